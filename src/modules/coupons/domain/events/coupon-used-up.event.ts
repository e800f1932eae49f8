import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';

export class CouponUsedUpEvent extends DomainEvent {
    constructor(
        public readonly couponId: string,
        public readonly campaignId: number,
        public readonly maxUses: number,
        occurredOn: Date,
    ) {
        super('coupon.used_up', occurredOn);
    }

    toPayload(): Record<string, unknown> {
        return {
            couponId: this.couponId,
            campaignId: this.campaignId,
            maxUses: this.maxUses,
            usedUpOn: this.occurredOn,
        };
    }
}
