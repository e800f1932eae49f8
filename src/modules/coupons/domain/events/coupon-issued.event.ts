import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';

export class CouponIssuedEvent extends DomainEvent {
    constructor(
        public readonly couponId: string,
        public readonly campaignId: number,
        public readonly couponCode: string,
        occurredOn: Date,
    ) {
        super('coupon.issued', occurredOn);
    }

    toPayload(): Record<string, unknown> {
        return {
            couponId: this.couponId,
            campaignId: this.campaignId,
            couponCode: this.couponCode,
            issuedOn: this.occurredOn,
        };
    }
}
