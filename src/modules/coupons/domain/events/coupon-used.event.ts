import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';

export class CouponUsedEvent extends DomainEvent {
    constructor(
        public readonly couponId: string,
        public readonly campaignId: number,
        public readonly couponCode: string,
        public readonly currentUses: number,
        public readonly remainingUses: number | null,
        public readonly stationId: string | undefined,
        occurredOn: Date,
    ) {
        super('coupon.used', occurredOn);
    }

    toPayload(): Record<string, unknown> {
        return {
            couponId: this.couponId,
            campaignId: this.campaignId,
            couponCode: this.couponCode,
            currentUses: this.currentUses,
            remainingUses: this.remainingUses,
            stationId: this.stationId,
            usedOn: this.occurredOn,
        };
    }
}
