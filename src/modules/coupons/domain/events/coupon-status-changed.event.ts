import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';
import type { CouponStatusValue } from '../value-objects/coupon-status.vo';

export class CouponStatusChangedEvent extends DomainEvent {
    constructor(
        public readonly couponId: string,
        public readonly from: CouponStatusValue,
        public readonly to: CouponStatusValue,
        public readonly reason: string | undefined,
        occurredOn: Date,
    ) {
        super('coupon.status_changed', occurredOn);
    }

    toPayload(): Record<string, unknown> {
        return {
            couponId: this.couponId,
            from: this.from,
            to: this.to,
            reason: this.reason,
            changedOn: this.occurredOn,
        };
    }
}
