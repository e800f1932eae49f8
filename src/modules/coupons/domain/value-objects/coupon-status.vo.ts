import { ValueObject } from '../../../../shared/domain/base/value-object.base';

export type CouponStatusValue = 'ACTIVE' | 'INACTIVE' | 'EXPIRED' | 'USED_UP' | 'CANCELLED';

export const COUPON_STATUSES: readonly CouponStatusValue[] = ['ACTIVE', 'INACTIVE', 'EXPIRED', 'USED_UP', 'CANCELLED'];

export const TERMINAL_COUPON_STATUSES: readonly CouponStatusValue[] = ['EXPIRED', 'USED_UP', 'CANCELLED'];

const TRANSITIONS: Record<CouponStatusValue, readonly CouponStatusValue[]> = {
    ACTIVE: ['INACTIVE', 'EXPIRED', 'USED_UP', 'CANCELLED'],
    INACTIVE: ['ACTIVE', 'EXPIRED', 'CANCELLED'],
    EXPIRED: [],
    USED_UP: [],
    CANCELLED: [],
};

interface CouponStatusProps {
    readonly value: CouponStatusValue;
}

export class CouponStatus extends ValueObject<CouponStatusProps> {
    private constructor(props: CouponStatusProps) {
        super(props);
    }

    get value(): CouponStatusValue {
        return this.props.value;
    }

    get isActive(): boolean {
        return this.props.value === 'ACTIVE';
    }

    static active(): CouponStatus {
        return new CouponStatus({ value: 'ACTIVE' });
    }

    static of(value: CouponStatusValue): CouponStatus {
        return new CouponStatus({ value });
    }

    static fromString(value: string): CouponStatus {
        const match = COUPON_STATUSES.find(status => status === value);
        if (!match) {
            throw new Error(`Invalid coupon status: ${value}`);
        }
        return new CouponStatus({ value: match });
    }

    canTransitionTo(next: CouponStatusValue): boolean {
        return TRANSITIONS[this.props.value].includes(next);
    }

    protected equalsCore(other: CouponStatus): boolean {
        return this.props.value === other.props.value;
    }
}
