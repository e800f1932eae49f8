import { randomInt } from 'node:crypto';
import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface CouponCodeProps {
    readonly value: string;
}

// No 0/O or 1/I: codes are read aloud at the pump.
const CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
const GENERATED_CODE_LENGTH = 10;

export const COUPON_CODE_PATTERN = /^[A-Z0-9-]{6,50}$/;

export class CouponCode extends ValueObject<CouponCodeProps> {
    private constructor(props: CouponCodeProps) {
        super(props);
    }

    get value(): string {
        return this.props.value;
    }

    static create(code: string): CouponCode {
        if (!code || code.trim().length === 0) {
            throw new Error('Coupon code cannot be empty');
        }
        const normalizedCode = code.toUpperCase().trim();
        if (normalizedCode.length < 6 || normalizedCode.length > 50) {
            throw new Error('Coupon code must be between 6 and 50 characters');
        }
        if (!COUPON_CODE_PATTERN.test(normalizedCode)) {
            throw new Error('Coupon code can only contain letters, numbers, and hyphens');
        }
        return new CouponCode({ value: normalizedCode });
    }

    static generate(prefix?: string): CouponCode {
        let random = '';
        for (let i = 0; i < GENERATED_CODE_LENGTH; i++) {
            random += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
        }
        return CouponCode.create(prefix ? `${prefix}-${random}` : random);
    }

    protected equalsCore(other: CouponCode): boolean {
        return this.props.value === other.props.value;
    }
}
