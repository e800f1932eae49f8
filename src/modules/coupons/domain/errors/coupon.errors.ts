export abstract class CouponDomainError extends Error {
    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidCouponTransitionError extends CouponDomainError {
    constructor(
        public readonly from: string,
        public readonly to: string,
    ) {
        super(`Coupon cannot transition from ${from} to ${to}`);
    }
}

export class CouponNotUsableError extends CouponDomainError {
    constructor(reason: string) {
        super(`Coupon cannot be used: ${reason}`);
    }
}

export class InvalidTokenFormatError extends CouponDomainError {
    constructor() {
        super('Invalid coupon token format');
    }
}

/**
 * Raised when a stored coupon row cannot be turned into an aggregate,
 * e.g. a status this engine does not know.
 */
export class CorruptCouponRecordError extends CouponDomainError {
    constructor(
        public readonly couponId: string,
        reason: string,
    ) {
        super(`Coupon record ${couponId} is corrupt: ${reason}`);
    }
}

export class SigningKeyUnavailableError extends CouponDomainError {
    constructor(purpose: string) {
        super(`No signing key configured for ${purpose}`);
    }
}
