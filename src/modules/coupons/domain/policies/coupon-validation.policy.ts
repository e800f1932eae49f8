import type { Coupon } from '../aggregates/coupon.aggregate';
import { formatCents } from '../value-objects/discount.vo';
import type {
    CouponViolation,
    RedemptionContext,
    TokenCheckResult,
} from '../interfaces/validation.interface';

/**
 * The slice of a campaign the eligibility rules look at.
 */
export interface CampaignSnapshot {
    id: number;
    isActive: boolean;
}

export interface CouponStateContext {
    coupon: Coupon;
    now: Date;
}

export interface CouponEvaluationContext extends CouponStateContext {
    token: TokenCheckResult;
    campaign: CampaignSnapshot | null;
    redemption: RedemptionContext;
}

type Check<C> = (ctx: C) => CouponViolation | null;

export const VIOLATION_MESSAGES = {
    NOT_FOUND: 'Coupon not found',
    MALFORMED_TOKEN: 'Invalid coupon token format',
    SIGNATURE_INVALID: 'Invalid coupon token signature - possible tampering detected',
    TOKEN_STALE: 'Coupon token has expired due to age',
    NOT_YET_VALID: 'Coupon is not yet valid',
    EXPIRED: 'Coupon has expired',
    USAGE_LIMIT_REACHED: 'Coupon has reached maximum usage limit',
    DISCOUNT_TERMS_CONFLICT: 'Coupon has conflicting discount terms',
    CAMPAIGN_INACTIVE: 'Campaign is not active',
    STATION_MISMATCH: 'Coupon is not valid at this station',
    FUEL_TYPE_MISMATCH: 'Coupon is not valid for this fuel type',
    CONCURRENT_MODIFICATION: 'Coupon was modified concurrently, please re-validate',
} as const;

const TOKEN_CHECKS: readonly Check<CouponEvaluationContext>[] = [
    ({ token }) => token.wellFormed
        ? null
        : { kind: 'MALFORMED_TOKEN', message: VIOLATION_MESSAGES.MALFORMED_TOKEN },
    ({ token }) => token.signatureValid
        ? null
        : { kind: 'SIGNATURE_INVALID', message: VIOLATION_MESSAGES.SIGNATURE_INVALID },
    ({ token }) => token.stale
        ? { kind: 'TOKEN_STALE', message: VIOLATION_MESSAGES.TOKEN_STALE }
        : null,
];

const STATE_CHECKS: readonly Check<CouponStateContext>[] = [
    ({ coupon }) => coupon.status.isActive
        ? null
        : {
            kind: 'STATUS_NOT_ACTIVE',
            message: `Coupon is not active (status: ${coupon.status.value})`,
            details: { status: coupon.status.value },
        },
    ({ coupon, now }) => {
        if (coupon.validity.isNotYetValid(now)) {
            return {
                kind: 'NOT_YET_VALID',
                message: VIOLATION_MESSAGES.NOT_YET_VALID,
                details: { validFrom: coupon.validity.validFrom.toISOString() },
            };
        }
        if (coupon.validity.hasExpired(now)) {
            return {
                kind: 'EXPIRED',
                message: VIOLATION_MESSAGES.EXPIRED,
                details: { validUntil: coupon.validity.validUntil.toISOString() },
            };
        }
        return null;
    },
    ({ coupon }) => coupon.usage.isExhausted
        ? {
            kind: 'USAGE_LIMIT_REACHED',
            message: VIOLATION_MESSAGES.USAGE_LIMIT_REACHED,
            details: { currentUses: coupon.usage.currentUses, maxUses: coupon.usage.maxUses },
        }
        : null,
    // Which discount to grant is undecidable, so the coupon cannot be redeemed.
    ({ coupon }) => coupon.discount.isConflicting
        ? {
            kind: 'DISCOUNT_TERMS_CONFLICT',
            message: VIOLATION_MESSAGES.DISCOUNT_TERMS_CONFLICT,
            details: { ...coupon.discount.toColumns() },
        }
        : null,
];

const CONTEXT_CHECKS: readonly Check<CouponEvaluationContext>[] = [
    // A missing campaign is reported as inactive.
    ({ campaign }) => campaign?.isActive
        ? null
        : { kind: 'CAMPAIGN_INACTIVE', message: VIOLATION_MESSAGES.CAMPAIGN_INACTIVE },
    ({ coupon, redemption }) => coupon.appliesToStation(redemption.stationId)
        ? null
        : {
            kind: 'STATION_MISMATCH',
            message: VIOLATION_MESSAGES.STATION_MISMATCH,
            details: { stationId: redemption.stationId },
        },
    ({ coupon, redemption }) => {
        if (redemption.fuelType === undefined) return null;
        return coupon.appliesToFuelType(redemption.fuelType)
            ? null
            : {
                kind: 'FUEL_TYPE_MISMATCH',
                message: VIOLATION_MESSAGES.FUEL_TYPE_MISMATCH,
                details: { fuelType: redemption.fuelType },
            };
    },
    ({ coupon, redemption }) => {
        const minimum = coupon.minimumPurchaseCents;
        if (redemption.purchaseAmountCents === undefined || minimum === null) return null;
        return coupon.meetsMinimumPurchase(redemption.purchaseAmountCents)
            ? null
            : {
                kind: 'MINIMUM_PURCHASE_NOT_MET',
                message: `Purchase amount does not meet minimum requirement of ${formatCents(minimum)}`,
                details: { purchaseAmountCents: redemption.purchaseAmountCents, minimumPurchaseCents: minimum },
            };
    },
];

function runChecks<C>(checks: readonly Check<C>[], ctx: C): CouponViolation[] {
    const violations: CouponViolation[] = [];
    for (const check of checks) {
        const violation = check(ctx);
        if (violation) violations.push(violation);
    }
    return violations;
}

/**
 * Domain Policy: Coupon Validation
 * Ordered eligibility rules for a resolved coupon. Every rule runs; the
 * result lists all violations in rule order.
 */
export class CouponValidationPolicy {
    static evaluate(ctx: CouponEvaluationContext): CouponViolation[] {
        return [
            ...runChecks(TOKEN_CHECKS, ctx),
            ...runChecks(STATE_CHECKS, ctx),
            ...runChecks(CONTEXT_CHECKS, ctx),
        ];
    }

    /**
     * Status, date window, usage and discount terms only; re-run against a fresh read
     * right before a use is consumed.
     */
    static evaluateConsumption(ctx: CouponStateContext): CouponViolation[] {
        return runChecks(STATE_CHECKS, ctx);
    }

    static notFound(): CouponViolation {
        return { kind: 'NOT_FOUND', message: VIOLATION_MESSAGES.NOT_FOUND };
    }

    static concurrentModification(attempts: number): CouponViolation {
        return {
            kind: 'CONCURRENT_MODIFICATION',
            message: VIOLATION_MESSAGES.CONCURRENT_MODIFICATION,
            details: { attempts },
        };
    }

    static canBeUsed(coupon: Coupon, violations: readonly CouponViolation[]): boolean {
        return violations.length === 0 && coupon.hasRemainingUses;
    }

    static isAuthenticated(token: TokenCheckResult): boolean {
        return token.wellFormed && token.signatureValid;
    }
}
