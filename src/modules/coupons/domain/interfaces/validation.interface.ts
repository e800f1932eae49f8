import type { Coupon } from '../aggregates/coupon.aggregate';

export type CouponViolationKind =
    | 'NOT_FOUND'
    | 'MALFORMED_TOKEN'
    | 'SIGNATURE_INVALID'
    | 'TOKEN_STALE'
    | 'STATUS_NOT_ACTIVE'
    | 'NOT_YET_VALID'
    | 'EXPIRED'
    | 'USAGE_LIMIT_REACHED'
    | 'DISCOUNT_TERMS_CONFLICT'
    | 'CAMPAIGN_INACTIVE'
    | 'STATION_MISMATCH'
    | 'FUEL_TYPE_MISMATCH'
    | 'MINIMUM_PURCHASE_NOT_MET'
    | 'CONCURRENT_MODIFICATION';

export interface CouponViolation {
    readonly kind: CouponViolationKind;
    readonly message: string;
    readonly details?: Record<string, unknown>;
}

export interface RedemptionContext {
    stationId: string;
    fuelType?: string;
    purchaseAmountCents?: number;
}

/**
 * Results of the cryptographic and structural token checks, computed
 * before the business rules run.
 */
export interface TokenCheckResult {
    wellFormed: boolean;
    signatureValid: boolean;
    stale: boolean;
}

export interface CouponNotFoundOutcome {
    readonly outcome: 'NOT_FOUND';
    readonly isValid: false;
    readonly canBeUsed: false;
    readonly authenticated: false;
    readonly coupon: null;
    readonly violations: readonly CouponViolation[];
}

export interface CouponEvaluatedOutcome {
    readonly outcome: 'EVALUATED';
    readonly isValid: boolean;
    readonly canBeUsed: boolean;
    /** False when format or signature failed: the other violations then describe an untrusted record. */
    readonly authenticated: boolean;
    readonly coupon: Coupon;
    readonly violations: readonly CouponViolation[];
}

export type CouponValidationOutcome = CouponNotFoundOutcome | CouponEvaluatedOutcome;

export interface PreValidationResult {
    exists: boolean;
    isActive: boolean;
    isExpired: boolean;
    campaignId: number | null;
    campaignName: string | null;
    discountInfo: string | null;
}

export interface CouponUsageStats {
    couponId: string;
    couponCode: string;
    currentUses: number;
    maxUses: number | null;
    remainingUses: number | null;
    usageRate: number | null;
    isMaxUsesReached: boolean;
}

export type CouponConsumptionResult =
    | {
        readonly consumed: true;
        readonly coupon: Coupon;
        readonly discountAppliedCents: number | null;
        readonly raffleTicketsGranted: number;
    }
    | {
        readonly consumed: false;
        readonly coupon: Coupon | null;
        readonly violations: readonly CouponViolation[];
    };
