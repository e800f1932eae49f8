/**
 * Stored shape of a coupon, before it is trusted as an aggregate.
 * The integrity audit works on this shape so rows that cannot be
 * reconstituted (both discount columns set, inverted windows) are still inspected.
 */
export interface CouponRecord {
    id: string;
    campaignId: number;
    token: string;
    tokenSignature: string;
    couponCode: string;
    issuedAt: Date;
    status: string;
    validFrom: Date;
    validUntil: Date;
    fixedDiscountCents: number | null;
    discountPercentage: number | null;
    minimumPurchaseCents: number | null;
    applicableFuelTypes: string[];
    applicableStations: string[];
    maxUses: number | null;
    currentUses: number;
    raffleTickets: number;
    termsAndConditions: string | null;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Issuance fields covered by the token signature. Never mutated after issuance.
 */
export interface SignedCouponFields {
    campaignId: number;
    couponCode: string;
    issuedAt: Date;
}
