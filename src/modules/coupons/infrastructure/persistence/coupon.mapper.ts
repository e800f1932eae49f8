import { Coupon } from '../../domain/aggregates/coupon.aggregate';
import { CorruptCouponRecordError } from '../../domain/errors/coupon.errors';
import type { CouponRecord } from '../../domain/interfaces/coupon-record.interface';
import {
    CouponCode,
    CouponStatus,
    Discount,
    UsageLimit,
    ValidityWindow,
} from '../../domain/value-objects/index';

export interface CouponRow {
    id: string;
    campaign_id: number;
    token: string;
    token_signature: string;
    coupon_code: string;
    issued_at: Date;
    status: string;
    valid_from: Date;
    valid_until: Date;
    fixed_discount_cents: number | null;
    // NUMERIC comes back from pg as a string
    discount_percentage: string | number | null;
    minimum_purchase_cents: number | null;
    applicable_fuel_types: string[] | null;
    applicable_stations: string[] | null;
    max_uses: number | null;
    current_uses: number;
    raffle_tickets: number;
    terms_and_conditions: string | null;
    created_at: Date;
    updated_at: Date;
}

export class CouponMapper {
    static fromRow(row: CouponRow): CouponRecord {
        return {
            id: row.id,
            campaignId: row.campaign_id,
            token: row.token,
            tokenSignature: row.token_signature,
            couponCode: row.coupon_code,
            issuedAt: row.issued_at,
            status: row.status,
            validFrom: row.valid_from,
            validUntil: row.valid_until,
            fixedDiscountCents: row.fixed_discount_cents,
            discountPercentage: row.discount_percentage === null ? null : Number(row.discount_percentage),
            minimumPurchaseCents: row.minimum_purchase_cents,
            applicableFuelTypes: row.applicable_fuel_types ?? [],
            applicableStations: row.applicable_stations ?? [],
            maxUses: row.max_uses,
            currentUses: row.current_uses,
            raffleTickets: row.raffle_tickets,
            termsAndConditions: row.terms_and_conditions,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
        };
    }

    /**
     * @throws CorruptCouponRecordError when the record breaks an aggregate invariant
     */
    static toDomain(record: CouponRecord): Coupon {
        try {
            return Coupon.reconstitute(record.id, {
                campaignId: record.campaignId,
                token: record.token,
                tokenSignature: record.tokenSignature,
                couponCode: CouponCode.create(record.couponCode),
                issuedAt: record.issuedAt,
                status: CouponStatus.fromString(record.status),
                validity: ValidityWindow.reconstitute(record.validFrom, record.validUntil),
                discount: Discount.fromStoredColumns({
                    fixedAmountCents: record.fixedDiscountCents,
                    percentage: record.discountPercentage,
                }),
                minimumPurchaseCents: record.minimumPurchaseCents,
                applicableFuelTypes: [...record.applicableFuelTypes],
                applicableStations: [...record.applicableStations],
                usage: UsageLimit.reconstitute(record.maxUses, record.currentUses),
                raffleTickets: record.raffleTickets,
                termsAndConditions: record.termsAndConditions,
                createdAt: record.createdAt,
                updatedAt: record.updatedAt,
            });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new CorruptCouponRecordError(record.id, reason);
        }
    }

    static toRecord(coupon: Coupon): CouponRecord {
        const discount = coupon.discount.toColumns();
        return {
            id: coupon.id,
            campaignId: coupon.campaignId,
            token: coupon.token,
            tokenSignature: coupon.tokenSignature,
            couponCode: coupon.couponCode.value,
            issuedAt: coupon.issuedAt,
            status: coupon.status.value,
            validFrom: coupon.validity.validFrom,
            validUntil: coupon.validity.validUntil,
            fixedDiscountCents: discount.fixedAmountCents,
            discountPercentage: discount.percentage,
            minimumPurchaseCents: coupon.minimumPurchaseCents,
            applicableFuelTypes: [...coupon.applicableFuelTypes],
            applicableStations: [...coupon.applicableStations],
            maxUses: coupon.usage.maxUses,
            currentUses: coupon.usage.currentUses,
            raffleTickets: coupon.raffleTickets,
            termsAndConditions: coupon.termsAndConditions,
            createdAt: coupon.createdAt,
            updatedAt: coupon.updatedAt,
        };
    }

    static toPersistence(record: CouponRecord): unknown[] {
        return [
            record.id,
            record.campaignId,
            record.token,
            record.tokenSignature,
            record.couponCode,
            record.issuedAt,
            record.status,
            record.validFrom,
            record.validUntil,
            record.fixedDiscountCents,
            record.discountPercentage,
            record.minimumPurchaseCents,
            record.applicableFuelTypes,
            record.applicableStations,
            record.maxUses,
            record.currentUses,
            record.raffleTickets,
            record.termsAndConditions,
            record.createdAt,
            record.updatedAt,
        ];
    }
}
