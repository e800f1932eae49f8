import { Coupon } from '../aggregates/coupon.aggregate';
import type { CouponRecord } from '../interfaces/coupon-record.interface';
import type { CouponStatusValue } from '../value-objects/coupon-status.vo';

export const COUPON_REPOSITORY = Symbol('COUPON_REPOSITORY');

export interface ExpectedUsageState {
    currentUses: number;
    status: CouponStatusValue;
}

/**
 * Coupon persistence contract.
 *
 * The compare-and-set operations are the only writes after issuance. Each
 * must apply atomically at the storage boundary and report `false`, without
 * writing, when the stored row no longer matches the expected state.
 */
export interface ICouponRepository {
    insertMany(coupons: readonly Coupon[]): Promise<void>;
    findById(id: string): Promise<Coupon | null>;
    findByToken(token: string): Promise<Coupon | null>;
    findByCouponCode(couponCode: string): Promise<Coupon | null>;
    findRecordById(id: string): Promise<CouponRecord | null>;
    findRecordsByCampaign(campaignId: number): Promise<CouponRecord[]>;
    compareAndSetUsage(coupon: Coupon, expected: ExpectedUsageState): Promise<boolean>;
    compareAndSetStatus(
        id: string,
        expected: CouponStatusValue,
        next: CouponStatusValue,
        at: Date,
    ): Promise<boolean>;
    /** Moves every non-terminal coupon with validUntil before `now` to EXPIRED; returns their ids. */
    expireOverdue(now: Date): Promise<string[]>;
}
