import { Inject, Injectable } from '@nestjs/common';
import { DatabaseClient } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { Coupon } from '../../domain/aggregates/coupon.aggregate';
import type { CouponRecord } from '../../domain/interfaces/coupon-record.interface';
import type {
    ExpectedUsageState,
    ICouponRepository,
} from '../../domain/repositories/coupon.repository.interface';
import type { CouponStatusValue } from '../../domain/value-objects/coupon-status.vo';
import { CouponMapper, CouponRow } from './coupon.mapper';

const INSERT_COUPON = `INSERT INTO coupons (
    id, campaign_id, token, token_signature, coupon_code, issued_at, status,
    valid_from, valid_until, fixed_discount_cents, discount_percentage,
    minimum_purchase_cents, applicable_fuel_types, applicable_stations,
    max_uses, current_uses, raffle_tickets, terms_and_conditions,
    created_at, updated_at
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20)`;

@Injectable()
export class CouponRepository implements ICouponRepository {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: DatabaseClient,
    ) { }

    async insertMany(coupons: readonly Coupon[]): Promise<void> {
        if (coupons.length === 0) return;

        await this.db.transaction(async (client) => {
            for (const coupon of coupons) {
                await client.query(INSERT_COUPON, CouponMapper.toPersistence(CouponMapper.toRecord(coupon)));
            }
        });
    }

    async findById(id: string): Promise<Coupon | null> {
        const record = await this.findRecordById(id);
        return record ? CouponMapper.toDomain(record) : null;
    }

    async findByToken(token: string): Promise<Coupon | null> {
        const result = await this.db.query<CouponRow>(
            'SELECT * FROM coupons WHERE token = $1',
            [token],
        );
        if (result.rows.length === 0) return null;
        return CouponMapper.toDomain(CouponMapper.fromRow(result.rows[0]));
    }

    async findByCouponCode(couponCode: string): Promise<Coupon | null> {
        const result = await this.db.query<CouponRow>(
            'SELECT * FROM coupons WHERE coupon_code = UPPER(TRIM($1))',
            [couponCode],
        );
        if (result.rows.length === 0) return null;
        return CouponMapper.toDomain(CouponMapper.fromRow(result.rows[0]));
    }

    async findRecordById(id: string): Promise<CouponRecord | null> {
        const result = await this.db.query<CouponRow>(
            'SELECT * FROM coupons WHERE id = $1',
            [id],
        );
        if (result.rows.length === 0) return null;
        return CouponMapper.fromRow(result.rows[0]);
    }

    async findRecordsByCampaign(campaignId: number): Promise<CouponRecord[]> {
        const result = await this.db.query<CouponRow>(
            'SELECT * FROM coupons WHERE campaign_id = $1 ORDER BY issued_at, id',
            [campaignId],
        );
        return result.rows.map(row => CouponMapper.fromRow(row));
    }

    async compareAndSetUsage(coupon: Coupon, expected: ExpectedUsageState): Promise<boolean> {
        const result = await this.db.query(
            `UPDATE coupons
            SET current_uses = $2, status = $3, updated_at = $4
            WHERE id = $1 AND current_uses = $5 AND status = $6`,
            [
                coupon.id,
                coupon.usage.currentUses,
                coupon.status.value,
                coupon.updatedAt,
                expected.currentUses,
                expected.status,
            ],
        );
        return (result.rowCount ?? 0) === 1;
    }

    async compareAndSetStatus(
        id: string,
        expected: CouponStatusValue,
        next: CouponStatusValue,
        at: Date,
    ): Promise<boolean> {
        const result = await this.db.query(
            'UPDATE coupons SET status = $3, updated_at = $4 WHERE id = $1 AND status = $2',
            [id, expected, next, at],
        );
        return (result.rowCount ?? 0) === 1;
    }

    async expireOverdue(now: Date): Promise<string[]> {
        const result = await this.db.query<{ id: string }>(
            `UPDATE coupons
            SET status = 'EXPIRED', updated_at = $1
            WHERE valid_until < $1 AND status IN ('ACTIVE', 'INACTIVE')
            RETURNING id`,
            [now],
        );
        return result.rows.map(row => row.id);
    }
}
