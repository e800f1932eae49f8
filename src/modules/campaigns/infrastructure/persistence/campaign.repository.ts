import { Inject, Injectable } from '@nestjs/common';
import { DatabaseClient } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { Campaign } from '../../domain/aggregates/campaign.aggregate';
import type { ICampaignRepository } from '../../domain/repositories/campaign.repository.interface';
import { CampaignMapper, CampaignRow } from './campaign.mapper';

@Injectable()
export class CampaignRepository implements ICampaignRepository {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: DatabaseClient,
    ) { }

    async findById(id: number): Promise<Campaign | null> {
        const result = await this.db.query<CampaignRow>(
            'SELECT * FROM campaigns WHERE id = $1',
            [id],
        );
        if (result.rows.length === 0) return null;
        return CampaignMapper.toDomain(result.rows[0]);
    }

    async reserveCouponAllocation(id: number, count: number): Promise<number | null> {
        const result = await this.db.query<{ generated_coupons: number }>(
            `UPDATE campaigns
            SET generated_coupons = generated_coupons + $2, updated_at = NOW()
            WHERE id = $1
                AND status IN ('DRAFT', 'ACTIVE')
                AND (max_coupons IS NULL OR generated_coupons + $2 <= max_coupons)
            RETURNING generated_coupons`,
            [id, count],
        );
        if (result.rows.length === 0) return null;
        return result.rows[0].generated_coupons - count;
    }

    async releaseCouponAllocation(id: number, count: number): Promise<void> {
        await this.db.query(
            `UPDATE campaigns
            SET generated_coupons = GREATEST(generated_coupons - $2, 0), updated_at = NOW()
            WHERE id = $1`,
            [id, count],
        );
    }

    async incrementUsedCoupons(id: number): Promise<void> {
        await this.db.query(
            'UPDATE campaigns SET used_coupons = used_coupons + 1, updated_at = NOW() WHERE id = $1',
            [id],
        );
    }
}
