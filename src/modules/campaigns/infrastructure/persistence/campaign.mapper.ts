import { Campaign } from '../../domain/aggregates/campaign.aggregate';
import { CampaignStatus } from '../../domain/value-objects/campaign-status.vo';
import { Discount } from '../../../coupons/domain/value-objects/discount.vo';
import { ValidityWindow } from '../../../coupons/domain/value-objects/validity-window.vo';

export interface CampaignRow {
    id: number;
    name: string;
    status: string;
    starts_at: Date;
    ends_at: Date;
    default_fixed_discount_cents: number | null;
    default_discount_percentage: string | number | null;
    default_raffle_tickets: number;
    max_coupons: number | null;
    generated_coupons: number;
    used_coupons: number;
    created_at: Date;
    updated_at: Date;
}

export class CampaignMapper {
    static toDomain(row: CampaignRow): Campaign {
        return Campaign.reconstitute(row.id, {
            name: row.name,
            status: CampaignStatus.fromString(row.status),
            validity: ValidityWindow.create(row.starts_at, row.ends_at),
            defaultDiscount: Discount.fromColumns({
                fixedAmountCents: row.default_fixed_discount_cents,
                percentage: row.default_discount_percentage === null ? null : Number(row.default_discount_percentage),
            }),
            defaultRaffleTickets: row.default_raffle_tickets,
            maxCoupons: row.max_coupons,
            generatedCoupons: row.generated_coupons,
            usedCoupons: row.used_coupons,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
        });
    }

    static toPersistence(campaign: Campaign): CampaignRow {
        const discount = campaign.defaultDiscount.toColumns();
        return {
            id: campaign.id,
            name: campaign.name,
            status: campaign.status.value,
            starts_at: campaign.validity.validFrom,
            ends_at: campaign.validity.validUntil,
            default_fixed_discount_cents: discount.fixedAmountCents,
            default_discount_percentage: discount.percentage,
            default_raffle_tickets: campaign.defaultRaffleTickets,
            max_coupons: campaign.maxCoupons,
            generated_coupons: campaign.generatedCoupons,
            used_coupons: campaign.usedCoupons,
            created_at: campaign.createdAt,
            updated_at: campaign.updatedAt,
        };
    }
}
