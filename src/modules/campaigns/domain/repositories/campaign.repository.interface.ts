import { Campaign } from '../aggregates/campaign.aggregate';

export const CAMPAIGN_REPOSITORY = Symbol('CAMPAIGN_REPOSITORY');

export interface ICampaignRepository {
    findById(id: number): Promise<Campaign | null>;
    /**
     * Atomically adds `count` to the generated counter when the campaign is
     * still issuing and has room. Returns the counter value before the
     * reservation, or null when nothing was reserved.
     */
    reserveCouponAllocation(id: number, count: number): Promise<number | null>;
    releaseCouponAllocation(id: number, count: number): Promise<void>;
    incrementUsedCoupons(id: number): Promise<void>;
}
