import { CampaignStatus } from '../value-objects/campaign-status.vo';
import { buildCampaign } from '../../../coupons/testing/coupon.fixtures';

describe('Campaign', () => {
    it('issues without limit when uncapped', () => {
        const campaign = buildCampaign();

        expect(campaign.remainingCapacity).toBeNull();
        expect(campaign.canIssue(10_000)).toBe(true);
    });

    it('issues up to its cap', () => {
        const campaign = buildCampaign(1, { maxCoupons: 100, generatedCoupons: 95 });

        expect(campaign.remainingCapacity).toBe(5);
        expect(campaign.canIssue(5)).toBe(true);
        expect(campaign.canIssue(6)).toBe(false);
    });

    it('issues while DRAFT but is only active when ACTIVE', () => {
        const draft = buildCampaign(1, { status: CampaignStatus.of('DRAFT') });

        expect(draft.canIssue(1)).toBe(true);
        expect(draft.isActive).toBe(false);
    });

    it.each(['PAUSED', 'COMPLETED', 'CANCELLED'] as const)('stops issuing when %s', (status) => {
        expect(buildCampaign(1, { status: CampaignStatus.of(status) }).canIssue(1)).toBe(false);
    });

    it('requires a positive integer id', () => {
        expect(() => buildCampaign(0)).toThrow('Campaign id must be a positive integer');
    });

    it('rejects unknown stored statuses', () => {
        expect(() => CampaignStatus.fromString('ARCHIVED')).toThrow('Invalid campaign status: ARCHIVED');
    });
});
