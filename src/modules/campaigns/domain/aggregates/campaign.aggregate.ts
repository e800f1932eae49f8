import { Entity } from '../../../../shared/domain/base/entity.base';
import { Discount } from '../../../coupons/domain/value-objects/discount.vo';
import { ValidityWindow } from '../../../coupons/domain/value-objects/validity-window.vo';
import { CampaignStatus } from '../value-objects/campaign-status.vo';

export interface CampaignProps {
    name: string;
    status: CampaignStatus;
    validity: ValidityWindow;
    defaultDiscount: Discount;
    defaultRaffleTickets: number;
    maxCoupons: number | null;
    generatedCoupons: number;
    usedCoupons: number;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Campaign as seen by the coupon engine. Lifecycle administration lives
 * elsewhere; here it is read, and only its counters move.
 */
export class Campaign extends Entity<CampaignProps, number> {
    private constructor(id: number, props: CampaignProps) {
        super(id, props);
    }

    get name(): string { return this.props.name; }
    get status(): CampaignStatus { return this.props.status; }
    get validity(): ValidityWindow { return this.props.validity; }
    get defaultDiscount(): Discount { return this.props.defaultDiscount; }
    get defaultRaffleTickets(): number { return this.props.defaultRaffleTickets; }
    get maxCoupons(): number | null { return this.props.maxCoupons; }
    get generatedCoupons(): number { return this.props.generatedCoupons; }
    get usedCoupons(): number { return this.props.usedCoupons; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }

    get isActive(): boolean {
        return this.props.status.isActive;
    }

    get remainingCapacity(): number | null {
        if (this.props.maxCoupons === null) return null;
        return Math.max(0, this.props.maxCoupons - this.props.generatedCoupons);
    }

    static reconstitute(id: number, props: CampaignProps): Campaign {
        if (!Number.isInteger(id) || id < 1) {
            throw new Error('Campaign id must be a positive integer');
        }
        return new Campaign(id, props);
    }

    canIssue(count: number): boolean {
        if (!this.props.status.allowsIssuance) return false;
        const remaining = this.remainingCapacity;
        return remaining === null || count <= remaining;
    }
}
