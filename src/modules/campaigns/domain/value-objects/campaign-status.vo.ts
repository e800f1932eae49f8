import { ValueObject } from '../../../../shared/domain/base/value-object.base';

export type CampaignStatusValue = 'DRAFT' | 'ACTIVE' | 'PAUSED' | 'COMPLETED' | 'CANCELLED';

export const CAMPAIGN_STATUSES: readonly CampaignStatusValue[] = ['DRAFT', 'ACTIVE', 'PAUSED', 'COMPLETED', 'CANCELLED'];

// Coupons may be generated ahead of launch.
export const ISSUING_CAMPAIGN_STATUSES: readonly CampaignStatusValue[] = ['DRAFT', 'ACTIVE'];

interface CampaignStatusProps {
    readonly value: CampaignStatusValue;
}

export class CampaignStatus extends ValueObject<CampaignStatusProps> {
    private constructor(props: CampaignStatusProps) {
        super(props);
    }

    get value(): CampaignStatusValue {
        return this.props.value;
    }

    get isActive(): boolean {
        return this.props.value === 'ACTIVE';
    }

    get allowsIssuance(): boolean {
        return ISSUING_CAMPAIGN_STATUSES.includes(this.props.value);
    }

    static of(value: CampaignStatusValue): CampaignStatus {
        return new CampaignStatus({ value });
    }

    static fromString(value: string): CampaignStatus {
        const match = CAMPAIGN_STATUSES.find(status => status === value);
        if (!match) {
            throw new Error(`Invalid campaign status: ${value}`);
        }
        return new CampaignStatus({ value: match });
    }

    protected equalsCore(other: CampaignStatus): boolean {
        return this.props.value === other.props.value;
    }
}
