import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface UsageLimitProps {
    readonly maxUses: number | null;
    readonly currentUses: number;
}

/**
 * Use counter against an optional ceiling; `maxUses` null means unlimited.
 */
export class UsageLimit extends ValueObject<UsageLimitProps> {
    private constructor(props: UsageLimitProps) {
        super(props);
    }

    get maxUses(): number | null {
        return this.props.maxUses;
    }

    get currentUses(): number {
        return this.props.currentUses;
    }

    get remaining(): number | null {
        if (this.props.maxUses === null) return null;
        return Math.max(0, this.props.maxUses - this.props.currentUses);
    }

    get isExhausted(): boolean {
        return this.props.maxUses !== null && this.props.currentUses >= this.props.maxUses;
    }

    static create(maxUses: number | null, currentUses: number = 0): UsageLimit {
        if (maxUses !== null && (!Number.isInteger(maxUses) || maxUses < 1)) {
            throw new Error('Max uses must be a positive integer');
        }
        if (!Number.isInteger(currentUses) || currentUses < 0) {
            throw new Error('Current uses cannot be negative');
        }
        if (maxUses !== null && currentUses > maxUses) {
            throw new Error(`Current uses (${currentUses}) exceed max uses (${maxUses})`);
        }
        return new UsageLimit({ maxUses, currentUses });
    }

    /**
     * Stored counters as they are, overrun included; an overrun limit is
     * exhausted.
     */
    static reconstitute(maxUses: number | null, currentUses: number): UsageLimit {
        return new UsageLimit({ maxUses, currentUses });
    }

    recordUse(): UsageLimit {
        if (this.isExhausted) {
            throw new Error('Maximum usage limit reached');
        }
        return new UsageLimit({
            maxUses: this.props.maxUses,
            currentUses: this.props.currentUses + 1,
        });
    }

    protected equalsCore(other: UsageLimit): boolean {
        return this.props.maxUses === other.props.maxUses &&
            this.props.currentUses === other.props.currentUses;
    }
}
