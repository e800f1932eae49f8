import { ValueObject } from '../../../../shared/domain/base/value-object.base';

export type DiscountTypeValue = 'fixed' | 'percentage' | 'none' | 'conflicting';

export type DiscountProps =
    | { readonly type: 'fixed'; readonly amountCents: number }
    | { readonly type: 'percentage'; readonly percentage: number }
    | { readonly type: 'none' }
    // Legacy rows with both columns set; never created by issuance.
    | { readonly type: 'conflicting'; readonly amountCents: number; readonly percentage: number };

/**
 * Column pair used by storage; both set is a corrupt record.
 */
export interface DiscountColumns {
    fixedAmountCents: number | null;
    percentage: number | null;
}

export class Discount extends ValueObject<DiscountProps> {
    private constructor(props: DiscountProps) {
        super(props);
    }

    get type(): DiscountTypeValue {
        return this.props.type;
    }

    get terms(): DiscountProps {
        return this.props;
    }

    get isConflicting(): boolean {
        return this.props.type === 'conflicting';
    }

    static fixed(amountCents: number): Discount {
        if (!Number.isInteger(amountCents) || amountCents <= 0) {
            throw new Error('Fixed discount must be a positive amount of cents');
        }
        return new Discount({ type: 'fixed', amountCents });
    }

    static percentage(percentage: number): Discount {
        if (!Number.isFinite(percentage) || percentage <= 0 || percentage > 100) {
            throw new Error('Percentage discount must be greater than 0 and at most 100');
        }
        return new Discount({ type: 'percentage', percentage });
    }

    static none(): Discount {
        return new Discount({ type: 'none' });
    }

    static fromColumns(columns: DiscountColumns): Discount {
        if (columns.fixedAmountCents !== null && columns.percentage !== null) {
            throw new Error('Both fixed amount and percentage discount are set');
        }
        if (columns.fixedAmountCents !== null) return Discount.fixed(columns.fixedAmountCents);
        if (columns.percentage !== null) return Discount.percentage(columns.percentage);
        return Discount.none();
    }

    /**
     * Like `fromColumns`, but a row with both columns set loads as a
     * conflicting discount instead of failing.
     */
    static fromStoredColumns(columns: DiscountColumns): Discount {
        if (columns.fixedAmountCents !== null && columns.percentage !== null) {
            return new Discount({
                type: 'conflicting',
                amountCents: columns.fixedAmountCents,
                percentage: columns.percentage,
            });
        }
        return Discount.fromColumns(columns);
    }

    toColumns(): DiscountColumns {
        switch (this.props.type) {
            case 'fixed':
                return { fixedAmountCents: this.props.amountCents, percentage: null };
            case 'percentage':
                return { fixedAmountCents: null, percentage: this.props.percentage };
            case 'none':
                return { fixedAmountCents: null, percentage: null };
            case 'conflicting':
                return { fixedAmountCents: this.props.amountCents, percentage: this.props.percentage };
        }
    }

    /**
     * Discount for a purchase, never more than the purchase itself.
     */
    calculateDiscountCents(purchaseCents: number): number {
        switch (this.props.type) {
            case 'fixed':
                return Math.min(this.props.amountCents, purchaseCents);
            case 'percentage':
                return Math.min(Math.round(purchaseCents * (this.props.percentage / 100)), purchaseCents);
            case 'none':
            case 'conflicting':
                return 0;
        }
    }

    describe(raffleTickets: number): string {
        switch (this.props.type) {
            case 'fixed':
                return `Fixed discount: ${formatCents(this.props.amountCents)}`;
            case 'percentage':
                return `Percentage discount: ${this.props.percentage}%`;
            case 'none':
                return raffleTickets > 0
                    ? `Raffle tickets only: ${raffleTickets} tickets`
                    : 'No discount information available';
            case 'conflicting':
                return 'Conflicting discount terms';
        }
    }

    protected equalsCore(other: Discount): boolean {
        const a = this.toColumns();
        const b = other.toColumns();
        return a.fixedAmountCents === b.fixedAmountCents && a.percentage === b.percentage;
    }
}

export function formatCents(cents: number): string {
    return (cents / 100).toFixed(2);
}
