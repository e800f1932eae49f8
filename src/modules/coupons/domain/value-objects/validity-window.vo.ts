import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface ValidityWindowProps {
    readonly validFrom: Date;
    readonly validUntil: Date;
}

export class ValidityWindow extends ValueObject<ValidityWindowProps> {
    private constructor(props: ValidityWindowProps) {
        super(props);
    }

    get validFrom(): Date { return this.props.validFrom; }
    get validUntil(): Date { return this.props.validUntil; }

    static create(validFrom: Date, validUntil: Date): ValidityWindow {
        if (validFrom.getTime() > validUntil.getTime()) {
            throw new Error('validFrom must be before or equal to validUntil');
        }
        return new ValidityWindow({ validFrom, validUntil });
    }

    /** Stored bounds without the ordering check; an inverted window never contains `now`. */
    static reconstitute(validFrom: Date, validUntil: Date): ValidityWindow {
        return new ValidityWindow({ validFrom, validUntil });
    }

    isNotYetValid(now: Date): boolean {
        return now.getTime() < this.props.validFrom.getTime();
    }

    hasExpired(now: Date): boolean {
        return now.getTime() > this.props.validUntil.getTime();
    }

    protected equalsCore(other: ValidityWindow): boolean {
        return this.props.validFrom.getTime() === other.props.validFrom.getTime() &&
            this.props.validUntil.getTime() === other.props.validUntil.getTime();
    }
}
