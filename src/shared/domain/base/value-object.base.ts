export abstract class ValueObject<TProps extends object> {
    protected readonly props: TProps;

    protected constructor(props: TProps) {
        this.props = Object.freeze({ ...props });
    }

    equals(other?: ValueObject<TProps>): boolean {
        if (!other) return false;
        if (this === other) return true;
        if (other.constructor !== this.constructor) return false;
        return this.equalsCore(other);
    }

    protected abstract equalsCore(other: ValueObject<TProps>): boolean;
}
