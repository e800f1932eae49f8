export type EntityId = string | number;

export abstract class Entity<TProps extends object, TId extends EntityId = string> {
    protected constructor(
        public readonly id: TId,
        protected props: TProps,
    ) { }

    equals(other?: Entity<TProps, TId>): boolean {
        if (!other) return false;
        if (this === other) return true;
        return this.id === other.id;
    }
}
