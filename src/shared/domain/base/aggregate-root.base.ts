import { Entity, EntityId } from './entity.base';
import { DomainEvent } from './domain-event.base';

export abstract class AggregateRoot<TProps extends object, TId extends EntityId = string> extends Entity<TProps, TId> {
    private readonly pendingEvents: DomainEvent[] = [];

    get domainEvents(): readonly DomainEvent[] {
        return this.pendingEvents;
    }

    protected addDomainEvent(event: DomainEvent): void {
        this.pendingEvents.push(event);
    }

    clearDomainEvents(): void {
        this.pendingEvents.length = 0;
    }
}
