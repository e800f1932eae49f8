import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DomainEvent } from '../domain/base/domain-event.base';
import { AggregateRoot } from '../domain/base/aggregate-root.base';
import { EntityId } from '../domain/base/entity.base';

/**
 * Domain Event Publisher
 * Drains the events an aggregate recorded and emits them on the in-process bus.
 * Callers invoke it only after the aggregate's state change has been persisted.
 */
@Injectable()
export class DomainEventPublisher {
    constructor(private readonly eventEmitter: EventEmitter2) { }

    publishEventsFromAggregate<T extends object, I extends EntityId>(aggregate: AggregateRoot<T, I>): DomainEvent[] {
        const events = [...aggregate.domainEvents];
        aggregate.clearDomainEvents();
        this.publishAll(events);
        return events;
    }

    publish(event: DomainEvent): void {
        this.eventEmitter.emit(event.eventName, event.toPayload());
    }

    publishAll(events: readonly DomainEvent[]): void {
        for (const event of events) {
            this.publish(event);
        }
    }
}
