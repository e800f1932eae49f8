export const CLOCK = Symbol('CLOCK');

/**
 * Source of the current instant. Injected wherever date windows or token age
 * are evaluated so they can be pinned in tests.
 */
export interface Clock {
    now(): Date;
}

export class SystemClock implements Clock {
    now(): Date {
        return new Date();
    }
}

export class FixedClock implements Clock {
    constructor(private instant: Date) { }

    now(): Date {
        return new Date(this.instant.getTime());
    }

    set(instant: Date): void {
        this.instant = instant;
    }

    advance(ms: number): void {
        this.instant = new Date(this.instant.getTime() + ms);
    }
}
