import type { ReminderStatus } from './types/reminder.js';

export class ValidationError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'ValidationError';
        this.field = field;
    }
}

export class PlacementFailure extends Error {
    readonly reason: string;

    constructor(reason: string, options?: { cause?: unknown }) {
        super(`Call placement failed: ${reason}`, options);
        this.name = 'PlacementFailure';
        this.reason = reason;
    }
}

export class GenerationUnavailable extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationUnavailable';
    }
}

export class UnknownReference extends Error {
    readonly callRef: string;

    constructor(callRef: string) {
        super(`No reminder matches call reference ${callRef}`);
        this.name = 'UnknownReference';
        this.callRef = callRef;
    }
}

export class StaleTransition extends Error {
    readonly reminderId: string;
    readonly from: ReminderStatus;
    readonly to: ReminderStatus;

    constructor(reminderId: string, from: ReminderStatus, to: ReminderStatus) {
        super(`Reminder ${reminderId} cannot move from ${from} to ${to}`);
        this.name = 'StaleTransition';
        this.reminderId = reminderId;
        this.from = from;
        this.to = to;
    }
}

export class ConcurrentModificationError extends Error {
    readonly reminderId: string;

    constructor(reminderId: string, expectedVersion: number) {
        super(`Reminder ${reminderId} changed since version ${expectedVersion}`);
        this.name = 'ConcurrentModificationError';
        this.reminderId = reminderId;
    }
}

export class TimeoutError extends Error {
    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
