import { StaleTransition, type CallOutcome, type Reminder, type ReminderStatus } from '@recall/shared';

const ALLOWED_TRANSITIONS: Record<ReminderStatus, readonly ReminderStatus[]> = {
    SCHEDULED: ['SENT', 'FAILED'],
    SENT: ['CONFIRMED', 'RESCHEDULED', 'FAILED'],
    CONFIRMED: [],
    RESCHEDULED: [],
    FAILED: []
};

const OUTCOME_STATUS: Record<CallOutcome, ReminderStatus | null> = {
    CONFIRMED: 'CONFIRMED',
    TRANSFER_REQUESTED: 'RESCHEDULED',
    NO_RESPONSE: null
};

/** The status a call outcome settles a SENT reminder into, or null when it stays SENT. */
export function outcomeStatus(outcome: CallOutcome | null): ReminderStatus | null {
    return outcome ? OUTCOME_STATUS[outcome] : null;
}

export type TransitionChanges = Partial<Pick<Reminder, 'callRef' | 'callOutcome' | 'lastError' | 'script'>>;

export function canTransition(from: ReminderStatus, to: ReminderStatus): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Moves a reminder along the status graph. Throws StaleTransition when the
 * move is not an edge of the graph; callers absorbing duplicate or
 * out-of-order delivery treat that as a no-op.
 */
export function transitionReminder(
    reminder: Reminder,
    to: ReminderStatus,
    now: Date,
    changes: TransitionChanges = {}
): Reminder {
    if (!canTransition(reminder.status, to)) {
        throw new StaleTransition(reminder.id, reminder.status, to);
    }

    const next: Reminder = { ...reminder, ...changes, status: to, updatedAt: now };

    if (to === 'SENT' && !next.callRef) {
        throw new Error(`Reminder ${reminder.id} cannot be marked SENT without a call reference`);
    }
    return next;
}
