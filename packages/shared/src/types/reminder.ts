export const REMINDER_STATUSES = ['SCHEDULED', 'SENT', 'CONFIRMED', 'RESCHEDULED', 'FAILED'] as const;
export type ReminderStatus = typeof REMINDER_STATUSES[number];

export const CALL_OUTCOMES = ['CONFIRMED', 'TRANSFER_REQUESTED', 'NO_RESPONSE'] as const;
export type CallOutcome = typeof CALL_OUTCOMES[number];

export const TERMINAL_REMINDER_STATUSES: ReadonlySet<ReminderStatus> = new Set<ReminderStatus>([
    'CONFIRMED',
    'RESCHEDULED',
    'FAILED'
]);

export interface Reminder {
    id: string;
    patientName: string;
    /** E.164 */
    phoneNumber: string;
    appointmentTime: Date;
    message: string | null;
    status: ReminderStatus;
    /** Provider call SID, set once a call has been placed. */
    callRef: string | null;
    /** Most recent in-call outcome recorded by the call flow. */
    callOutcome: CallOutcome | null;
    /** Reminder text spoken when the call is answered. */
    script: string | null;
    lastError: string | null;
    attempts: number;
    placementAttemptedAt: Date | null;
    /** Optimistic concurrency token, bumped on every save. */
    version: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface NewReminderInput {
    patientName: string;
    phoneNumber: string;
    appointmentTime: string | Date;
    message?: string | null;
}
