import type { Reminder } from '../types/reminder.js';

/** Fixture with every field set; tests override what they care about. */
export function buildReminder(overrides: Partial<Reminder> = {}): Reminder {
    const createdAt = new Date('2026-03-01T09:00:00Z');
    return {
        id: 'rem-1',
        patientName: 'Jordan Lee',
        phoneNumber: '+12015550123',
        appointmentTime: new Date('2026-03-03T14:30:00Z'),
        message: null,
        status: 'SCHEDULED',
        callRef: null,
        callOutcome: null,
        script: null,
        lastError: null,
        attempts: 0,
        placementAttemptedAt: null,
        version: 0,
        createdAt,
        updatedAt: createdAt,
        ...overrides
    };
}
