import { ConcurrentModificationError } from '../errors.js';
import type { Reminder } from '../types/reminder.js';

export interface ReminderStore {
    findById(id: string): Promise<Reminder | null>;
    findByCallRef(callRef: string): Promise<Reminder | null>;
    /**
     * Versioned upsert. `reminder.version` must equal the stored version (0 for a
     * record that does not exist yet); the stored copy carries `version + 1`.
     * Throws ConcurrentModificationError when the check fails.
     */
    save(reminder: Reminder): Promise<Reminder>;
    /** Reminders whose appointment is after `now`, soonest first. */
    listUpcoming(now: Date, limit: number): Promise<Reminder[]>;
}

const MAX_MUTATION_ATTEMPTS = 5;

/**
 * Re-reads the reminder and applies `mutate` until the versioned save goes
 * through. `mutate` returns null to leave the record unchanged; anything it
 * throws propagates without a retry. Resolves null when the reminder does not exist.
 */
export async function mutateReminder(
    store: ReminderStore,
    id: string,
    mutate: (current: Reminder) => Reminder | null,
    maxAttempts: number = MAX_MUTATION_ATTEMPTS
): Promise<Reminder | null> {
    for (let attempt = 1; ; attempt++) {
        const current = await store.findById(id);
        if (!current) {
            return null;
        }

        const next = mutate(current);
        if (!next) {
            return current;
        }

        try {
            return await store.save(next);
        } catch (error) {
            if (error instanceof ConcurrentModificationError && attempt < maxAttempts) {
                console.warn(`[ReminderStore] Version conflict on ${id}, retrying (${attempt}/${maxAttempts})`);
                continue;
            }
            throw error;
        }
    }
}
