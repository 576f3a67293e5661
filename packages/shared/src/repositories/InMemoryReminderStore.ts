import { ConcurrentModificationError } from '../errors.js';
import type { Reminder } from '../types/reminder.js';
import type { ReminderStore } from './ReminderStore.js';

export class InMemoryReminderStore implements ReminderStore {
    private reminders = new Map<string, Reminder>();

    async findById(id: string): Promise<Reminder | null> {
        const reminder = this.reminders.get(id);
        return reminder ? structuredClone(reminder) : null;
    }

    async findByCallRef(callRef: string): Promise<Reminder | null> {
        for (const reminder of this.reminders.values()) {
            if (reminder.callRef === callRef) {
                return structuredClone(reminder);
            }
        }
        return null;
    }

    async save(reminder: Reminder): Promise<Reminder> {
        const storedVersion = this.reminders.get(reminder.id)?.version ?? 0;
        if (storedVersion !== reminder.version) {
            throw new ConcurrentModificationError(reminder.id, reminder.version);
        }

        const saved: Reminder = { ...structuredClone(reminder), version: reminder.version + 1 };
        this.reminders.set(saved.id, saved);
        return structuredClone(saved);
    }

    async listUpcoming(now: Date, limit: number): Promise<Reminder[]> {
        return [...this.reminders.values()]
            .filter((r) => r.appointmentTime.getTime() > now.getTime())
            .sort((a, b) => a.appointmentTime.getTime() - b.appointmentTime.getTime())
            .slice(0, limit)
            .map((r) => structuredClone(r));
    }

    get size(): number {
        return this.reminders.size;
    }
}
