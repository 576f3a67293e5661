import { z } from 'zod';
import { ValidationError, type Reminder } from '@recall/shared';
import type { AttemptOutcome, ReminderLifecycleManager } from '../services/ReminderLifecycleManager.js';

const CreateReminderBody = z.object({
    patientName: z.string(),
    phoneNumber: z.string(),
    appointmentTime: z.string(),
    message: z.string().optional()
});

export const DEFAULT_UPCOMING_LIMIT = 10;
const MAX_UPCOMING_LIMIT = 100;

export type TriggerResult =
    | { kind: 'not-found' }
    | { kind: 'not-scheduled'; reminder: Reminder }
    | { kind: 'deferred'; retryAt: Date }
    | { kind: 'attempted'; outcome: AttemptOutcome };

export class ReminderController {
    private lifecycle: ReminderLifecycleManager;

    constructor(lifecycle: ReminderLifecycleManager) {
        this.lifecycle = lifecycle;
    }

    async createReminder(body: unknown): Promise<string> {
        const parsed = CreateReminderBody.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue?.path.join('.') || 'body';
            throw new ValidationError(field, issue?.message ?? 'Invalid request body');
        }
        return await this.lifecycle.createReminder(parsed.data);
    }

    async getReminder(id: string): Promise<Reminder | null> {
        return await this.lifecycle.getReminder(id);
    }

    async listUpcoming(rawLimit: unknown): Promise<Reminder[]> {
        let limit = DEFAULT_UPCOMING_LIMIT;
        if (typeof rawLimit === 'string' && rawLimit !== '') {
            limit = Number(rawLimit);
            if (!Number.isInteger(limit) || limit < 1 || limit > MAX_UPCOMING_LIMIT) {
                throw new ValidationError('limit', `limit must be an integer between 1 and ${MAX_UPCOMING_LIMIT}`);
            }
        }
        return await this.lifecycle.listUpcoming(limit);
    }

    async triggerReminder(id: string): Promise<TriggerResult> {
        const reminder = await this.lifecycle.getReminder(id);
        if (!reminder) {
            return { kind: 'not-found' };
        }
        if (reminder.status !== 'SCHEDULED') {
            return { kind: 'not-scheduled', reminder };
        }

        const decision = this.lifecycle.evaluateSchedulingEligibility(reminder);
        if (decision.kind === 'deferUntil') {
            console.log(`[ReminderController] Reminder ${id} deferred until ${decision.at.toISOString()}`);
            return { kind: 'deferred', retryAt: decision.at };
        }

        return { kind: 'attempted', outcome: await this.lifecycle.attemptCall(reminder) };
    }
}
