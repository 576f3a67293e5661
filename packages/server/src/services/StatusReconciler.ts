import {
    StaleTransition,
    UnknownReference,
    mutateReminder,
    type CallOutcome,
    type DeliveryStatus,
    type Reminder,
    type ReminderStore
} from '@recall/shared';
import { outcomeStatus, transitionReminder } from './ReminderTransitions.js';

/**
 * Folds provider delivery events and in-call outcomes into reminder state.
 * Every entry point is idempotent and never throws for unknown references or
 * moves the status graph does not allow, since the provider redelivers and
 * reorders webhooks.
 */
export class StatusReconciler {
    private store: ReminderStore;
    private clock: () => Date;

    constructor(store: ReminderStore, clock: () => Date = () => new Date()) {
        this.store = store;
        this.clock = clock;
    }

    async reconcile(callRef: string, status: DeliveryStatus): Promise<Reminder | null> {
        const reminder = await this.store.findByCallRef(callRef);
        if (!reminder) {
            const unknown = new UnknownReference(callRef);
            console.warn(`[StatusReconciler] ${unknown.message} (status ${status}), ignoring`);
            return null;
        }

        return await this.apply(reminder.id, `status ${status}`, (current) => {
            switch (status) {
                case 'initiated':
                case 'ringing':
                case 'answered':
                    return null;

                case 'completed': {
                    const target = outcomeStatus(current.callOutcome);
                    if (!target || current.status === target) {
                        return null;
                    }
                    return transitionReminder(current, target, this.clock());
                }

                case 'busy':
                case 'no-answer':
                case 'failed':
                case 'canceled':
                    if (current.status === 'FAILED') {
                        return null;
                    }
                    return transitionReminder(current, 'FAILED', this.clock(), { lastError: `Call ${status}` });
            }
        });
    }

    /**
     * Records the outcome the call flow reached. A confirmation or transfer
     * resolves a SENT reminder immediately; an outcome that arrives before SENT
     * is persisted is kept and applied once the reminder is marked SENT.
     */
    async recordOutcome(callRef: string, outcome: CallOutcome, reminderId?: string): Promise<Reminder | null> {
        const reminder = (await this.store.findByCallRef(callRef))
            ?? (reminderId ? await this.store.findById(reminderId) : null);
        if (!reminder) {
            const unknown = new UnknownReference(callRef);
            console.warn(`[StatusReconciler] ${unknown.message} (outcome ${outcome}), ignoring`);
            return null;
        }

        return await this.apply(reminder.id, `outcome ${outcome}`, (current) => {
            if (current.status === 'SCHEDULED') {
                return current.callOutcome === outcome
                    ? null
                    : { ...current, callOutcome: outcome, updatedAt: this.clock() };
            }

            const target = outcomeStatus(outcome);
            if (current.status === 'SENT' && !target) {
                return current.callOutcome === outcome
                    ? null
                    : { ...current, callOutcome: outcome, updatedAt: this.clock() };
            }
            if (target && current.status === target) {
                return null;
            }
            return transitionReminder(current, target ?? current.status, this.clock(), { callOutcome: outcome });
        });
    }

    private async apply(
        id: string,
        cause: string,
        mutate: (current: Reminder) => Reminder | null
    ): Promise<Reminder | null> {
        try {
            const updated = await mutateReminder(this.store, id, mutate);
            if (updated) {
                console.log(`[StatusReconciler] Reminder ${id} is ${updated.status} after ${cause}`);
            }
            return updated;
        } catch (error) {
            if (error instanceof StaleTransition) {
                console.warn(`[StatusReconciler] Ignoring ${cause}: ${error.message}`);
                return await this.store.findById(id);
            }
            throw error;
        }
    }
}
