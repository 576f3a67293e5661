import { randomUUID } from 'node:crypto';
import {
    GenerationUnavailable,
    PlacementFailure,
    StaleTransition,
    TimeoutError,
    ValidationError,
    errorMessage,
    mutateReminder,
    normalizePhoneNumber,
    withTimeout,
    type NewReminderInput,
    type Reminder,
    type ReminderStore,
    type ScriptGenerator,
    type TelephonyGateway
} from '@recall/shared';
import { fallbackReminderScript, formatAppointmentTime } from '../dialog/ReminderScripts.js';
import { outcomeStatus, transitionReminder } from './ReminderTransitions.js';

const HOUR_MS = 60 * 60 * 1000;

export interface ReminderLifecycleConfigs {
    publicBaseUrl: string;
    practiceName: string;
    timezone: string;
    leadHours: number;
    placementTimeoutMs: number;
}

export interface ReminderLifecycleDeps {
    store: ReminderStore;
    gateway: TelephonyGateway;
    scripts: ScriptGenerator;
    configs: ReminderLifecycleConfigs;
    clock?: () => Date;
    generateId?: () => string;
}

export type SchedulingDecision =
    | { kind: 'placeNow' }
    | { kind: 'deferUntil'; at: Date };

export type AttemptOutcome =
    | { kind: 'sent'; reminder: Reminder; callRef: string }
    | { kind: 'failed'; reminder: Reminder; reason: string }
    | { kind: 'skipped'; reminder: Reminder; reason: string };

export class ReminderLifecycleManager {
    private store: ReminderStore;
    private gateway: TelephonyGateway;
    private scripts: ScriptGenerator;
    private configs: ReminderLifecycleConfigs;
    private clock: () => Date;
    private generateId: () => string;

    constructor(deps: ReminderLifecycleDeps) {
        this.store = deps.store;
        this.gateway = deps.gateway;
        this.scripts = deps.scripts;
        this.configs = deps.configs;
        this.clock = deps.clock ?? (() => new Date());
        this.generateId = deps.generateId ?? randomUUID;
    }

    async createReminder(input: NewReminderInput): Promise<string> {
        const now = this.clock();

        const patientName = input.patientName.trim();
        if (!patientName) {
            throw new ValidationError('patientName', 'Patient name must not be empty');
        }

        const phoneNumber = normalizePhoneNumber(input.phoneNumber);
        if (!phoneNumber) {
            throw new ValidationError('phoneNumber', `Phone number "${input.phoneNumber}" is not a valid number`);
        }

        const appointmentTime = input.appointmentTime instanceof Date
            ? new Date(input.appointmentTime.getTime())
            : new Date(input.appointmentTime);
        if (Number.isNaN(appointmentTime.getTime())) {
            throw new ValidationError('appointmentTime', `Appointment time "${String(input.appointmentTime)}" is not a valid date`);
        }
        if (appointmentTime.getTime() <= now.getTime()) {
            throw new ValidationError('appointmentTime', 'Appointment time must be in the future');
        }

        const message = input.message?.trim() || null;

        const reminder: Reminder = {
            id: this.generateId(),
            patientName,
            phoneNumber,
            appointmentTime,
            message,
            status: 'SCHEDULED',
            callRef: null,
            callOutcome: null,
            script: null,
            lastError: null,
            attempts: 0,
            placementAttemptedAt: null,
            version: 0,
            createdAt: now,
            updatedAt: now
        };

        await this.store.save(reminder);
        console.log(`[ReminderLifecycleManager] Created reminder ${reminder.id} for appointment ${appointmentTime.toISOString()}`);
        return reminder.id;
    }

    async getReminder(id: string): Promise<Reminder | null> {
        return await this.store.findById(id);
    }

    async listUpcoming(limit: number): Promise<Reminder[]> {
        return await this.store.listUpcoming(this.clock(), limit);
    }

    /**
     * Timing policy only: call `leadHours` before the appointment, or right away
     * once that instant has passed. Waking up at a deferred instant belongs to
     * whatever triggers reminders.
     */
    evaluateSchedulingEligibility(reminder: Reminder, now: Date = this.clock()): SchedulingDecision {
        const callAt = new Date(reminder.appointmentTime.getTime() - this.configs.leadHours * HOUR_MS);
        if (callAt.getTime() <= now.getTime()) {
            return { kind: 'placeNow' };
        }
        return { kind: 'deferUntil', at: callAt };
    }

    async attemptCall(reminder: Reminder): Promise<AttemptOutcome> {
        if (reminder.status !== 'SCHEDULED') {
            return { kind: 'skipped', reminder, reason: `Reminder is ${reminder.status}` };
        }

        const spokenTime = formatAppointmentTime(reminder.appointmentTime, this.configs.timezone);
        const script = await this.buildScript(reminder, spokenTime);

        const claim = await this.claimForPlacement(reminder.id, script);
        if (claim.kind === 'skipped') {
            return claim;
        }

        let callRef: string;
        try {
            callRef = await withTimeout(
                this.gateway.placeCall({
                    to: claim.reminder.phoneNumber,
                    answerUrl: `${this.configs.publicBaseUrl}/voice/answer?reminderId=${encodeURIComponent(claim.reminder.id)}`,
                    statusCallbackUrl: `${this.configs.publicBaseUrl}/voice/status`
                }),
                this.configs.placementTimeoutMs,
                'Call placement'
            );
        } catch (error) {
            const failure = error instanceof PlacementFailure
                ? error
                : new PlacementFailure(error instanceof TimeoutError ? error.message : errorMessage(error), { cause: error });
            return await this.recordPlacementFailure(claim.reminder.id, failure);
        }

        try {
            const sent = await mutateReminder(this.store, claim.reminder.id, (current) => {
                const now = this.clock();
                const next = transitionReminder(current, 'SENT', now, { callRef, lastError: null });
                // The call flow may have recorded an outcome before this write landed.
                const settled = outcomeStatus(next.callOutcome);
                return settled ? transitionReminder(next, settled, now) : next;
            });
            if (!sent) {
                throw new Error(`Reminder ${claim.reminder.id} disappeared after its call was placed`);
            }

            console.log(`[ReminderLifecycleManager] Reminder ${sent.id} ${sent.status}, call ${callRef}`);
            return { kind: 'sent', reminder: sent, callRef };
        } catch (error) {
            // The call is live but the record still says SCHEDULED; its placement
            // claim lets the next attempt detect the possible duplicate.
            console.error(
                `[ReminderLifecycleManager] Call ${callRef} placed for reminder ${claim.reminder.id} but SENT was not persisted:`,
                error
            );
            throw error;
        }
    }

    private async buildScript(reminder: Reminder, spokenTime: string): Promise<string> {
        try {
            return await this.scripts.generateReminderScript(reminder.patientName, spokenTime, reminder.message);
        } catch (error) {
            if (!(error instanceof GenerationUnavailable)) {
                throw error;
            }
            console.warn(`[ReminderLifecycleManager] Using fallback script for reminder ${reminder.id}:`, error.message);
            return fallbackReminderScript(reminder.patientName, spokenTime, this.configs.practiceName, reminder.message);
        }
    }

    private async claimForPlacement(
        id: string,
        script: string
    ): Promise<{ kind: 'claimed'; reminder: Reminder } | { kind: 'skipped'; reminder: Reminder; reason: string }> {
        const now = this.clock();
        const skip: { reason: string | null } = { reason: null };

        const claimed = await mutateReminder(this.store, id, (current) => {
            skip.reason = null;

            if (current.status !== 'SCHEDULED') {
                skip.reason = `Reminder is ${current.status}`;
                return null;
            }

            if (current.placementAttemptedAt) {
                const age = now.getTime() - current.placementAttemptedAt.getTime();
                if (age < this.configs.placementTimeoutMs * 2) {
                    skip.reason = 'A call placement is already in progress';
                    return null;
                }
                console.warn(
                    `[ReminderLifecycleManager] Reminder ${id} has an unresolved placement from ` +
                    `${current.placementAttemptedAt.toISOString()}; the patient may receive a duplicate call`
                );
            }

            return {
                ...current,
                script,
                attempts: current.attempts + 1,
                placementAttemptedAt: now,
                updatedAt: now
            };
        });

        if (!claimed) {
            throw new Error(`Reminder ${id} not found`);
        }
        if (skip.reason !== null) {
            console.log(`[ReminderLifecycleManager] Skipping call for reminder ${id}: ${skip.reason}`);
            return { kind: 'skipped', reminder: claimed, reason: skip.reason };
        }
        return { kind: 'claimed', reminder: claimed };
    }

    private async recordPlacementFailure(id: string, failure: PlacementFailure): Promise<AttemptOutcome> {
        console.error(`[ReminderLifecycleManager] Placement failed for reminder ${id}:`, failure.reason);

        try {
            const failed = await mutateReminder(this.store, id, (current) =>
                transitionReminder(current, 'FAILED', this.clock(), { lastError: failure.reason })
            );
            if (!failed) {
                throw new Error(`Reminder ${id} not found`);
            }
            return { kind: 'failed', reminder: failed, reason: failure.reason };
        } catch (error) {
            if (error instanceof StaleTransition) {
                // A concurrent path already resolved the reminder.
                const current = await this.store.findById(id);
                if (current) {
                    return { kind: 'skipped', reminder: current, reason: error.message };
                }
            }
            throw error;
        }
    }
}
