import {
    CALL_ENDED_STATUSES,
    GenerationUnavailable,
    TERMINAL_REMINDER_STATUSES,
    type AnswerEvent,
    type CallOutcome,
    type Reminder,
    type ReminderStore,
    type ScriptGenerator,
    type StatusEvent
} from '@recall/shared';
import { INQUIRY_DIALOG_START, buildInquiryTurn } from '../dialog/InquiryDialog.js';
import { REMINDER_DIALOG_START, buildReminderTurn } from '../dialog/ReminderDialog.js';
import { APOLOGY_CLOSING, fallbackReminderScript, formatAppointmentTime } from '../dialog/ReminderScripts.js';
import type {
    DialogStep,
    DialogTurn,
    InquiryDialogEvent,
    InquiryDialogState,
    ReminderDialogEvent,
    ReminderDialogState
} from '../dialog/types.js';
import type { CallSession, CallSessionManager } from './CallSessionManager.js';
import type { StatusReconciler } from './StatusReconciler.js';

const MAX_HISTORY = 10;

export type EngineTurn = DialogTurn<ReminderDialogState | InquiryDialogState>;

export interface CallFlowConfigs {
    practiceName: string;
    timezone: string;
    transferNumber: string | null;
}

export interface CallFlowDeps {
    store: ReminderStore;
    scripts: ScriptGenerator;
    reconciler: StatusReconciler;
    sessions: CallSessionManager;
    configs: CallFlowConfigs;
}

export const APOLOGY_TURN: EngineTurn = { prompt: APOLOGY_CLOSING, inputMode: 'none', onTimeout: null };

type ReminderSession = Extract<CallSession, { flow: 'reminder' }>;
type InquirySession = Extract<CallSession, { flow: 'inquiry' }>;

export class CallFlowEngine {
    private store: ReminderStore;
    private scripts: ScriptGenerator;
    private reconciler: StatusReconciler;
    private sessions: CallSessionManager;
    private configs: CallFlowConfigs;

    constructor(deps: CallFlowDeps) {
        this.store = deps.store;
        this.scripts = deps.scripts;
        this.reconciler = deps.reconciler;
        this.sessions = deps.sessions;
        this.configs = deps.configs;
    }

    /**
     * Advances the call's dialog by one answer or gather callback and returns
     * the turn to render. `reminderId` is the hint carried on outbound answer
     * URLs; calls matching no reminder run the general-inquiry dialog.
     */
    async handleAnswer(event: AnswerEvent, reminderId?: string): Promise<EngineTurn> {
        try {
            return await this.sessions.withCall<EngineTurn>(event.callRef, async (existing) => {
                const session = existing ?? await this.openSession(event.callRef, reminderId);

                if (session.flow === 'reminder') {
                    const step = await this.advanceReminder(session, event);
                    return { session: { ...session, state: step.next }, result: step.turn };
                }

                const { step, history } = await this.advanceInquiry(session, event);
                return { session: { ...session, state: step.next, history }, result: step.turn };
            });
        } catch (error) {
            console.error(`[CallFlowEngine] Failed handling ${event.kind} for call ${event.callRef}:`, error);
            return APOLOGY_TURN;
        }
    }

    async handleStatus(event: StatusEvent): Promise<void> {
        await this.reconciler.reconcile(event.callRef, event.kind);

        if (CALL_ENDED_STATUSES.has(event.kind)) {
            await this.sessions.endCall(event.callRef);
        }
    }

    private async openSession(callRef: string, reminderId?: string): Promise<CallSession> {
        const reminder = await this.findReminderForCall(callRef, reminderId);

        if (!reminder) {
            console.log(`[CallFlowEngine] Call ${callRef} matches no reminder, starting general inquiry`);
            return { flow: 'inquiry', state: INQUIRY_DIALOG_START, history: [] };
        }

        console.log(`[CallFlowEngine] Call ${callRef} bound to reminder ${reminder.id} (${reminder.status})`);
        const state: ReminderDialogState = TERMINAL_REMINDER_STATUSES.has(reminder.status)
            ? { kind: 'Terminal', outcome: reminder.callOutcome ?? 'NO_RESPONSE' }
            : REMINDER_DIALOG_START;
        return { flow: 'reminder', reminderId: reminder.id, state };
    }

    private async findReminderForCall(callRef: string, reminderId?: string): Promise<Reminder | null> {
        const byRef = await this.store.findByCallRef(callRef);
        if (byRef) return byRef;
        if (!reminderId) return null;

        const byHint = await this.store.findById(reminderId);
        if (byHint && (byHint.callRef === null || byHint.callRef === callRef)) {
            return byHint;
        }
        return null;
    }

    private async advanceReminder(session: ReminderSession, event: AnswerEvent): Promise<DialogStep<ReminderDialogState>> {
        const script = session.state.kind === 'Greeting' || event.kind === 'answered'
            ? await this.reminderScript(session.reminderId)
            : '';

        const step = buildReminderTurn(session.state, toReminderEvent(event), {
            script,
            transferNumber: this.configs.transferNumber
        });

        if (step.next.kind === 'Terminal' && session.state.kind !== 'Terminal') {
            await this.recordOutcome(event.callRef, step.next.outcome, session.reminderId);
        }
        return step;
    }

    private async advanceInquiry(
        session: InquirySession,
        event: AnswerEvent
    ): Promise<{ step: DialogStep<InquiryDialogState>; history: InquirySession['history'] }> {
        let dialogEvent: InquiryDialogEvent;
        let history = session.history;

        switch (event.kind) {
            case 'answered':
                dialogEvent = { kind: 'answered' };
                break;
            case 'speech-input':
                try {
                    const reply = await this.scripts.generateFreeformReply(event.utterance, {
                        callRef: event.callRef,
                        history
                    });
                    dialogEvent = { kind: 'reply', reply };
                    history = [...history, { utterance: event.utterance, reply }].slice(-MAX_HISTORY);
                } catch (error) {
                    if (!(error instanceof GenerationUnavailable)) {
                        throw error;
                    }
                    console.warn(`[CallFlowEngine] Reply unavailable for call ${event.callRef}:`, error.message);
                    dialogEvent = { kind: 'generation-failed' };
                }
                break;
            // The inquiry gather listens for speech only; keypresses count as silence.
            case 'digit-input':
            case 'timeout':
                dialogEvent = { kind: 'timeout' };
                break;
        }

        const step = buildInquiryTurn(session.state, dialogEvent, { practiceName: this.configs.practiceName });
        return { step, history };
    }

    private async reminderScript(reminderId: string): Promise<string> {
        const reminder = await this.store.findById(reminderId);
        if (!reminder) {
            throw new Error(`Reminder ${reminderId} not found`);
        }
        if (reminder.script) {
            return reminder.script;
        }

        const spokenTime = formatAppointmentTime(reminder.appointmentTime, this.configs.timezone);
        try {
            return await this.scripts.generateReminderScript(reminder.patientName, spokenTime, reminder.message);
        } catch (error) {
            if (!(error instanceof GenerationUnavailable)) {
                throw error;
            }
            console.warn(`[CallFlowEngine] Using fallback script for reminder ${reminderId}:`, error.message);
            return fallbackReminderScript(reminder.patientName, spokenTime, this.configs.practiceName, reminder.message);
        }
    }

    private async recordOutcome(callRef: string, outcome: CallOutcome, reminderId: string): Promise<void> {
        try {
            await this.reconciler.recordOutcome(callRef, outcome, reminderId);
        } catch (error) {
            // The callee still hears the closing turn; the delivery status path can settle the record.
            console.error(`[CallFlowEngine] Failed to record ${outcome} for call ${callRef}:`, error);
        }
    }
}

function toReminderEvent(event: AnswerEvent): ReminderDialogEvent {
    switch (event.kind) {
        case 'answered':
            return { kind: 'answered' };
        case 'timeout':
            return { kind: 'timeout' };
        case 'digit-input':
            return { kind: 'digit', digits: event.digits };
        case 'speech-input':
            return { kind: 'speech', utterance: event.utterance };
    }
}
