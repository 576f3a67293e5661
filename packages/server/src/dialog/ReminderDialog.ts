import type { CallOutcome } from '@recall/shared';
import {
    CONFIRMATION_PROMPT,
    CONFIRMED_CLOSING,
    INVALID_SELECTION_PREFIX,
    NO_INPUT_PREFIX,
    NO_RESPONSE_CLOSING,
    TRANSFER_NOTICE,
    TRANSFER_UNAVAILABLE
} from './ReminderScripts.js';
import type {
    DialogStep,
    DialogTurn,
    ReminderDialogContext,
    ReminderDialogEvent,
    ReminderDialogState
} from './types.js';

export const REMINDER_DIALOG_START: ReminderDialogState = { kind: 'Greeting' };

const REPEATING: ReminderDialogState = { kind: 'Repeating' };
const NO_RESPONSE: ReminderDialogState = { kind: 'Terminal', outcome: 'NO_RESPONSE' };

type Selection = 'confirm' | 'transfer' | 'unrecognized' | 'none';

function selectionOf(event: ReminderDialogEvent): Selection {
    switch (event.kind) {
        case 'digit':
            if (event.digits === '1') return 'confirm';
            if (event.digits === '2') return 'transfer';
            return 'unrecognized';
        case 'speech':
            return 'unrecognized';
        case 'timeout':
        case 'answered':
            return 'none';
    }
}

function terminal(outcome: CallOutcome, context: ReminderDialogContext): DialogStep<ReminderDialogState> {
    const next: ReminderDialogState = { kind: 'Terminal', outcome };

    switch (outcome) {
        case 'CONFIRMED':
            return { next, turn: { prompt: CONFIRMED_CLOSING, inputMode: 'none', onTimeout: null } };
        case 'TRANSFER_REQUESTED':
            if (context.transferNumber) {
                return {
                    next,
                    turn: { prompt: TRANSFER_NOTICE, inputMode: 'none', onTimeout: null, transferTo: context.transferNumber }
                };
            }
            return { next, turn: { prompt: `${TRANSFER_NOTICE} ${TRANSFER_UNAVAILABLE}`, inputMode: 'none', onTimeout: null } };
        case 'NO_RESPONSE':
            return { next, turn: { prompt: NO_RESPONSE_CLOSING, inputMode: 'none', onTimeout: null } };
    }
}

function confirmationGather(prompt: string, onTimeout: ReminderDialogState): DialogTurn<ReminderDialogState> {
    return { prompt, inputMode: 'digits', onTimeout };
}

/**
 * Reminder-confirmation dialog. Pure: the same state, event and context
 * always produce the same turn and next state.
 */
export function buildReminderTurn(
    state: ReminderDialogState,
    event: ReminderDialogEvent,
    context: ReminderDialogContext
): DialogStep<ReminderDialogState> {
    const selection = selectionOf(event);

    switch (state.kind) {
        case 'Greeting':
            return {
                next: { kind: 'AwaitingConfirmation' },
                turn: confirmationGather(`${context.script} ${CONFIRMATION_PROMPT}`, REPEATING)
            };

        case 'AwaitingConfirmation':
            if (selection === 'confirm') return terminal('CONFIRMED', context);
            if (selection === 'transfer') return terminal('TRANSFER_REQUESTED', context);
            if (event.kind === 'answered') {
                // Provider re-requested the answer document; replay the greeting.
                return { next: state, turn: confirmationGather(`${context.script} ${CONFIRMATION_PROMPT}`, REPEATING) };
            }
            return {
                next: REPEATING,
                turn: confirmationGather(
                    `${selection === 'unrecognized' ? INVALID_SELECTION_PREFIX : NO_INPUT_PREFIX} ${CONFIRMATION_PROMPT}`,
                    NO_RESPONSE
                )
            };

        case 'Repeating':
            if (selection === 'confirm') return terminal('CONFIRMED', context);
            if (selection === 'transfer') return terminal('TRANSFER_REQUESTED', context);
            return terminal('NO_RESPONSE', context);

        case 'Terminal':
            return { next: state, turn: { prompt: '', inputMode: 'none', onTimeout: null } };
    }
}
