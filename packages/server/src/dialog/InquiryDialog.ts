import {
    APOLOGY_CLOSING,
    INQUIRY_FOLLOW_UP,
    INQUIRY_NO_INPUT_CLOSING,
    INQUIRY_NO_INPUT_PREFIX,
    inquiryGreeting
} from './ReminderScripts.js';
import type { DialogStep, InquiryDialogContext, InquiryDialogEvent, InquiryDialogState } from './types.js';

export const INQUIRY_DIALOG_START: InquiryDialogState = { kind: 'Conversing', consecutiveTimeouts: 0 };

const MAX_CONSECUTIVE_TIMEOUTS = 2;

/** General-inquiry dialog: one looping state, ended by repeated silence. */
export function buildInquiryTurn(
    state: InquiryDialogState,
    event: InquiryDialogEvent,
    context: InquiryDialogContext
): DialogStep<InquiryDialogState> {
    if (state.kind === 'Terminal') {
        return { next: state, turn: { prompt: '', inputMode: 'none', onTimeout: null } };
    }

    const silent: InquiryDialogState = { kind: 'Conversing', consecutiveTimeouts: state.consecutiveTimeouts + 1 };

    switch (event.kind) {
        case 'answered':
            return {
                next: { kind: 'Conversing', consecutiveTimeouts: 0 },
                turn: {
                    prompt: inquiryGreeting(context.practiceName),
                    inputMode: 'speech',
                    onTimeout: { kind: 'Conversing', consecutiveTimeouts: 1 }
                }
            };

        case 'reply':
            return {
                next: { kind: 'Conversing', consecutiveTimeouts: 0 },
                turn: {
                    prompt: `${event.reply} ${INQUIRY_FOLLOW_UP}`,
                    inputMode: 'speech',
                    onTimeout: { kind: 'Conversing', consecutiveTimeouts: 1 }
                }
            };

        case 'timeout': {
            if (silent.consecutiveTimeouts >= MAX_CONSECUTIVE_TIMEOUTS) {
                return {
                    next: { kind: 'Terminal', outcome: 'CALLER_SILENT' },
                    turn: { prompt: INQUIRY_NO_INPUT_CLOSING, inputMode: 'none', onTimeout: null }
                };
            }
            return {
                next: silent,
                turn: {
                    prompt: `${INQUIRY_NO_INPUT_PREFIX} ${inquiryGreeting(context.practiceName)}`,
                    inputMode: 'speech',
                    onTimeout: { kind: 'Terminal', outcome: 'CALLER_SILENT' }
                }
            };
        }

        case 'generation-failed':
            return {
                next: { kind: 'Terminal', outcome: 'GENERATION_FAILED' },
                turn: { prompt: APOLOGY_CLOSING, inputMode: 'none', onTimeout: null }
            };
    }
}
