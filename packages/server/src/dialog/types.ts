import type { CallOutcome } from '@recall/shared';

export type InputMode = 'speech' | 'digits' | 'none';

export interface DialogTurn<S> {
    prompt: string;
    inputMode: InputMode;
    /** State the flow enters if the gather window closes without input. */
    onTimeout: S | null;
    transferTo?: string;
}

export interface DialogStep<S> {
    turn: DialogTurn<S>;
    next: S;
}

export type ReminderDialogState =
    | { kind: 'Greeting' }
    | { kind: 'AwaitingConfirmation' }
    | { kind: 'Repeating' }
    | { kind: 'Terminal'; outcome: CallOutcome };

export type ReminderDialogEvent =
    | { kind: 'answered' }
    | { kind: 'digit'; digits: string }
    | { kind: 'speech'; utterance: string }
    | { kind: 'timeout' };

export interface ReminderDialogContext {
    script: string;
    transferNumber: string | null;
}

export type InquiryOutcome = 'CALLER_SILENT' | 'GENERATION_FAILED';

export type InquiryDialogState =
    | { kind: 'Conversing'; consecutiveTimeouts: number }
    | { kind: 'Terminal'; outcome: InquiryOutcome };

export type InquiryDialogEvent =
    | { kind: 'answered' }
    | { kind: 'reply'; reply: string }
    | { kind: 'timeout' }
    | { kind: 'generation-failed' };

export interface InquiryDialogContext {
    practiceName: string;
}
