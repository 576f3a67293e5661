import { describe, expect, it } from 'vitest';
import { GenerationUnavailable, InMemoryReminderStore, type Reminder, type ScriptGenerator } from '@recall/shared';
import { buildReminder } from '@recall/shared/testing';
import {
    APOLOGY_CLOSING,
    CONFIRMATION_PROMPT,
    CONFIRMED_CLOSING,
    INQUIRY_FOLLOW_UP,
    INVALID_SELECTION_PREFIX,
    NO_RESPONSE_CLOSING,
    inquiryGreeting
} from '../dialog/ReminderScripts.js';
import { createScripts, fixedClock } from '../testing/fakes.js';
import { CallFlowEngine } from './CallFlowEngine.js';
import { CallSessionManager } from './CallSessionManager.js';
import { StatusReconciler } from './StatusReconciler.js';

const SCRIPT = 'Hello Jordan, this is Bright Smile Dental calling about Tuesday.';

class BrokenStore extends InMemoryReminderStore {
    async findByCallRef(): Promise<Reminder | null> {
        throw new Error('connection reset');
    }
}

async function setup(options: {
    reminder?: Partial<Reminder> | null;
    store?: InMemoryReminderStore;
    reply?: ScriptGenerator['generateFreeformReply'];
} = {}) {
    const store = options.store ?? new InMemoryReminderStore();
    if (options.reminder !== null) {
        await store.save(buildReminder(options.reminder ?? { status: 'SENT', callRef: 'CA100', script: SCRIPT }));
    }
    const time = fixedClock('2026-03-02T14:30:00Z');
    const sessions = new CallSessionManager({ ttlMs: 60_000 });
    const { scripts, generateReminderScript, generateFreeformReply } = createScripts({ reply: options.reply });
    const engine = new CallFlowEngine({
        store,
        scripts,
        reconciler: new StatusReconciler(store, time.clock),
        sessions,
        configs: { practiceName: 'Bright Smile Dental', timezone: 'UTC', transferNumber: '+15005550100' }
    });

    async function current(): Promise<Reminder | null> {
        return await store.findById('rem-1');
    }

    return { store, engine, sessions, current, generateReminderScript, generateFreeformReply };
}

describe('CallFlowEngine reminder calls', () => {
    it('confirms the appointment on 1 and settles the reminder', async () => {
        const { engine, sessions, current } = await setup();

        const greeting = await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' });
        expect(greeting).toMatchObject({ prompt: `${SCRIPT} ${CONFIRMATION_PROMPT}`, inputMode: 'digits' });

        const closing = await engine.handleAnswer({ kind: 'digit-input', callRef: 'CA100', digits: '1' });
        expect(closing).toEqual({ prompt: CONFIRMED_CLOSING, inputMode: 'none', onTimeout: null });
        expect(await current()).toMatchObject({ status: 'CONFIRMED', callOutcome: 'CONFIRMED' });

        await engine.handleStatus({ kind: 'completed', callRef: 'CA100' });
        expect((await current())?.status).toBe('CONFIRMED');
        expect(sessions.activeCount).toBe(0);
    });

    it('repeats once after an invalid key and then ends without a response', async () => {
        const { engine, current } = await setup();

        await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' });
        const repeat = await engine.handleAnswer({ kind: 'digit-input', callRef: 'CA100', digits: '9' });
        expect(repeat.prompt).toBe(`${INVALID_SELECTION_PREFIX} ${CONFIRMATION_PROMPT}`);

        const closing = await engine.handleAnswer({ kind: 'timeout', callRef: 'CA100' });
        expect(closing.prompt).toBe(NO_RESPONSE_CLOSING);

        await engine.handleStatus({ kind: 'completed', callRef: 'CA100' });
        expect(await current()).toMatchObject({ status: 'SENT', callOutcome: 'NO_RESPONSE' });
    });

    it('transfers to staff on 2 and marks the reminder RESCHEDULED', async () => {
        const { engine, current } = await setup();

        await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' });
        const transfer = await engine.handleAnswer({ kind: 'digit-input', callRef: 'CA100', digits: '2' });

        expect(transfer.transferTo).toBe('+15005550100');
        expect((await current())?.status).toBe('RESCHEDULED');
    });

    it('binds a call answered before SENT was stored through the reminder hint', async () => {
        const { store, engine, current } = await setup({ reminder: { status: 'SCHEDULED', callRef: null, script: SCRIPT } });

        const greeting = await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' }, 'rem-1');
        expect(greeting.prompt).toBe(`${SCRIPT} ${CONFIRMATION_PROMPT}`);
        await engine.handleAnswer({ kind: 'digit-input', callRef: 'CA100', digits: '1' });
        expect(await current()).toMatchObject({ status: 'SCHEDULED', callOutcome: 'CONFIRMED' });

        const held = await current();
        if (!held) throw new Error('reminder missing');
        await store.save({ ...held, status: 'SENT', callRef: 'CA100' });
        await engine.handleStatus({ kind: 'completed', callRef: 'CA100' });

        expect((await current())?.status).toBe('CONFIRMED');
    });

    it('ignores a hint that points at a reminder placed on another call', async () => {
        const { engine, generateFreeformReply } = await setup();

        const turn = await engine.handleAnswer({ kind: 'answered', callRef: 'CA777' }, 'rem-1');

        expect(turn.prompt).toBe(inquiryGreeting('Bright Smile Dental'));
        expect(generateFreeformReply).not.toHaveBeenCalled();
    });

    it('generates the script when none was stored', async () => {
        const { engine, generateReminderScript } = await setup({ reminder: { status: 'SENT', callRef: 'CA100' } });

        const greeting = await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' });

        expect(greeting.prompt).toBe(`Hi Jordan Lee, this is your reminder. ${CONFIRMATION_PROMPT}`);
        expect(generateReminderScript).toHaveBeenCalledWith('Jordan Lee', 'Tuesday, March 3 at 2:30 PM', null);
    });

    it('hangs up quietly on a call whose reminder is already settled', async () => {
        const { engine } = await setup({ reminder: { status: 'CONFIRMED', callRef: 'CA100', callOutcome: 'CONFIRMED' } });

        const turn = await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' });

        expect(turn).toEqual({ prompt: '', inputMode: 'none', onTimeout: null });
    });

    it('apologises when the call cannot be processed', async () => {
        const { engine } = await setup({ store: new BrokenStore() });

        const turn = await engine.handleAnswer({ kind: 'answered', callRef: 'CA100' });

        expect(turn).toEqual({ prompt: APOLOGY_CLOSING, inputMode: 'none', onTimeout: null });
    });
});

describe('CallFlowEngine inquiry calls', () => {
    it('answers questions with generated replies and carries the history', async () => {
        const { engine, generateFreeformReply } = await setup({ reminder: null });

        const greeting = await engine.handleAnswer({ kind: 'answered', callRef: 'CA200', from: '+12015550123' });
        expect(greeting).toMatchObject({ prompt: inquiryGreeting('Bright Smile Dental'), inputMode: 'speech' });

        const first = await engine.handleAnswer({ kind: 'speech-input', callRef: 'CA200', utterance: 'When do you open?' });
        expect(first.prompt).toBe(`You asked: When do you open? ${INQUIRY_FOLLOW_UP}`);

        await engine.handleAnswer({ kind: 'speech-input', callRef: 'CA200', utterance: 'And Saturday?' });
        expect(generateFreeformReply).toHaveBeenLastCalledWith('And Saturday?', {
            callRef: 'CA200',
            history: [{ utterance: 'When do you open?', reply: 'You asked: When do you open?' }]
        });
    });

    it('treats keypresses as silence and hangs up after two in a row', async () => {
        const { engine } = await setup({ reminder: null });

        await engine.handleAnswer({ kind: 'answered', callRef: 'CA200' });
        const reprompt = await engine.handleAnswer({ kind: 'digit-input', callRef: 'CA200', digits: '5' });
        expect(reprompt.inputMode).toBe('speech');

        const closing = await engine.handleAnswer({ kind: 'timeout', callRef: 'CA200' });
        expect(closing.inputMode).toBe('none');
    });

    it('apologises and ends the call when no reply can be generated', async () => {
        const { engine } = await setup({
            reminder: null,
            reply: async () => {
                throw new GenerationUnavailable('offline');
            }
        });

        await engine.handleAnswer({ kind: 'answered', callRef: 'CA200' });
        const turn = await engine.handleAnswer({ kind: 'speech-input', callRef: 'CA200', utterance: 'Hello?' });

        expect(turn).toEqual({ prompt: APOLOGY_CLOSING, inputMode: 'none', onTimeout: null });
    });
});
