import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PlacementFailure } from '../errors.js';
import { TwilioClient, parseAnswerWebhook, parseStatusWebhook } from './TwilioClient.js';

const twilioMocks = vi.hoisted(() => ({
    create: vi.fn(),
    validateRequest: vi.fn()
}));

vi.mock('twilio', () => ({
    default: Object.assign(() => ({ calls: { create: twilioMocks.create } }), {
        validateRequest: twilioMocks.validateRequest
    })
}));

function createClient() {
    return new TwilioClient({ accountSid: 'AC-test', authToken: 'test-secret', agentNumber: '+15005550006' });
}

describe('TwilioClient', () => {
    beforeEach(() => {
        twilioMocks.create.mockReset();
        twilioMocks.validateRequest.mockReset();
    });

    it('places a call with answer and status callbacks and returns its SID', async () => {
        twilioMocks.create.mockResolvedValue({ sid: 'CA100' });

        const callRef = await createClient().placeCall({
            to: '+12015550123',
            answerUrl: 'https://voice.test/voice/answer?reminderId=rem-1',
            statusCallbackUrl: 'https://voice.test/voice/status'
        });

        expect(callRef).toBe('CA100');
        expect(twilioMocks.create).toHaveBeenCalledWith({
            from: '+15005550006',
            to: '+12015550123',
            url: 'https://voice.test/voice/answer?reminderId=rem-1',
            method: 'POST',
            statusCallback: 'https://voice.test/voice/status',
            statusCallbackMethod: 'POST',
            statusCallbackEvent: ['initiated', 'ringing', 'answered', 'completed']
        });
    });

    it('wraps provider errors in PlacementFailure', async () => {
        twilioMocks.create.mockRejectedValue(new Error('Invalid To number'));

        const attempt = createClient().placeCall({ to: '+12015550123', answerUrl: 'a', statusCallbackUrl: 's' });

        await expect(attempt).rejects.toThrow(PlacementFailure);
        await expect(attempt).rejects.toMatchObject({ reason: 'Invalid To number' });
    });

    it('validates webhook signatures with the auth token', () => {
        twilioMocks.validateRequest.mockReturnValue(true);

        const valid = createClient().validateSignature('https://voice.test/voice/status', { CallSid: 'CA100' }, 'sig');

        expect(valid).toBe(true);
        expect(twilioMocks.validateRequest).toHaveBeenCalledWith(
            'test-secret',
            'sig',
            'https://voice.test/voice/status',
            { CallSid: 'CA100' }
        );
    });
});

describe('parseAnswerWebhook', () => {
    it('reads the initial answer as answered', () => {
        expect(parseAnswerWebhook({ CallSid: 'CA100', From: '+12015550123' }, false))
            .toEqual({ kind: 'answered', callRef: 'CA100', from: '+12015550123' });
    });

    it('reads an empty gather callback as a timeout', () => {
        expect(parseAnswerWebhook({ CallSid: 'CA100', Digits: '' }, true))
            .toEqual({ kind: 'timeout', callRef: 'CA100', from: undefined });
    });

    it('reads keypad input', () => {
        expect(parseAnswerWebhook({ CallSid: 'CA100', Digits: ' 1 ' }, true))
            .toEqual({ kind: 'digit-input', callRef: 'CA100', digits: '1', from: undefined });
    });

    it('reads transcribed speech', () => {
        expect(parseAnswerWebhook({ CallSid: 'CA100', SpeechResult: 'What are your hours?' }, true))
            .toEqual({ kind: 'speech-input', callRef: 'CA100', utterance: 'What are your hours?', from: undefined });
    });

    it('rejects payloads without a call SID', () => {
        expect(parseAnswerWebhook({ Digits: '1' }, true)).toBeNull();
        expect(parseAnswerWebhook(undefined, false)).toBeNull();
    });
});

describe('parseStatusWebhook', () => {
    it('maps provider statuses onto delivery statuses', () => {
        expect(parseStatusWebhook({ CallSid: 'CA100', CallStatus: 'no-answer' }))
            .toEqual({ kind: 'no-answer', callRef: 'CA100' });
        expect(parseStatusWebhook({ CallSid: 'CA100', CallStatus: 'in-progress' }))
            .toEqual({ kind: 'answered', callRef: 'CA100' });
        expect(parseStatusWebhook({ CallSid: 'CA100', CallStatus: 'Completed' }))
            .toEqual({ kind: 'completed', callRef: 'CA100' });
    });

    it('ignores statuses it does not know', () => {
        expect(parseStatusWebhook({ CallSid: 'CA100', CallStatus: 'paused' })).toBeNull();
    });
});
