import Twilio from 'twilio';
import { z } from 'zod';
import { PlacementFailure, errorMessage } from '../errors.js';
import type { AnswerEvent, DeliveryStatus, PlaceCallRequest, StatusEvent, TelephonyGateway } from '../types/calls.js';

export interface TwilioConfigs {
    accountSid: string;
    authToken: string;
    agentNumber: string;
}

export class TwilioClient implements TelephonyGateway {
    private client: ReturnType<typeof Twilio>;
    private configs: TwilioConfigs;

    constructor(configs: TwilioConfigs) {
        this.configs = configs;
        this.client = Twilio(configs.accountSid, configs.authToken);
    }

    async placeCall(request: PlaceCallRequest): Promise<string> {
        try {
            console.log('[TwilioClient] Placing call to', request.to, 'answer URL:', request.answerUrl);

            const call = await this.client.calls.create({
                from: this.configs.agentNumber,
                to: request.to,
                url: request.answerUrl,
                method: 'POST',
                statusCallback: request.statusCallbackUrl,
                statusCallbackMethod: 'POST',
                statusCallbackEvent: ['initiated', 'ringing', 'answered', 'completed']
            });

            return call.sid;
        } catch (error) {
            console.error('[TwilioClient] Error placing call:', error);
            throw new PlacementFailure(errorMessage(error), { cause: error });
        }
    }

    validateSignature(url: string, params: Record<string, string>, signature: string): boolean {
        return Twilio.validateRequest(this.configs.authToken, signature, url, params);
    }
}

const AnswerWebhookSchema = z.object({
    CallSid: z.string().min(1),
    From: z.string().optional(),
    Digits: z.string().optional(),
    SpeechResult: z.string().optional()
});

const StatusWebhookSchema = z.object({
    CallSid: z.string().min(1),
    CallStatus: z.string().min(1)
});

const PROVIDER_STATUS_MAP: Record<string, DeliveryStatus> = {
    'queued': 'initiated',
    'initiated': 'initiated',
    'ringing': 'ringing',
    'in-progress': 'answered',
    'answered': 'answered',
    'completed': 'completed',
    'busy': 'busy',
    'no-answer': 'no-answer',
    'failed': 'failed',
    'canceled': 'canceled'
};

/**
 * Turns an answer or gather-callback payload into a call event. A gather
 * callback with neither digits nor speech means the gather window expired.
 */
export function parseAnswerWebhook(body: unknown, isGatherCallback: boolean): AnswerEvent | null {
    const parsed = AnswerWebhookSchema.safeParse(body);
    if (!parsed.success) {
        return null;
    }

    const { CallSid: callRef, From: from, Digits: digits, SpeechResult: speech } = parsed.data;

    if (digits && digits.trim()) {
        return { kind: 'digit-input', callRef, digits: digits.trim(), from };
    }
    if (speech && speech.trim()) {
        return { kind: 'speech-input', callRef, utterance: speech.trim(), from };
    }
    return { kind: isGatherCallback ? 'timeout' : 'answered', callRef, from };
}

export function parseStatusWebhook(body: unknown): StatusEvent | null {
    const parsed = StatusWebhookSchema.safeParse(body);
    if (!parsed.success) {
        return null;
    }

    const kind = PROVIDER_STATUS_MAP[parsed.data.CallStatus.toLowerCase()];
    if (!kind) {
        return null;
    }

    return { kind, callRef: parsed.data.CallSid };
}
