import { errorMessage, parseAnswerWebhook, parseStatusWebhook } from '@recall/shared';
import { APOLOGY_CLOSING } from '../dialog/ReminderScripts.js';
import type { CallFlowEngine } from '../services/CallFlowEngine.js';
import type { TwimlRenderer } from '../services/TwimlRenderer.js';

export interface AnswerWebhookInput {
    body: unknown;
    isGatherCallback: boolean;
    reminderId?: string;
}

export class VoiceController {
    private engine: CallFlowEngine;
    private renderer: TwimlRenderer;

    constructor(engine: CallFlowEngine, renderer: TwimlRenderer) {
        this.engine = engine;
        this.renderer = renderer;
    }

    /** Always resolves with a TwiML document; failures are spoken as an apology. */
    async handleAnswer(input: AnswerWebhookInput): Promise<string> {
        const event = parseAnswerWebhook(input.body, input.isGatherCallback);
        if (!event) {
            console.warn('[VoiceController] Answer webhook without a CallSid');
            return this.renderer.renderError(APOLOGY_CLOSING);
        }

        try {
            const turn = await this.engine.handleAnswer(event, input.reminderId);
            return this.renderer.render(turn);
        } catch (error) {
            console.error('[VoiceController] Error rendering call turn:', errorMessage(error));
            return this.renderer.renderError(APOLOGY_CLOSING);
        }
    }

    async handleStatus(body: unknown): Promise<{ success: boolean; error?: string }> {
        const event = parseStatusWebhook(body);
        if (!event) {
            console.warn('[VoiceController] Ignoring unrecognized status webhook');
            return { success: false, error: 'Unrecognized status payload' };
        }

        try {
            await this.engine.handleStatus(event);
            return { success: true };
        } catch (error) {
            console.error(`[VoiceController] Error reconciling ${event.kind} for call ${event.callRef}:`, error);
            return { success: false, error: errorMessage(error) };
        }
    }
}
