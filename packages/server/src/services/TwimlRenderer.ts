import Twilio from 'twilio';
import type { DialogTurn } from '../dialog/types.js';

const { VoiceResponse } = Twilio.twiml;

export const GATHER_ACTION = '/voice/answer?gather=1';

export interface TwimlRendererConfigs {
    gatherTimeoutSeconds: number;
}

/**
 * Renders dialog turns as TwiML. Every gather posts back to the answer
 * webhook, including when it closes empty, so the dialog sees its timeouts.
 */
export class TwimlRenderer {
    private configs: TwimlRendererConfigs;

    constructor(configs: TwimlRendererConfigs) {
        this.configs = configs;
    }

    render<S>(turn: DialogTurn<S>): string {
        const response = new VoiceResponse();

        switch (turn.inputMode) {
            case 'digits':
                response.gather({
                    input: ['dtmf'],
                    numDigits: 1,
                    timeout: this.configs.gatherTimeoutSeconds,
                    actionOnEmptyResult: true,
                    action: GATHER_ACTION,
                    method: 'POST'
                }).say(turn.prompt);
                break;

            case 'speech':
                response.gather({
                    input: ['speech'],
                    speechTimeout: 'auto',
                    timeout: this.configs.gatherTimeoutSeconds,
                    actionOnEmptyResult: true,
                    action: GATHER_ACTION,
                    method: 'POST'
                }).say(turn.prompt);
                break;

            case 'none':
                if (turn.prompt) {
                    response.say(turn.prompt);
                }
                if (turn.transferTo) {
                    response.dial(turn.transferTo);
                }
                response.hangup();
                break;
        }

        return response.toString();
    }

    renderError(message: string): string {
        const response = new VoiceResponse();
        response.say(message);
        response.hangup();
        return response.toString();
    }
}
