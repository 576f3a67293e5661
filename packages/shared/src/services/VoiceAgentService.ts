import type { ChatCompleter, Message } from '../clients/OpenAIClient.js';
import { GenerationUnavailable, errorMessage } from '../errors.js';
import type { ReplyContext, ScriptGenerator } from '../types/calls.js';
import { withTimeout } from '../utils/timeout.js';

export interface VoiceAgentConfigs {
    practiceName: string;
    timeoutMs: number;
    maxTokens?: number;
    maxHistory?: number;
}

export class VoiceAgentService implements ScriptGenerator {
    private completer: ChatCompleter;
    private configs: VoiceAgentConfigs;

    constructor(completer: ChatCompleter, configs: VoiceAgentConfigs) {
        this.completer = completer;
        this.configs = configs;
    }

    private get assistantPrompt(): string {
        return [
            `You are the automated phone assistant for the ${this.configs.practiceName} dental practice.`,
            'You answer patient questions about dental procedures, office policies and appointments.',
            "If you don't know an answer, say so politely and offer to connect the caller with a staff member.",
            'You are speaking on a phone call: keep replies brief, natural and free of lists or formatting.'
        ].join(' ');
    }

    private get reminderPrompt(): string {
        return [
            `You are calling a patient on behalf of the ${this.configs.practiceName} dental practice to remind them of an upcoming appointment.`,
            'Identify the practice, greet the patient by name and state the appointment date and time.',
            'Do not ask for a reply or list keypad options; those are read out after your message.',
            'Keep it to two or three short spoken sentences.'
        ].join(' ');
    }

    async generateReminderScript(patientName: string, appointmentTime: string, customMessage: string | null): Promise<string> {
        let details = `Remind ${patientName} about their dental appointment on ${appointmentTime}.`;
        if (customMessage) {
            details += ` Additional information: ${customMessage}`;
        }

        return await this.complete('reminder script', [
            { role: 'system', content: this.reminderPrompt },
            { role: 'user', content: details }
        ]);
    }

    async generateFreeformReply(utterance: string, context: ReplyContext): Promise<string> {
        const history = context.history.slice(-(this.configs.maxHistory ?? 10));

        const messages: Message[] = [{ role: 'system', content: this.assistantPrompt }];
        for (const exchange of history) {
            messages.push({ role: 'user', content: exchange.utterance });
            messages.push({ role: 'assistant', content: exchange.reply });
        }
        messages.push({ role: 'user', content: utterance });

        return await this.complete(`reply for call ${context.callRef}`, messages);
    }

    private async complete(label: string, messages: Message[]): Promise<string> {
        const controller = new AbortController();

        try {
            const text = await withTimeout(
                this.completer.completeText({
                    messages,
                    max_tokens: this.configs.maxTokens ?? 200,
                    signal: controller.signal
                }),
                this.configs.timeoutMs,
                `Generating ${label}`
            );

            if (!text) {
                throw new GenerationUnavailable(`Empty completion for ${label}`);
            }
            return text;
        } catch (error) {
            controller.abort();
            if (error instanceof GenerationUnavailable) {
                throw error;
            }
            console.error(`[VoiceAgentService] Failed generating ${label}:`, errorMessage(error));
            throw new GenerationUnavailable(`Generation failed for ${label}: ${errorMessage(error)}`, { cause: error });
        }
    }
}
