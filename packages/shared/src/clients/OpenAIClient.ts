import OpenAI from 'openai';

export interface OpenAIConfigs {
    apiKey: string;
    baseUrl?: string;
    model?: string;
}

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
    role: MessageRole;
    content: string;
}

export interface ChatCompletionRequest {
    messages: Message[];
    model?: string;
    temperature?: number;
    max_tokens?: number;
    signal?: AbortSignal;
}

export interface ChatCompleter {
    completeText(request: ChatCompletionRequest): Promise<string>;
}

export class OpenAIClient implements ChatCompleter {
    private openai: OpenAI;
    private model: string;

    constructor(configs: OpenAIConfigs) {
        this.openai = new OpenAI({
            apiKey: configs.apiKey,
            baseURL: configs.baseUrl
        });
        this.model = configs.model ?? 'gpt-4o';
    }

    async generalGPTCall(request: ChatCompletionRequest): Promise<OpenAI.Chat.Completions.ChatCompletion> {
        try {
            const messages: OpenAI.Chat.ChatCompletionMessageParam[] = request.messages.map((m) => ({
                role: m.role,
                content: m.content
            }));

            return await this.openai.chat.completions.create(
                {
                    messages,
                    model: request.model ?? this.model,
                    temperature: request.temperature ?? 0.7,
                    stream: false,
                    ...(request.max_tokens ? { max_tokens: request.max_tokens } : {})
                },
                { signal: request.signal }
            );
        } catch (error) {
            console.error('[OpenAI] Failed general task:', error);
            throw new Error('[OpenAI] Call to api with general prompt failed', { cause: error });
        }
    }

    async completeText(request: ChatCompletionRequest): Promise<string> {
        const completion = await this.generalGPTCall(request);
        return completion.choices[0]?.message?.content?.trim() ?? '';
    }
}
