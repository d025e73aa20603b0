import OpenAI from 'openai';
import type { AssistantReply, ChatRequest, ModelClient, ToolCall } from './types.js';
import { MalformedToolCallError, RateLimitError, errorMessage } from './errors.js';

// ─── Failure Classification ──────────────────────────────────────────────────

/**
 * Map an SDK error onto the engine's recoverable kinds. Groq reports
 * throttling with code `rate_limit_exceeded` (429, or 413 for the
 * tokens-per-minute limit) and XML-style tool calls from small models as
 * 400 / `tool_use_failed`. Anything else is returned as is.
 */
export function classifyEndpointError(err: unknown): unknown {
    const text = errorMessage(err);
    const code = err instanceof OpenAI.APIError ? err.code : undefined;

    if (err instanceof OpenAI.RateLimitError || code === 'rate_limit_exceeded' || text.includes('rate_limit_exceeded')) {
        return new RateLimitError(text);
    }
    if (code === 'tool_use_failed' || text.includes('tool_use_failed')) {
        return new MalformedToolCallError(text);
    }
    return err;
}

// ─── OpenAI-compatible Client ────────────────────────────────────────────────

export interface OpenAIModelClientOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 120_000;

export class OpenAIModelClient implements ModelClient {
    private readonly client: OpenAI;

    constructor(options: OpenAIModelClientOptions) {
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            maxRetries: 0, // rotation and backoff happen in the engine
        });
    }

    async complete(request: ChatRequest): Promise<AssistantReply> {
        let completion: OpenAI.Chat.Completions.ChatCompletion;
        try {
            completion = await this.client.chat.completions.create({
                model: request.model,
                messages: request.messages,
                tools: request.tools,
                tool_choice: request.toolChoice,
                temperature: request.temperature,
            });
        } catch (err) {
            throw classifyEndpointError(err);
        }

        const message = completion.choices[0]?.message;
        if (!message) {
            throw new Error('Model endpoint returned no choices');
        }

        const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.function.name, arguments: call.function.arguments },
        }));

        return { content: message.content, toolCalls };
    }
}

export function createModelClientFactory(baseUrl: string): (apiKey: string) => ModelClient {
    return (apiKey) => new OpenAIModelClient({ apiKey, baseUrl });
}
