// ========================================
// Smart Inspection - Ollama Chat Backend
// ========================================

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ModelUnavailableError } from '../errors.js';
import { Mutex } from '../mutex.js';
import type { ChatBackend, ChatReply, ChatRequest } from '../types.js';

export interface OllamaBackendOptions {
    host: string;
    model: string;
    timeoutMs?: number;
    /** Injected in tests; defaults to an axios instance bound to `host`. */
    http?: AxiosInstance;
}

const ChatResponseSchema = z.object({
    message: z.object({
        role: z.string().optional(),
        content: z.string().default(''),
        tool_calls: z.array(z.object({
            function: z.object({
                name: z.string(),
                arguments: z.unknown().optional(),
            }),
        })).optional(),
    }),
});

const TagsResponseSchema = z.object({
    models: z.array(z.object({ name: z.string(), model: z.string().optional() })),
});

/**
 * Chat client for a local Ollama server (`POST /api/chat`, non-streaming).
 * Calls are serialized so a preload and a real turn never overlap on the model.
 */
export class OllamaBackend implements ChatBackend {
    readonly name = 'ollama';
    readonly model: string;
    private readonly http: AxiosInstance;
    private readonly callMutex = new Mutex();

    constructor(options: OllamaBackendOptions) {
        this.model = options.model;
        this.http = options.http ?? axios.create({
            baseURL: options.host,
            timeout: options.timeoutMs ?? 120_000,
        });
    }

    async listModels(): Promise<string[]> {
        const res = await this.http.get('/api/tags');
        const tags = TagsResponseSchema.parse(res.data);
        return tags.models.map((m) => m.model ?? m.name);
    }

    /** Throws ModelUnavailableError when the configured model is not installed. */
    async ensureModelAvailable(): Promise<void> {
        const available = await this.listModels();
        if (!available.includes(this.model)) {
            throw new ModelUnavailableError(this.model, available);
        }
    }

    chat(request: ChatRequest): Promise<ChatReply> {
        return this.callMutex.runExclusive(async (): Promise<ChatReply> => {
            const body = {
                model: this.model,
                messages: request.messages,
                stream: false,
                ...(request.tools && request.tools.length > 0 ? { tools: request.tools } : {}),
            };

            const res = await this.http.post('/api/chat', body);
            const { message } = ChatResponseSchema.parse(res.data);

            const toolCall = message.tool_calls?.[0];
            if (toolCall) {
                return { kind: 'tool_call', name: toolCall.function.name };
            }
            return { kind: 'text', content: message.content };
        });
    }
}
