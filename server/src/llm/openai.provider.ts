import type OpenAI from "openai";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";
import { DEFAULT_LLM_MODEL, LLM_GENERATION_TIMEOUT_MS } from "../config/index.js";
import { logger } from "../lib/logger/structured-logger.js";

function toInput(messages: Message[]) {
    return messages.map(m => ({ role: m.role, content: m.content }));
}

function describeError(e: unknown): string | number {
    if (e instanceof Error) {
        const status = 'status' in e ? e.status : undefined;
        return typeof status === 'number' ? status : e.name;
    }
    return 'unknown';
}

export class OpenAiProvider implements LLMProvider {
    constructor(
        private readonly client: OpenAI,
        private readonly defaultModel: string = DEFAULT_LLM_MODEL
    ) { }

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        const temperature = opts?.temperature ?? 0;
        const timeoutMs = opts?.timeout ?? LLM_GENERATION_TIMEOUT_MS;
        const tStart = Date.now();

        const controller = new AbortController();
        const t = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const resp = await this.client.responses.create({
                model: opts?.model || this.defaultModel,
                input: toInput(messages),
                temperature
            }, { signal: controller.signal });

            logger.debug({ event: 'llm_complete_ok', durMs: Date.now() - tStart }, '[llm] ok');
            return resp.output_text || '';
        } catch (e) {
            logger.error({
                event: 'llm_complete_failed',
                status: describeError(e),
                durMs: Date.now() - tStart
            }, '[llm] complete failed');
            throw e;
        } finally {
            clearTimeout(t);
        }
    }
}
