import type { LLMProvider } from "./types.js";
import type { AppConfig } from "../config/env.js";
import { OpenAiProvider } from "./openai.provider.js";
import { createOpenAiClient } from "../services/openai.client.js";

export function createLLMProvider(config: AppConfig): LLMProvider | null {
    switch (config.llmProvider) {
        case "openai": {
            if (!config.openaiApiKey) return null;
            return new OpenAiProvider(createOpenAiClient(config.openaiApiKey), config.openaiModel);
        }
        case "none":
        case "disabled":
            return null;
        default:
            // Unknown provider configured; disable LLM usage gracefully
            return null;
    }
}
