/**
 * @file    llm.ts
 * @purpose Structured-output LLM entry point with an automatic provider fallback chain.
 * @deps    @ai-sdk/google, @ai-sdk/openai, @ai-sdk/anthropic, ai, zod
 * @env     GOOGLE_GENERATIVE_AI_API_KEY (or GEMINI_API_KEY), OPENAI_API_KEY, ANTHROPIC_API_KEY
 *
 * DECISION: Fallback chain is Gemini Flash → OpenAI GPT-4o → Anthropic.
 * Gemini reads multi-page PDFs natively and is the cheapest of the three.
 * The chain skips any provider without an API key configured.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { generateObject, type CoreMessage, type LanguageModel } from 'ai';
import { z } from 'zod';
import { errorMessage } from '../errors';

export type ProviderKeys = {
    google?: string;
    openai?: string;
    anthropic?: string;
};

export type LLMOptions = {
    keys: ProviderKeys;
    system?: string;
    prompt?: string;
    messages?: CoreMessage[];
    temperature?: number;
};

type ProviderEntry = {
    name: string;
    model: () => LanguageModel; // instantiated on first use
};

export function getProviderChain(keys: ProviderKeys): ProviderEntry[] {
    const chain: ProviderEntry[] = [];
    const { google, openai, anthropic } = keys;

    if (google) {
        chain.push({
            name: 'Gemini 2.5 Flash',
            model: () => createGoogleGenerativeAI({ apiKey: google })('gemini-2.5-flash'),
        });
    }
    if (openai) {
        chain.push({
            name: 'OpenAI GPT-4o',
            model: () => createOpenAI({ apiKey: openai })('gpt-4o'),
        });
    }
    if (anthropic) {
        chain.push({
            name: 'Anthropic Claude 3.5 Sonnet',
            model: () => createAnthropic({ apiKey: anthropic })('claude-3-5-sonnet-20241022'),
        });
    }
    return chain;
}

/**
 * Generates a structured object using the provider fallback chain.
 * Tries each available provider in order until one succeeds.
 */
export async function unifiedObjectGeneration<T>(
    options: LLMOptions & { schema: z.ZodType<T>; schemaName?: string }
): Promise<T> {
    const providers = getProviderChain(options.keys);

    if (providers.length === 0) {
        throw new Error('No LLM providers configured. Set GOOGLE_GENERATIVE_AI_API_KEY, OPENAI_API_KEY, or ANTHROPIC_API_KEY.');
    }

    let lastError: unknown = null;

    for (let i = 0; i < providers.length; i++) {
        const provider = providers[i];
        try {
            const { object } = await generateObject({
                model: provider.model(),
                schema: options.schema,
                schemaName: options.schemaName,
                system: options.system,
                prompt: options.prompt,
                messages: options.messages,
                temperature: options.temperature,
            });
            return object;
        } catch (err) {
            lastError = err;
            const next = providers[i + 1];
            if (next) {
                console.warn(`⚠️ ${provider.name} failed: ${errorMessage(err)}. Falling back to ${next.name}...`);
            } else {
                console.error(`❌ All LLM providers failed. Last error (${provider.name}): ${errorMessage(err)}`);
            }
        }
    }

    throw lastError instanceof Error ? lastError : new Error('All LLM providers failed.');
}
