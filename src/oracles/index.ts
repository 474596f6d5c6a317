import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { API_KEYS, ApiKeys, GEMINI_RATE_LIMIT_DELAY } from '../config';
import { TextOracle } from '../types';
import { OracleOptions } from './base-oracle';
import { AnthropicOracle } from './anthropic-oracle';
import { OpenAIOracle } from './openai-oracle';
import { GeminiOracle } from './gemini-oracle';
import { HumanOracle, HumanOracleOptions } from './human-oracle';

export { BaseOracle } from './base-oracle';
export type { OracleOptions, OracleReply } from './base-oracle';
export { AnthropicOracle } from './anthropic-oracle';
export { OpenAIOracle } from './openai-oracle';
export { GeminiOracle } from './gemini-oracle';
export type { GeminiOracleOptions } from './gemini-oracle';
export { HumanOracle } from './human-oracle';
export type { HumanOracleOptions } from './human-oracle';
export { estimateCost } from './pricing';

export interface OracleFactoryOptions extends OracleOptions {
    apiKeys?: ApiKeys;
    geminiThrottleMs?: number;
    human?: HumanOracleOptions;
}

function requireKey(key: string | undefined, variable: string, model: string): string {
    if (!key) {
        throw new Error(`${variable} is not set. Please set the ${variable} environment variable to use ${model}.`);
    }
    return key;
}

/**
 * Pick an oracle adapter from the model name prefix.
 */
export function createOracle(model: string, options: OracleFactoryOptions = {}): TextOracle {
    const { apiKeys = API_KEYS, geminiThrottleMs = GEMINI_RATE_LIMIT_DELAY, human, ...oracleOptions } = options;

    if (model === 'human') {
        return new HumanOracle(human);
    }

    if (model.startsWith('claude')) {
        const client = new Anthropic({ apiKey: requireKey(apiKeys.anthropic, 'ANTHROPIC_API_KEY', model) });
        return new AnthropicOracle(model, client, oracleOptions);
    }

    if (model.startsWith('gpt') || model.startsWith('o1') || model.startsWith('o3')) {
        const client = new OpenAI({ apiKey: requireKey(apiKeys.openai, 'OPENAI_API_KEY', model) });
        return new OpenAIOracle(model, client, oracleOptions);
    }

    if (model.startsWith('gemini')) {
        const client = new GoogleGenerativeAI(requireKey(apiKeys.google, 'GOOGLE_API_KEY', model));
        return new GeminiOracle(model, client, { ...oracleOptions, throttleMs: geminiThrottleMs });
    }

    throw new Error(`Unknown model prefix: ${model}`);
}
