import { MODEL_COSTS } from '../config';
import { OracleUsage } from '../types';

interface Rate {
    input: number;   // $ per million tokens
    output: number;
}

function rateFor(model: string): Rate | null {
    if (model.startsWith('claude')) {
        if (model.includes('haiku')) return MODEL_COSTS.claude.haiku;
        if (model.includes('opus')) return MODEL_COSTS.claude.opus;
        return MODEL_COSTS.claude.sonnet;
    }

    if (model.startsWith('gpt')) {
        if (model.includes('gpt-4o-mini')) return MODEL_COSTS.openai.gpt4o_mini;
        return MODEL_COSTS.openai.gpt4o;
    }

    if (model.startsWith('gemini')) {
        const known = Object.entries(MODEL_COSTS.gemini).find(([name]) => model.startsWith(name));
        if (known) return known[1];
        console.warn(`[Pricing] Unknown Gemini model "${model}" for cost calculation. Using default.`);
        return MODEL_COSTS.gemini['gemini-1.5-pro'];
    }

    return null;
}

/**
 * Dollar cost of the given usage. Models without a price (humans, unknown
 * providers) cost nothing.
 */
export function estimateCost(model: string, usage: OracleUsage): number {
    const rate = rateFor(model);
    if (!rate) {
        return 0;
    }
    return (usage.input * rate.input + usage.output * rate.output) / 1000000;
}
