/**
 * Configuration for the turnwise conversation runner.
 *
 * Defines the default roster, model pricing and runtime settings.
 * Loads API keys from environment variables via dotenv.
 *
 * Each speaker has:
 * - identity: Display name, unique within a roster
 * - role: Short description shown in the CLI banner
 * - model: Oracle to use ('claude-*', 'gpt-*', 'gemini-*' or 'human')
 * - directive: Fixed system instruction for the persona
 */
import dotenv from 'dotenv';
import { SpeakerConfig } from './types';
import { RetryConfig } from './utils/error-recovery';

dotenv.config();

export const SPEAKER_CONFIGS: SpeakerConfig[] = [
    {
        identity: 'Narrator',
        role: 'Game master',
        model: 'claude-3-5-haiku-latest',
        directive: 'You are the Narrator of a short text adventure. Describe what happens as a result of the Hero\'s actions in two or three sentences. Never act for the Hero.'
    },
    {
        identity: 'Hero',
        role: 'Protagonist',
        model: 'claude-3-5-haiku-latest',
        directive: 'You are the Hero of a short text adventure. Reply in the first person with one or two sentences describing what you do next.'
    }
];

export const DEFAULT_OPENING = 'Begin the quest.';

export const MODEL_COSTS = {
    claude: {
        haiku: { input: 0.80, output: 4.0 },   // $ per million tokens
        sonnet: { input: 3.0, output: 15.0 },
        opus: { input: 15.0, output: 75.0 }
    },
    openai: {
        gpt4o: { input: 2.50, output: 10.00 },
        gpt4o_mini: { input: 0.15, output: 0.60 }
    },
    gemini: {
        'gemini-1.5-pro': { input: 1.25, output: 5.00 },
        'gemini-1.5-flash': { input: 0.075, output: 0.30 },
        'gemini-2.0-flash': { input: 0.10, output: 0.40 }
    }
};

export const API_KEYS = {
    anthropic: process.env.ANTHROPIC_API_KEY,
    openai: process.env.OPENAI_API_KEY,
    google: process.env.GOOGLE_API_KEY
};

export type ApiKeys = typeof API_KEYS;

// 4000ms delay to stay under 15 RPM free tier limit (60s / 15 = 4s)
export const GEMINI_RATE_LIMIT_DELAY = 4000;

export const ORACLE_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    initialDelayMs: 1000,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
    rateLimitDelayMs: 65000
};

export interface Settings {
    maxTurns: number;
    logDirectory: string;
    costSummaryPath: string;
    oracleTimeoutMs: number;
    maxTokens: number;
    showPrompts: boolean;
}

export const DEFAULT_SETTINGS: Settings = {
    maxTurns: 6,
    logDirectory: 'data/logs',
    costSummaryPath: 'data/summaries/costs_summary.csv',
    oracleTimeoutMs: 120000,
    maxTokens: 1024,
    showPrompts: false
};

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    return {
        maxTurns: readPositiveInt(env, 'MAX_TURNS', DEFAULT_SETTINGS.maxTurns),
        logDirectory: env.LOG_DIRECTORY || DEFAULT_SETTINGS.logDirectory,
        costSummaryPath: env.COST_SUMMARY_PATH || DEFAULT_SETTINGS.costSummaryPath,
        oracleTimeoutMs: readPositiveInt(env, 'ORACLE_TIMEOUT_MS', DEFAULT_SETTINGS.oracleTimeoutMs),
        maxTokens: readPositiveInt(env, 'MAX_TOKENS', DEFAULT_SETTINGS.maxTokens),
        showPrompts: env.SHOW_SPEAKER_PROMPTS === 'true'
    };
}
