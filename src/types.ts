export interface TranscriptEntry {
    identity: string;
    text: string;
}

export interface SpeakerConfig {
    identity: string;
    directive: string;
    model: string;      // 'claude-*', 'gpt-*', 'gemini-*' or 'human'
    role?: string;      // Display only, never sent to the oracle
}

export interface OracleUsage {
    calls: number;
    input: number;
    output: number;
}

/**
 * External text-generation capability a Speaker delegates to.
 * Implementations must reject with OracleUnavailable on any failure.
 */
export interface TextOracle {
    readonly model: string;
    generate(directive: string, content: string): Promise<string>;
    getUsage?(): OracleUsage;
    close?(): void;     // Release held resources such as an input stream
}

export interface TurnResult {
    identity: string;
    text: string;
    turnIndex: number;  // Index of the turn that just completed
}

export type ConversationPhase = 'unseeded' | 'seeded';

/**
 * Picks the roster index that speaks on a given turn. Must return an integer
 * in [0, rosterSize).
 */
export type SelectionPolicy = (
    turnIndex: number,
    rosterSize: number,
    history: readonly TranscriptEntry[]
) => number;

export interface SpeakerState {
    utterancesProduced: number;
    failures: number;
    lastProducedAt: Date | null;
}

export interface OrchestratorOptions {
    selectionPolicy?: SelectionPolicy;
    logDirectory?: string;
}
