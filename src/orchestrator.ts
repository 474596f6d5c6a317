import { Speaker } from './speaker';
import { roundRobin } from './selection';
import { FileUtils, LogEntry } from './utils/file-utils';
import { ConversationPhase, OrchestratorOptions, SelectionPolicy, TranscriptEntry, TurnResult } from './types';

/**
 * Drives turn-taking over a fixed roster. Every completed turn is broadcast
 * to all speakers in roster order, so their transcripts stay identical.
 */
export class Orchestrator {
    private readonly roster: readonly Speaker[];
    private readonly selectionPolicy: SelectionPolicy;
    private readonly logPath?: string;
    private turnIndex: number = 0;
    private phase: ConversationPhase = 'unseeded';
    private hasWarnedUnseeded: boolean = false;
    private inFlight: boolean = false;

    constructor(roster: readonly Speaker[], options: OrchestratorOptions = {}) {
        if (roster.length === 0) {
            throw new Error('Orchestrator needs at least one speaker');
        }

        const seen = new Set<string>();
        for (const speaker of roster) {
            if (seen.has(speaker.identity)) {
                throw new Error(`Duplicate speaker identity in roster: "${speaker.identity}"`);
            }
            seen.add(speaker.identity);
        }

        this.roster = [...roster];
        this.selectionPolicy = options.selectionPolicy ?? roundRobin;
        if (options.logDirectory) {
            this.logPath = `${options.logDirectory}/orchestrator.log`;
        }
    }

    getTurnIndex(): number {
        return this.turnIndex;
    }

    getPhase(): ConversationPhase {
        return this.phase;
    }

    getRoster(): readonly Speaker[] {
        return this.roster;
    }

    getHistory(): readonly TranscriptEntry[] {
        return this.roster[0].getTranscript();
    }

    isConsistent(): boolean {
        const reference = this.roster[0].getTranscript();
        return this.roster.every(speaker => {
            const transcript = speaker.getTranscript();
            return transcript.length === reference.length &&
                transcript.every((entry, i) =>
                    entry.identity === reference[i].identity && entry.text === reference[i].text
                );
        });
    }

    /**
     * Seed every transcript with the opening line. Call exactly once; a
     * second call seeds the transcript twice.
     */
    prime(identity: string, text: string): void {
        if (this.phase === 'seeded') {
            console.warn(`⚠️  prime() called again; "${identity}" line will be seeded twice`);
        }

        for (const speaker of this.roster) {
            speaker.absorb(identity, text);
        }
        this.phase = 'seeded';
    }

    selectSpeaker(turnIndex: number): number {
        const index = this.selectionPolicy(turnIndex, this.roster.length, this.getHistory());
        if (!Number.isInteger(index) || index < 0 || index >= this.roster.length) {
            throw new RangeError(
                `Selection policy returned ${index} for turn ${turnIndex}; roster has ${this.roster.length} speakers`
            );
        }
        return index;
    }

    /**
     * Run one turn. If the speaker's oracle fails nothing is absorbed and the
     * turn index stays put, so the caller may simply call advance() again.
     * Turns are strictly sequential: a call made while another is still
     * waiting on its oracle is rejected.
     */
    async advance(): Promise<TurnResult> {
        if (this.inFlight) {
            throw new Error(`advance() called while turn ${this.turnIndex} is still in flight`);
        }

        this.inFlight = true;
        try {
            return await this.runTurn();
        } finally {
            this.inFlight = false;
        }
    }

    private async runTurn(): Promise<TurnResult> {
        if (this.phase === 'unseeded' && !this.hasWarnedUnseeded) {
            console.warn('⚠️  advance() called before prime(); speakers start from an empty transcript');
            this.hasWarnedUnseeded = true;
        }

        const turnIndex = this.turnIndex;
        const speaker = this.roster[this.selectSpeaker(turnIndex)];
        const startedAt = Date.now();

        let text: string;
        try {
            text = await speaker.produce();
        } catch (error: unknown) {
            await this.log('Turn failed', {
                turnIndex,
                speaker: speaker.identity,
                error: error instanceof Error ? error.message : String(error)
            });
            throw error;
        }

        // No await between here and the increment: the broadcast is atomic.
        for (const listener of this.roster) {
            listener.absorb(speaker.identity, text);
        }
        this.turnIndex++;

        await this.log('Turn completed', {
            turnIndex,
            speaker: speaker.identity,
            characters: text.length,
            durationMs: Date.now() - startedAt
        });

        return { identity: speaker.identity, text, turnIndex };
    }

    private async log(message: string, data: LogEntry): Promise<void> {
        if (!this.logPath) {
            return;
        }

        try {
            await FileUtils.appendToLog(this.logPath, {
                timestamp: new Date().toISOString(),
                message,
                ...data
            });
        } catch (error: unknown) {
            console.error(`❌ Failed to write orchestrator log: ${error}`);
        }
    }
}
