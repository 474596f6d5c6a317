import { OracleUnavailable } from './errors';
import { FileUtils, LogEntry } from './utils/file-utils';
import { OracleUsage, SpeakerConfig, SpeakerState, TextOracle, TranscriptEntry } from './types';

export const NARRATIVE_PREAMBLE = 'Here is the conversation so far.';

export type SpeakerInit = Omit<SpeakerConfig, 'model'>;

export interface SpeakerOptions {
    logDirectory?: string;
}

/**
 * One persona in a conversation. Holds a fixed directive and a private,
 * append-only view of the transcript; turns that view into the next
 * utterance through its oracle.
 */
export class Speaker {
    readonly identity: string;
    readonly directive: string;
    readonly role?: string;

    private readonly transcript: TranscriptEntry[] = [];
    private readonly state: SpeakerState = {
        utterancesProduced: 0,
        failures: 0,
        lastProducedAt: null
    };
    private readonly logPath?: string;

    constructor(
        init: SpeakerInit,
        private readonly oracle: TextOracle,
        options: SpeakerOptions = {}
    ) {
        this.identity = init.identity;
        this.directive = init.directive;
        this.role = init.role;

        if (options.logDirectory) {
            this.logPath = `${options.logDirectory}/speakers/${this.identity.toLowerCase().replace(/[^a-z0-9_-]/g, '_')}.log`;
        }
    }

    getModel(): string {
        return this.oracle.model;
    }

    getState(): SpeakerState {
        return { ...this.state };
    }

    getUsage(): OracleUsage | undefined {
        return this.oracle.getUsage?.();
    }

    getTranscript(): readonly TranscriptEntry[] {
        return this.transcript.map(entry => ({ ...entry }));
    }

    /**
     * Flatten the transcript into the text block handed to the oracle.
     */
    renderNarrative(): string {
        return NARRATIVE_PREAMBLE + this.transcript
            .map(entry => `\n${entry.identity}: ${entry.text}`)
            .join('');
    }

    /**
     * Ask the oracle for this speaker's next line. Does not touch the
     * transcript; the orchestrator broadcasts the result afterwards.
     */
    async produce(): Promise<string> {
        const content = `${this.renderNarrative()}\n${this.identity}:`;
        const startedAt = Date.now();

        let text: string;
        try {
            text = await this.oracle.generate(this.directive, content);
        } catch (error: unknown) {
            const failure = OracleUnavailable.from(error, this.oracle.model);
            this.state.failures++;
            await this.log('Oracle failure', { error: failure.message });
            throw failure;
        }

        this.state.utterancesProduced++;
        this.state.lastProducedAt = new Date();
        await this.log('Produced utterance', {
            characters: text.length,
            durationMs: Date.now() - startedAt
        });

        return text;
    }

    close(): void {
        this.oracle.close?.();
    }

    absorb(identity: string, text: string): void {
        this.transcript.push({ identity, text });
    }

    // Metadata only: utterance text never reaches disk.
    private async log(message: string, data: LogEntry): Promise<void> {
        if (!this.logPath) {
            return;
        }

        try {
            await FileUtils.appendToLog(this.logPath, {
                timestamp: new Date().toISOString(),
                speaker: this.identity,
                model: this.oracle.model,
                message,
                ...data
            });
        } catch (error: unknown) {
            console.error(`❌ Failed to write speaker log for ${this.identity}: ${error}`);
        }
    }
}
