import * as readline from 'readline';
import { OracleUnavailable } from '../errors';
import { OracleUsage, TextOracle } from '../types';

export interface HumanOracleOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

const INPUT_CLOSED = 'Input closed before a reply was entered';

interface PendingReply {
    resolve: (line: string) => void;
    reject: (error: Error) => void;
}

/**
 * Lets a person hold a seat in the roster. Shows the rendered conversation
 * and reads one line from the terminal as the utterance.
 *
 * One readline interface serves every turn. Lines that arrive before they
 * are asked for (piped input) wait in a queue for the next turn.
 */
export class HumanOracle implements TextOracle {
    readonly model = 'human';
    private readonly input: NodeJS.ReadableStream;
    private readonly output: NodeJS.WritableStream;
    private readonly usage: OracleUsage = { calls: 0, input: 0, output: 0 };
    private rl?: readline.Interface;
    private readonly queuedLines: string[] = [];
    private readonly pending: PendingReply[] = [];
    private inputClosed: boolean = false;

    constructor(options: HumanOracleOptions = {}) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
    }

    getUsage(): OracleUsage {
        return { ...this.usage };
    }

    async generate(directive: string, content: string): Promise<string> {
        this.output.write('\n\n👤 IT\'S YOUR TURN!\n');
        this.output.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');
        this.output.write(`${directive}\n`);
        this.output.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');
        this.output.write(`${content}\n`);
        this.output.write('> ');

        try {
            const answer = await this.nextLine();
            this.usage.calls++;
            return answer.trim();
        } catch (error: unknown) {
            throw OracleUnavailable.from(error, this.model);
        }
    }

    /**
     * Release the input stream. Later turns fail with OracleUnavailable.
     */
    close(): void {
        this.inputClosed = true;
        this.rl?.close();
    }

    private nextLine(): Promise<string> {
        this.attach();

        const queued = this.queuedLines.shift();
        if (queued !== undefined) {
            return Promise.resolve(queued);
        }
        if (this.inputClosed) {
            return Promise.reject(new Error(INPUT_CLOSED));
        }
        return new Promise<string>((resolve, reject) => {
            this.pending.push({ resolve, reject });
        });
    }

    private attach(): void {
        if (this.rl || this.inputClosed) {
            return;
        }

        const rl = readline.createInterface({ input: this.input, terminal: false });
        rl.on('line', line => {
            const waiter = this.pending.shift();
            if (waiter) {
                waiter.resolve(line);
            } else {
                this.queuedLines.push(line);
            }
        });
        rl.once('close', () => {
            this.inputClosed = true;
            for (const waiter of this.pending.splice(0)) {
                waiter.reject(new Error(INPUT_CLOSED));
            }
        });
        this.rl = rl;
    }
}
