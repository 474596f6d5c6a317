import { OracleUnavailable } from '../errors';
import { RetryConfig, retryIfRetryable, withTimeout } from '../utils/error-recovery';
import { ORACLE_RETRY_CONFIG } from '../config';
import { OracleUsage, TextOracle } from '../types';

export interface OracleOptions {
    timeoutMs?: number;
    maxTokens?: number;
    retry?: RetryConfig;
    showPrompts?: boolean;
}

export interface OracleReply {
    text: string;
    inputTokens: number;
    outputTokens: number;
}

/**
 * Shared plumbing for network-backed oracles: timeout, transient-error retry,
 * usage accounting and the uniform OracleUnavailable failure.
 */
export abstract class BaseOracle implements TextOracle {
    protected readonly timeoutMs: number;
    protected readonly maxTokens: number;
    private readonly retry: RetryConfig;
    private readonly showPrompts: boolean;
    private readonly usage: OracleUsage = { calls: 0, input: 0, output: 0 };

    constructor(readonly model: string, options: OracleOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 120000;
        this.maxTokens = options.maxTokens ?? 1024;
        this.retry = options.retry ?? ORACLE_RETRY_CONFIG;
        this.showPrompts = options.showPrompts ?? false;
    }

    protected abstract request(directive: string, content: string): Promise<OracleReply>;

    getUsage(): OracleUsage {
        return { ...this.usage };
    }

    async generate(directive: string, content: string): Promise<string> {
        if (this.showPrompts) {
            console.log(`\n${'='.repeat(80)}`);
            console.log(`📝 PROMPT TO ${this.model}:`);
            console.log(`${'='.repeat(80)}`);
            console.log(`[DIRECTIVE]\n${directive}\n`);
            console.log(`[CONTENT]\n${content}`);
            console.log(`${'='.repeat(80)}\n`);
        }

        const operationName = `${this.model} call`;
        try {
            const reply = await retryIfRetryable(
                () => withTimeout(this.request(directive, content), this.timeoutMs, operationName),
                this.retry,
                operationName
            );

            this.usage.calls++;
            this.usage.input += reply.inputTokens;
            this.usage.output += reply.outputTokens;
            return reply.text;
        } catch (error: unknown) {
            throw OracleUnavailable.from(error, this.model);
        }
    }
}
