/**
 * Error Recovery - Retry failed operations with exponential backoff
 */

export interface RetryConfig {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    rateLimitDelayMs?: number;  // Pause used instead of backoff on 429/quota errors
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    initialDelayMs: 1000,
    maxDelayMs: 10000,
    backoffMultiplier: 2,
    rateLimitDelayMs: 65000
};

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Calculate delay for retry attempt using exponential backoff
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
    const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
    return Math.min(delay, config.maxDelayMs);
}

export function isRateLimitError(error: Error): boolean {
    return error.message.includes('429') ||
        error.message.toLowerCase().includes('rate limit') ||
        error.message.includes('Quota exceeded');
}

/**
 * Retry an async operation with exponential backoff.
 * The last error is rethrown as-is so callers can still match on its type.
 */
export async function retryWithBackoff<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG,
    operationName: string = 'operation',
    shouldRetry: (error: Error) => boolean = () => true
): Promise<T> {
    let lastError: Error = new Error(`${operationName} was never attempted`);

    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
        try {
            return await operation();
        } catch (error: unknown) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (!shouldRetry(lastError) || attempt === config.maxRetries) {
                break;
            }

            console.log(`\n⚠️  ${operationName} failed (attempt ${attempt + 1}/${config.maxRetries + 1})`);
            console.log(`   Error Type: ${lastError.name}`);
            console.log(`   Error Message: ${lastError.message}`);

            let delay = calculateDelay(attempt, config);
            if (isRateLimitError(lastError) && config.rateLimitDelayMs !== undefined) {
                delay = Math.max(delay, config.rateLimitDelayMs);
                console.log(`⏳ Rate limit hit (429/Quota). Pausing for ${delay / 1000}s to clear quota...`);
            }

            if (delay > 0) {
                console.log(`   Retrying in ${delay}ms...\n`);
                await sleep(delay);
            }
        }
    }

    throw lastError;
}

/**
 * Check if an error is retryable (vs fatal)
 */
export function isRetryableError(error: Error): boolean {
    const retryablePatterns = [
        /timeout/i,
        /timed out/i,
        /network/i,
        /ECONNRESET/i,
        /ECONNREFUSED/i,
        /ENOTFOUND/i,
        /rate limit/i,
        /overloaded/i,
        /429/,
        /500/,
        /502/,
        /503/,
        /504/,
        /529/,
        /temporarily unavailable/i
    ];

    return retryablePatterns.some(pattern => pattern.test(error.message));
}

/**
 * Retry only if error is retryable, otherwise throw immediately
 */
export async function retryIfRetryable<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG,
    operationName: string = 'operation'
): Promise<T> {
    try {
        return await retryWithBackoff(operation, config, operationName, isRetryableError);
    } catch (error: unknown) {
        if (error instanceof Error && !isRetryableError(error)) {
            console.log(`\n❌ Fatal error in ${operationName}: ${error.message}`);
            console.log(`   Not retrying (error is not transient)\n`);
        }
        throw error;
    }
}

/**
 * Race an operation against a timer. The timer is always cleared so nothing
 * is left pending once the operation settles.
 */
export async function withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    operationName: string = 'operation'
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
            () => reject(new Error(`${operationName} timeout after ${timeoutMs / 1000}s`)),
            timeoutMs
        );
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
