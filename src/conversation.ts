import { Orchestrator } from './orchestrator';
import { isOracleUnavailable } from './errors';
import { RetryConfig, retryWithBackoff } from './utils/error-recovery';
import { TurnResult } from './types';

export type StopCondition = (turn: TurnResult) => boolean;

export interface ConversationOptions {
    maxTurns: number;
    stopWhen?: StopCondition;
    onTurn?: (turn: TurnResult) => void;
    retry?: RetryConfig | false;
}

export interface ConversationOutcome {
    turns: TurnResult[];
    stoppedBy: 'max_turns' | 'stop_condition';
}

export function stopWhenContains(marker: string): StopCondition {
    return turn => turn.text.includes(marker);
}

/**
 * Advance until the turn budget is spent or the stop condition fires.
 * Retrying a failed turn is safe: a failed advance() leaves no partial state.
 */
export async function runConversation(
    orchestrator: Orchestrator,
    options: ConversationOptions
): Promise<ConversationOutcome> {
    const { maxTurns, stopWhen, onTurn, retry = false } = options;
    if (!Number.isInteger(maxTurns) || maxTurns < 0) {
        throw new RangeError(`maxTurns must be a non-negative integer, got ${maxTurns}`);
    }

    const turns: TurnResult[] = [];
    while (turns.length < maxTurns) {
        const turn = retry
            ? await retryWithBackoff(
                () => orchestrator.advance(),
                retry,
                `Turn ${orchestrator.getTurnIndex()}`,
                isOracleUnavailable
            )
            : await orchestrator.advance();

        turns.push(turn);
        onTurn?.(turn);

        if (stopWhen?.(turn)) {
            return { turns, stoppedBy: 'stop_condition' };
        }
    }

    return { turns, stoppedBy: 'max_turns' };
}
