import { SelectionPolicy } from './types';

/**
 * Default policy. The +1 offset means roster[0] (usually whoever primed the
 * conversation) does not speak on turn 0.
 */
export const roundRobin: SelectionPolicy = (turnIndex, rosterSize) => (turnIndex + 1) % rosterSize;

/**
 * Cycle through an explicit list of roster indices.
 */
export function fixedOrder(order: readonly number[]): SelectionPolicy {
    if (order.length === 0) {
        throw new Error('fixedOrder needs at least one roster index');
    }
    const sequence = [...order];
    return turnIndex => sequence[turnIndex % sequence.length];
}

// mulberry32
function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Pseudo-random speaker choice that replays identically for the same seed.
 * Each turn's draw is derived from the seed and the turn index alone, so
 * asking twice about a turn (e.g. after a failed advance) returns the same
 * speaker and nothing accumulates across turns.
 */
export function seededRandom(seed: number): SelectionPolicy {
    return (turnIndex, rosterSize) => {
        const draw = createRandom((seed ^ Math.imul(turnIndex, 0x9e3779b9)) >>> 0)();
        return Math.floor(draw * rosterSize);
    };
}
