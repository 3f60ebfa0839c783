/** Ordered city indices; the last city connects back to the first. */
export type Tour = ReadonlyArray<number>;

/** Row-major N×N distances, `matrix[i][j]` from city i to city j */
export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

export type MoveFamily = 'swap' | 'segment-reversal';

export const MOVE_FAMILIES: ReadonlyArray<MoveFamily> = ['swap', 'segment-reversal'];

export interface SwapMove {
    readonly family: 'swap';
    readonly i: number;
    readonly j: number;
}

export interface SegmentReversalMove {
    readonly family: 'segment-reversal';
    readonly i: number;
    readonly j: number;
}

export type Move = SwapMove | SegmentReversalMove;

export type InitialStrategy = 'identity' | 'random-shuffle' | 'nearest-neighbor-greedy';

export const INITIAL_STRATEGIES: ReadonlyArray<InitialStrategy> = ['identity', 'random-shuffle', 'nearest-neighbor-greedy'];

/**
 * What a tabu key is built from:
 * - `positions`: the move's (i, j) positions
 * - `cities`: the cities sitting at those positions before the move
 */
export type TabuAttribute = 'positions' | 'cities';
