/**
 * Tour encoding: a tour is a permutation of city indices, closed from the last
 * city back to the first. Moves never mutate the tour they are applied to.
 */

import { InvalidTourError } from '../../errors';
import { DistanceMatrix, Move, TabuAttribute, Tour } from '../../types/tour';

export const assertPermutation = (tour: Tour, cityCount: number, iteration?: number): void => {
    if (tour.length !== cityCount) {
        throw new InvalidTourError(`Tour visits ${tour.length} cities, expected ${cityCount}`, iteration);
    }

    const seen = new Array<boolean>(cityCount).fill(false);
    for (const city of tour) {
        if (!Number.isInteger(city) || city < 0 || city >= cityCount) {
            throw new InvalidTourError(`Tour contains unknown city index ${city}`, iteration);
        }
        if (seen[city]) {
            throw new InvalidTourError(`Tour visits city ${city} more than once`, iteration);
        }
        seen[city] = true;
    }
};

export const tourCost = (tour: Tour, matrix: DistanceMatrix): number => {
    const n = matrix.length;
    assertPermutation(tour, n);

    let cost = 0;
    for (let k = 0; k < n; ++k) {
        cost += matrix[tour[k]][tour[(k + 1) % n]];
    }

    return cost;
};

export const applyMove = (tour: Tour, move: Move): number[] => {
    const next = [...tour];
    const { i, j } = move;

    switch (move.family) {
        case 'swap':
            [next[i], next[j]] = [next[j], next[i]];
            break;
        case 'segment-reversal':
            for (let a = i, b = j; a < b; ++a, --b) {
                [next[a], next[b]] = [next[b], next[a]];
            }
            break;
    }

    return next;
};

// City found at `position` once the move has been applied
const cityAfterMove = (tour: Tour, move: Move, position: number): number => {
    const { i, j } = move;

    switch (move.family) {
        case 'swap':
            if (position === i) return tour[j];
            if (position === j) return tour[i];
            return tour[position];
        case 'segment-reversal':
            return position >= i && position <= j ? tour[i + j - position] : tour[position];
    }
};

// Edge k joins positions k and k + 1 (mod n). Edges inside a reversed segment keep their
// length on a symmetric matrix, so only the two boundary edges can change.
const touchedEdges = (move: Move, n: number): Set<number> => {
    const { i, j } = move;
    const wrap = (k: number) => (k + n) % n;

    switch (move.family) {
        case 'swap':
            return new Set([wrap(i - 1), i, wrap(j - 1), j]);
        case 'segment-reversal':
            return new Set([wrap(i - 1), j]);
    }
};

/** Cost change caused by `move`, looking only at the edges it touches */
export const moveDelta = (tour: Tour, move: Move, matrix: DistanceMatrix): number => {
    const n = tour.length;
    let delta = 0;

    for (const k of touchedEdges(move, n)) {
        const next = (k + 1) % n;
        delta -= matrix[tour[k]][tour[next]];
        delta += matrix[cityAfterMove(tour, move, k)][cityAfterMove(tour, move, next)];
    }

    return delta;
};

/**
 * Canonical tabu key. Both move families are their own inverse on positions, and the
 * pair of cities at (i, j) is the same before and after the move, so the key of a move
 * equals the key of the move that would undo it.
 */
export const moveKey = (move: Move, tour: Tour, attribute: TabuAttribute): string => {
    switch (attribute) {
        case 'positions':
            return `${move.family}:${move.i}:${move.j}`;
        case 'cities': {
            const a = tour[move.i];
            const b = tour[move.j];
            return `${move.family}:${Math.min(a, b)}-${Math.max(a, b)}`;
        }
    }
};
