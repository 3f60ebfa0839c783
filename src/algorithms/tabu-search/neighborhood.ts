import { Move, MoveFamily, Tour } from '../../types/tour';

/**
 * Lazily yields one move per unordered position pair (i, j), i < j, in lexicographic order.
 * The order is the tie-break order of the search, so it must stay stable.
 */
export function* generateNeighborhood(tour: Tour, family: MoveFamily): Generator<Move, void, undefined> {
    const n = tour.length;

    for (let i = 0; i < n - 1; ++i) {
        for (let j = i + 1; j < n; ++j) {
            yield { family, i, j };
        }
    }
}

export const neighborhoodSize = (cityCount: number): number => (cityCount * (cityCount - 1)) / 2;
