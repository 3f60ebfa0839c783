import { Algorithm } from '../types/algorithm';
import { DistanceMatrix, Tour } from '../types/tour';

/** Random number generator interface for reproducible results */
export interface RandomGenerator {
    next(): number; // [0, 1)
    nextInt(max: number): number; // [0, max)
    shuffle<T>(items: T[]): T[];
}

/** Exact solvers used as ground truth for the heuristics */
export interface ExactSolver extends Algorithm {
    readonly maxCities: number;
    optimalTour(matrix: DistanceMatrix): { tour: Tour; cost: number };
}
