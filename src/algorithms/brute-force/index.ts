/**
 * @module brute-force-solver
 * @description
 * Exact solver: fixes city 0 as the start and evaluates every ordering of the remaining
 * cities.
 *
 * Complexity:
 * O((N - 1)! * N).
 *
 * WARNING:
 * Suitable ONLY for very small inputs (N <= 10), as ground truth for the heuristics.
 */

import { performance } from 'perf_hooks';

import { ConfigurationError } from '../../errors';
import { AlgorithmConfig, AlgorithmResultWithMetadata, TourSolution } from '../../types/algorithm';
import { DistanceMatrix, Tour } from '../../types/tour';
import { City } from '../../types/types';
import { buildDistanceMatrix, validateDistanceMatrix } from '../../utils/DistanceMatrix';
import { ExactSolver } from '../interfaces';
import { iteratePermutations } from './iteratePermutations';

export class BruteForceAlgorithm implements ExactSolver {
    readonly name = 'brute-force';
    readonly maxCities = 10;

    async solve(
        cities: ReadonlyArray<City>,
        { distanceCalc }: Pick<AlgorithmConfig, 'distanceCalc'>,
    ): Promise<AlgorithmResultWithMetadata<TourSolution>> {
        const startTime = performance.now();
        const matrix = buildDistanceMatrix(cities, distanceCalc);
        const { tour, cost, evaluated } = this.search(matrix);

        return {
            solution: {
                route: tour.map(index => cities[index].name),
                tour,
                cost,
                bestIteration: 0,
                iterations: evaluated,
                stopReason: 'exhausted',
            },
            history: [],
            execTime: performance.now() - startTime,
        };
    }

    optimalTour(matrix: DistanceMatrix): { tour: Tour; cost: number } {
        const { tour, cost } = this.search(matrix);
        return { tour, cost };
    }

    private search(matrix: DistanceMatrix): { tour: number[]; cost: number; evaluated: number } {
        validateDistanceMatrix(matrix);

        const n = matrix.length;
        if (n > this.maxCities) {
            throw new ConfigurationError(`Brute force supports at most ${this.maxCities} cities, got ${n}`, {
                cityCount: n,
            });
        }

        const rest = Array.from({ length: n - 1 }, (_, i) => i + 1);
        let bestTour: number[] = [0, ...rest];
        let bestCost = Infinity;
        let evaluated = 0;

        iteratePermutations(rest, permutation => {
            ++evaluated;

            let cost = matrix[0][permutation[0]] + matrix[permutation[permutation.length - 1]][0];
            for (let k = 0; k < permutation.length - 1 && cost < bestCost; ++k) {
                cost += matrix[permutation[k]][permutation[k + 1]];
            }

            if (cost < bestCost) {
                bestCost = cost;
                bestTour = [0, ...permutation];
            }
        });

        return { tour: bestTour, cost: bestCost, evaluated };
    }
}
