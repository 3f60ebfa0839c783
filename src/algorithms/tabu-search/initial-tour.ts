/**
 * Constructive heuristics for the starting tour of a search.
 */

import { ConfigurationError } from '../../errors';
import { DistanceMatrix, InitialStrategy } from '../../types/tour';
import { RandomGenerator } from '../interfaces';

export interface InitialTourOptions {
    matrix?: DistanceMatrix;
    rng?: RandomGenerator;
    startCity?: number;
}

const identityTour = (cityCount: number): number[] => Array.from({ length: cityCount }, (_, i) => i);

/**
 * Greedy nearest neighbour: from the current city always go to the closest unvisited one.
 * Equal distances resolve to the lowest city index.
 */
export const nearestNeighborTour = (matrix: DistanceMatrix, startCity: number): number[] => {
    const n = matrix.length;
    const visited = new Array<boolean>(n).fill(false);
    const tour = [startCity];
    visited[startCity] = true;

    let current = startCity;
    while (tour.length < n) {
        let next = -1;
        let nextDistance = Infinity;

        for (let city = 0; city < n; ++city) {
            if (!visited[city] && matrix[current][city] < nextDistance) {
                next = city;
                nextDistance = matrix[current][city];
            }
        }

        tour.push(next);
        visited[next] = true;
        current = next;
    }

    return tour;
};

export const initialTour = (cityCount: number, strategy: InitialStrategy, options: InitialTourOptions = {}): number[] => {
    switch (strategy) {
        case 'identity':
            return identityTour(cityCount);

        case 'random-shuffle': {
            if (!options.rng) {
                throw new ConfigurationError('random-shuffle needs a seeded random generator');
            }
            return options.rng.shuffle(identityTour(cityCount));
        }

        case 'nearest-neighbor-greedy': {
            const { matrix, rng } = options;
            if (!matrix) {
                throw new ConfigurationError('nearest-neighbor-greedy needs a distance matrix');
            }
            if (matrix.length !== cityCount) {
                throw new ConfigurationError(`Distance matrix covers ${matrix.length} cities, expected ${cityCount}`);
            }

            let startCity = options.startCity;
            if (startCity === undefined) {
                if (!rng) {
                    throw new ConfigurationError('nearest-neighbor-greedy needs a start city or a random generator');
                }
                startCity = rng.nextInt(cityCount);
            }
            if (!Number.isInteger(startCity) || startCity < 0 || startCity >= cityCount) {
                throw new ConfigurationError(`Start city ${startCity} is outside 0..${cityCount - 1}`, { startCity });
            }

            return nearestNeighborTour(matrix, startCity);
        }
    }
};
