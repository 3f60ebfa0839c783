import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../../errors';
import { City } from '../../types/types';
import { buildDistanceMatrix } from '../../utils/DistanceMatrix';
import { euclideanDistanceCalculator } from '../../utils/euclideanDistanceCalculator';
import { BruteForceAlgorithm } from './index';

const makeCity = (name: string, x: number, y: number): City => ({ name, longitude: x, latitude: y });

describe('BruteForceAlgorithm', () => {
    it('should find the square perimeter', async () => {
        const cities = [makeCity('A', 0, 0), makeCity('C', 1, 1), makeCity('B', 0, 1), makeCity('D', 1, 0)];

        const { solution, history } = await new BruteForceAlgorithm().solve(cities, {
            distanceCalc: euclideanDistanceCalculator,
        });

        expect(solution.cost).toBe(4);
        expect(solution.tour[0]).toBe(0);
        expect(solution.iterations).toBe(6);
        expect(solution.stopReason).toBe('exhausted');
        expect(history).toEqual([]);
    });

    it('should visit cities on a line end to end and back', () => {
        const line = [makeCity('P', 0, 0), makeCity('Q', 5, 0), makeCity('R', 2, 0), makeCity('S', 9, 0)];
        const matrix = buildDistanceMatrix(line, euclideanDistanceCalculator);

        const { tour, cost } = new BruteForceAlgorithm().optimalTour(matrix);

        expect(cost).toBe(18);
        expect(tour).toEqual([0, 2, 1, 3]);
    });

    it('should handle two cities', () => {
        const { tour, cost } = new BruteForceAlgorithm().optimalTour([
            [0, 2.5],
            [2.5, 0],
        ]);

        expect(tour).toEqual([0, 1]);
        expect(cost).toBe(5);
    });

    it('should refuse more than 10 cities', () => {
        const matrix = Array.from({ length: 11 }, (_, i) => Array.from({ length: 11 }, (_, j) => Math.abs(i - j)));

        expect(() => new BruteForceAlgorithm().optimalTour(matrix)).toThrow(ConfigurationError);
    });
});
