import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { ConfigurationError } from '../errors';
import { euclideanDistanceCalculator } from '../utils/euclideanDistanceCalculator';
import { buildParamGrid, tuneTabuSearch } from './tuning';

const square = {
    id: 'square',
    cities: [
        { name: 'A', longitude: 0, latitude: 0 },
        { name: 'C', longitude: 1, latitude: 1 },
        { name: 'B', longitude: 0, latitude: 1 },
        { name: 'D', longitude: 1, latitude: 0 },
    ],
};

describe('buildParamGrid', () => {
    it('should build the Cartesian product', () => {
        const grid = buildParamGrid({ tabuTenure: [5, 10, 15], moveFamily: ['swap', 'segment-reversal'], maxIterations: [100] });

        expect(grid).toHaveLength(6);
        expect(grid[0]).toEqual({ tabuTenure: 5, moveFamily: 'swap', maxIterations: 100, tabuAttribute: 'positions' });
    });

    it('should include the tabu attribute when given', () => {
        const grid = buildParamGrid({
            tabuTenure: [5, 10],
            moveFamily: ['swap'],
            maxIterations: [100, 200],
            tabuAttribute: ['positions', 'cities'],
        });

        expect(grid).toHaveLength(8);
    });
});

describe('tuneTabuSearch', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should find the optimum of a small data set with every configuration', async () => {
        const grid = buildParamGrid({ tabuTenure: [2], moveFamily: ['swap', 'segment-reversal'], maxIterations: [10] });

        const results = await tuneTabuSearch([square], grid, { distanceCalc: euclideanDistanceCalculator, repetitions: 2 });

        expect(results).toHaveLength(2);
        results.forEach(result => {
            expect(result.avgGapPercent).toBe(0);
            expect(result.optimalHits).toBe(2);
        });
    });

    it('should refuse data sets too large for the exact solver', async () => {
        const large = {
            id: 'large',
            cities: Array.from({ length: 11 }, (_, i) => ({ name: `c${i}`, longitude: i, latitude: i * i })),
        };

        await expect(
            tuneTabuSearch([large], buildParamGrid({ tabuTenure: [5], moveFamily: ['swap'], maxIterations: [10] }), {
                distanceCalc: euclideanDistanceCalculator,
                repetitions: 1,
            }),
        ).rejects.toThrow(ConfigurationError);
    });

    it('should reject a non-positive repetition count', async () => {
        await expect(
            tuneTabuSearch([square], [], { distanceCalc: euclideanDistanceCalculator, repetitions: 0 }),
        ).rejects.toThrow(/Repetitions must be a positive integer/);
    });
});
