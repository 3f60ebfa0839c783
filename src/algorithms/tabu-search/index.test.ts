import { describe, it, expect } from 'vitest';

import { AlgorithmConfig } from '../../types/algorithm';
import { City } from '../../types/types';
import { CityLoader } from '../../utils/city-loader';
import { euclideanDistanceCalculator } from '../../utils/euclideanDistanceCalculator';
import { TabuSearchAlgorithm } from './index';

const makeCity = (name: string, x: number, y: number): City => ({ name, longitude: x, latitude: y });

describe('TabuSearchAlgorithm', () => {
    it('should return the best route as city names', async () => {
        const cities = [makeCity('A', 0, 0), makeCity('C', 1, 1), makeCity('B', 0, 1), makeCity('D', 1, 0)];
        const config: AlgorithmConfig = {
            distanceCalc: euclideanDistanceCalculator,
            tabuConfig: { moveFamily: 'swap', initialStrategy: 'identity', maxIterations: 10 },
        };

        const { solution, history } = await new TabuSearchAlgorithm().solve(cities, config);

        expect(solution.cost).toBe(4);
        expect([...solution.route].sort()).toEqual(['A', 'B', 'C', 'D']);
        expect(solution.route).toEqual(solution.tour.map(index => cities[index].name));
        expect(solution.iterations).toBe(10);
        expect(solution.stopReason).toBe('max-iterations');
        expect(history[0]).toEqual({ timeMs: 0, iteration: 0, bestCost: expect.closeTo(2 + 2 * Math.SQRT2, 12) });
        expect(history).toHaveLength(2);
    });

    it('should improve on the nearest-neighbour tour of the Moroccan cities', async () => {
        const { cities } = await new CityLoader().loadMorocco();
        const bestCosts: number[] = [];

        const { solution } = await new TabuSearchAlgorithm().solve(cities, {
            distanceCalc: euclideanDistanceCalculator,
            tabuConfig: { startCity: 0, maxIterations: 100 },
            callbacks: { onNewBest: update => bestCosts.push(update.bestCost) },
        });

        expect(new Set(solution.route).size).toBe(22);
        expect(solution.route).toHaveLength(22);
        bestCosts.forEach(cost => expect(solution.cost).toBeLessThanOrEqual(cost));
    });
});
