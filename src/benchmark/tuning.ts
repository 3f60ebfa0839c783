import sortBy from 'lodash/sortBy';

import { BruteForceAlgorithm } from '../algorithms/brute-force';
import { ExactSolver } from '../algorithms/interfaces';
import { TabuSearchAlgorithm } from '../algorithms/tabu-search';
import { TabuSearchConfigInput } from '../algorithms/tabu-search/config';
import { ConfigurationError } from '../errors';
import { DistanceCalculator } from '../types/algorithm';
import { BenchmarkDataset } from '../types/benchmark';
import { MoveFamily, TabuAttribute } from '../types/tour';
import { buildDistanceMatrix } from '../utils/DistanceMatrix';

export interface TuningGrid {
    tabuTenure: ReadonlyArray<number>;
    moveFamily: ReadonlyArray<MoveFamily>;
    maxIterations: ReadonlyArray<number>;
    tabuAttribute?: ReadonlyArray<TabuAttribute>;
}

export interface TuningResult {
    configId: number;
    config: TabuSearchConfigInput;
    avgGapPercent: number; // How far from optimal?
    optimalHits: number; // Runs that matched the optimum
    avgTimeMs: number;
}

export interface TuningOptions {
    distanceCalc: DistanceCalculator;
    repetitions: number;
    exactSolver?: ExactSolver;
}

const OPTIMUM_TOLERANCE = 1e-9;

/** Cartesian product of the grid values */
export const buildParamGrid = (grid: TuningGrid): TabuSearchConfigInput[] => {
    const configs: TabuSearchConfigInput[] = [];
    const attributes = grid.tabuAttribute ?? ['positions'];

    grid.tabuTenure.forEach(tabuTenure => {
        grid.moveFamily.forEach(moveFamily => {
            grid.maxIterations.forEach(maxIterations => {
                attributes.forEach(tabuAttribute => {
                    configs.push({ tabuTenure, moveFamily, maxIterations, tabuAttribute });
                });
            });
        });
    });

    return configs;
};

/**
 * Runs every configuration `repetitions` times on each data set small enough for the exact
 * solver and ranks configurations by their average gap to the optimum. Repetition `r` uses
 * seed `config.randomSeed + r` (base 0 when unset).
 */
export const tuneTabuSearch = async (
    datasets: ReadonlyArray<BenchmarkDataset>,
    grid: ReadonlyArray<TabuSearchConfigInput>,
    { distanceCalc, repetitions, exactSolver = new BruteForceAlgorithm() }: TuningOptions,
): Promise<TuningResult[]> => {
    const validation = datasets.filter(dataset => dataset.cities.length <= exactSolver.maxCities);
    if (validation.length === 0) {
        throw new ConfigurationError(`No data set has at most ${exactSolver.maxCities} cities to tune on`);
    }
    if (!Number.isInteger(repetitions) || repetitions <= 0) {
        throw new ConfigurationError(`Repetitions must be a positive integer, got ${repetitions}`);
    }

    console.log(`Tuning on ${validation.length} data sets with ${grid.length} configs...`);

    const groundTruth = new Map<string, number>();
    for (const dataset of validation) {
        groundTruth.set(dataset.id, exactSolver.optimalTour(buildDistanceMatrix(dataset.cities, distanceCalc)).cost);
    }

    const tabuSearch = new TabuSearchAlgorithm();
    const results: TuningResult[] = [];

    for (let configId = 0; configId < grid.length; configId++) {
        const config = grid[configId];
        let totalGap = 0;
        let totalTime = 0;
        let optimalHits = 0;

        for (const dataset of validation) {
            const optimal = groundTruth.get(dataset.id) ?? 0;

            for (let r = 0; r < repetitions; r++) {
                const { solution, execTime } = await tabuSearch.solve(dataset.cities, {
                    distanceCalc,
                    tabuConfig: { ...config, randomSeed: (config.randomSeed ?? 0) + r },
                });
                totalTime += execTime;

                if (solution.cost - optimal <= OPTIMUM_TOLERANCE * Math.max(1, optimal)) {
                    ++optimalHits;
                }
                if (optimal > 0) {
                    totalGap += Math.max(0, ((solution.cost - optimal) / optimal) * 100);
                }
            }
        }

        const runCount = validation.length * repetitions;
        results.push({
            configId,
            config,
            avgGapPercent: totalGap / runCount,
            optimalHits,
            avgTimeMs: totalTime / runCount,
        });
    }

    return sortBy(results, [result => result.avgGapPercent, result => result.avgTimeMs]);
};
