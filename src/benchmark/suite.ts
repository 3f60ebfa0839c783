import { writeFile } from 'fs/promises';
import groupBy from 'lodash/groupBy';
import mean from 'lodash/mean';

import { ConfigurationError } from '../errors';
import { BenchmarkConfig, BenchmarkRun, BenchmarkSuite, BenchmarkSummary } from '../types/benchmark';

/** Main benchmarking implementation */
export class DefaultBenchmarkSuite implements BenchmarkSuite {
    async run(config: BenchmarkConfig): Promise<ReadonlyArray<BenchmarkSummary>> {
        if (!Number.isInteger(config.runs) || config.runs <= 0) {
            throw new ConfigurationError(`Benchmark runs must be a positive integer, got ${config.runs}`);
        }

        const baseSeed = config.config.tabuConfig?.randomSeed ?? 0;
        const results: BenchmarkRun[] = [];
        const cityCounts = new Map<string, number>();

        for (const algorithm of config.algorithms) {
            for (const dataset of config.datasets) {
                cityCounts.set(dataset.id, dataset.cities.length);
                console.log(`Running ${algorithm.name} on ${dataset.id} (${dataset.cities.length} cities)`);

                for (let runIndex = 0; runIndex < config.runs; runIndex++) {
                    const { solution, execTime } = await algorithm.solve(dataset.cities, {
                        ...config.config,
                        tabuConfig: { ...config.config.tabuConfig, randomSeed: baseSeed + runIndex },
                    });

                    results.push({
                        algorithmName: algorithm.name,
                        datasetId: dataset.id,
                        runIndex,
                        solution,
                        execTime,
                        timestamp: Date.now(),
                    });
                }
            }
        }

        return this.summarizeResults(results, cityCounts);
    }

    private summarizeResults(
        results: ReadonlyArray<BenchmarkRun>,
        cityCounts: ReadonlyMap<string, number>,
    ): ReadonlyArray<BenchmarkSummary> {
        const grouped = groupBy(results, result => `${result.algorithmName}:${result.datasetId}`);

        return Object.values(grouped).map(runs => {
            const { algorithmName, datasetId } = runs[0];
            const costs = runs.map(r => r.solution.cost);
            const times = runs.map(r => r.execTime);

            return {
                algorithmName,
                datasetId,
                cityCount: cityCounts.get(datasetId) ?? 0,
                runs: runs.length,
                avgExecutionTime: mean(times),
                stdExecutionTime: this.std(times),
                avgCost: mean(costs),
                stdCost: this.std(costs),
                bestCost: Math.min(...costs),
                worstCost: Math.max(...costs),
                avgIterations: mean(runs.map(r => r.solution.iterations)),
            };
        });
    }

    private std(values: ReadonlyArray<number>): number {
        const avg = mean(values);
        const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
        return Math.sqrt(variance);
    }

    async exportResults(summaries: ReadonlyArray<BenchmarkSummary>, outputPath: string): Promise<void> {
        try {
            await writeFile(outputPath, JSON.stringify(summaries, null, 4));
        } catch (error) {
            console.error(`Failed to export benchmark results to ${outputPath}`);
            throw error;
        }
    }
}
