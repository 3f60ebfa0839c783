import { Algorithm, AlgorithmConfig, TourSolution } from './algorithm';
import { City } from './types';

export interface BenchmarkDataset {
    readonly id: string;
    readonly cities: ReadonlyArray<City>;
}

/** Individual benchmark run result */
export interface BenchmarkRun {
    readonly algorithmName: string;
    readonly datasetId: string;
    readonly runIndex: number;
    readonly solution: TourSolution;
    readonly execTime: number; // ms
    readonly timestamp: number;
}

/** Statistical summary of multiple runs */
export interface BenchmarkSummary {
    readonly algorithmName: string;
    readonly datasetId: string;
    readonly cityCount: number;
    readonly runs: number;
    readonly avgExecutionTime: number;
    readonly stdExecutionTime: number;
    readonly avgCost: number;
    readonly stdCost: number;
    readonly bestCost: number;
    readonly worstCost: number;
    readonly avgIterations: number;
}

/** Benchmark configuration; run `i` uses random seed `tabuConfig.randomSeed + i` (base 0 when unset) */
export interface BenchmarkConfig {
    readonly runs: number;
    readonly algorithms: ReadonlyArray<Algorithm>;
    readonly datasets: ReadonlyArray<BenchmarkDataset>;
    readonly config: AlgorithmConfig;
}

/** Benchmark suite interface */
export interface BenchmarkSuite {
    run(config: BenchmarkConfig): Promise<ReadonlyArray<BenchmarkSummary>>;
    exportResults(summaries: ReadonlyArray<BenchmarkSummary>, outputPath: string): Promise<void>;
}
