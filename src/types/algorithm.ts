import type { TabuSearchConfigInput } from '../algorithms/tabu-search/config';
import { City } from './types';
import { Move } from './tour';

export type DistanceCalculator = (from: City, to: City) => number;

export type StopReason = 'max-iterations' | 'no-improvement' | 'target-cost' | 'time-limit' | 'cancelled';

export interface ConvergenceUpdate {
    timeMs: number;
    iteration: number;
    bestCost: number;
}

/** State reported after every completed iteration */
export interface IterationSnapshot {
    iteration: number;
    timeMs: number; // since the run started, initialization included
    currentCost: number;
    bestCost: number;
    move: Move | null; // null when every neighbour was tabu
    aspirated: boolean;
    tabuSize: number;
}

export interface SearchCallbacks {
    onIteration?: (snapshot: IterationSnapshot) => void;
    onNewBest?: (update: ConvergenceUpdate) => void;
}

export interface AlgorithmConfig {
    distanceCalc: DistanceCalculator;
    tabuConfig?: TabuSearchConfigInput;
    callbacks?: SearchCallbacks;
    signal?: AbortSignal;
}

export interface TourSolution {
    route: string[]; // city names in visiting order
    tour: number[];
    cost: number;
    bestIteration: number;
    iterations: number;
    stopReason: StopReason | 'exhausted';
}

export interface AlgorithmResultWithMetadata<T> {
    solution: T;
    history: ConvergenceUpdate[];
    execTime: number; // ms
}

export interface Algorithm {
    readonly name: string;
    solve(cities: ReadonlyArray<City>, config: AlgorithmConfig): Promise<AlgorithmResultWithMetadata<TourSolution>>;
}
