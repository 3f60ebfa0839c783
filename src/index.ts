export * from './algorithms/tabu-search';
export { BruteForceAlgorithm } from './algorithms/brute-force';
export type { ExactSolver, RandomGenerator } from './algorithms/interfaces';
export { DefaultBenchmarkSuite } from './benchmark/suite';
export { buildParamGrid, tuneTabuSearch } from './benchmark/tuning';
export type { TuningGrid, TuningOptions, TuningResult } from './benchmark/tuning';
export * from './errors';
export type * from './types/algorithm';
export type * from './types/benchmark';
export type {
    DistanceMatrix,
    InitialStrategy,
    Move,
    MoveFamily,
    SegmentReversalMove,
    SwapMove,
    TabuAttribute,
    Tour,
} from './types/tour';
export { INITIAL_STRATEGIES, MOVE_FAMILIES } from './types/tour';
export { citiesJsonSchema, cityJsonSchema } from './types/types';
export type { Cities, City } from './types/types';
export { CityLoader, MOROCCO_CITIES_PATH } from './utils/city-loader';
export { selectCitiesByName, selectRandomCities } from './utils/city-selection';
export { buildDistanceMatrix, validateDistanceMatrix } from './utils/DistanceMatrix';
export { euclideanDistanceCalculator } from './utils/euclideanDistanceCalculator';
export { greatCircleDistanceCalculator } from './utils/greatCircleDistanceCalculator';
export { PerformanceTracker } from './utils/performance-tracker';
export { MAX_RANDOM_SEED, SeededRandom } from './utils/random';
