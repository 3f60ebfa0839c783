import { Algorithm, AlgorithmConfig, AlgorithmResultWithMetadata, TourSolution } from '../../types/algorithm';
import { City } from '../../types/types';
import { buildDistanceMatrix } from '../../utils/DistanceMatrix';
import { TabuSearchEngine } from './engine';

export class TabuSearchAlgorithm implements Algorithm {
    readonly name = 'tabu-search';

    async solve(
        cities: ReadonlyArray<City>,
        { distanceCalc, tabuConfig, callbacks, signal }: AlgorithmConfig,
    ): Promise<AlgorithmResultWithMetadata<TourSolution>> {
        const matrix = buildDistanceMatrix(cities, distanceCalc);
        const engine = new TabuSearchEngine(matrix, tabuConfig, callbacks);
        const run = engine.run({ signal });

        return {
            solution: {
                route: run.tour.map(index => cities[index].name),
                tour: run.tour,
                cost: run.cost,
                bestIteration: run.bestIteration,
                iterations: run.iterations,
                stopReason: run.stopReason,
            },
            history: run.history,
            execTime: run.elapsedMs,
        };
    }
}

export { TabuSearchEngine, SearchPhase, selectCandidate } from './engine';
export type { Candidate, RunOptions, SearchState, Selection, TabuSearchRun } from './engine';
export { DEFAULT_TABU_SEARCH_CONFIG, parseTabuSearchConfig, tabuSearchConfigSchema } from './config';
export type { TabuSearchConfig, TabuSearchConfigInput } from './config';
export { initialTour, nearestNeighborTour } from './initial-tour';
export { generateNeighborhood, neighborhoodSize } from './neighborhood';
export { TabuMemory } from './tabu-memory';
export { applyMove, assertPermutation, moveDelta, moveKey, tourCost } from './tour';
