/**
 * @module tabu-search-engine
 * @description
 * Tabu Search over closed tours.
 *
 * Every iteration scores the whole neighbourhood of the current tour, moves to the best
 * admissible neighbour even when it is worse than the current tour, and forbids that move
 * for `tabuTenure` iterations so the search cannot fall straight back into the optimum it
 * just left. A tabu move is still admissible when it would beat the best tour found so far
 * (aspiration).
 *
 * Phases: READY -> INITIALIZING -> ITERATING -> TERMINATED. An engine runs once; a new run
 * needs a new engine.
 */

import { performance } from 'perf_hooks';

import { ConfigurationError, EngineStateError } from '../../errors';
import { ConvergenceUpdate, SearchCallbacks, StopReason } from '../../types/algorithm';
import { DistanceMatrix, Move } from '../../types/tour';
import { validateDistanceMatrix } from '../../utils/DistanceMatrix';
import { SeededRandom } from '../../utils/random';
import { parseTabuSearchConfig, TabuSearchConfig, TabuSearchConfigInput } from './config';
import { initialTour } from './initial-tour';
import { generateNeighborhood } from './neighborhood';
import { TabuMemory } from './tabu-memory';
import { applyMove, assertPermutation, moveDelta, moveKey, tourCost } from './tour';

export enum SearchPhase {
    READY = 'READY',
    INITIALIZING = 'INITIALIZING',
    ITERATING = 'ITERATING',
    TERMINATED = 'TERMINATED',
}

export interface SearchState {
    iteration: number;
    currentTour: number[];
    currentCost: number;
    bestTour: number[];
    bestCost: number;
    bestIteration: number;
    iterationsSinceImprovement: number;
}

export interface Candidate {
    move: Move;
    key: string;
    cost: number;
    tabu: boolean;
}

export interface Selection {
    candidate: Candidate | null;
    aspirated: boolean;
}

export interface TabuSearchRun {
    tour: number[];
    cost: number;
    bestIteration: number;
    iterations: number;
    stopReason: StopReason;
    initialTour: number[];
    initialCost: number;
    acceptedMoves: number;
    aspirationMoves: number;
    idleIterations: number;
    history: ConvergenceUpdate[];
    elapsedMs: number;
}

export interface RunOptions {
    signal?: AbortSignal;
}

/**
 * Picks the cheapest admissible candidate. Ties keep the earliest candidate, so the result
 * only depends on the order candidates arrive in.
 */
export const selectCandidate = (candidates: Iterable<Candidate>, bestCost: number, aspiration: boolean): Selection => {
    let chosen: Candidate | null = null;

    for (const candidate of candidates) {
        const admissible = !candidate.tabu || (aspiration && candidate.cost < bestCost);

        if (admissible && (chosen === null || candidate.cost < chosen.cost)) {
            chosen = candidate;
        }
    }

    return { candidate: chosen, aspirated: chosen !== null && chosen.tabu };
};

export class TabuSearchEngine {
    readonly config: TabuSearchConfig;

    private currentPhase = SearchPhase.READY;
    private readonly memory = new TabuMemory();
    private result: TabuSearchRun | null = null;

    constructor(
        private readonly matrix: DistanceMatrix,
        config: TabuSearchConfigInput = {},
        private readonly callbacks: SearchCallbacks = {},
    ) {
        validateDistanceMatrix(matrix);
        this.config = parseTabuSearchConfig(config);

        const { startCity } = this.config;
        if (startCity !== undefined && startCity >= matrix.length) {
            throw new ConfigurationError(`Start city ${startCity} is outside 0..${matrix.length - 1}`, { startCity });
        }
    }

    get phase(): SearchPhase {
        return this.currentPhase;
    }

    /** Best tour of a finished run, null until the engine has terminated */
    get bestResult(): TabuSearchRun | null {
        return this.result;
    }

    run({ signal }: RunOptions = {}): TabuSearchRun {
        if (this.currentPhase !== SearchPhase.READY) {
            throw new EngineStateError(`Engine already ran (phase ${this.currentPhase}); create a new engine for a new run`);
        }

        const startTime = performance.now();
        const state = this.initialize();
        const initialTourCopy = [...state.currentTour];
        const initialCost = state.currentCost;
        const history: ConvergenceUpdate[] = [{ timeMs: 0, iteration: 0, bestCost: state.bestCost }];

        let acceptedMoves = 0;
        let aspirationMoves = 0;
        let idleIterations = 0;
        let stopReason: StopReason | null = null;

        this.currentPhase = SearchPhase.ITERATING;

        while (stopReason === null) {
            const iteration = ++state.iteration;
            const { candidate, aspirated } = selectCandidate(
                this.scoreNeighborhood(state, iteration),
                state.bestCost,
                this.config.aspiration,
            );

            if (candidate === null) {
                ++idleIterations;
                ++state.iterationsSinceImprovement;
            } else {
                this.applyCandidate(state, candidate, iteration);
                ++acceptedMoves;
                if (aspirated) {
                    ++aspirationMoves;
                }

                if (state.currentCost < state.bestCost) {
                    state.bestTour = [...state.currentTour];
                    state.bestCost = state.currentCost;
                    state.bestIteration = iteration;
                    state.iterationsSinceImprovement = 0;

                    const update = { timeMs: performance.now() - startTime, iteration, bestCost: state.bestCost };
                    history.push(update);
                    this.callbacks.onNewBest?.(update);
                } else {
                    ++state.iterationsSinceImprovement;
                }
            }

            this.memory.purgeExpired(iteration);

            this.callbacks.onIteration?.({
                iteration,
                timeMs: performance.now() - startTime,
                currentCost: state.currentCost,
                bestCost: state.bestCost,
                move: candidate?.move ?? null,
                aspirated,
                tabuSize: this.memory.size,
            });

            stopReason = this.checkTermination(state, startTime, signal);
        }

        this.currentPhase = SearchPhase.TERMINATED;
        this.result = {
            tour: state.bestTour,
            cost: state.bestCost,
            bestIteration: state.bestIteration,
            iterations: state.iteration,
            stopReason,
            initialTour: initialTourCopy,
            initialCost,
            acceptedMoves,
            aspirationMoves,
            idleIterations,
            history,
            elapsedMs: performance.now() - startTime,
        };

        return this.result;
    }

    private initialize(): SearchState {
        this.currentPhase = SearchPhase.INITIALIZING;

        const { initialStrategy, randomSeed, startCity } = this.config;
        const n = this.matrix.length;
        const tour = initialTour(n, initialStrategy, {
            matrix: this.matrix,
            rng: new SeededRandom(randomSeed),
            startCity,
        });
        const cost = tourCost(tour, this.matrix);

        this.memory.clear();

        return {
            iteration: 0,
            currentTour: tour,
            currentCost: cost,
            bestTour: [...tour],
            bestCost: cost,
            bestIteration: 0,
            iterationsSinceImprovement: 0,
        };
    }

    private *scoreNeighborhood(state: SearchState, iteration: number): Generator<Candidate, void, undefined> {
        const { moveFamily, tabuAttribute } = this.config;
        const tour = state.currentTour;

        for (const move of generateNeighborhood(tour, moveFamily)) {
            const key = moveKey(move, tour, tabuAttribute);

            yield {
                move,
                key,
                cost: state.currentCost + moveDelta(tour, move, this.matrix),
                tabu: this.memory.isTabu(key, iteration),
            };
        }
    }

    private applyCandidate(state: SearchState, candidate: Candidate, iteration: number): void {
        const next = applyMove(state.currentTour, candidate.move);
        assertPermutation(next, this.matrix.length, iteration);

        state.currentTour = next;
        // full recompute keeps the running cost from drifting away from the true tour length
        state.currentCost = tourCost(next, this.matrix);

        this.memory.forbid(candidate.key, iteration, this.config.tabuTenure);
    }

    private checkTermination(state: SearchState, startTime: number, signal?: AbortSignal): StopReason | null {
        const { targetCost, maxNoImprovement, maxIterations, timeLimitMs } = this.config;

        if (targetCost !== undefined && state.bestCost <= targetCost) {
            return 'target-cost';
        }
        if (maxNoImprovement !== undefined && state.iterationsSinceImprovement >= maxNoImprovement) {
            return 'no-improvement';
        }
        if (state.iteration >= maxIterations) {
            return 'max-iterations';
        }
        if (timeLimitMs !== undefined && performance.now() - startTime >= timeLimitMs) {
            return 'time-limit';
        }
        if (signal?.aborted) {
            return 'cancelled';
        }
        return null;
    }
}
