import { describe, it, expect } from 'vitest';

import { TabuSearchEngine } from '../algorithms/tabu-search';
import { IterationSnapshot } from '../types/algorithm';
import { PerformanceTracker } from './performance-tracker';

const snapshot = (overrides: Partial<IterationSnapshot>): IterationSnapshot => ({
    iteration: 1,
    timeMs: 0,
    currentCost: 10,
    bestCost: 10,
    move: null,
    aspirated: false,
    tabuSize: 0,
    ...overrides,
});

describe('PerformanceTracker', () => {
    it('should summarize the tracked iterations', () => {
        const tracker = new PerformanceTracker();
        tracker.trackIteration(snapshot({ iteration: 1, currentCost: 15, bestCost: 15, move: { family: 'swap', i: 0, j: 1 } }));
        tracker.trackIteration(
            snapshot({ iteration: 2, currentCost: 8, bestCost: 8, move: { family: 'swap', i: 1, j: 2 }, aspirated: true }),
        );
        tracker.trackIteration(snapshot({ iteration: 3, timeMs: 12.5, currentCost: 8, bestCost: 8 }));

        expect(tracker.getSummary(20).split('\n')).toEqual([
            'Initial cost: 20.00',
            'Iterations: 3',
            'Final best cost: 8.00',
            'Improvement: 60.00%',
            'Moves applied: swap 2, segment-reversal 0',
            'Aspiration moves: 1, idle iterations: 1',
            'Elapsed: 12.5 ms',
        ]);
        expect(tracker.moveCounts).toEqual({ swap: 2, 'segment-reversal': 0 });
    });

    it('should report when nothing was tracked', () => {
        expect(new PerformanceTracker().getSummary()).toBe('No performance data available.');
    });

    it('should chain with other callbacks while tracking an engine run', () => {
        const tracker = new PerformanceTracker();
        const seen: number[] = [];
        const matrix = [
            [0, 1, 2, 1],
            [1, 0, 1, 2],
            [2, 1, 0, 1],
            [1, 2, 1, 0],
        ];

        const run = new TabuSearchEngine(
            matrix,
            { maxIterations: 5 },
            tracker.callbacks({ onIteration: s => seen.push(s.iteration) }),
        ).run();

        expect(seen).toEqual([1, 2, 3, 4, 5]);
        expect(tracker.iterations.map(entry => entry.iteration)).toEqual([1, 2, 3, 4, 5]);

        // times come from the engine clock, which starts before initialization
        const times = tracker.iterations.map(entry => entry.timeMs);
        times.slice(1).forEach((time, k) => expect(time).toBeGreaterThanOrEqual(times[k]));
        expect(times[4]).toBeLessThanOrEqual(run.elapsedMs);
    });
});
