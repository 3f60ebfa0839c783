import { IterationSnapshot, SearchCallbacks } from '../types/algorithm';
import { MoveFamily } from '../types/tour';

export interface TrackedIteration {
    iteration: number;
    timeMs: number;
    currentCost: number;
    bestCost: number;
}

/** Per-iteration record of a search, fed through the engine callbacks */
export class PerformanceTracker {
    readonly iterations: TrackedIteration[] = [];
    readonly moveCounts: Record<MoveFamily, number> = { swap: 0, 'segment-reversal': 0 };

    private idle = 0;
    private aspirated = 0;

    trackIteration(snapshot: IterationSnapshot): void {
        this.iterations.push({
            iteration: snapshot.iteration,
            timeMs: snapshot.timeMs,
            currentCost: snapshot.currentCost,
            bestCost: snapshot.bestCost,
        });

        if (snapshot.move === null) {
            ++this.idle;
        } else {
            ++this.moveCounts[snapshot.move.family];
        }
        if (snapshot.aspirated) {
            ++this.aspirated;
        }
    }

    /** Callbacks that forward every iteration to this tracker, chained with `others` */
    callbacks(others: SearchCallbacks = {}): SearchCallbacks {
        return {
            ...others,
            onIteration: snapshot => {
                this.trackIteration(snapshot);
                others.onIteration?.(snapshot);
            },
        };
    }

    getSummary(initialCost?: number): string {
        if (this.iterations.length === 0) {
            return 'No performance data available.';
        }

        const last = this.iterations[this.iterations.length - 1];
        const lines = [`Iterations: ${this.iterations.length}`, `Final best cost: ${last.bestCost.toFixed(2)}`];

        if (initialCost !== undefined && initialCost > 0) {
            const improvement = ((initialCost - last.bestCost) / initialCost) * 100;
            lines.unshift(`Initial cost: ${initialCost.toFixed(2)}`);
            lines.push(`Improvement: ${improvement.toFixed(2)}%`);
        }

        lines.push(
            `Moves applied: swap ${this.moveCounts.swap}, segment-reversal ${this.moveCounts['segment-reversal']}`,
            `Aspiration moves: ${this.aspirated}, idle iterations: ${this.idle}`,
            `Elapsed: ${last.timeMs.toFixed(1)} ms`,
        );

        return lines.join('\n');
    }
}
