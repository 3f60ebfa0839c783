import { ConfigurationError } from '../../errors';

/**
 * Short-term memory of forbidden moves: move key -> iteration at which the move is allowed again.
 */
export class TabuMemory {
    private readonly entries = new Map<string, number>();

    get size(): number {
        return this.entries.size;
    }

    isTabu(moveKey: string, currentIteration: number): boolean {
        const expiry = this.entries.get(moveKey);
        if (expiry === undefined) {
            return false;
        }
        if (expiry <= currentIteration) {
            this.entries.delete(moveKey);
            return false;
        }
        return true;
    }

    forbid(moveKey: string, currentIteration: number, tenure: number): void {
        if (!Number.isInteger(tenure) || tenure <= 0) {
            throw new ConfigurationError(`Tabu tenure must be a positive integer, got ${tenure}`, { tenure });
        }
        this.entries.set(moveKey, currentIteration + tenure);
    }

    /** Drops entries whose expiry has been reached; returns how many were removed */
    purgeExpired(currentIteration: number): number {
        let removed = 0;
        for (const [key, expiry] of this.entries) {
            if (expiry <= currentIteration) {
                this.entries.delete(key);
                ++removed;
            }
        }
        return removed;
    }

    expiryOf(moveKey: string): number | undefined {
        return this.entries.get(moveKey);
    }

    clear(): void {
        this.entries.clear();
    }
}
