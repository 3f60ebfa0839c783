import { RandomGenerator } from '../algorithms/interfaces';
import { ConfigurationError } from '../errors';

export const MAX_RANDOM_SEED = 0x7fffffff;

/**
 * Linear congruential generator. Two instances created with the same seed
 * produce the same sequence, which keeps seeded runs reproducible.
 */
export class SeededRandom implements RandomGenerator {
    private state: number;

    constructor(seed: number) {
        // the state is 31 bits wide; wider seeds would alias onto the same sequence
        if (!Number.isInteger(seed) || seed < 0 || seed > MAX_RANDOM_SEED) {
            throw new ConfigurationError(`Random seed must be an integer in 0..${MAX_RANDOM_SEED}, got ${seed}`, { seed });
        }
        this.state = seed;
    }

    next(): number {
        this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
        return this.state / 0x80000000;
    }

    nextInt(max: number): number {
        return Math.floor(this.next() * max);
    }

    /** Fisher-Yates, in place */
    shuffle<T>(items: T[]): T[] {
        for (let i = items.length - 1; i > 0; --i) {
            const j = this.nextInt(i + 1);
            [items[i], items[j]] = [items[j], items[i]];
        }

        return items;
    }
}

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('same seed yields the same sequence', () => {
        const a = new SeededRandom(7);
        const b = new SeededRandom(7);

        const seqA = Array.from({ length: 20 }, () => a.next());
        const seqB = Array.from({ length: 20 }, () => b.next());

        expect(seqA).toEqual(seqB);
        seqA.forEach(value => {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        });
    });

    test('shuffle keeps every element', () => {
        const shuffled = new SeededRandom(3).shuffle([0, 1, 2, 3, 4, 5, 6, 7]);

        expect([...shuffled].sort((x, y) => x - y)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    test('seeds outside the 31-bit state are rejected', () => {
        expect(() => new SeededRandom(-1)).toThrow(ConfigurationError);
        expect(() => new SeededRandom(MAX_RANDOM_SEED + 1)).toThrow(ConfigurationError);
        expect(() => new SeededRandom(1.5)).toThrow(ConfigurationError);
        expect(new SeededRandom(MAX_RANDOM_SEED).next()).not.toBe(new SeededRandom(0).next());
    });

    test('nextInt stays in range', () => {
        const rng = new SeededRandom(11);

        for (let i = 0; i < 100; ++i) {
            const value = rng.nextInt(5);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(5);
        }
    });
}
