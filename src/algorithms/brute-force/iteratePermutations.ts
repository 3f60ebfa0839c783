/**
 * Visits every ordering of `items` using Heap's algorithm, one swap per step.
 *
 * The array passed to `cb` is reused between calls: copy it if you need to keep it.
 *
 * @complexity O(k!) where k is the number of items.
 */
export const iteratePermutations = (items: ReadonlyArray<number>, cb: (permutation: ReadonlyArray<number>) => void) => {
    const current = [...items];
    const counters = new Array<number>(current.length).fill(0);

    cb(current);

    let i = 1;
    while (i < current.length) {
        if (counters[i] < i) {
            const j = i % 2 === 0 ? 0 : counters[i];
            [current[j], current[i]] = [current[i], current[j]];
            cb(current);
            ++counters[i];
            i = 1;
        } else {
            counters[i] = 0;
            ++i;
        }
    }
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should visit all 6 orderings of 3 items exactly once', () => {
        const seen = new Set<string>();
        iteratePermutations([1, 2, 3], p => seen.add(p.join(',')));

        expect(seen.size).toBe(6);
        expect([...seen].sort()).toEqual(['1,2,3', '1,3,2', '2,1,3', '2,3,1', '3,1,2', '3,2,1']);
    });

    test('should visit the single ordering of an empty list', () => {
        let calls = 0;
        iteratePermutations([], () => ++calls);

        expect(calls).toBe(1);
    });
}
