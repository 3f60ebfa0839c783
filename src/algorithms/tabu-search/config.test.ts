import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../../errors';
import { MAX_RANDOM_SEED } from '../../utils/random';
import { DEFAULT_TABU_SEARCH_CONFIG, parseTabuSearchConfig } from './config';

describe('parseTabuSearchConfig', () => {
    it('should fill every default', () => {
        expect(parseTabuSearchConfig()).toEqual(DEFAULT_TABU_SEARCH_CONFIG);
        expect(DEFAULT_TABU_SEARCH_CONFIG).toEqual({
            moveFamily: 'segment-reversal',
            tabuTenure: 10,
            maxIterations: 1000,
            initialStrategy: 'nearest-neighbor-greedy',
            randomSeed: 42,
            aspiration: true,
            tabuAttribute: 'positions',
        });
    });

    it('should keep seeds inside the generator range', () => {
        expect(parseTabuSearchConfig({ randomSeed: MAX_RANDOM_SEED }).randomSeed).toBe(MAX_RANDOM_SEED);
        expect(() => parseTabuSearchConfig({ randomSeed: -1 })).toThrow(ConfigurationError);
        expect(() => parseTabuSearchConfig({ randomSeed: MAX_RANDOM_SEED + 1 })).toThrow(/randomSeed/);
    });
});
