import z from 'zod';

import { ConfigurationError } from '../../errors';
import { MAX_RANDOM_SEED } from '../../utils/random';

export const tabuSearchConfigSchema = z
    .object({
        moveFamily: z.enum(['swap', 'segment-reversal']).default('segment-reversal'),
        tabuTenure: z.number().int().positive().default(10),
        maxIterations: z.number().int().positive().default(1000),
        maxNoImprovement: z.number().int().positive().optional(),
        targetCost: z.number().finite().optional(),
        initialStrategy: z.enum(['identity', 'random-shuffle', 'nearest-neighbor-greedy']).default('nearest-neighbor-greedy'),
        randomSeed: z.number().int().min(0).max(MAX_RANDOM_SEED).default(42),
        startCity: z.number().int().nonnegative().optional(),
        aspiration: z.boolean().default(true),
        tabuAttribute: z.enum(['positions', 'cities']).default('positions'),
        timeLimitMs: z.number().positive().optional(),
    })
    .strict();

export type TabuSearchConfig = z.infer<typeof tabuSearchConfigSchema>;
export type TabuSearchConfigInput = z.input<typeof tabuSearchConfigSchema>;

export const DEFAULT_TABU_SEARCH_CONFIG: TabuSearchConfig = tabuSearchConfigSchema.parse({});

export const parseTabuSearchConfig = (input: TabuSearchConfigInput = {}): TabuSearchConfig => {
    const result = tabuSearchConfigSchema.safeParse(input);

    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid tabu search configuration: ${details}`);
    }

    return result.data;
};
