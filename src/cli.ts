import { writeFile } from 'fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import z from 'zod';

import { BruteForceAlgorithm } from './algorithms/brute-force';
import { TabuSearchAlgorithm } from './algorithms/tabu-search';
import { DEFAULT_TABU_SEARCH_CONFIG, TabuSearchConfigInput } from './algorithms/tabu-search/config';
import { DefaultBenchmarkSuite } from './benchmark/suite';
import { ConfigurationError } from './errors';
import { Algorithm, DistanceCalculator } from './types/algorithm';
import { INITIAL_STRATEGIES, MOVE_FAMILIES } from './types/tour';
import { City } from './types/types';
import { CityLoader } from './utils/city-loader';
import { selectCitiesByName, selectRandomCities } from './utils/city-selection';
import { euclideanDistanceCalculator } from './utils/euclideanDistanceCalculator';
import { greatCircleDistanceCalculator } from './utils/greatCircleDistanceCalculator';
import { PerformanceTracker } from './utils/performance-tracker';
import { MAX_RANDOM_SEED, SeededRandom } from './utils/random';

const DISTANCES = ['euclidean', 'great-circle'] as const;

const distanceCalculators: Record<(typeof DISTANCES)[number], DistanceCalculator> = {
    euclidean: euclideanDistanceCalculator,
    'great-circle': greatCircleDistanceCalculator,
};

const tabuOptionsSchema = z.object({
    moveFamily: z.enum(['swap', 'segment-reversal']),
    tenure: z.number(),
    maxIterations: z.number(),
    maxNoImprovement: z.number().optional(),
    targetCost: z.number().optional(),
    initial: z.enum(['identity', 'random-shuffle', 'nearest-neighbor-greedy']),
    seed: z.number().int().min(0).max(MAX_RANDOM_SEED),
    aspiration: z.boolean(),
    tabuAttribute: z.enum(['positions', 'cities']),
    timeLimit: z.number().optional(),
    distance: z.enum(DISTANCES),
});

const solveOptionsSchema = tabuOptionsSchema.extend({
    cities: z.string().optional(),
    select: z.string().array().optional(),
    randomCount: z.number().optional(),
    startCity: z.string().optional(),
    output: z.string().optional(),
    verbose: z.boolean().optional(),
});

const benchmarkOptionsSchema = tabuOptionsSchema.extend({
    cities: z.string().array().optional(),
    runs: z.number(),
    output: z.string(),
    withExact: z.boolean().optional(),
});

type TabuOptions = z.infer<typeof tabuOptionsSchema>;

const parseInteger = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
};

const parseNumber = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
};

const toTabuConfig = (options: TabuOptions, startCity?: number): TabuSearchConfigInput => ({
    moveFamily: options.moveFamily,
    tabuTenure: options.tenure,
    maxIterations: options.maxIterations,
    maxNoImprovement: options.maxNoImprovement,
    targetCost: options.targetCost,
    initialStrategy: options.initial,
    randomSeed: options.seed,
    startCity,
    aspiration: options.aspiration,
    tabuAttribute: options.tabuAttribute,
    timeLimitMs: options.timeLimit === undefined ? undefined : options.timeLimit * 1000,
});

const defaults = DEFAULT_TABU_SEARCH_CONFIG;

const addTabuOptions = (command: Command): Command =>
    command
        .addOption(new Option('--move-family <family>', 'neighbourhood move').choices(MOVE_FAMILIES).default(defaults.moveFamily))
        .option('--tenure <n>', 'iterations a move stays tabu', parseInteger, defaults.tabuTenure)
        .option('--max-iterations <n>', 'maximum number of iterations', parseInteger, defaults.maxIterations)
        .option('--max-no-improvement <n>', 'stop after n iterations without a new best', parseInteger)
        .option('--target-cost <cost>', 'stop once the best cost reaches this value', parseNumber)
        .addOption(
            new Option('--initial <strategy>', 'initial tour construction')
                .choices(INITIAL_STRATEGIES)
                .default(defaults.initialStrategy),
        )
        .option('--seed <n>', `random seed (0..${MAX_RANDOM_SEED})`, parseInteger, defaults.randomSeed)
        .option('--no-aspiration', 'never accept tabu moves')
        .addOption(new Option('--tabu-attribute <attribute>', 'what a tabu entry forbids').choices(['positions', 'cities']).default(defaults.tabuAttribute))
        .option('--time-limit <seconds>', 'wall-clock limit for the search', parseNumber)
        .addOption(new Option('--distance <kind>', 'distance between cities').choices(DISTANCES).default('euclidean'));

const pickCities = (all: ReadonlyArray<City>, options: z.infer<typeof solveOptionsSchema>): City[] => {
    if (options.select && options.randomCount !== undefined) {
        throw new ConfigurationError('Use either --select or --random-count, not both');
    }
    if (options.select) {
        const names = options.startCity && !options.select.includes(options.startCity)
            ? [options.startCity, ...options.select]
            : options.select;
        return selectCitiesByName(all, names);
    }
    if (options.randomCount !== undefined) {
        return selectRandomCities(all, options.randomCount, new SeededRandom(options.seed), options.startCity);
    }
    return [...all];
};

async function solve(rawOptions: unknown): Promise<void> {
    const options = solveOptionsSchema.parse(rawOptions);
    const loader = new CityLoader();
    const { cities: all, metadata } = options.cities ? await loader.loadFromFile(options.cities) : await loader.loadMorocco();
    const cities = pickCities(all, options);

    let startCity: number | undefined;
    if (options.startCity !== undefined) {
        startCity = cities.findIndex(city => city.name === options.startCity);
        if (startCity < 0) {
            throw new ConfigurationError(`Unknown start city "${options.startCity}"`);
        }
    }

    console.log(`Tabu search over ${cities.length} cities from "${metadata.filename}"`);
    console.log(`Tabu tenure: ${options.tenure} iterations, move family: ${options.moveFamily}`);

    const tracker = new PerformanceTracker();
    const callbacks = tracker.callbacks(
        options.verbose
            ? { onNewBest: update => console.log(`Iteration ${update.iteration}: best cost = ${update.bestCost.toFixed(4)}`) }
            : {},
    );

    const { solution, history } = await new TabuSearchAlgorithm().solve(cities, {
        distanceCalc: distanceCalculators[options.distance],
        tabuConfig: toTabuConfig(options, startCity),
        callbacks,
    });

    console.log(`\nStopped after ${solution.iterations} iterations (${solution.stopReason})`);
    console.log(`Best cost: ${solution.cost.toFixed(4)} (found at iteration ${solution.bestIteration})`);
    console.log(`Route: ${[...solution.route, solution.route[0]].join(' -> ')}`);

    if (options.verbose) {
        console.log(`\n${tracker.getSummary(history[0]?.bestCost)}`);
    }

    if (options.output) {
        const byName = new Map(cities.map(city => [city.name, city]));
        await writeFile(
            options.output,
            JSON.stringify({ ...solution, cities: solution.route.map(name => byName.get(name)), history }, null, 4),
        );
        console.log(`Result written to ${options.output}`);
    }
}

async function benchmark(rawOptions: unknown): Promise<void> {
    const options = benchmarkOptionsSchema.parse(rawOptions);
    const loader = new CityLoader();
    const loaded = options.cities
        ? await Promise.all(options.cities.map(file => loader.loadFromFile(file)))
        : [await loader.loadMorocco()];

    const algorithms: Algorithm[] = [new TabuSearchAlgorithm()];
    if (options.withExact) {
        algorithms.push(new BruteForceAlgorithm());
    }

    const suite = new DefaultBenchmarkSuite();
    const summaries = await suite.run({
        runs: options.runs,
        algorithms,
        datasets: loaded.map(({ cities, metadata }) => ({ id: metadata.filename, cities })),
        config: {
            distanceCalc: distanceCalculators[options.distance],
            tabuConfig: toTabuConfig(options),
        },
    });

    console.table(
        summaries.map(s => ({
            algorithm: s.algorithmName,
            dataset: s.datasetId,
            avgCost: s.avgCost.toFixed(4),
            bestCost: s.bestCost.toFixed(4),
            worstCost: s.worstCost.toFixed(4),
            avgTimeMs: s.avgExecutionTime.toFixed(1),
        })),
    );

    await suite.exportResults(summaries, options.output);
    console.log(`Summaries written to ${options.output}`);
}

async function main(): Promise<void> {
    const program = new Command();

    program.name('tabu-tour').description('Closed tours over a set of cities with Tabu Search');

    addTabuOptions(
        program
            .command('solve', { isDefault: true })
            .description('optimize a tour and print the best route')
            .option('-c, --cities <file>', 'city data set (JSON); defaults to the Moroccan cities')
            .option('--select <names...>', 'visit only these cities')
            .option('--random-count <n>', 'visit a seeded random sample of n cities', parseInteger)
            .option('--start-city <name>', 'start city for the nearest-neighbour tour')
            .option('-o, --output <file>', 'write the result as JSON')
            .option('-v, --verbose', 'print progress and a performance summary'),
    ).action(async (_options, command: Command) => solve(command.opts()));

    addTabuOptions(
        program
            .command('benchmark')
            .description('repeat the search with seeds seed..seed+runs-1 and summarize')
            .option('-c, --cities <files...>', 'city data sets (JSON)')
            .option('--runs <n>', 'runs per data set', parseInteger, 5)
            .option('--with-exact', 'also run the exact solver (10 cities at most)')
            .option('-o, --output <file>', 'summary file', 'bench_results.json'),
    ).action(async (_options, command: Command) => benchmark(command.opts()));

    await program.parseAsync(process.argv);
}

main().catch(error => {
    console.error('\nTabu search failed:', error instanceof Error ? error.message : error);

    if (error instanceof Error && error.stack) {
        console.error('\nStack trace:');
        console.error(error.stack);
    }

    process.exit(1);
});
