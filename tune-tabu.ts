// tune-tabu.ts
import fs from 'fs';
import { globSync } from 'glob';

import { buildParamGrid, tuneTabuSearch } from './src/benchmark/tuning';
import { BenchmarkDataset } from './src/types/benchmark';
import { CityLoader } from './src/utils/city-loader';
import { euclideanDistanceCalculator } from './src/utils/euclideanDistanceCalculator';
import { selectRandomCities } from './src/utils/city-selection';
import { SeededRandom } from './src/utils/random';

const DATA_DIR = 'data';
const VALIDATION_SIZE = 9; // Small enough for the exact solver
const SAMPLES_PER_FILE = 3;
const REPETITIONS_PER_CONFIG = 3;

// 1. DEFINING THE HYPERPARAMETER GRID
const paramGrid = buildParamGrid({
    tabuTenure: [3, 5, 10],
    moveFamily: ['swap', 'segment-reversal'],
    maxIterations: [50, 200],
    tabuAttribute: ['positions', 'cities'],
});

async function main() {
    // 2. Build validation samples from every city file
    const loader = new CityLoader();
    const files = globSync('**/*.json', { cwd: DATA_DIR, absolute: true }).sort();
    const datasets: BenchmarkDataset[] = [];

    for (const file of files) {
        const { cities, metadata } = await loader.loadFromFile(file);
        const rng = new SeededRandom(cities.length);

        for (let s = 0; s < SAMPLES_PER_FILE; s++) {
            const size = Math.min(VALIDATION_SIZE, cities.length);
            datasets.push({ id: `${metadata.filename}#${s}`, cities: selectRandomCities(cities, size, rng) });
        }
    }

    // 3. Run Grid Search
    const results = await tuneTabuSearch(datasets, paramGrid, {
        distanceCalc: euclideanDistanceCalculator,
        repetitions: REPETITIONS_PER_CONFIG,
    });

    // 4. Save and Log Results
    fs.writeFileSync('tuning-results.json', JSON.stringify(results, null, 2));

    console.log('\n--- BEST CONFIGURATIONS ---');
    results.slice(0, 3).forEach(result => {
        console.log(`\nConfig #${result.configId}:`, result.config);
        console.log(`Gap: ${result.avgGapPercent.toFixed(4)}% | Optimal hits: ${result.optimalHits} | Time: ${result.avgTimeMs.toFixed(1)}ms`);
    });
}

main().catch(error => {
    console.error('\nTuning failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
