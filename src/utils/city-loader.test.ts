import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { ConfigurationError } from '../errors';
import { CityLoader } from './city-loader';

describe('CityLoader', () => {
    const loader = new CityLoader();

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should load the bundled Moroccan cities', async () => {
        const { cities, metadata } = await loader.loadMorocco();

        expect(cities).toHaveLength(22);
        expect(cities[0]).toEqual({ name: 'Tangier', longitude: -5.8, latitude: 35.8 });
        expect(metadata).toEqual({ filename: 'morocco-cities', cityCount: 22 });
    });

    it('should parse inline city data', () => {
        const cities = loader.parse('[{"name":"A","longitude":1,"latitude":2},{"name":"B","longitude":3,"latitude":4}]');

        expect(cities.map(city => city.name)).toEqual(['A', 'B']);
    });

    it('should reject duplicate names', () => {
        const content = '[{"name":"A","longitude":1,"latitude":2},{"name":"A","longitude":3,"latitude":4}]';

        expect(() => loader.parse(content, 'dup.json')).toThrow(ConfigurationError);
        expect(() => loader.parse(content, 'dup.json')).toThrow('Invalid city data in dup.json: 1.name: Duplicate city name "A"');
    });

    it('should reject malformed JSON', () => {
        expect(() => loader.parse('[{', 'broken.json')).toThrow(/^Invalid JSON in broken\.json/);
    });

    it('should reject a single city', () => {
        expect(() => loader.parse('[{"name":"A","longitude":1,"latitude":2}]')).toThrow(ConfigurationError);
    });

    describe('loadFromDirectory', () => {
        let directory: string;

        beforeEach(async () => {
            directory = await mkdtemp(path.join(tmpdir(), 'cities-'));
            await writeFile(
                path.join(directory, 'good.json'),
                JSON.stringify([
                    { name: 'A', longitude: 0, latitude: 0 },
                    { name: 'B', longitude: 1, latitude: 1 },
                ]),
            );
            await writeFile(path.join(directory, 'bad.json'), '{ not json');
            await writeFile(path.join(directory, 'notes.txt'), 'ignored');
        });

        afterEach(async () => {
            await rm(directory, { recursive: true, force: true });
        });

        it('should skip files that fail to load', async () => {
            const datasets = await loader.loadFromDirectory(directory);

            expect(datasets).toHaveLength(1);
            expect(datasets[0].metadata).toEqual({ filename: 'good', cityCount: 2 });
        });
    });
});
