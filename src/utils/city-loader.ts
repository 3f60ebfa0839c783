import { readFile, readdir } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { ZodError } from 'zod';

import { ConfigurationError } from '../errors';
import { Cities, citiesJsonSchema } from '../types/types';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const MOROCCO_CITIES_PATH = path.resolve(__dirname, '../../data/morocco-cities.json');

export interface LoadedCities {
    cities: Cities;
    metadata: CitiesMetadata;
}

export interface CitiesMetadata {
    filename: string;
    cityCount: number;
}

export class CityLoader {
    async loadFromDirectory(directoryPath: string): Promise<LoadedCities[]> {
        const datasets: LoadedCities[] = [];

        let files: string[];
        try {
            files = await readdir(directoryPath);
        } catch (error) {
            console.error(`Failed to read directory "${directoryPath}"`);
            throw error;
        }

        const jsonFiles = files.filter(file => file.endsWith('.json')).sort();
        console.log(`Found ${jsonFiles.length} city files in "${directoryPath}"`);

        for (const file of jsonFiles) {
            try {
                datasets.push(await this.loadFromFile(path.join(directoryPath, file)));
                console.log(`\tLoaded ${file} successfully`);
            } catch (error) {
                console.error(`\tFailed to load ${file}:`, error instanceof Error ? error.message : error);
            }
        }

        return datasets;
    }

    async loadFromFile(filePath: string): Promise<LoadedCities> {
        const content = await readFile(filePath, 'utf-8');
        const cities = this.parse(content, filePath);

        return {
            cities,
            metadata: {
                filename: path.basename(filePath, '.json'),
                cityCount: cities.length,
            },
        };
    }

    async loadMorocco(): Promise<LoadedCities> {
        return this.loadFromFile(MOROCCO_CITIES_PATH);
    }

    parse(content: string, source = '<inline>'): Cities {
        try {
            return citiesJsonSchema.parse(JSON.parse(content));
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new ConfigurationError(`Invalid JSON in ${source}: ${error.message}`);
            }
            if (error instanceof ZodError) {
                const details = error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
                throw new ConfigurationError(`Invalid city data in ${source}: ${details}`);
            }
            throw error;
        }
    }
}
