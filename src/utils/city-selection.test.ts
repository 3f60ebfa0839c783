import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../errors';
import { City } from '../types/types';
import { selectCitiesByName, selectRandomCities } from './city-selection';
import { SeededRandom } from './random';

const cities: City[] = ['Rabat', 'Fes', 'Agadir', 'Safi', 'Taza', 'Nador', 'Ifrane'].map((name, i) => ({
    name,
    longitude: i,
    latitude: -i,
}));

describe('selectCitiesByName', () => {
    it('should keep the requested order', () => {
        expect(selectCitiesByName(cities, ['Safi', 'Rabat']).map(city => city.name)).toEqual(['Safi', 'Rabat']);
    });

    it('should reject unknown and repeated names', () => {
        expect(() => selectCitiesByName(cities, ['Paris'])).toThrow('Unknown city "Paris"');
        expect(() => selectCitiesByName(cities, ['Fes', 'Fes'])).toThrow(ConfigurationError);
    });
});

describe('selectRandomCities', () => {
    it('should put the start city first', () => {
        const picked = selectRandomCities(cities, 5, new SeededRandom(9), 'Taza');

        expect(picked).toHaveLength(5);
        expect(picked[0].name).toBe('Taza');
        expect(new Set(picked.map(city => city.name)).size).toBe(5);
    });

    it('should be deterministic for a seed', () => {
        const first = selectRandomCities(cities, 4, new SeededRandom(5));
        const second = selectRandomCities(cities, 4, new SeededRandom(5));

        expect(second).toEqual(first);
    });

    it('should reject counts outside 2..N', () => {
        expect(() => selectRandomCities(cities, 1, new SeededRandom(1))).toThrow(ConfigurationError);
        expect(() => selectRandomCities(cities, 8, new SeededRandom(1))).toThrow('Cannot select 8 cities out of 7');
    });
});
