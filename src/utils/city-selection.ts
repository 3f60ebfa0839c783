import { RandomGenerator } from '../algorithms/interfaces';
import { ConfigurationError } from '../errors';
import { City } from '../types/types';

/** Cities in the order the names are given; unknown or repeated names are rejected */
export const selectCitiesByName = (cities: ReadonlyArray<City>, names: ReadonlyArray<string>): City[] => {
    const byName = new Map(cities.map(city => [city.name, city]));
    const picked = new Set<string>();

    return names.map(name => {
        const city = byName.get(name);
        if (!city) {
            throw new ConfigurationError(`Unknown city "${name}"`, { name });
        }
        if (picked.has(name)) {
            throw new ConfigurationError(`City "${name}" selected more than once`, { name });
        }
        picked.add(name);
        return city;
    });
};

/**
 * Seeded random sample of `count` cities. When `startName` is given that city is always
 * part of the sample and comes first.
 */
export const selectRandomCities = (
    cities: ReadonlyArray<City>,
    count: number,
    rng: RandomGenerator,
    startName?: string,
): City[] => {
    if (!Number.isInteger(count) || count < 2 || count > cities.length) {
        throw new ConfigurationError(`Cannot select ${count} cities out of ${cities.length}`, { count });
    }

    if (startName === undefined) {
        return rng.shuffle([...cities]).slice(0, count);
    }

    const [start] = selectCitiesByName(cities, [startName]);
    const others = rng.shuffle(cities.filter(city => city.name !== startName));

    return [start, ...others.slice(0, count - 1)];
};
