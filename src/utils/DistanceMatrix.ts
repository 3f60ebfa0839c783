import { ConfigurationError } from '../errors';
import { DistanceCalculator } from '../types/algorithm';
import { DistanceMatrix } from '../types/tour';
import { City } from '../types/types';

export type { DistanceMatrix };

const SYMMETRY_TOLERANCE = 1e-9;

export const buildDistanceMatrix = (cities: ReadonlyArray<City>, distanceCalc: DistanceCalculator): number[][] => {
    const n = cities.length;
    const matrix: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

    for (let i = 0; i < n; ++i) {
        for (let j = i + 1; j < n; ++j) {
            const distance = distanceCalc(cities[i], cities[j]);
            matrix[i][j] = distance;
            matrix[j][i] = distance;
        }
    }

    return matrix;
};

/**
 * Throws ConfigurationError unless the matrix is square, has at least two rows,
 * and holds finite non-negative distances with a zero diagonal and d(i,j) == d(j,i).
 */
export const validateDistanceMatrix = (matrix: DistanceMatrix): void => {
    const n = matrix.length;

    if (n < 2) {
        throw new ConfigurationError(`At least 2 cities are required, got ${n}`, { cityCount: n });
    }

    matrix.forEach((row, i) => {
        if (row.length !== n) {
            throw new ConfigurationError(`Distance matrix is not square: row ${i} has ${row.length} entries, expected ${n}`, {
                row: i,
            });
        }
    });

    for (let i = 0; i < n; ++i) {
        for (let j = 0; j < n; ++j) {
            const d = matrix[i][j];

            if (!Number.isFinite(d)) {
                throw new ConfigurationError(`Distance d(${i},${j}) is not a finite number: ${d}`, { row: i, column: j });
            }
            if (d < 0) {
                throw new ConfigurationError(`Distance d(${i},${j}) is negative: ${d}`, { row: i, column: j });
            }
            if (i === j && d !== 0) {
                throw new ConfigurationError(`Diagonal entry d(${i},${i}) must be 0, got ${d}`, { row: i, column: j });
            }
            if (j > i && Math.abs(d - matrix[j][i]) > SYMMETRY_TOLERANCE * Math.max(1, Math.abs(d))) {
                throw new ConfigurationError(`Distance matrix is asymmetric: d(${i},${j}) = ${d}, d(${j},${i}) = ${matrix[j][i]}`, {
                    row: i,
                    column: j,
                });
            }
        }
    }
};
