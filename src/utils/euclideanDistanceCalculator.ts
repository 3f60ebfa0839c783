import { DistanceCalculator } from '../types/algorithm';

/** Planar distance over raw (longitude, latitude) degrees */
export const euclideanDistanceCalculator: DistanceCalculator = (from, to) => {
    return Math.sqrt(Math.pow(from.longitude - to.longitude, 2) + Math.pow(from.latitude - to.latitude, 2));
};
