import { DistanceCalculator } from '../types/algorithm';

const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number) => degrees * (Math.PI / 180);

/** Spherical law of cosines, in kilometres */
export const greatCircleDistanceCalculator: DistanceCalculator = (from, to) => {
    if (from.latitude === to.latitude && from.longitude === to.longitude) {
        return 0;
    }

    const lat1 = toRadians(from.latitude);
    const lon1 = toRadians(from.longitude);
    const lat2 = toRadians(to.latitude);
    const lon2 = toRadians(to.longitude);

    const cosAngle = Math.sin(lat1) * Math.sin(lat2) + Math.cos(lat1) * Math.cos(lat2) * Math.cos(lon1 - lon2);

    // rounding can push the cosine just outside [-1, 1]
    return Math.acos(Math.min(1, Math.max(-1, cosAngle))) * EARTH_RADIUS_KM;
};
