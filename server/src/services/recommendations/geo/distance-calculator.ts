/**
 * Great-circle distances between the user and places.
 * Radius checks are done in miles because the user picks a radius in miles.
 */

import type { Coordinates, GeoPoint, Place } from '../types.js';

const EARTH_RADIUS_KM = 6371;
const MILES_PER_KM = 0.621371;

export class DistanceCalculator {
  toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
  }

  /** Haversine distance in kilometers */
  haversine(lat1: number, lng1: number, lat2: number, lng2: number): number {
    const dLat = this.toRadians(lat2 - lat1);
    const dLng = this.toRadians(lng2 - lng1);
    const a =
      Math.sin(dLat / 2) * Math.sin(dLat / 2) +
      Math.cos(this.toRadians(lat1)) * Math.cos(this.toRadians(lat2)) *
      Math.sin(dLng / 2) * Math.sin(dLng / 2);
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
    return EARTH_RADIUS_KM * c;
  }

  distanceInMiles(origin: GeoPoint, target: Coordinates): number {
    return this.haversine(origin.lat, origin.lng, target.latitude, target.longitude) * MILES_PER_KM;
  }
}

const calculator = new DistanceCalculator();

/** Miles from the user, or null when the place has no coordinates. */
export function distanceFromUser(place: Pick<Place, 'coordinates'>, origin: GeoPoint): number | null {
  if (!place.coordinates) return null;
  return calculator.distanceInMiles(origin, place.coordinates);
}

export function isWithinRadius(origin: GeoPoint, target: Coordinates, radiusMiles: number): boolean {
  return calculator.distanceInMiles(origin, target) <= radiusMiles;
}

/**
 * Keeps places inside the radius. Places without coordinates are dropped,
 * since they cannot be shown to be nearby.
 */
export function filterPlacesWithinRadius<T extends Pick<Place, 'coordinates'>>(
  places: T[],
  origin: GeoPoint,
  radiusMiles: number
): T[] {
  return places.filter(place =>
    place.coordinates !== undefined && isWithinRadius(origin, place.coordinates, radiusMiles)
  );
}
