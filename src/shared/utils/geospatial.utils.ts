/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Bounding Boxes & Haversine Distance
 * =============================================================================
 *
 * Pure functions over E7 fixed-point coordinates. No state, no I/O.
 * Shared by the feature store, the note registry and the route recorder.
 * =============================================================================
 */

import { COORD_FACTOR, EARTH_RADIUS_METERS } from '../../core/constants';
import { Bounds, Point, Rectangle } from '../types/api.types';

/**
 * Normalize a rectangle whose corners may be given in any order
 */
export function normalizeRectangle(rect: Rectangle): Bounds {
  return {
    left: Math.min(rect.lo.longitude, rect.hi.longitude),
    right: Math.max(rect.lo.longitude, rect.hi.longitude),
    top: Math.max(rect.lo.latitude, rect.hi.latitude),
    bottom: Math.min(rect.lo.latitude, rect.hi.latitude),
  };
}

/**
 * Whether the point lies inside the rectangle, boundaries included
 */
export function containsPoint(rect: Rectangle, point: Point): boolean {
  const { left, right, top, bottom } = normalizeRectangle(rect);

  return (
    point.longitude >= left &&
    point.longitude <= right &&
    point.latitude >= bottom &&
    point.latitude <= top
  );
}

/**
 * Great-circle distance between two points using the haversine formula.
 *
 * @returns Whole meters, truncated toward zero
 */
export function distanceMeters(p1: Point, p2: Point): number {
  const lat1 = toRadians(p1.latitude / COORD_FACTOR);
  const lat2 = toRadians(p2.latitude / COORD_FACTOR);
  const lng1 = toRadians(p1.longitude / COORD_FACTOR);
  const lng2 = toRadians(p2.longitude / COORD_FACTOR);
  const dLat = lat2 - lat1;
  const dLng = lng2 - lng1;

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) *
      Math.cos(lat2) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return Math.trunc(EARTH_RADIUS_METERS * c);
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Exact, component-wise equality
 */
export function pointsEqual(a: Point, b: Point): boolean {
  return a.latitude === b.latitude && a.longitude === b.longitude;
}

/**
 * Exact key for a point: "<latitude> <longitude>"
 */
export function pointKey(point: Point): string {
  return `${point.latitude} ${point.longitude}`;
}

/**
 * Human-readable form for logs
 */
export function formatPoint(point: Point): string {
  return `(${(point.latitude / COORD_FACTOR).toFixed(7)}, ${(point.longitude / COORD_FACTOR).toFixed(7)})`;
}
