/**
 * =============================================================================
 * API TYPES - SHARED CONTRACTS
 * =============================================================================
 *
 * These types mirror the messages in proto/route_guide.proto.
 * Any change here must be made to the proto as well.
 * =============================================================================
 */

/**
 * A latitude/longitude pair in E7 units (degrees * 10^7).
 * No geographic range check is applied anywhere.
 */
export interface Point {
  latitude: number;
  longitude: number;
}

/**
 * Two diagonally opposite corners, in no particular order
 */
export interface Rectangle {
  lo: Point;
  hi: Point;
}

/**
 * A normalized rectangle
 */
export interface Bounds {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * A named location. Empty name = nothing known at that point.
 */
export interface Feature {
  name: string;
  location: Point;
}

export interface RouteNote {
  location: Point;
  message: string;
}

export interface RouteSummary {
  pointCount: number;
  featureCount: number;
  distanceMeters: number;
  elapsedSeconds: number;
}
