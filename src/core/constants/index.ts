/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// COORDINATES
// =============================================================================

/**
 * Coordinates travel as integers: degrees multiplied by 10^7
 */
export const COORD_FACTOR = 1e7;

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

/**
 * Mean Earth radius used by the haversine formula
 */
export const EARTH_RADIUS_METERS = 6371000;

// =============================================================================
// RPC SURFACE
// =============================================================================

export const ROUTE_GUIDE_SERVICE = 'routeguide.RouteGuide';

/**
 * Method names as declared in proto/route_guide.proto
 */
export enum RouteGuideMethod {
  GET_FEATURE = 'GetFeature',
  LIST_FEATURES = 'ListFeatures',
  RECORD_ROUTE = 'RecordRoute',
  ROUTE_CHAT = 'RouteChat'
}

// =============================================================================
// ROUTE RECORDING
// =============================================================================

/**
 * RecordRoute lifecycle: Idle → Accumulating → Completed
 */
export enum RouteRecordingState {
  IDLE = 'idle',
  ACCUMULATING = 'accumulating',
  COMPLETED = 'completed'
}

// =============================================================================
// ERROR CODES
// =============================================================================

export enum ErrorCode {
  // Input
  INVALID_MESSAGE = 'INVALID_MESSAGE',

  // Feature dataset
  FEATURES_FILE_UNREADABLE = 'FEATURES_FILE_UNREADABLE',
  FEATURES_FILE_INVALID = 'FEATURES_FILE_INVALID',
  FEATURE_STORE_ALREADY_LOADED = 'FEATURE_STORE_ALREADY_LOADED',

  // Route recording
  ROUTE_ALREADY_COMPLETED = 'ROUTE_ALREADY_COMPLETED',

  // General
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}
