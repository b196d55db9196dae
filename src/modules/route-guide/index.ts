/**
 * Route Guide Module
 *
 * Feature lookup, region listing, route recording and route chat over gRPC.
 */

export { FeatureStore } from './feature-store.service';
export { NoteRegistry } from './note-registry.service';
export { RouteGuideService, RouteRecorder } from './route-guide.service';
export type { Clock } from './route-guide.service';
export { createRouteGuideHandlers } from './route-guide.handlers';
export { RouteGuideClient } from './route-guide.client';
export type { RouteGuideHandlers } from './route-guide.handlers';
export * from './route-guide.schema';
