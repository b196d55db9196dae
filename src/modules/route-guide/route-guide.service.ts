/**
 * =============================================================================
 * ROUTE GUIDE MODULE - SERVICE
 * =============================================================================
 *
 * The four RouteGuide operations, independent of the transport:
 *
 * ┌──────────────┬──────────────────┬─────────────────────────────────────┐
 * │ GetFeature   │ unary            │ feature at a point (or unnamed one) │
 * │ ListFeatures │ server streaming │ features inside a rectangle         │
 * │ RecordRoute  │ client streaming │ summary of a stream of points       │
 * │ RouteChat    │ bidi streaming   │ notes left at each visited point    │
 * └──────────────┴──────────────────┴─────────────────────────────────────┘
 *
 * The gRPC glue lives in route-guide.handlers.ts.
 * =============================================================================
 */

import { ErrorCode, RouteRecordingState } from '../../core/constants';
import { FailedPreconditionError } from '../../core/errors/AppError';
import { Feature, Point, Rectangle, RouteNote, RouteSummary } from '../../shared/types/api.types';
import { distanceMeters } from '../../shared/utils/geospatial.utils';
import { FeatureStore } from './feature-store.service';
import { NoteRegistry } from './note-registry.service';

/**
 * Millisecond clock, injectable for deterministic tests
 */
export type Clock = () => number;

// =============================================================================
// ROUTE RECORDER (one per RecordRoute call)
// =============================================================================

/**
 * Accumulates a route: Idle → Accumulating → Completed.
 *
 * Every store feature exactly at a received point counts, so passing the same
 * feature twice counts it twice.
 */
export class RouteRecorder {
  private state: RouteRecordingState = RouteRecordingState.IDLE;
  private pointCount = 0;
  private featureCount = 0;
  private distance = 0;
  private previous: Point | null = null;
  private firstReceivedAt: number | null = null;

  constructor(
    private readonly featureStore: FeatureStore,
    private readonly clock: Clock
  ) {}

  get currentState(): RouteRecordingState {
    return this.state;
  }

  record(point: Point): void {
    this.assertNotCompleted();

    if (this.state === RouteRecordingState.IDLE) {
      this.state = RouteRecordingState.ACCUMULATING;
      this.firstReceivedAt = this.clock();
    }

    this.pointCount++;
    this.featureCount += this.featureStore.countExact(point);

    if (this.previous) {
      this.distance += distanceMeters(this.previous, point);
    }
    this.previous = point;
  }

  /**
   * Close the route on end-of-stream
   */
  complete(): RouteSummary {
    this.assertNotCompleted();

    const elapsedMs = this.firstReceivedAt === null ? 0 : this.clock() - this.firstReceivedAt;
    this.state = RouteRecordingState.COMPLETED;

    return {
      pointCount: this.pointCount,
      featureCount: this.featureCount,
      distanceMeters: this.distance,
      elapsedSeconds: Math.max(0, Math.trunc(elapsedMs / 1000)),
    };
  }

  private assertNotCompleted(): void {
    if (this.state === RouteRecordingState.COMPLETED) {
      throw new FailedPreconditionError(
        'Route is already completed',
        ErrorCode.ROUTE_ALREADY_COMPLETED
      );
    }
  }
}

// =============================================================================
// SERVICE
// =============================================================================

export class RouteGuideService {
  constructor(
    private readonly featureStore: FeatureStore,
    private readonly noteRegistry: NoteRegistry,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * Feature at `point`; an unnamed feature when nothing is known there
   */
  getFeature(point: Point): Feature {
    return this.featureStore.findExact(point) ?? { name: '', location: point };
  }

  /**
   * Features inside `rect`, in store order
   */
  listFeatures(rect: Rectangle): Iterable<Feature> {
    return this.featureStore.findInRegion(rect);
  }

  startRoute(): RouteRecorder {
    return new RouteRecorder(this.featureStore, this.clock);
  }

  /**
   * Store a note and return every note at its location, oldest first
   */
  chat(note: RouteNote): RouteNote[] {
    return this.noteRegistry.append(note.location, note);
  }
}
