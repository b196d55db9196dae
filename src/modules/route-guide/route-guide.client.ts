/**
 * =============================================================================
 * ROUTE GUIDE MODULE - TYPED CLIENT
 * =============================================================================
 *
 * grpc-js client for the four RPCs, built from the runtime-loaded service
 * definition. Unary and client-streaming responses are decoded with zod;
 * streamed responses arrive undecoded and callers parse each one.
 *
 * Every call gets a deadline of `callTimeoutMs` from the moment it starts.
 * =============================================================================
 */

import * as grpc from '@grpc/grpc-js';
import type { MethodDefinition, ServiceDefinition } from '@grpc/proto-loader';
import { RouteGuideMethod } from '../../core/constants';
import { Feature, Point, Rectangle, RouteNote, RouteSummary } from '../../shared/types/api.types';
import { featureSchema, parseMessage, routeSummarySchema } from './route-guide.schema';

const DEFAULT_CALL_TIMEOUT_MS = 10_000;

export class RouteGuideClient extends grpc.Client {
  constructor(
    address: string,
    private readonly serviceMethods: ServiceDefinition,
    private readonly callTimeoutMs: number = DEFAULT_CALL_TIMEOUT_MS
  ) {
    super(address, grpc.credentials.createInsecure());
  }

  getFeature(point: Point): Promise<Feature> {
    const method = this.method(RouteGuideMethod.GET_FEATURE);
    return new Promise((resolve, reject) => {
      this.makeUnaryRequest<Point, Feature>(
        method.path,
        method.requestSerialize,
        bytes => parseMessage(featureSchema, 'Feature', method.responseDeserialize(bytes)),
        point,
        new grpc.Metadata(),
        { deadline: this.deadline() },
        (error, feature) => {
          if (error || !feature) {
            reject(error ?? new Error('GetFeature returned no feature'));
            return;
          }
          resolve(feature);
        }
      );
    });
  }

  listFeatures(rect: Rectangle): grpc.ClientReadableStream<unknown> {
    const method = this.method(RouteGuideMethod.LIST_FEATURES);
    return this.makeServerStreamRequest<Rectangle, unknown>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      rect,
      new grpc.Metadata(),
      { deadline: this.deadline() }
    );
  }

  recordRoute(callback: grpc.requestCallback<RouteSummary>): grpc.ClientWritableStream<Point> {
    const method = this.method(RouteGuideMethod.RECORD_ROUTE);
    return this.makeClientStreamRequest<Point, RouteSummary>(
      method.path,
      method.requestSerialize,
      bytes => parseMessage(routeSummarySchema, 'RouteSummary', method.responseDeserialize(bytes)),
      new grpc.Metadata(),
      { deadline: this.deadline() },
      callback
    );
  }

  routeChat(): grpc.ClientDuplexStream<RouteNote, unknown> {
    const method = this.method(RouteGuideMethod.ROUTE_CHAT);
    return this.makeBidiStreamRequest<RouteNote, unknown>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      new grpc.Metadata(),
      { deadline: this.deadline() }
    );
  }

  private deadline(): Date {
    return new Date(Date.now() + this.callTimeoutMs);
  }

  private method(name: RouteGuideMethod): MethodDefinition<object, object> {
    const definition = this.serviceMethods[name];
    if (!definition) {
      throw new Error(`RouteGuide has no method ${name}`);
    }
    return definition;
  }
}
