/**
 * =============================================================================
 * ROUTE GUIDE MODULE - gRPC HANDLERS
 * =============================================================================
 *
 * Binds RouteGuideService to grpc-js calls:
 * - Decode every inbound message (INVALID_ARGUMENT on mismatch)
 * - Drive the service, write responses
 * - Map thrown errors to a status via toServiceError()
 * - Track every call (log line + metrics) from start to final status
 *
 * STREAMING RULES:
 * - Inbound streams are read with consumeMessages(); end-of-stream resolves it,
 *   a transport error rejects it
 * - Nothing is retried or patched up after a transport failure
 * - A cancelled call stops issuing work; completed note appends stay
 * =============================================================================
 */

import { status as GrpcStatus } from '@grpc/grpc-js';
import { RouteGuideMethod } from '../../core/constants';
import { AppError, toServiceError } from '../../core/errors/AppError';
import { CallTracker } from '../../shared/grpc/call-tracker';
import { consumeMessages } from '../../shared/grpc/inbound-stream';
import {
  BidiStreamingCall,
  ClientStreamingCall,
  ServerStreamingCall,
  UnaryCall,
  UnaryResponder,
} from '../../shared/grpc/call.types';
import { logger } from '../../shared/services/logger.service';
import { Feature, RouteNote, RouteSummary } from '../../shared/types/api.types';
import { formatPoint } from '../../shared/utils/geospatial.utils';
import {
  parseMessage,
  pointSchema,
  rectangleSchema,
  routeNoteSchema,
} from './route-guide.schema';
import { RouteGuideService } from './route-guide.service';

/**
 * Keyed by the method names in the proto; a type literal so it can be handed
 * to Server.addService() as is
 */
export type RouteGuideHandlers = {
  GetFeature(call: UnaryCall, callback: UnaryResponder<Feature>): void;
  ListFeatures(call: ServerStreamingCall<Feature>): Promise<void>;
  RecordRoute(call: ClientStreamingCall, callback: UnaryResponder<RouteSummary>): Promise<void>;
  RouteChat(call: BidiStreamingCall<RouteNote>): Promise<void>;
};

/**
 * Status code reported for a failed call
 */
function statusOf(error: unknown): GrpcStatus {
  return error instanceof AppError ? error.grpcStatus : GrpcStatus.INTERNAL;
}

export function createRouteGuideHandlers(service: RouteGuideService): RouteGuideHandlers {
  return {
    // =========================================================================
    // GetFeature - unary
    // =========================================================================
    GetFeature(call, callback) {
      const tracker = new CallTracker(RouteGuideMethod.GET_FEATURE, call.getPeer(), call.metadata);

      let feature: Feature;
      try {
        const point = parseMessage(pointSchema, 'Point', call.request);
        feature = service.getFeature(point);
      } catch (error) {
        tracker.finish(statusOf(error), error);
        callback(toServiceError(error));
        return;
      }

      logger.debug('Feature lookup', {
        callId: tracker.callId,
        point: formatPoint(feature.location),
        name: feature.name || '(unnamed)',
      });
      tracker.finish(GrpcStatus.OK);
      callback(null, feature);
    },

    // =========================================================================
    // ListFeatures - server streaming
    // =========================================================================
    async ListFeatures(call) {
      const tracker = new CallTracker(RouteGuideMethod.LIST_FEATURES, call.getPeer(), call.metadata);

      try {
        const rect = parseMessage(rectangleSchema, 'Rectangle', call.request);

        for (const feature of service.listFeatures(rect)) {
          if (call.cancelled) {
            tracker.finish(GrpcStatus.CANCELLED);
            return;
          }
          call.write(feature);
          tracker.messagesSent();
        }
      } catch (error) {
        tracker.finish(statusOf(error), error);
        call.emit('error', toServiceError(error));
        return;
      }

      tracker.finish(GrpcStatus.OK);
      call.end();
    },

    // =========================================================================
    // RecordRoute - client streaming
    // =========================================================================
    async RecordRoute(call, callback) {
      const tracker = new CallTracker(RouteGuideMethod.RECORD_ROUTE, call.getPeer(), call.metadata);
      const recorder = service.startRoute();

      let summary: RouteSummary;
      try {
        await consumeMessages(call, message => {
          tracker.messageReceived();
          recorder.record(parseMessage(pointSchema, 'Point', message));
        });

        if (call.cancelled) {
          tracker.finish(GrpcStatus.CANCELLED);
          return;
        }

        summary = recorder.complete();
      } catch (error) {
        // The partial route is dropped with the recorder
        tracker.finish(call.cancelled ? GrpcStatus.CANCELLED : statusOf(error), error);
        callback(toServiceError(error));
        return;
      }

      logger.debug('Route recorded', { callId: tracker.callId, ...summary });
      tracker.finish(GrpcStatus.OK);
      callback(null, summary);
    },

    // =========================================================================
    // RouteChat - bidirectional streaming
    // =========================================================================
    async RouteChat(call) {
      const tracker = new CallTracker(RouteGuideMethod.ROUTE_CHAT, call.getPeer(), call.metadata);

      try {
        // Replies are queued before the next message is read
        await consumeMessages(call, message => {
          tracker.messageReceived();

          const note = parseMessage(routeNoteSchema, 'RouteNote', message);
          const history = service.chat(note);

          for (const entry of history) {
            call.write(entry);
          }
          tracker.messagesSent(history.length);
        });
      } catch (error) {
        tracker.finish(call.cancelled ? GrpcStatus.CANCELLED : statusOf(error), error);
        call.emit('error', toServiceError(error));
        return;
      }

      if (call.cancelled) {
        tracker.finish(GrpcStatus.CANCELLED);
        return;
      }

      tracker.finish(GrpcStatus.OK);
      call.end();
    },
  };
}
