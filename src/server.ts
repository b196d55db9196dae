/**
 * =============================================================================
 * ROUTE GUIDE SERVICE - MAIN SERVER
 * =============================================================================
 *
 * gRPC service over a fixed set of named locations:
 *
 * ┌──────────────┬──────────────────────────────────────────────────────────┐
 * │ GetFeature   │ Point → Feature (unnamed when nothing is known there)    │
 * │ ListFeatures │ Rectangle → stream of Features inside it                 │
 * │ RecordRoute  │ stream of Points → RouteSummary                          │
 * │ RouteChat    │ stream of RouteNotes ↔ notes left at each location       │
 * └──────────────┴──────────────────────────────────────────────────────────┘
 *
 * STARTUP ORDER:
 * 1. Validate environment
 * 2. Load the features file (any failure exits before binding)
 * 3. Register the service (+ reflection) and bind the gRPC port
 * 4. Start the health/metrics HTTP side-car
 *
 * =============================================================================
 */

import * as grpc from '@grpc/grpc-js';
import express from 'express';
import { createServer as createHttpServer, Server as HttpServer } from 'http';

import { validateAndLogEnvironment } from './core';
import { config } from './config/environment';
import { logError, logger } from './shared/services/logger.service';
import { metrics } from './shared/monitoring/metrics.service';
import { createHealthRoutes } from './shared/routes/health.routes';
import { loadRouteGuideService } from './shared/grpc/proto-loader.service';
import { bindServer, enableReflection, shutdownServer } from './shared/grpc/grpc-server';
import {
  createRouteGuideHandlers,
  FeatureStore,
  NoteRegistry,
  RouteGuideService,
} from './modules/route-guide';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

// =============================================================================
// SERVICE STATE
// =============================================================================
const featureStore = new FeatureStore();
const noteRegistry = new NoteRegistry();
const routeGuideService = new RouteGuideService(featureStore, noteRegistry);

const grpcServer = new grpc.Server();
let grpcBound = false;
let httpServer: HttpServer | null = null;

metrics.registerGauge('features_loaded', 'Features held by the feature store', () => featureStore.size);
metrics.registerGauge('route_note_locations', 'Locations holding at least one note', () => noteRegistry.locationCount);
metrics.registerGauge('route_notes_total', 'Notes stored across all locations', () => noteRegistry.noteCount);

// =============================================================================
// HEALTH SIDE-CAR
// =============================================================================

function startHealthServer(port: number): Promise<HttpServer> {
  const app = express();
  app.disable('x-powered-by');
  app.use('/', createHealthRoutes({
    features: () => featureStore.isLoaded,
    grpc: () => grpcBound,
  }));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found'
      }
    });
  });

  const server = createHttpServer(app);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

// =============================================================================
// START SERVER
// =============================================================================

async function start(): Promise<void> {
  // Features must be in place before the first call can arrive
  try {
    await featureStore.loadFromFile(config.featuresFile);
  } catch (error) {
    logError('❌ Failed to load features, refusing to start', error);
    process.exit(1);
  }

  const { packageDefinition, service } = loadRouteGuideService(config.grpc.protoPath);
  grpcServer.addService(service, createRouteGuideHandlers(routeGuideService));

  if (config.grpc.reflectionEnabled) {
    enableReflection(grpcServer, packageDefinition);
  }

  const port = await bindServer(grpcServer, config.grpc.host, config.grpc.port);
  grpcBound = true;

  if (config.http.enabled) {
    httpServer = await startHealthServer(config.http.port);
  }

  metrics.startSystemMetricsCollection();

  console.log('');
  console.log('╔════════════════════════════════════════════════════════════════════╗');
  console.log('║   🧭  ROUTE GUIDE SERVICE STARTED                                  ║');
  console.log('╠════════════════════════════════════════════════════════════════════╣');
  console.log(`║   📍 gRPC:        ${`${config.grpc.host}:${port}`.padEnd(49)}║`);
  console.log(`║   📍 Health:      ${(httpServer ? `http://localhost:${config.http.port}/health` : 'disabled').padEnd(49)}║`);
  console.log(`║   📍 Environment: ${config.nodeEnv.padEnd(49)}║`);
  console.log(`║   📚 Features:    ${String(featureStore.size).padEnd(49)}║`);
  console.log(`║   🔎 Reflection:  ${(config.grpc.reflectionEnabled ? 'enabled' : 'disabled').padEnd(49)}║`);
  console.log('╚════════════════════════════════════════════════════════════════════╝');
  console.log('');

  logger.info(`Server started on port ${port}`);
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', reason);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const gracefulShutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received. Starting graceful shutdown...`);

  metrics.stopSystemMetricsCollection();
  grpcBound = false;

  await shutdownServer(grpcServer, config.shutdownTimeoutMs);
  logger.info('gRPC server closed');

  if (httpServer) {
    const server = httpServer;
    await new Promise<void>(resolve => server.close(() => resolve()));
    logger.info('Health server closed');
  }

  process.exit(0);
};

process.on('SIGTERM', () => {
  gracefulShutdown('SIGTERM').catch(error => {
    logError('Shutdown failed', error);
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  gracefulShutdown('SIGINT').catch(error => {
    logError('Shutdown failed', error);
    process.exit(1);
  });
});

start().catch(error => {
  logError('❌ Server failed to start', error);
  process.exit(1);
});
