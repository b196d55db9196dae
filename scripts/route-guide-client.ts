/**
 * =============================================================================
 * ROUTE GUIDE DEMO CLIENT
 * =============================================================================
 *
 * Exercises all four RPCs against a running server.
 *
 * USAGE:
 *   npm run build && GRPC_TARGET=localhost:50051 npm run client
 *
 * STEPS:
 * 1. GetFeature for a known point and for (0, 0)
 * 2. ListFeatures for a rectangle around the bundled dataset
 * 3. RecordRoute with 2-101 points, the first one a known feature
 * 4. RouteChat with six notes over three locations
 *
 * Every call gets a 10 second deadline.
 * =============================================================================
 */

import { config } from '../src/config/environment';
import { logError, logger } from '../src/shared/services/logger.service';
import { loadRouteGuideService } from '../src/shared/grpc/proto-loader.service';
import { formatPoint } from '../src/shared/utils/geospatial.utils';
import { Point, Rectangle, RouteNote, RouteSummary } from '../src/shared/types/api.types';
import { RouteGuideClient } from '../src/modules/route-guide/route-guide.client';
import {
  featureSchema,
  parseMessage,
  routeNoteSchema,
} from '../src/modules/route-guide/route-guide.schema';

const TARGET = process.env.GRPC_TARGET || `localhost:${config.grpc.port}`;
const CALL_TIMEOUT_MS = 10_000;
const POINT_INTERVAL_MS = 100;

// First record of data/route_guide_db.json
const KNOWN_POINT: Point = { latitude: 473768210, longitude: 85417130 };

const DATASET_RECTANGLE: Rectangle = {
  lo: { latitude: 473000000, longitude: 84500000 },
  hi: { latitude: 474500000, longitude: 86500000 },
};

const CHAT_NOTES: RouteNote[] = [
  { location: { latitude: 0, longitude: 1 }, message: 'First message' },
  { location: { latitude: 0, longitude: 2 }, message: 'Second message' },
  { location: { latitude: 0, longitude: 3 }, message: 'Third message' },
  { location: { latitude: 0, longitude: 1 }, message: 'Fourth message' },
  { location: { latitude: 0, longitude: 2 }, message: 'Fifth message' },
  { location: { latitude: 0, longitude: 3 }, message: 'Sixth message' },
];

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Whole-degree random point, in E7 units
 */
function randomPoint(): Point {
  const lat = (Math.floor(Math.random() * 180) - 90) * 1e7;
  const lng = (Math.floor(Math.random() * 360) - 180) * 1e7;
  return { latitude: lat, longitude: lng };
}

// =============================================================================
// STEPS
// =============================================================================

async function printFeature(client: RouteGuideClient, point: Point): Promise<void> {
  logger.info(`Getting feature for point ${formatPoint(point)}`);
  const feature = await client.getFeature(point);
  logger.info(feature.name ? `Found "${feature.name}"` : 'No feature found', {
    location: formatPoint(feature.location),
  });
}

async function printFeatures(client: RouteGuideClient, rect: Rectangle): Promise<void> {
  logger.info(`Looking for features between ${formatPoint(rect.lo)} and ${formatPoint(rect.hi)}`);
  let count = 0;
  for await (const message of client.listFeatures(rect)) {
    const feature = parseMessage(featureSchema, 'Feature', message);
    count++;
    logger.info(`  ${feature.name || '(unnamed)'} at ${formatPoint(feature.location)}`);
  }
  logger.info(`${count} features listed`);
}

async function runRecordRoute(client: RouteGuideClient): Promise<void> {
  const pointCount = Math.floor(Math.random() * 100) + 2;
  const points: Point[] = [KNOWN_POINT];
  for (let i = 0; i < pointCount - 1; i++) {
    points.push(randomPoint());
  }
  logger.info(`Traversing ${points.length} points`);

  const summary = await new Promise<RouteSummary>((resolve, reject) => {
    const stream = client.recordRoute((error, result) => {
      if (error || !result) {
        reject(error ?? new Error('RecordRoute returned no summary'));
        return;
      }
      resolve(result);
    });

    (async () => {
      for (const point of points) {
        stream.write(point);
        await sleep(POINT_INTERVAL_MS);
      }
      stream.end();
    })().catch(reject);
  });

  logger.info('Route summary', { ...summary });
}

async function runRouteChat(client: RouteGuideClient): Promise<void> {
  const stream = client.routeChat();

  const received = (async () => {
    for await (const incoming of stream) {
      const { message, location } = parseMessage(routeNoteSchema, 'RouteNote', incoming);
      logger.info(`Got "${message}" at ${formatPoint(location)}`);
    }
  })();

  for (const note of CHAT_NOTES) {
    stream.write(note);
  }
  stream.end();

  await received;
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  const { service } = loadRouteGuideService(config.grpc.protoPath);
  const client = new RouteGuideClient(TARGET, service, CALL_TIMEOUT_MS);
  logger.info(`Connecting to ${TARGET}`);

  try {
    await printFeature(client, KNOWN_POINT);
    await printFeature(client, { latitude: 0, longitude: 0 });
    await printFeatures(client, DATASET_RECTANGLE);
    await runRecordRoute(client);
    await runRouteChat(client);
  } finally {
    client.close();
  }
}

main().catch(error => {
  logError('Route guide client failed', error);
  process.exit(1);
});
