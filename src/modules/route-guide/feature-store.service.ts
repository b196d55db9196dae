/**
 * =============================================================================
 * ROUTE GUIDE MODULE - FEATURE STORE
 * =============================================================================
 *
 * Ordered, read-only collection of named points.
 *
 * LIFECYCLE:
 * ─────────────────────────────
 * 1. Server bootstrap calls loadFromFile() exactly once
 * 2. Any read/parse/validation failure throws FeatureLoadError (fatal)
 * 3. After load the list is frozen; handlers only read it
 *
 * Lookups are linear scans in load order. No spatial index.
 * =============================================================================
 */

import { readFile } from 'fs/promises';
import { ErrorCode } from '../../core/constants';
import { FeatureLoadError } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { Feature, Point, Rectangle } from '../../shared/types/api.types';
import { containsPoint, pointsEqual } from '../../shared/utils/geospatial.utils';
import { featureDatasetSchema, FeatureRecord } from './route-guide.schema';

export class FeatureStore {
  private features: readonly Feature[] = [];
  private loaded = false;

  get size(): number {
    return this.features.length;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /**
   * Populate the store from an already-parsed dataset (e.g. JSON.parse output)
   */
  load(data: unknown, source: string = 'inline dataset'): number {
    if (this.loaded) {
      throw new FeatureLoadError(
        'Feature store is already loaded',
        ErrorCode.FEATURE_STORE_ALREADY_LOADED,
        { source }
      );
    }

    const result = featureDatasetSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const [index, ...field] = issue.path;
      const where = typeof index === 'number'
        ? `record ${index}${field.length > 0 ? ` (${field.join('.')})` : ''}`
        : 'dataset';
      throw new FeatureLoadError(
        `Invalid features in ${source}: ${where}: ${issue.message}`,
        ErrorCode.FEATURES_FILE_INVALID,
        { source, path: issue.path.join('.') }
      );
    }

    this.features = Object.freeze(result.data.map(toFeature));
    this.loaded = true;

    logger.info(`📍 Loaded ${this.features.length} features`, { source });
    return this.features.length;
  }

  /**
   * Read, parse and load a JSON features file
   */
  async loadFromFile(filePath: string): Promise<number> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new FeatureLoadError(
        `Cannot read features file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.FEATURES_FILE_UNREADABLE,
        { source: filePath }
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new FeatureLoadError(
        `Features file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.FEATURES_FILE_INVALID,
        { source: filePath }
      );
    }

    return this.load(data, filePath);
  }

  /**
   * First feature located exactly at `point`
   */
  findExact(point: Point): Feature | undefined {
    return this.features.find(feature => pointsEqual(feature.location, point));
  }

  /**
   * How many features sit exactly at `point`
   */
  countExact(point: Point): number {
    let count = 0;
    for (const feature of this.features) {
      if (pointsEqual(feature.location, point)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Features inside `rect`, in load order. Each call scans afresh.
   */
  *findInRegion(rect: Rectangle): Generator<Feature, void, undefined> {
    for (const feature of this.features) {
      if (containsPoint(rect, feature.location)) {
        yield feature;
      }
    }
  }
}

function toFeature(record: FeatureRecord): Feature {
  return Object.freeze({
    name: record.name,
    location: Object.freeze({
      latitude: record.location.latitude,
      longitude: record.location.longitude,
    }),
  });
}
