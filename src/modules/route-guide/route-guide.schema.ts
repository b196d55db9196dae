/**
 * =============================================================================
 * ROUTE GUIDE MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Decodes messages handed over by the gRPC layer and records read from the
 * features file.
 *
 * KEY RULES:
 * - Coordinates must be int32 values (a wire-type check, NOT a geographic one:
 *   latitude 95° is accepted)
 * - A message-typed field missing on the wire decodes as the zero point,
 *   matching proto3 default semantics
 * - Strings default to ""
 * =============================================================================
 */

import { z } from 'zod';
import { INT32_MAX, INT32_MIN } from '../../core/constants';
import { InvalidArgumentError } from '../../core/errors/AppError';
import { Point } from '../../shared/types/api.types';

// =============================================================================
// WIRE MESSAGES
// =============================================================================

const int32Schema = z.number().int().min(INT32_MIN).max(INT32_MAX);

const counterSchema = int32Schema.nonnegative();

export const pointSchema = z.object({
  latitude: int32Schema.default(0),
  longitude: int32Schema.default(0),
});

/**
 * Message-typed field: null/undefined → zero point
 */
const embeddedPointSchema = pointSchema
  .nullish()
  .transform((point): Point => point ?? { latitude: 0, longitude: 0 });

export const rectangleSchema = z.object({
  lo: embeddedPointSchema,
  hi: embeddedPointSchema,
});

export const featureSchema = z.object({
  name: z.string().default(''),
  location: embeddedPointSchema,
});

export const routeNoteSchema = z.object({
  location: embeddedPointSchema,
  message: z.string().default(''),
});

export const routeSummarySchema = z.object({
  pointCount: counterSchema.default(0),
  featureCount: counterSchema.default(0),
  distanceMeters: counterSchema.default(0),
  elapsedSeconds: counterSchema.default(0),
});

// =============================================================================
// FEATURES FILE
// =============================================================================

/**
 * One record of the features file. Unlike wire messages, a record without a
 * location is corrupt data, not a default.
 */
export const featureRecordSchema = z.object({
  name: z.string().default(''),
  location: z.object({
    latitude: int32Schema,
    longitude: int32Schema,
  }),
});

export const featureDatasetSchema = z.array(featureRecordSchema);

export type FeatureRecord = z.infer<typeof featureRecordSchema>;

// =============================================================================
// DECODING
// =============================================================================

/**
 * Parse an inbound message, throwing INVALID_ARGUMENT on mismatch
 */
export function parseMessage<T extends z.ZodTypeAny>(
  schema: T,
  messageType: string,
  value: unknown
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw InvalidArgumentError.fromZodError(messageType, result.error);
  }
  return result.data;
}
