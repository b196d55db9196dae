/**
 * =============================================================================
 * CALL TRACKER - Per-call logging & metrics
 * =============================================================================
 *
 * The gRPC counterpart of an HTTP request logger: every handler opens a
 * tracker when the call starts and finishes it exactly once with the final
 * status code.
 *
 * - Assigns a call id (uuid v4) that tags every log line of the call
 * - Log level follows the status (OK → info, client-side codes → warn,
 *   server-side codes → error)
 * - Feeds grpc_requests_total / grpc_request_duration_ms / grpc_active_calls
 * =============================================================================
 */

import { Metadata, status as GrpcStatus } from '@grpc/grpc-js';
import { v4 as uuidv4 } from 'uuid';
import { isOperationalError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';
import { metrics, trackGrpcCall, trackStreamMessage } from '../monitoring/metrics.service';

/**
 * Codes caused by the caller, logged as warnings
 */
const CLIENT_STATUS_CODES: ReadonlySet<GrpcStatus> = new Set([
  GrpcStatus.CANCELLED,
  GrpcStatus.INVALID_ARGUMENT,
  GrpcStatus.DEADLINE_EXCEEDED,
  GrpcStatus.NOT_FOUND,
  GrpcStatus.FAILED_PRECONDITION,
  GrpcStatus.OUT_OF_RANGE,
]);

export class CallTracker {
  readonly callId = uuidv4();
  private readonly startedAt = process.hrtime.bigint();
  private received = 0;
  private sent = 0;
  private finished = false;

  constructor(
    private readonly method: string,
    private readonly peer: string,
    metadata?: Metadata
  ) {
    metrics.incrementGauge('grpc_active_calls');
    logger.debug(`→ ${method}`, { callId: this.callId, peer, ...(metadata && { metadata }) });
  }

  messageReceived(): void {
    this.received++;
    trackStreamMessage(this.method, 'in');
  }

  messagesSent(count: number = 1): void {
    this.sent += count;
    trackStreamMessage(this.method, 'out', count);
  }

  /**
   * Close the call record. Later calls are ignored.
   */
  finish(code: GrpcStatus, error?: unknown): void {
    if (this.finished) return;
    this.finished = true;

    const durationMs = Number(process.hrtime.bigint() - this.startedAt) / 1e6;
    const codeName = GrpcStatus[code];

    metrics.decrementGauge('grpc_active_calls');
    trackGrpcCall(this.method, codeName, durationMs);

    const logData: Record<string, unknown> = {
      callId: this.callId,
      peer: this.peer,
      code: codeName,
      duration: `${durationMs.toFixed(1)}ms`,
      ...(this.received > 0 && { received: this.received }),
      ...(this.sent > 0 && { sent: this.sent }),
    };

    if (code === GrpcStatus.OK) {
      logger.info(`${this.method} completed`, logData);
    } else if (CLIENT_STATUS_CODES.has(code)) {
      logger.warn(`${this.method} failed`, { ...logData, error: describeError(error) });
    } else {
      logger.error(`${this.method} failed`, {
        ...logData,
        error: describeError(error),
        ...(error instanceof Error && !isOperationalError(error) && { stack: error.stack }),
      });
    }
  }
}

function describeError(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}
