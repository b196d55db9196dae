/**
 * =============================================================================
 * gRPC CALL SHAPES
 * =============================================================================
 *
 * The parts of the @grpc/grpc-js server call objects the handlers rely on.
 * grpc-js calls satisfy these structurally, and so do the in-process fakes
 * used by the tests.
 *
 * Inbound messages are typed `unknown`: handlers decode them with zod.
 * Inbound streams are read through their events, never async-iterated
 * (see consumeMessages in inbound-stream.ts).
 * =============================================================================
 */

import type { Metadata, StatusObject } from '@grpc/grpc-js';

export type CallStatus = Partial<StatusObject>;

export interface CallBase {
  /** Set once the client cancels or the deadline passes */
  readonly cancelled: boolean;
  readonly metadata: Metadata;
  getPeer(): string;
}

/**
 * Inbound half of a streaming call: 'data', 'end', 'error' and 'cancelled'
 */
export interface InboundStream {
  on(event: string, listener: (...args: never[]) => void): unknown;
  removeListener(event: string, listener: (...args: never[]) => void): unknown;
}

/**
 * Outbound half of a streaming call
 */
interface MessageSink<Res> {
  write(message: Res): boolean;
  end(): void;
  /** Emitting 'error' with a status ends the call with that status */
  emit(event: 'error', status: CallStatus): boolean;
}

export interface UnaryCall extends CallBase {
  readonly request: unknown;
}

export interface ServerStreamingCall<Res> extends CallBase, MessageSink<Res> {
  readonly request: unknown;
}

export interface ClientStreamingCall extends CallBase, InboundStream {}

export interface BidiStreamingCall<Res> extends CallBase, InboundStream, MessageSink<Res> {}

export type UnaryResponder<Res> = (error: CallStatus | null, value?: Res | null) => void;
