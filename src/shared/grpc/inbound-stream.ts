/**
 * =============================================================================
 * INBOUND STREAM READER
 * =============================================================================
 *
 * Reads the client half of a client-streaming or bidi call through its
 * events. grpc-js server streams are Node Readables; leaving a `for await`
 * loop over one destroys it, which on a duplex call drops the writes still
 * queued and the final status.
 *
 * SETTLES ON:
 * - 'end'        → resolve (client half-closed)
 * - 'cancelled'  → resolve (caller checks `call.cancelled`)
 * - 'error'      → reject with the transport error
 * - onMessage throws → reject with that error; later messages are ignored
 * =============================================================================
 */

import { CallBase, InboundStream } from './call.types';

export function consumeMessages(
  call: CallBase & InboundStream,
  onMessage: (message: unknown) => void
): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const settle = (error?: unknown): void => {
      if (settled) return;
      settled = true;
      call.removeListener('data', onData);
      call.removeListener('end', onEnd);
      call.removeListener('cancelled', onEnd);
      call.removeListener('error', onError);
      if (error === undefined) {
        resolve();
      } else {
        reject(error);
      }
    };

    const onData = (message: unknown): void => {
      if (settled) return;
      if (call.cancelled) {
        settle();
        return;
      }
      try {
        onMessage(message);
      } catch (error) {
        settle(error);
      }
    };

    const onEnd = (): void => settle();

    const onError = (error: Error): void => settle(error);

    call.on('error', onError);
    call.on('end', onEnd);
    call.on('cancelled', onEnd);
    call.on('data', onData);
  });
}
