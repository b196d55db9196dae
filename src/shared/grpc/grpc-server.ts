/**
 * =============================================================================
 * gRPC SERVER LIFECYCLE
 * =============================================================================
 *
 * Bind, optional server reflection, graceful shutdown with a forced fallback.
 * =============================================================================
 */

import * as grpc from '@grpc/grpc-js';
import { ReflectionService } from '@grpc/reflection';
import type { PackageDefinition } from '@grpc/proto-loader';
import { logger } from '../services/logger.service';

/**
 * Register reflection so tools such as grpcurl can discover the service
 */
export function enableReflection(server: grpc.Server, packageDefinition: PackageDefinition): void {
  const reflection = new ReflectionService(packageDefinition);
  reflection.addToServer(server);
  logger.info('🔎 gRPC server reflection enabled');
}

/**
 * Bind an insecure listener.
 *
 * @returns The bound port (useful when `port` is 0)
 */
export function bindServer(server: grpc.Server, host: string, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(`${host}:${port}`, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(boundPort);
    });
  });
}

/**
 * Stop accepting calls and wait for in-flight ones; cancel whatever is still
 * running after `timeoutMs`
 */
export function shutdownServer(server: grpc.Server, timeoutMs: number): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(() => {
      logger.warn(`gRPC server did not drain within ${timeoutMs}ms, forcing shutdown`);
      server.forceShutdown();
      resolve();
    }, timeoutMs);
    timer.unref();

    server.tryShutdown(error => {
      clearTimeout(timer);
      if (error) {
        logger.error('gRPC graceful shutdown failed, forcing shutdown', { error: error.message });
        server.forceShutdown();
      }
      resolve();
    });
  });
}
