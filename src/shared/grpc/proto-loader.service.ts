/**
 * =============================================================================
 * PROTO LOADER
 * =============================================================================
 *
 * Loads proto/route_guide.proto at run time with @grpc/proto-loader.
 * No generated code: serializers come from the package definition.
 *
 * FIELD NAMES: keepCase is off, so point_count on the wire is pointCount in
 * TypeScript, matching shared/types/api.types.ts.
 * =============================================================================
 */

import * as protoLoader from '@grpc/proto-loader';
import type { AnyDefinition, PackageDefinition, ServiceDefinition } from '@grpc/proto-loader';
import { ROUTE_GUIDE_SERVICE } from '../../core/constants';
import { InternalError } from '../../core/errors/AppError';

export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export interface LoadedService {
  packageDefinition: PackageDefinition;
  service: ServiceDefinition;
}

function isServiceDefinition(definition: AnyDefinition | undefined): definition is ServiceDefinition {
  return definition !== undefined && !('format' in definition);
}

/**
 * Pick a service out of a package definition by its fully-qualified name
 */
export function getServiceDefinition(
  packageDefinition: PackageDefinition,
  serviceName: string
): ServiceDefinition {
  const definition = packageDefinition[serviceName];
  if (!isServiceDefinition(definition)) {
    throw new InternalError(`Service ${serviceName} is not defined in the loaded proto`);
  }
  return definition;
}

/**
 * Load the RouteGuide service definition
 */
export function loadRouteGuideService(protoPath: string): LoadedService {
  const packageDefinition = protoLoader.loadSync(protoPath, PROTO_LOADER_OPTIONS);
  return {
    packageDefinition,
    service: getServiceDefinition(packageDefinition, ROUTE_GUIDE_SERVICE),
  };
}
