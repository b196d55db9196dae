/**
 * =============================================================================
 * PROTO LOADER - Tests
 * =============================================================================
 *
 * Loads the real proto/route_guide.proto and checks the service surface and
 * the field-name mapping of the generated serializers.
 * =============================================================================
 */

import path from 'path';
import { InternalError } from '../core/errors/AppError';
import { featureSchema, parseMessage } from '../modules/route-guide/route-guide.schema';
import { getServiceDefinition, loadRouteGuideService } from '../shared/grpc/proto-loader.service';

const PROTO_PATH = path.resolve(__dirname, '../../proto/route_guide.proto');

describe('loadRouteGuideService', () => {
  const { packageDefinition, service } = loadRouteGuideService(PROTO_PATH);

  it('exposes the four RouteGuide methods with their streaming shapes', () => {
    const shapes = Object.fromEntries(
      Object.entries(service).map(([name, method]) => [name, [method.requestStream, method.responseStream]])
    );

    expect(shapes).toEqual({
      GetFeature: [false, false],
      ListFeatures: [false, true],
      RecordRoute: [true, false],
      RouteChat: [true, true],
    });
  });

  it('routes calls under the routeguide package', () => {
    expect(service.GetFeature.path).toBe('/routeguide.RouteGuide/GetFeature');
    expect(service.RouteChat.path).toBe('/routeguide.RouteGuide/RouteChat');
  });

  it('maps snake_case fields to camelCase', () => {
    const summary = { pointCount: 3, featureCount: 1, distanceMeters: 500, elapsedSeconds: 2 };
    const bytes = service.RecordRoute.responseSerialize(summary);

    expect(service.RecordRoute.responseDeserialize(bytes)).toEqual(summary);
  });

  it('decodes an empty Point with zero coordinates', () => {
    expect(service.GetFeature.requestDeserialize(Buffer.alloc(0))).toEqual({ latitude: 0, longitude: 0 });
  });

  it('decodes a Feature without a location as an unnamed zero-point feature', () => {
    const decoded = service.GetFeature.responseDeserialize(Buffer.alloc(0));

    expect(parseMessage(featureSchema, 'Feature', decoded)).toEqual({
      name: '',
      location: { latitude: 0, longitude: 0 },
    });
  });

  it('refuses a message type as a service', () => {
    expect(() => getServiceDefinition(packageDefinition, 'routeguide.Point')).toThrow(InternalError);
  });

  it('refuses an unknown service', () => {
    expect(() => getServiceDefinition(packageDefinition, 'routeguide.Missing')).toThrow(
      'Service routeguide.Missing is not defined in the loaded proto'
    );
  });
});
