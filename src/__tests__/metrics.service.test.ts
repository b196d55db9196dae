/**
 * =============================================================================
 * METRICS SERVICE - Unit Tests
 * =============================================================================
 */

import { MetricsService } from '../shared/monitoring/metrics.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('MetricsService', () => {
  let metrics: MetricsService;

  beforeEach(() => {
    metrics = new MetricsService();
  });

  afterEach(() => {
    metrics.stopSystemMetricsCollection();
  });

  describe('counters', () => {
    it('counts per label set regardless of label order', () => {
      metrics.incrementCounter('grpc_requests_total', { method: 'GetFeature', code: 'OK' });
      metrics.incrementCounter('grpc_requests_total', { code: 'OK', method: 'GetFeature' });
      metrics.incrementCounter('grpc_requests_total', { method: 'GetFeature', code: 'INVALID_ARGUMENT' });

      expect(metrics.getCounter('grpc_requests_total', { method: 'GetFeature', code: 'OK' })).toBe(2);
      expect(metrics.getPrometheusMetrics().split('\n')).toContain(
        'grpc_requests_total{code="OK",method="GetFeature"} 2'
      );
    });

    it('adds a given amount', () => {
      metrics.incrementCounter('grpc_stream_messages_total', { method: 'RouteChat', direction: 'out' }, 3);

      expect(metrics.getCounter('grpc_stream_messages_total', { direction: 'out', method: 'RouteChat' })).toBe(3);
    });

    it('ignores unknown counters', () => {
      metrics.incrementCounter('no_such_counter');

      expect(metrics.getCounter('no_such_counter')).toBe(0);
    });
  });

  describe('gauges', () => {
    it('never drops below zero', () => {
      metrics.incrementGauge('grpc_active_calls');
      metrics.decrementGauge('grpc_active_calls', 5);

      expect(metrics.getGauge('grpc_active_calls')).toBe(0);
    });

    it('reads registered gauges from their source at export time', () => {
      let notes = 1;
      metrics.registerGauge('route_notes_total', 'Notes stored', () => notes);
      notes = 4;

      expect(metrics.getGauge('route_notes_total')).toBe(4);
      expect(metrics.getPrometheusMetrics().split('\n')).toEqual(
        expect.arrayContaining([
          '# HELP route_notes_total Notes stored',
          '# TYPE route_notes_total gauge',
          'route_notes_total 4',
        ])
      );
    });
  });

  describe('histograms', () => {
    it('fills cumulative buckets', () => {
      metrics.observeHistogram('grpc_request_duration_ms', 30, { method: 'ListFeatures' });
      metrics.observeHistogram('grpc_request_duration_ms', 7, { method: 'ListFeatures' });

      const lines = metrics.getPrometheusMetrics().split('\n');
      expect(lines).toEqual(expect.arrayContaining([
        'grpc_request_duration_ms_bucket{method="ListFeatures",le="5"} 0',
        'grpc_request_duration_ms_bucket{method="ListFeatures",le="10"} 1',
        'grpc_request_duration_ms_bucket{method="ListFeatures",le="25"} 1',
        'grpc_request_duration_ms_bucket{method="ListFeatures",le="50"} 2',
        'grpc_request_duration_ms_bucket{method="ListFeatures",le="+Inf"} 2',
        'grpc_request_duration_ms_sum{method="ListFeatures"} 37',
        'grpc_request_duration_ms_count{method="ListFeatures"} 2',
      ]));
      expect(metrics.getHistogramCount('grpc_request_duration_ms', { method: 'ListFeatures' })).toBe(2);
    });
  });
});
