import { describe, expect, it } from 'vitest';

import { hostOf, InstrumentationCollector, sanitizeEndpoint } from '../instrumentation.js';

describe('Instrumentation Utilities', () => {
  describe('sanitizeEndpoint', () => {
    it('should strip hex keys', () => {
      const url = '/api/v1/0a1b2c3d4e5f6a7b8c9d0e1f2a3b4c5d/data';
      expect(sanitizeEndpoint(url)).toBe('/api/v1/{token}/data');
    });

    it('should strip base64-like keys', () => {
      const url = '/api/v1/AbCdEfGhIjKlMnOpQrStUvWxYz123456/data';
      expect(sanitizeEndpoint(url)).toBe('/api/v1/{token}/data');
    });

    it('should replace numeric ids', () => {
      expect(sanitizeEndpoint('/users/12345/orders/7')).toBe('/users/{id}/orders/{id}');
    });

    it('should handle full URLs by keeping only pathname', () => {
      const url = 'https://api.example.com/api/v1/users?key=secret';
      expect(sanitizeEndpoint(url)).toBe('/api/v1/users');
    });

    it('should resolve bare strings as paths', () => {
      expect(sanitizeEndpoint('not-a-url')).toBe('/not-a-url');
    });
  });

  describe('hostOf', () => {
    it('should keep explicit ports', () => {
      expect(hostOf('https://example.com:8443/x')).toBe('example.com:8443');
      expect(hostOf('nope')).toBe('');
    });
  });

  describe('InstrumentationCollector', () => {
    it('should collect and summarize metrics', () => {
      const collector = new InstrumentationCollector();
      collector.record({ host: 'example.com', endpoint: '/a', method: 'GET', status: 200, durationMs: 100, timestamp: 1 });
      collector.record({ host: 'example.com', endpoint: '/a', method: 'GET', status: 200, durationMs: 300, timestamp: 2 });
      collector.record({
        host: 'other.test',
        endpoint: '/b',
        method: 'POST',
        status: 500,
        durationMs: 200,
        timestamp: 3,
        error: 'UnsuccessfulStatusError',
      });

      expect(collector.getSummary()).toEqual({
        total: 3,
        avgDuration: 200,
        byHost: { 'example.com': 2, 'other.test': 1 },
        byStatus: { '200': 2, '500': 1 },
        byEndpoint: {
          'example.com:/a': { calls: 2, avgDuration: 200 },
          'other.test:/b': { calls: 1, avgDuration: 200 },
        },
      });
    });

    it('should return an empty summary without metrics', () => {
      expect(new InstrumentationCollector().getSummary()).toEqual({
        total: 0,
        avgDuration: 0,
        byHost: {},
        byStatus: {},
        byEndpoint: {},
      });
    });

    it('should forget metrics on clear', () => {
      const collector = new InstrumentationCollector();
      collector.record({ host: 'h', endpoint: '/', method: 'GET', status: 0, durationMs: 1, timestamp: 1 });
      collector.clear();

      expect(collector.getMetrics()).toEqual([]);
    });
  });
});
