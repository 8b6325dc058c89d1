import { describe, it, expect } from '@jest/globals';
import { FetchError } from 'node-fetch';
import { z } from 'zod';
import {
  AuthError,
  ParameterError,
  RateLimitedError,
  SerializationError,
  TransientNetworkError,
  UpstreamProtocolError,
  VolumeAggregatorErrorHandler,
  classifyHttpError,
  toConnectorError,
  toVolumeAggregatorError
} from '../ErrorHandler';

describe('ErrorHandler', () => {
  describe('classifyHttpError', () => {
    it('should map 429 to a retryable rate limit error', () => {
      const error = classifyHttpError(429, '', 'woox GET /v1/client/trades');

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error.retryable).toBe(true);
      expect(error.message).toBe('woox GET /v1/client/trades 429');
    });

    it('should map 5xx to a retryable upstream protocol error', () => {
      const error = classifyHttpError(503, 'busy');

      expect(error).toBeInstanceOf(UpstreamProtocolError);
      expect(error.kind).toBe('upstream_protocol');
      expect(error.retryable).toBe(true);
      expect(error.message).toBe('HTTP 503: busy');
    });

    it('should map 401 and 403 to auth errors', () => {
      expect(classifyHttpError(401, '')).toBeInstanceOf(AuthError);
      expect(classifyHttpError(403, '')).toBeInstanceOf(AuthError);
    });

    it('should map other 4xx to non-retryable parameter errors', () => {
      for (const status of [400, 404, 422]) {
        const error = classifyHttpError(status, '');
        expect(error).toBeInstanceOf(ParameterError);
        expect(error.retryable).toBe(false);
        expect(error.status).toBe(status);
      }
    });
  });

  describe('toVolumeAggregatorError', () => {
    it('should pass typed errors through', () => {
      const error = new AuthError('no key');
      expect(toVolumeAggregatorError(error)).toBe(error);
    });

    it('should treat node-fetch failures as transient network errors', () => {
      const error = toVolumeAggregatorError(new FetchError('network timeout at: https://exchange.test', 'request-timeout'));

      expect(error).toBeInstanceOf(TransientNetworkError);
      expect(error.retryable).toBe(true);
      expect(error.message).toBe('request-timeout: network timeout at: https://exchange.test');
    });

    it('should treat schema failures as serialization errors', () => {
      const parsed = z.object({ price: z.number() }).safeParse({ price: 'abc' });
      if (parsed.success) {
        throw new Error('expected schema failure');
      }

      const error = toVolumeAggregatorError(parsed.error);

      expect(error).toBeInstanceOf(SerializationError);
      expect(error.message).toBe('Unexpected payload at price: Expected number, received string');
    });

    it('should wrap unknown errors as non-retryable upstream errors', () => {
      const error = toVolumeAggregatorError(new Error('boom'));

      expect(error).toBeInstanceOf(UpstreamProtocolError);
      expect(error.retryable).toBe(false);
    });
  });

  describe('toConnectorError', () => {
    it('should keep kind, message and status', () => {
      expect(toConnectorError(classifyHttpError(400, 'bad symbol'))).toEqual({
        kind: 'parameter',
        message: 'HTTP 400: bad symbol',
        status: 400
      });
    });

    it('should omit status when there is none', () => {
      expect(toConnectorError(new SerializationError('bad row'))).toEqual({
        kind: 'serialization',
        message: 'bad row'
      });
    });
  });

  describe('VolumeAggregatorErrorHandler', () => {
    it('should count errors per platform', () => {
      const handler = new VolumeAggregatorErrorHandler();
      const at = new Date('2024-01-01T00:00:00.000Z');

      handler.record('woox', { kind: 'auth', message: 'no key' }, at);
      handler.record('woox', { kind: 'rate_limited', message: 'slow down' }, at);

      expect(handler.getErrorStats()).toEqual({
        woox: { count: 2, lastError: at, lastKind: 'rate_limited' }
      });
    });
  });
});
