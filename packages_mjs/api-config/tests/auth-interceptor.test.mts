/**
 * Tests for auth-interceptor.mts
 * Logic testing: Equivalence Partitioning (header forms), Integration with Dispatcher.compose
 */
import { describe, it, expect } from 'vitest';
import { request } from 'undici';
import { authHeaderInterceptor, headerEntries, setHeaders } from '../src/auth-interceptor.mjs';
import { ScriptedDispatcher } from '../../api-client/tests/helpers/scripted-dispatcher.mjs';

describe('auth-interceptor', () => {
  describe('headerEntries', () => {
    it('should return nothing for missing headers', () => {
      expect(headerEntries(undefined)).toEqual([]);
    });

    it('should pair up a flat array', () => {
      expect(headerEntries(['Accept', 'text/plain', 'X-Trace', '1'])).toEqual([
        ['Accept', 'text/plain'],
        ['X-Trace', '1'],
      ]);
    });

    it('should read an iterable and skip undefined values', () => {
      const headers = new Map<string, string | undefined>([
        ['accept', 'text/plain'],
        ['x-skip', undefined],
      ]);
      expect(headerEntries(headers)).toEqual([['accept', 'text/plain']]);
    });

    it('should read a plain object', () => {
      expect(headerEntries({ accept: 'text/plain', 'set-cookie': ['a=1', 'b=2'] })).toEqual([
        ['accept', 'text/plain'],
        ['set-cookie', ['a=1', 'b=2']],
      ]);
    });
  });

  describe('setHeaders', () => {
    it('should replace same-named headers regardless of case', () => {
      expect(setHeaders({ authorization: 'Basic old', accept: 'text/plain' }, { Authorization: 'Bearer new' })).toEqual({
        accept: 'text/plain',
        Authorization: 'Bearer new',
      });
    });

    it('should replace headers given as a flat array', () => {
      expect(setHeaders(['AUTHORIZATION', 'Basic old', 'Accept', 'text/plain'], { Authorization: 'Bearer new' })).toEqual({
        Accept: 'text/plain',
        Authorization: 'Bearer new',
      });
    });

    it('should add headers when none are present', () => {
      expect(setHeaders(undefined, { 'X-API-Key': 'test-key' })).toEqual({ 'X-API-Key': 'test-key' });
    });
  });

  describe('authHeaderInterceptor', () => {
    it('should set the headers on every dispatched request', async () => {
      const base = new ScriptedDispatcher({ chunks: ['ok'] });
      const dispatcher = base.compose(authHeaderInterceptor({ Authorization: 'Bearer test-token' }));

      for (const path of ['/a', '/b']) {
        const { body } = await request(`http://example.test${path}`, {
          dispatcher,
          headers: { authorization: 'Basic old', accept: 'text/plain' },
        });
        await body.text();
      }

      expect(base.requests).toHaveLength(2);
      for (const recorded of base.requests) {
        expect(recorded.headers).toEqual({ accept: 'text/plain', authorization: 'Bearer test-token' });
      }
    });

    it('should evaluate a header factory per request', async () => {
      const base = new ScriptedDispatcher({});
      let calls = 0;
      const dispatcher = base.compose(authHeaderInterceptor(() => ({ 'X-Request-Number': String(++calls) })));

      await (await request('http://example.test/a', { dispatcher })).body.text();
      await (await request('http://example.test/b', { dispatcher })).body.text();

      expect(base.requests.map((r) => r.headers['x-request-number'])).toEqual(['1', '2']);
    });
  });
});
