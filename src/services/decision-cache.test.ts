/**
 * Decision Cache Tests
 */

import * as fc from 'fast-check';
import { DecisionCache, generateDecisionKey } from './decision-cache';
import {
  createManualClock,
  permissionActionArb,
  principalIdArb,
  resourceIdArb
} from '../test/generators';

describe('DecisionCache', () => {
  describe('generateDecisionKey', () => {
    it('joins principal, action and resource with colons', () => {
      expect(generateDecisionKey('u1', 'read', 'doc-1')).toBe('u1:read:doc-1');
    });

    it('escapes colons and backslashes inside a part', () => {
      expect(generateDecisionKey('x:read', 'read', 'y')).toBe('x\\:read:read:y');
      expect(generateDecisionKey('x', 'read', 'read:y')).toBe('x:read:read\\:y');
      expect(generateDecisionKey('a\\', 'read', 'b')).toBe('a\\\\:read:b');
    });

    it('never serves one request the decision cached for another whose parts contain colons', () => {
      const cache = new DecisionCache({}, createManualClock());
      cache.put('x:read', 'read', 'y', true);

      expect(cache.get('x', 'read', 'read:y')).toEqual({ value: false, found: false });
      expect(cache.get('x:read', 'read', 'y')).toEqual({ value: true, found: true });
    });
  });

  describe('get/put', () => {
    it('reports a miss for an unknown key', () => {
      const cache = new DecisionCache({}, createManualClock());

      expect(cache.get('u1', 'read', 'doc-1')).toEqual({ value: false, found: false });
      expect(cache.getStats()).toEqual({ size: 0, hits: 0, misses: 1 });
    });

    it('cached decision SHALL be returned unchanged within the TTL', () => {
      fc.assert(
        fc.property(principalIdArb(), permissionActionArb(), resourceIdArb(), fc.boolean(), (principal, action, resource, value) => {
          const cache = new DecisionCache({}, createManualClock());
          cache.put(principal, action, resource, value);

          expect(cache.get(principal, action, resource)).toEqual({ value, found: true });
        }),
        { numRuns: 100 }
      );
    });

    it('put overwrites an existing entry', () => {
      const cache = new DecisionCache({}, createManualClock());
      cache.put('u1', 'read', 'doc-1', true);
      cache.put('u1', 'read', 'doc-1', false);

      expect(cache.get('u1', 'read', 'doc-1')).toEqual({ value: false, found: true });
      expect(cache.getStats().size).toBe(1);
    });
  });

  describe('TTL', () => {
    it('serves an entry just before the TTL elapses', () => {
      const clock = createManualClock();
      const cache = new DecisionCache({ ttlSeconds: 300 }, clock);
      cache.put('u1', 'read', 'doc-1', true);

      clock.advance(299_999);

      expect(cache.get('u1', 'read', 'doc-1').found).toBe(true);
    });

    it('treats an entry as missing once the TTL has elapsed and purges it', () => {
      const clock = createManualClock();
      const cache = new DecisionCache({ ttlSeconds: 300 }, clock);
      cache.put('u1', 'read', 'doc-1', true);

      clock.advance(300_000);

      expect(cache.get('u1', 'read', 'doc-1')).toEqual({ value: false, found: false });
      expect(cache.getStats().size).toBe(0);
    });

    it('honours a configured TTL', () => {
      const clock = createManualClock();
      const cache = new DecisionCache({ ttlSeconds: 5 }, clock);
      cache.put('u1', 'read', 'doc-1', true);

      clock.advance(5_000);

      expect(cache.get('u1', 'read', 'doc-1').found).toBe(false);
    });
  });

  describe('invalidation', () => {
    function seededCache(): DecisionCache {
      const cache = new DecisionCache({}, createManualClock());
      cache.put('u1', 'read', 'doc-1', true);
      cache.put('u1', 'update', 'doc-2', false);
      cache.put('u2', 'read', 'doc-1', true);
      cache.put('u10', 'read', 'doc-3', true);
      return cache;
    }

    it('clearForPrincipal removes only that principal', () => {
      const cache = seededCache();
      cache.clearForPrincipal('u1');

      expect(cache.get('u1', 'read', 'doc-1').found).toBe(false);
      expect(cache.get('u1', 'update', 'doc-2').found).toBe(false);
      expect(cache.get('u2', 'read', 'doc-1').found).toBe(true);
      expect(cache.get('u10', 'read', 'doc-3').found).toBe(true);
    });

    it('clearForResource removes only that resource', () => {
      const cache = seededCache();
      cache.clearForResource('doc-1');

      expect(cache.get('u1', 'read', 'doc-1').found).toBe(false);
      expect(cache.get('u2', 'read', 'doc-1').found).toBe(false);
      expect(cache.get('u1', 'update', 'doc-2').found).toBe(true);
      expect(cache.getStats().size).toBe(2);
    });

    it('matches principals and resources exactly, not by key prefix or suffix', () => {
      const cache = new DecisionCache({}, createManualClock());
      cache.put('u1', 'read', 'folder:doc-1', true);
      cache.put('u1:admin', 'read', 'doc-2', true);

      cache.clearForResource('doc-1');
      cache.clearForPrincipal('u1');

      expect(cache.get('u1:admin', 'read', 'doc-2').found).toBe(true);
      expect(cache.get('u1', 'read', 'folder:doc-1').found).toBe(false);
      expect(cache.getStats().size).toBe(1);
    });

    it('clearAll empties the cache', () => {
      const cache = seededCache();
      cache.clearAll();

      expect(cache.getStats().size).toBe(0);
    });
  });
});
