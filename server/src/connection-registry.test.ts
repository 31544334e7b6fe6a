/**
 * Tests for connection admission and bookkeeping
 */

import { describe, test, expect } from 'vitest';
import { ConnectionRegistry } from './connection-registry.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ConnectionRegistry', () => {
  test('defaults to 100 connections', () => {
    expect(new ConnectionRegistry().getMaxConnections()).toBe(100);
  });

  test('rejects an invalid limit at construction', () => {
    expect(() => new ConnectionRegistry(0)).toThrow('maxConnections must be a positive integer, got 0');
  });

  test('refuses connections beyond the limit', () => {
    const registry = new ConnectionRegistry(5);
    for (let i = 0; i < 5; i++) {
      expect(registry.register(`conn-${i}`, `+1555000000${i}`, 'telephony')).toBe(true);
    }

    expect(registry.register('conn-5', undefined, 'web')).toBe(false);
    expect(registry.activeCount()).toBe(5);
    expect(registry.get('conn-5')).toBeUndefined();

    registry.unregister('conn-2');
    expect(registry.register('conn-5', undefined, 'web')).toBe(true);
    expect(registry.activeCount()).toBe(5);
  });

  test('refuses a duplicate connection id', () => {
    const registry = new ConnectionRegistry(5);
    expect(registry.register('conn-1', 'alice', 'web')).toBe(true);
    expect(registry.register('conn-1', 'bob', 'web')).toBe(false);
    expect(registry.get('conn-1')?.callerId).toBe('alice');
  });

  test('records entry details', () => {
    const registry = new ConnectionRegistry();
    registry.register('conn-1', '+15550001111', 'telephony');

    const entry = registry.get('conn-1');
    expect(entry?.callerId).toBe('+15550001111');
    expect(entry?.connectionType).toBe('telephony');
    expect(entry?.status).toBe('connected');
    expect(entry?.connectedAt).toBeInstanceOf(Date);
  });

  test('ignores unregistering an unknown id', () => {
    const registry = new ConnectionRegistry();
    registry.register('conn-1', undefined, 'web');

    registry.unregister('missing');

    expect(registry.activeCount()).toBe(1);
  });

  test('snapshots are not affected by later changes', () => {
    const registry = new ConnectionRegistry();
    registry.register('conn-1', 'alice', 'web');

    const snapshot = registry.all();
    registry.unregister('conn-1');
    registry.register('conn-2', 'bob', 'web');

    expect(Array.from(snapshot.keys())).toEqual(['conn-1']);
    expect(registry.all().has('conn-1')).toBe(false);
  });

  test('admits exactly the limit when registrations race', async () => {
    const registry = new ConnectionRegistry(5);

    const results = await Promise.all(
      Array.from({ length: 12 }, async (_, i) => {
        await delay((i * 7) % 5);
        return registry.register(`conn-${i}`, undefined, 'web');
      })
    );

    expect(results.filter(Boolean)).toHaveLength(5);
    expect(registry.activeCount()).toBe(5);
  });

  test('returns to zero once every concurrent session unregisters', async () => {
    const registry = new ConnectionRegistry(20);

    const results = await Promise.all(
      Array.from({ length: 12 }, async (_, i) => {
        await delay(i % 3);
        const admitted = registry.register(`conn-${i}`, undefined, 'telephony');
        await delay((i * 5) % 4);
        registry.unregister(`conn-${i}`);
        return admitted;
      })
    );

    expect(results.filter(Boolean)).toHaveLength(12);
    expect(registry.activeCount()).toBe(0);
  });

  test('setMaxConnections applies to later registrations', () => {
    const registry = new ConnectionRegistry(1);
    registry.register('conn-1', undefined, 'web');
    expect(registry.register('conn-2', undefined, 'web')).toBe(false);

    registry.setMaxConnections(2);
    expect(registry.register('conn-2', undefined, 'web')).toBe(true);
  });

  test('setMaxConnections ignores non-positive values', () => {
    const registry = new ConnectionRegistry(3);
    registry.setMaxConnections(0);
    registry.setMaxConnections(-4);
    expect(registry.getMaxConnections()).toBe(3);
  });
});
