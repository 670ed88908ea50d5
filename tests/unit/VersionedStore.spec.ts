/**
 * Unit Tests: Versioned Store
 *
 * @see libs/config/versionedStore.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'node:timers/promises';
import { VersionedStore } from '../../libs/config/versionedStore.js';

interface Value {
    label: string;
}

describe('VersionedStore', () => {
    it('should store whole values with increasing versions', () => {
        const store = new VersionedStore<Value>();

        assert.strictEqual(store.put('a', { label: 'one' }, store.generation('a')), true);
        const first = store.get('a');
        assert.strictEqual(store.put('a', { label: 'two' }, store.generation('a')), true);
        const second = store.get('a');

        assert.strictEqual(first?.value.label, 'one');
        assert.strictEqual(second?.value.label, 'two');
        assert.ok((second?.version ?? 0) > (first?.version ?? 0));
        assert.ok(Object.isFrozen(second));
    });

    it('should reject a write whose generation predates an eviction', () => {
        const store = new VersionedStore<Value>();
        const generation = store.generation('a');

        store.evict('a');

        assert.strictEqual(store.put('a', { label: 'late' }, generation), false);
        assert.strictEqual(store.has('a'), false);
    });

    it('should reject a write whose generation predates a clear', () => {
        const store = new VersionedStore<Value>();
        const generation = store.generation('a');

        store.clear();

        assert.strictEqual(store.put('a', { label: 'late' }, generation), false);
        assert.strictEqual(store.put('a', { label: 'now' }, store.generation('a')), true);
    });

    it('should leave other keys untouched on eviction', () => {
        const store = new VersionedStore<Value>();
        const generation = store.generation('b');

        store.evict('a');

        assert.strictEqual(store.put('b', { label: 'ok' }, generation), true);
    });

    it('should bound the number of entries', () => {
        const store = new VersionedStore<Value>({ maxEntries: 2 });

        store.put('a', { label: 'a' }, store.generation('a'));
        store.put('b', { label: 'b' }, store.generation('b'));
        store.put('c', { label: 'c' }, store.generation('c'));

        assert.strictEqual(store.size, 2);
        assert.strictEqual(store.has('a'), false);
        assert.strictEqual(store.has('c'), true);
    });

    it('should expire entries once their lifetime has passed', async () => {
        const store = new VersionedStore<Value>({ ttlMs: 20 });

        store.put('a', { label: 'a' }, store.generation('a'));
        assert.strictEqual(store.has('a'), true);

        await sleep(80);

        assert.strictEqual(store.has('a'), false);
        assert.strictEqual(store.get('a'), undefined);
    });

    it('should keep no more eviction markers than entries', () => {
        const store = new VersionedStore<Value>({ maxEntries: 2 });

        for (const key of ['a', 'b', 'c', 'd', 'e']) {
            store.evict(key);
        }

        assert.strictEqual(store.trackedEvictions, 2);
    });

    it('should still reject a stale write after its eviction marker is dropped', () => {
        const store = new VersionedStore<Value>({ maxEntries: 2 });
        const generation = store.generation('a');

        store.evict('a');
        store.evict('b');
        store.evict('c');

        assert.strictEqual(store.trackedEvictions, 2);
        assert.strictEqual(store.put('a', { label: 'late' }, generation), false);
        assert.strictEqual(store.put('a', { label: 'now' }, store.generation('a')), true);
        assert.strictEqual(store.get('a')?.value.label, 'now');
    });
});
