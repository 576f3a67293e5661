import { describe, expect, it } from 'vitest';
import { RedisClient } from '../clients/RedisClient.js';
import { ConcurrentModificationError } from '../errors.js';
import { buildReminder } from '../testing/reminders.js';
import { RedisReminderStore, deserializeReminder } from './RedisReminderStore.js';

/** Mirrors the compare-and-set script over in-process maps. */
class FakeRedisClient extends RedisClient {
    strings = new Map<string, string>();
    sorted = new Map<string, Map<string, number>>();

    constructor() {
        super({ url: 'redis://localhost:6379' });
    }

    async get(key: string): Promise<string | null> {
        return this.strings.get(key) ?? null;
    }

    async getMany(keys: string[]): Promise<Array<string | null>> {
        return keys.map((key) => this.strings.get(key) ?? null);
    }

    async rangeByScore(key: string, min: string, max: string, limit: number): Promise<string[]> {
        const exclusive = min.startsWith('(');
        const floor = Number(exclusive ? min.slice(1) : min);
        const ceiling = max === '+inf' ? Infinity : Number(max);
        return [...(this.sorted.get(key) ?? new Map<string, number>()).entries()]
            .filter(([, score]) => (exclusive ? score > floor : score >= floor) && score <= ceiling)
            .sort((a, b) => a[1] - b[1])
            .slice(0, limit)
            .map(([member]) => member);
    }

    async runScript(script: string, keys: string[], args: string[]): Promise<boolean> {
        const [recordKey, indexKey, refKey] = keys;
        const [json, expected, score, id] = args;
        const current = this.strings.get(recordKey);
        const storedVersion = current ? deserializeReminder(current).version : 0;
        if (storedVersion !== Number(expected)) {
            return false;
        }

        this.strings.set(recordKey, json);
        const index = this.sorted.get(indexKey) ?? new Map<string, number>();
        index.set(id, Number(score));
        this.sorted.set(indexKey, index);
        if (refKey) {
            this.strings.set(refKey, id);
        }
        return true;
    }
}

describe('RedisReminderStore', () => {
    it('stores the record with its call-reference and appointment indexes', async () => {
        const redis = new FakeRedisClient();
        const store = new RedisReminderStore(redis);

        const created = await store.save(buildReminder());
        await store.save({ ...created, status: 'SENT', callRef: 'CA100' });

        expect(redis.strings.get('reminder:ref:CA100')).toBe('rem-1');
        expect(redis.sorted.get('reminders:by-appointment')?.get('rem-1')).toBe(Date.parse('2026-03-03T14:30:00Z'));
        expect(await store.findByCallRef('CA100')).toMatchObject({ id: 'rem-1', status: 'SENT', version: 2 });
    });

    it('rejects a save from an outdated version', async () => {
        const store = new RedisReminderStore(new FakeRedisClient());
        const created = await store.save(buildReminder());
        await store.save({ ...created, attempts: 1 });

        await expect(store.save({ ...created, attempts: 2 })).rejects.toThrow(ConcurrentModificationError);
    });

    it('lists only appointments after now, soonest first', async () => {
        const store = new RedisReminderStore(new FakeRedisClient());
        await store.save(buildReminder({ id: 'past', appointmentTime: new Date('2026-02-27T10:00:00Z') }));
        await store.save(buildReminder({ id: 'later', appointmentTime: new Date('2026-03-09T10:00:00Z') }));
        await store.save(buildReminder({ id: 'sooner', appointmentTime: new Date('2026-03-02T10:00:00Z') }));

        const upcoming = await store.listUpcoming(new Date('2026-03-01T00:00:00Z'), 10);

        expect(upcoming.map((r) => r.id)).toEqual(['sooner', 'later']);
    });
});

describe('deserializeReminder', () => {
    it('restores dates from the stored JSON', () => {
        const reminder = buildReminder({
            status: 'SENT',
            callRef: 'CA100',
            placementAttemptedAt: new Date('2026-03-02T14:30:00Z'),
            version: 3
        });

        expect(deserializeReminder(JSON.stringify(reminder))).toEqual(reminder);
    });

    it('rejects records with an unknown status', () => {
        const raw = JSON.stringify({ ...buildReminder(), status: 'LOST' });

        expect(() => deserializeReminder(raw)).toThrow();
    });
});
