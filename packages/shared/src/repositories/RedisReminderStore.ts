import { z } from 'zod';
import { ConcurrentModificationError } from '../errors.js';
import type { RedisClient } from '../clients/RedisClient.js';
import { CALL_OUTCOMES, REMINDER_STATUSES, type Reminder } from '../types/reminder.js';
import type { ReminderStore } from './ReminderStore.js';

const BY_APPOINTMENT_KEY = 'reminders:by-appointment';

const reminderKey = (id: string) => `reminder:${id}`;
const callRefKey = (callRef: string) => `reminder:ref:${callRef}`;

// KEYS: reminder, appointment index[, call-ref index]
// ARGV: json, expected version, appointment score, id
const COMPARE_AND_SET = `
local current = redis.call('GET', KEYS[1])
local expected = tonumber(ARGV[2])
if current then
    if cjson.decode(current).version ~= expected then
        return 0
    end
elseif expected ~= 0 then
    return 0
end
redis.call('SET', KEYS[1], ARGV[1])
redis.call('ZADD', KEYS[2], ARGV[3], ARGV[4])
if KEYS[3] then
    redis.call('SET', KEYS[3], ARGV[4])
end
return 1
`;

const ReminderRecordSchema = z.object({
    id: z.string(),
    patientName: z.string(),
    phoneNumber: z.string(),
    appointmentTime: z.coerce.date(),
    message: z.string().nullable(),
    status: z.enum(REMINDER_STATUSES),
    callRef: z.string().nullable(),
    callOutcome: z.enum(CALL_OUTCOMES).nullable(),
    script: z.string().nullable(),
    lastError: z.string().nullable(),
    attempts: z.number().int(),
    placementAttemptedAt: z.coerce.date().nullable(),
    version: z.number().int(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date()
});

export function deserializeReminder(raw: string): Reminder {
    return ReminderRecordSchema.parse(JSON.parse(raw));
}

export class RedisReminderStore implements ReminderStore {
    private redis: RedisClient;

    constructor(redis: RedisClient) {
        this.redis = redis;
    }

    async findById(id: string): Promise<Reminder | null> {
        try {
            const raw = await this.redis.get(reminderKey(id));
            return raw ? deserializeReminder(raw) : null;
        } catch (error) {
            console.error('[RedisReminderStore] Error loading reminder by id:', id, error);
            throw error;
        }
    }

    async findByCallRef(callRef: string): Promise<Reminder | null> {
        const id = await this.redis.get(callRefKey(callRef));
        return id ? await this.findById(id) : null;
    }

    async save(reminder: Reminder): Promise<Reminder> {
        const saved: Reminder = { ...reminder, version: reminder.version + 1 };

        const keys = [reminderKey(reminder.id), BY_APPOINTMENT_KEY];
        if (saved.callRef) {
            keys.push(callRefKey(saved.callRef));
        }

        const applied = await this.redis.runScript(COMPARE_AND_SET, keys, [
            JSON.stringify(saved),
            String(reminder.version),
            String(saved.appointmentTime.getTime()),
            saved.id
        ]);

        if (!applied) {
            throw new ConcurrentModificationError(reminder.id, reminder.version);
        }
        return saved;
    }

    async listUpcoming(now: Date, limit: number): Promise<Reminder[]> {
        const ids = await this.redis.rangeByScore(BY_APPOINTMENT_KEY, `(${now.getTime()}`, '+inf', limit);
        const records = await this.redis.getMany(ids.map(reminderKey));

        const reminders: Reminder[] = [];
        for (const raw of records) {
            if (raw) {
                reminders.push(deserializeReminder(raw));
            }
        }
        return reminders;
    }
}
