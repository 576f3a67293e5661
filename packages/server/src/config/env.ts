import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((value) => value === 'true' || value === '1');

function isTimeZone(zone: string): boolean {
    try {
        new Intl.DateTimeFormat(undefined, { timeZone: zone });
        return true;
    } catch {
        return false;
    }
}

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    PUBLIC_BASE_URL: z.string().url(),
    TWILIO_ACCOUNT_SID: z.string().min(1),
    TWILIO_AUTH_TOKEN: z.string().min(1),
    TWILIO_NUMBER: z.string().min(1),
    TWILIO_VALIDATE_SIGNATURE: booleanFlag,
    STAFF_TRANSFER_NUMBER: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o'),
    REDIS_URL: z.string().default('redis://localhost:6379'),
    REMINDER_STORE: z.enum(['redis', 'memory']).default('redis'),
    PRACTICE_NAME: z.string().default('My Dentist'),
    PRACTICE_TIMEZONE: z.string().refine(isTimeZone, 'Unknown IANA time zone').default('UTC'),
    REMINDER_LEAD_HOURS: z.coerce.number().positive().default(24),
    CALL_PLACEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
    GATHER_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(6),
    CALL_SESSION_TTL_MS: z.coerce.number().int().positive().default(3_600_000)
});

export interface AppConfig {
    port: number;
    publicBaseUrl: string;
    twilio: {
        accountSid: string;
        authToken: string;
        agentNumber: string;
        validateSignature: boolean;
    };
    openai: {
        apiKey: string;
        baseUrl?: string;
        model: string;
    };
    store: {
        kind: 'redis' | 'memory';
        redisUrl: string;
    };
    practice: {
        name: string;
        timezone: string;
        transferNumber: string | null;
    };
    reminders: {
        leadHours: number;
        placementTimeoutMs: number;
    };
    generationTimeoutMs: number;
    gatherTimeoutSeconds: number;
    callSessionTtlMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid environment configuration - ${problems.join('; ')}`);
    }

    const env = parsed.data;
    return {
        port: env.PORT,
        publicBaseUrl: env.PUBLIC_BASE_URL.replace(/\/+$/, ''),
        twilio: {
            accountSid: env.TWILIO_ACCOUNT_SID,
            authToken: env.TWILIO_AUTH_TOKEN,
            agentNumber: env.TWILIO_NUMBER,
            validateSignature: env.TWILIO_VALIDATE_SIGNATURE
        },
        openai: {
            apiKey: env.OPENAI_API_KEY,
            baseUrl: env.OPENAI_BASE_URL,
            model: env.OPENAI_MODEL
        },
        store: {
            kind: env.REMINDER_STORE,
            redisUrl: env.REDIS_URL
        },
        practice: {
            name: env.PRACTICE_NAME,
            timezone: env.PRACTICE_TIMEZONE,
            transferNumber: env.STAFF_TRANSFER_NUMBER ?? null
        },
        reminders: {
            leadHours: env.REMINDER_LEAD_HOURS,
            placementTimeoutMs: env.CALL_PLACEMENT_TIMEOUT_MS
        },
        generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
        gatherTimeoutSeconds: env.GATHER_TIMEOUT_SECONDS,
        callSessionTtlMs: env.CALL_SESSION_TTL_MS
    };
}
