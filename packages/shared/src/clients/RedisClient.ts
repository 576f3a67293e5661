import { createClient } from 'redis';

export type RedisConnection = ReturnType<typeof createClient>;

export interface RedisConfigs {
    url: string;
}

export class RedisClient {
    private client: RedisConnection;
    private isConnected = false;

    constructor(configs: RedisConfigs) {
        this.client = createClient({
            url: configs.url
        });
        this.setupEventHandlers();
    }

    private setupEventHandlers(): void {
        this.client.on('error', (err) => {
            console.error('[RedisClient] Client error:', err);
            this.isConnected = false;
        });

        this.client.on('connect', () => {
            console.log('[RedisClient] Connected');
            this.isConnected = true;
        });

        this.client.on('reconnecting', () => {
            console.log('[RedisClient] Reconnecting...');
        });

        this.client.on('ready', () => {
            console.log('[RedisClient] Ready');
            this.isConnected = true;
        });
    }

    async connect(): Promise<void> {
        if (!this.isConnected) {
            await this.client.connect();
        }
    }

    async disconnect(): Promise<void> {
        await this.client.quit();
        this.isConnected = false;
    }

    async get(key: string): Promise<string | null> {
        return await this.client.get(key);
    }

    async getMany(keys: string[]): Promise<Array<string | null>> {
        if (keys.length === 0) return [];
        return await this.client.mGet(keys);
    }

    async rangeByScore(key: string, min: string, max: string, limit: number): Promise<string[]> {
        return await this.client.zRangeByScore(key, min, max, {
            LIMIT: { offset: 0, count: limit }
        });
    }

    /** Runs a Lua script and reports whether it returned 1. */
    async runScript(script: string, keys: string[], args: string[]): Promise<boolean> {
        const reply = await this.client.eval(script, { keys, arguments: args });
        return Number(reply) === 1;
    }
}
