import 'dotenv/config';
import http from 'node:http';
import {
    InMemoryReminderStore,
    OpenAIClient,
    RedisClient,
    RedisReminderStore,
    TwilioClient,
    VoiceAgentService,
    type ReminderStore
} from '@recall/shared';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { twilioSignature } from './middleware/TwilioSignature.js';
import { CallFlowEngine } from './services/CallFlowEngine.js';
import { CallSessionManager } from './services/CallSessionManager.js';
import { ReminderLifecycleManager } from './services/ReminderLifecycleManager.js';
import { StatusReconciler } from './services/StatusReconciler.js';
import { TwimlRenderer } from './services/TwimlRenderer.js';

const config = loadConfig();

let redisClient: RedisClient | null = null;
let store: ReminderStore;
if (config.store.kind === 'redis') {
    redisClient = new RedisClient({ url: config.store.redisUrl });
    await redisClient.connect();
    store = new RedisReminderStore(redisClient);
} else {
    console.warn('Using the in-memory reminder store; reminders are lost on restart');
    store = new InMemoryReminderStore();
}

const twilioClient = new TwilioClient({
    accountSid: config.twilio.accountSid,
    authToken: config.twilio.authToken,
    agentNumber: config.twilio.agentNumber
});

const scripts = new VoiceAgentService(
    new OpenAIClient({ apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl, model: config.openai.model }),
    { practiceName: config.practice.name, timeoutMs: config.generationTimeoutMs }
);

const sessions = new CallSessionManager({ ttlMs: config.callSessionTtlMs });
const reconciler = new StatusReconciler(store);

const lifecycle = new ReminderLifecycleManager({
    store,
    gateway: twilioClient,
    scripts,
    configs: {
        publicBaseUrl: config.publicBaseUrl,
        practiceName: config.practice.name,
        timezone: config.practice.timezone,
        leadHours: config.reminders.leadHours,
        placementTimeoutMs: config.reminders.placementTimeoutMs
    }
});

const engine = new CallFlowEngine({
    store,
    scripts,
    reconciler,
    sessions,
    configs: {
        practiceName: config.practice.name,
        timezone: config.practice.timezone,
        transferNumber: config.practice.transferNumber
    }
});

const app = createApp({
    lifecycle,
    engine,
    renderer: new TwimlRenderer({ gatherTimeoutSeconds: config.gatherTimeoutSeconds }),
    verifySignature: twilioSignature(
        (url, params, signature) => twilioClient.validateSignature(url, params, signature),
        { enabled: config.twilio.validateSignature, publicBaseUrl: config.publicBaseUrl }
    )
});

sessions.start();
const server = http.createServer(app);

server.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`Answer webhook available at: ${config.publicBaseUrl}/voice/answer`);
    console.log(`Inbound webhook available at: ${config.publicBaseUrl}/voice/inbound`);
});

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        console.log(`Shutdown already in progress, ignoring ${signal}`);
        return;
    }

    isShuttingDown = true;
    console.log(`\n${signal} received - Shutting down gracefully...`);

    let exitCode = 0;

    try {
        await new Promise<void>((resolve, reject) => {
            server.close((err) => {
                if (err && !('code' in err && err.code === 'ERR_SERVER_NOT_RUNNING')) {
                    console.error('Error closing HTTP server:', err);
                    reject(err);
                } else {
                    console.log('HTTP server closed');
                    resolve();
                }
            });
        });

        sessions.stop();
        console.log(`Dropped ${sessions.activeCount} in-flight call session(s)`);

        if (redisClient) {
            console.log('Disconnecting from Redis...');
            await redisClient.disconnect();
            console.log('Redis disconnected');
        }

        console.log('Graceful shutdown complete');
    } catch (error) {
        console.error('Error during shutdown:', error);
        exitCode = 1;
    } finally {
        process.exit(exitCode);
    }
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection, reason:', reason);
    void gracefulShutdown('UNHANDLED_REJECTION');
});
