import express, { type Express, type RequestHandler } from 'express';
import { ReminderController } from './controllers/ReminderController.js';
import { VoiceController } from './controllers/VoiceController.js';
import { createReminderRouter } from './routes/ReminderRoutes.js';
import { StatusRouter } from './routes/StatusRoute.js';
import { createVoiceRouter } from './routes/VoiceRoutes.js';
import type { CallFlowEngine } from './services/CallFlowEngine.js';
import type { ReminderLifecycleManager } from './services/ReminderLifecycleManager.js';
import type { TwimlRenderer } from './services/TwimlRenderer.js';

export const SERVICE_NAME = 'recall-voice';

export interface AppDeps {
    lifecycle: ReminderLifecycleManager;
    engine: CallFlowEngine;
    renderer: TwimlRenderer;
    verifySignature: RequestHandler;
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.use(express.urlencoded({ extended: false }));
    app.use(express.json());

    app.use(createReminderRouter(new ReminderController(deps.lifecycle)));
    app.use(createVoiceRouter(new VoiceController(deps.engine, deps.renderer), deps.verifySignature));
    app.use(StatusRouter(SERVICE_NAME));

    return app;
}
