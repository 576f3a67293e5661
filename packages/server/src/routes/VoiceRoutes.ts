import { Router, type RequestHandler } from 'express';
import type { VoiceController } from '../controllers/VoiceController.js';

export function createVoiceRouter(controller: VoiceController, verifySignature: RequestHandler): Router {
    const router = Router();

    const answer: RequestHandler = async (req, res) => {
        const reminderId = typeof req.query.reminderId === 'string' ? req.query.reminderId : undefined;
        const twiml = await controller.handleAnswer({
            body: req.body,
            isGatherCallback: req.query.gather === '1',
            reminderId
        });
        res.type('text/xml').send(twiml);
    };

    router.post('/voice/answer', verifySignature, answer);
    router.post('/voice/inbound', verifySignature, answer);

    router.post('/voice/status', verifySignature, async (req, res) => {
        await controller.handleStatus(req.body);
        res.status(204).end();
    });

    return router;
}
