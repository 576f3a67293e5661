import { Router } from 'express';

export function StatusRouter(service: string): Router {
    const router = Router();

    router.get('/health', (req, res) => {
        res.json({
            status: 'healthy',
            service,
            timestamp: new Date().toISOString()
        });
    });

    return router;
}
