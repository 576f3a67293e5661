import { Router, type Response } from 'express';
import { ValidationError, type Reminder } from '@recall/shared';
import type { ReminderController } from '../controllers/ReminderController.js';

function sendError(res: Response, error: unknown, action: string): void {
    if (error instanceof ValidationError) {
        res.status(400).json({ success: false, error: error.message, field: error.field });
        return;
    }
    console.error(`[ReminderRoutes] Error ${action}:`, error);
    res.status(500).json({ success: false, error: `Failed ${action}` });
}

function notFound(res: Response, id: string): void {
    res.status(404).json({ success: false, error: `Reminder ${id} not found` });
}

export function toReminderView(reminder: Reminder) {
    return {
        id: reminder.id,
        patientName: reminder.patientName,
        phoneNumber: reminder.phoneNumber,
        appointmentTime: reminder.appointmentTime.toISOString(),
        message: reminder.message,
        status: reminder.status,
        callRef: reminder.callRef,
        callOutcome: reminder.callOutcome,
        lastError: reminder.lastError,
        attempts: reminder.attempts,
        createdAt: reminder.createdAt.toISOString(),
        updatedAt: reminder.updatedAt.toISOString()
    };
}

export function createReminderRouter(controller: ReminderController): Router {
    const router = Router();

    router.post('/reminders', async (req, res) => {
        try {
            const reminderId = await controller.createReminder(req.body);
            res.status(201).json({ success: true, reminderId });
        } catch (error) {
            sendError(res, error, 'creating reminder');
        }
    });

    router.get('/reminders/upcoming', async (req, res) => {
        try {
            const reminders = await controller.listUpcoming(req.query.limit);
            res.json({ count: reminders.length, reminders: reminders.map(toReminderView) });
        } catch (error) {
            sendError(res, error, 'listing reminders');
        }
    });

    router.get('/reminders/:id', async (req, res) => {
        try {
            const reminder = await controller.getReminder(req.params.id);
            if (!reminder) {
                notFound(res, req.params.id);
                return;
            }
            res.json(toReminderView(reminder));
        } catch (error) {
            sendError(res, error, 'fetching reminder');
        }
    });

    router.post('/reminders/:id/trigger', async (req, res) => {
        try {
            const result = await controller.triggerReminder(req.params.id);

            switch (result.kind) {
                case 'not-found':
                    notFound(res, req.params.id);
                    return;
                case 'not-scheduled':
                    res.status(409).json({
                        success: false,
                        error: `Reminder is ${result.reminder.status}`,
                        reminder: toReminderView(result.reminder)
                    });
                    return;
                case 'deferred':
                    res.status(202).json({ deferred: true, retryAt: result.retryAt.toISOString() });
                    return;
                case 'attempted': {
                    const { outcome } = result;
                    if (outcome.kind === 'sent') {
                        res.json({ success: true, outcome: 'sent', callRef: outcome.callRef, reminder: toReminderView(outcome.reminder) });
                    } else {
                        res.status(outcome.kind === 'failed' ? 502 : 409).json({
                            success: false,
                            outcome: outcome.kind,
                            error: outcome.reason,
                            reminder: toReminderView(outcome.reminder)
                        });
                    }
                    return;
                }
            }
        } catch (error) {
            sendError(res, error, 'triggering reminder');
        }
    });

    return router;
}
