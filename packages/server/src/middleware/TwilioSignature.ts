import type { NextFunction, Request, RequestHandler, Response } from 'express';

export type SignatureValidator = (url: string, params: Record<string, string>, signature: string) => boolean;

export interface TwilioSignatureConfigs {
    enabled: boolean;
    publicBaseUrl: string;
}

function formParams(body: unknown): Record<string, string> {
    const params: Record<string, string> = {};
    if (body && typeof body === 'object') {
        for (const [key, value] of Object.entries(body)) {
            if (typeof value === 'string') {
                params[key] = value;
            }
        }
    }
    return params;
}

/**
 * Rejects webhooks whose X-Twilio-Signature does not match the public URL the
 * provider called. Must run after the urlencoded body parser.
 */
export function twilioSignature(validate: SignatureValidator, configs: TwilioSignatureConfigs): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!configs.enabled) {
            next();
            return;
        }

        const signature = req.header('x-twilio-signature');
        const url = `${configs.publicBaseUrl}${req.originalUrl}`;

        if (!signature || !validate(url, formParams(req.body), signature)) {
            console.warn('[TwilioSignature] Rejected webhook with invalid signature:', req.originalUrl);
            res.status(403).send('Invalid signature');
            return;
        }

        next();
    };
}
