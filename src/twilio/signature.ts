import type { Request, Response, NextFunction, RequestHandler } from 'express';
import twilio from 'twilio';
import type { EnvConfig } from '../config/env.js';

/**
 * Rejects webhook calls not signed with the account's auth token.
 * Skipped when validation is disabled or no token is configured.
 */
export function twilioWebhookAuth(
  env: Pick<EnvConfig, 'twilioAuthToken' | 'twilioValidateSignature' | 'publicBaseUrl'>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!env.twilioValidateSignature || !env.twilioAuthToken) {
      next();
      return;
    }

    const signature = req.header('x-twilio-signature') ?? '';
    const base = env.publicBaseUrl ?? `${req.protocol}://${req.get('host') ?? ''}`;
    const url = `${base}${req.originalUrl}`;
    const params: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};

    if (!twilio.validateRequest(env.twilioAuthToken, signature, url, params)) {
      // eslint-disable-next-line no-console
      console.warn(`[Twilio] Rejected unsigned request to ${req.originalUrl}`);
      res.status(403).send('Forbidden');
      return;
    }

    next();
  };
}
