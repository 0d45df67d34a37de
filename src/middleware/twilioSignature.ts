/**
 * Rejects webhook calls that were not signed by Twilio.
 *
 * Must run after `express.urlencoded()` so the form fields are available.
 */

import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../errors';
import { INVALID_SIGNATURE, MISSING_SIGNATURE } from '../constants/errorMessages';
import { isValidTwilioSignature, toFormParams } from '../services/webhook/twilioSignature';

export const TWILIO_SIGNATURE_HEADER = 'x-twilio-signature';

export interface TwilioSignatureOptions {
  secret: string;
  /**
   * Public origin Twilio calls (e.g. `https://bets.example.com`). Needed
   * behind a proxy, where the URL seen by Express differs from the signed one.
   */
  publicBaseUrl?: string;
}

export function signedUrl(req: Request, publicBaseUrl?: string): string {
  if (publicBaseUrl) {
    return `${publicBaseUrl.replace(/\/+$/, '')}${req.originalUrl}`;
  }
  return `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`;
}

export function verifyTwilioSignature(opts: TwilioSignatureOptions) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const signature = req.get(TWILIO_SIGNATURE_HEADER);
    if (!signature) {
      next(AppError.forbidden(MISSING_SIGNATURE));
      return;
    }

    const url = signedUrl(req, opts.publicBaseUrl);
    if (!isValidTwilioSignature(opts.secret, url, toFormParams(req.body), signature)) {
      next(AppError.forbidden(INVALID_SIGNATURE));
      return;
    }
    next();
  };
}
