import type { NextFunction, Request, RequestHandler, Response } from "express";
import { validateRequest } from "twilio";
import logger from "../utils/logger";

/**
 * The URL Twilio signed: the configured public base URL when we sit behind a
 * proxy, otherwise what the request itself says.
 */
export function signedUrlFor(req: Request, publicBaseUrl?: string): string {
  const base = publicBaseUrl || `${req.protocol}://${req.get("host") ?? ""}`;
  return `${base}${req.originalUrl}`;
}

/**
 * Rejects requests whose X-Twilio-Signature doesn't match the form body.
 * Without an auth token every request is let through (dev mode).
 */
export function requireTwilioSignature(opts: { authToken: string; publicBaseUrl?: string }): RequestHandler {
  if (!opts.authToken) {
    logger.warn("TWILIO_AUTH_TOKEN not set; webhook signature validation is DISABLED");
  }

  return (req: Request, res: Response, next: NextFunction) => {
    if (!opts.authToken) {
      next();
      return;
    }

    const signature = req.get("X-Twilio-Signature") ?? "";
    const url = signedUrlFor(req, opts.publicBaseUrl);
    const params: Record<string, unknown> = req.body ?? {};

    if (!signature || !validateRequest(opts.authToken, signature, url, params)) {
      logger.warn("Rejected webhook with invalid Twilio signature", { url, hasSignature: Boolean(signature) });
      res.status(403).type("text/plain").send("Forbidden");
      return;
    }
    next();
  };
}
