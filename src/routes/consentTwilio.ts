import { Router } from "express";
import { requireTwilioSignature } from "../consentTwilio/twilioSignature";
import { createInboundHandler, createStatusHandler, type WebhookDeps } from "../consentTwilio/webhookHandler";

export function createConsentTwilioRouter(
  deps: WebhookDeps & { twilioAuthToken: string; publicBaseUrl?: string }
): Router {
  const router = Router();
  const verifySignature = requireTwilioSignature({
    authToken: deps.twilioAuthToken,
    publicBaseUrl: deps.publicBaseUrl,
  });

  // Twilio inbound WhatsApp webhook
  router.post("/inbound", verifySignature, createInboundHandler(deps));

  // Twilio delivery status callback
  router.post("/status", verifySignature, createStatusHandler(deps));

  return router;
}
