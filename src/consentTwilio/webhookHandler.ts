import type { Request, Response } from "express";
import type { BackgroundTaskRunner } from "../utils/backgroundTasks";
import logger from "../utils/logger";
import { normalizeSender } from "../utils/phoneNumber";
import { classifyCommand, normalizeCommandBody } from "./domain/commandClassifier";
import { buildReplyText, buildTwimlReply } from "./domain/replyFormatting";
import type { ConsentBackend, DeliveryStatusUpdate, TwilioInboundWebhookBody, TwilioStatusWebhookBody } from "./types";

export type WebhookDeps = {
  store: ConsentBackend;
  tasks: BackgroundTaskRunner;
  programName: string;
};

function formField(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function formatDeliveryError(code: string, message: string): string {
  if (code && message) return `${code} - ${message}`;
  return code || message;
}

export function parseStatusCallback(body: TwilioStatusWebhookBody): DeliveryStatusUpdate {
  return {
    sid: formField(body.MessageSid) || formField(body.SmsSid),
    status: formField(body.MessageStatus) || formField(body.SmsStatus),
    error: formatDeliveryError(formField(body.ErrorCode), formField(body.ErrorMessage)),
    phone: normalizeSender(formField(body.To)),
  };
}

/**
 * Twilio inbound WhatsApp webhook.
 *
 * The TwiML reply goes out immediately; logging the message and updating
 * consent happen afterwards on the background runner.
 */
export function createInboundHandler(deps: WebhookDeps) {
  return function twilioInboundHandler(req: Request, res: Response): void {
    const body: TwilioInboundWebhookBody = req.body ?? {};
    const from = normalizeSender(formField(body.From));
    const messageBody = formField(body.Body);
    const messageSid = formField(body.MessageSid);

    if (!from) {
      logger.warn(`Twilio inbound webhook without From; ignoring. Body=${JSON.stringify(body)}`);
      res.status(200).type("text/xml").send(buildTwimlReply(null));
      return;
    }

    const command = classifyCommand(normalizeCommandBody(messageBody));
    logger.info("Inbound WhatsApp message", { from, command, messageSid });

    res.status(200).type("text/xml").send(buildTwimlReply(buildReplyText(command, deps.programName)));

    deps.tasks.enqueue("logInbound", { from, messageSid }, () =>
      deps.store.logInbound(from, messageBody, messageSid)
    );

    if (command === "unsubscribe") {
      deps.tasks.enqueue("recordUnsubscribe", { from }, () => deps.store.recordUnsubscribe(from));
    } else if (command === "resubscribe") {
      deps.tasks.enqueue("recordResubscribe", { from }, () => deps.store.recordResubscribe(from));
    }
  };
}

/**
 * Twilio delivery-status callback. Always answers 200 "OK" so Twilio doesn't
 * retry (and duplicate rows); the store update happens in the background.
 */
export function createStatusHandler(deps: WebhookDeps) {
  return function twilioStatusHandler(req: Request, res: Response): void {
    const update = parseStatusCallback(req.body ?? {});

    if (!update.sid) {
      logger.warn(`Twilio status callback without MessageSid/SmsSid. Body=${JSON.stringify(req.body)}`);
    }

    deps.tasks.enqueue("recordDeliveryStatus", { sid: update.sid, status: update.status }, () =>
      deps.store.recordDeliveryStatus(update)
    );

    res.status(200).type("text/plain").send("OK");
  };
}
