import { twiml } from "twilio";
import type { ConsentCommand } from "../types";

export function buildReplyText(command: ConsentCommand, programName: string): string {
  switch (command) {
    case "unsubscribe":
      return (
        `You have been unsubscribed from ${programName} messages. Reply START to subscribe again. / ` +
        `Has sido dado de baja de ${programName}. Responde START para suscribirte de nuevo.`
      );
    case "resubscribe":
      return `You are subscribed to ${programName} messages again. / Suscripción activada para ${programName}.`;
    case "other":
      return `Thanks for contacting ${programName}!`;
  }
}

/** TwiML reply; `null` renders an empty <Response/> (no message sent back). */
export function buildTwimlReply(text: string | null): string {
  const response = new twiml.MessagingResponse();
  if (text) {
    response.message(text);
  }
  return response.toString();
}
