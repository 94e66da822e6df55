export type TwilioInboundWebhookBody = {
  From?: string;
  To?: string;
  Body?: string;
  MessageSid?: string;
};

export type TwilioStatusWebhookBody = {
  MessageSid?: string;
  SmsSid?: string;
  MessageStatus?: string;
  SmsStatus?: string;
  ErrorCode?: string;
  ErrorMessage?: string;
  To?: string;
};

export type ConsentCommand = "unsubscribe" | "resubscribe" | "other";

export type CustomerRecord = {
  phone: string;
  name: string | null;
  /** Do-not-contact: true once the customer opted out. */
  dnc: boolean;
  optinDate: string | null;
  optinSource: string | null;
  optoutDate: string | null;
};

export type MessageType = "inbound" | "outbound" | "status-update";

export type MessageRecord = {
  sid: string;
  date: string;
  phone: string;
  type: MessageType | "";
  message: string;
  status: string;
  error: string;
};

export type DeliveryStatusUpdate = {
  sid: string;
  status: string;
  error: string;
  /** Recipient (`To`) when the gateway sent one; may be blank. */
  phone: string;
};

/** Opt-in/opt-out ledger. Both operations create the customer on a miss. */
export interface ConsentStore {
  recordUnsubscribe(phone: string): Promise<void>;
  recordResubscribe(phone: string): Promise<void>;
  findCustomer(phone: string): Promise<CustomerRecord | null>;
}

export interface MessageLogStore {
  /** Always inserts, even when the sid was seen before. */
  logInbound(phone: string, body: string, sid: string): Promise<void>;
  /** Updates every row with this sid in place, or inserts one status-update row. */
  recordDeliveryStatus(update: DeliveryStatusUpdate): Promise<void>;
  findMessages(sid: string): Promise<MessageRecord[]>;
}

export type ConsentBackend = ConsentStore & MessageLogStore;
