import logger from "../../utils/logger";
import { phonesMatch } from "../../utils/phoneNumber";
import { isoNow, systemClock, type Clock } from "../../utils/timeUtils";
import {
  applyRowUpdates,
  buildHeaderMap,
  CUSTOMER_HEADERS,
  MESSAGE_HEADERS,
  missingFields,
  type CustomerField,
  type HeaderMap,
  type HeaderSchema,
  type MessageField,
} from "../domain/headerMap";
import type { ConsentBackend, CustomerRecord, DeliveryStatusUpdate, MessageRecord, MessageType } from "../types";
import type { SheetTab } from "./sheetTab";

export type SheetHeaderMaps = {
  customers: HeaderMap<CustomerField>;
  messages: HeaderMap<MessageField>;
};

type Tabs = {
  customers: SheetTab;
  messages: SheetTab;
};

function cell(row: readonly string[], headers: readonly string[], actual: string | undefined): string {
  if (actual === undefined) return "";
  const idx = headers.indexOf(actual);
  return idx >= 0 ? (row[idx] ?? "").trim() : "";
}

function parseBool(value: string): boolean {
  return ["true", "yes", "1", "y"].includes(value.trim().toLowerCase());
}

function asMessageType(value: string): MessageType | "" {
  return value === "inbound" || value === "outbound" || value === "status-update" ? value : "";
}

async function resolveHeaders<F extends string>(tab: SheetTab, schema: HeaderSchema<F>): Promise<HeaderMap<F>> {
  const rows = await tab.readRows();
  const map = buildHeaderMap(rows[0] ?? [], schema);
  const missing = missingFields(map, schema);
  if (missing.length > 0) {
    logger.warn(`Sheet "${tab.title}" has no column for: ${missing.join(", ")}; writes to them are dropped.`);
  }
  return map;
}

/**
 * Reads the header row of both tabs once. The result is passed to the store and
 * reused for the lifetime of the process.
 */
export async function resolveSheetHeaderMaps(tabs: Tabs): Promise<SheetHeaderMaps> {
  return {
    customers: await resolveHeaders(tabs.customers, CUSTOMER_HEADERS),
    messages: await resolveHeaders(tabs.messages, MESSAGE_HEADERS),
  };
}

/**
 * Consent + message log backed by a spreadsheet: a customers tab and a messages
 * tab with loosely-named headers. Every lookup is a full scan in row order; the
 * first matching row wins.
 */
export class SheetsConsentStore implements ConsentBackend {
  private readonly clock: Clock;

  constructor(
    private readonly tabs: Tabs,
    private readonly headerMaps: SheetHeaderMaps,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async recordUnsubscribe(phone: string): Promise<void> {
    await this.upsertCustomer(phone, { dnc: "TRUE", optout_date: isoNow(this.clock) });
    logger.info("[UNSUBSCRIBE] sheet updated", { phone });
  }

  async recordResubscribe(phone: string): Promise<void> {
    await this.upsertCustomer(phone, {
      dnc: "FALSE",
      optin_source: "Resubscribe",
      optin_date: isoNow(this.clock),
    });
    logger.info("[RESUBSCRIBE] sheet updated", { phone });
  }

  async findCustomer(phone: string): Promise<CustomerRecord | null> {
    const rows = await this.tabs.customers.readRows();
    const found = this.findCustomerRow(rows, phone);
    if (!found) return null;

    const headers = rows[0] ?? [];
    const map = this.headerMaps.customers;
    const get = (field: CustomerField) => cell(found.row, headers, map[field]);
    return {
      phone: get("phone"),
      name: get("name") || null,
      dnc: parseBool(get("dnc")),
      optinDate: get("optin_date") || null,
      optinSource: get("optin_source") || null,
      optoutDate: get("optout_date") || null,
    };
  }

  async logInbound(phone: string, body: string, sid: string): Promise<void> {
    await this.appendMessage({
      date: isoNow(this.clock),
      phone,
      type: "inbound",
      message: body,
      sid,
      status: "received",
      error: "",
    });
  }

  async recordDeliveryStatus(update: DeliveryStatusUpdate): Promise<void> {
    const tab = this.tabs.messages;
    const map = this.headerMaps.messages;
    const rows = await tab.readRows();
    const headers = rows[0] ?? [];
    const date = isoNow(this.clock);

    // Without a sid (or a sid column) every unlabelled row would match.
    const matchable = update.sid.trim() !== "" && map.sid !== undefined;
    let updated = 0;
    for (let i = 1; matchable && i < rows.length; i++) {
      if (cell(rows[i], headers, map.sid) !== update.sid) continue;
      const next = applyRowUpdates(headers, rows[i], map, MESSAGE_HEADERS, {
        status: update.status,
        error: update.error,
        date,
      });
      await tab.updateRow(i + 1, next);
      updated += 1;
    }

    if (updated > 0) {
      logger.info("Delivery status updated", { sid: update.sid, status: update.status, rows: updated });
      return;
    }

    await this.appendMessage({
      date,
      phone: update.phone,
      type: "status-update",
      message: "",
      sid: update.sid,
      status: update.status,
      error: update.error,
    });
    logger.info("Delivery status recorded for unseen sid", { sid: update.sid, status: update.status });
  }

  async findMessages(sid: string): Promise<MessageRecord[]> {
    const rows = await this.tabs.messages.readRows();
    const headers = rows[0] ?? [];
    const map = this.headerMaps.messages;

    return rows
      .slice(1)
      .filter((row) => cell(row, headers, map.sid) === sid)
      .map((row) => {
        const get = (field: MessageField) => cell(row, headers, map[field]);
        return {
          sid: get("sid"),
          date: get("date"),
          phone: get("phone"),
          type: asMessageType(get("type")),
          message: get("message"),
          status: get("status"),
          error: get("error"),
        };
      });
  }

  private findCustomerRow(rows: string[][], phone: string): { rowNumber: number; row: string[] } | null {
    const headers = rows[0] ?? [];
    const phoneHeader = this.headerMaps.customers.phone;
    for (let i = 1; i < rows.length; i++) {
      const stored = cell(rows[i], headers, phoneHeader);
      if (stored && phonesMatch(phone, stored)) {
        return { rowNumber: i + 1, row: rows[i] };
      }
    }
    return null;
  }

  private async upsertCustomer(phone: string, updates: Partial<Record<CustomerField, string>>): Promise<void> {
    const tab = this.tabs.customers;
    const map = this.headerMaps.customers;
    if (map.phone === undefined) {
      throw new Error(`Sheet "${tab.title}" has no phone column; cannot record consent for ${phone}`);
    }

    const rows = await tab.readRows();
    const headers = rows[0] ?? [];
    const found = this.findCustomerRow(rows, phone);

    if (found) {
      await tab.updateRow(found.rowNumber, applyRowUpdates(headers, found.row, map, CUSTOMER_HEADERS, updates));
      return;
    }

    logger.info("Customer not in sheet; appending", { phone });
    await tab.appendRow(applyRowUpdates(headers, [], map, CUSTOMER_HEADERS, { ...updates, phone }));
  }

  private async appendMessage(fields: Record<MessageField, string>): Promise<void> {
    const tab = this.tabs.messages;
    const rows = await tab.readRows();
    const headers = rows[0] ?? [];
    await tab.appendRow(applyRowUpdates(headers, [], this.headerMaps.messages, MESSAGE_HEADERS, fields));
  }
}
