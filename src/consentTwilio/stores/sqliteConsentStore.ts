import Database from "better-sqlite3";
import logger from "../../utils/logger";
import { MIN_SUFFIX_MATCH_DIGITS, phoneDigits } from "../../utils/phoneNumber";
import { isoNow, systemClock, type Clock } from "../../utils/timeUtils";
import type { ConsentBackend, CustomerRecord, DeliveryStatusUpdate, MessageRecord, MessageType } from "../types";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS customers (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  phone        TEXT NOT NULL,
  phone_digits TEXT NOT NULL UNIQUE,
  name         TEXT,
  dnc          INTEGER NOT NULL DEFAULT 0,
  optin_date   TEXT,
  optin_source TEXT,
  optout_date  TEXT
);

CREATE TABLE IF NOT EXISTS messages (
  id      INTEGER PRIMARY KEY AUTOINCREMENT,
  date    TEXT,
  phone   TEXT,
  type    TEXT,
  message TEXT,
  sid     TEXT,
  status  TEXT,
  error   TEXT
);

CREATE INDEX IF NOT EXISTS idx_messages_sid ON messages (sid);
`;

// Same rule as phonesMatch(): equal digits, or a suffix either way when the
// shorter side is long enough. Earliest row wins.
const FIND_CUSTOMER_SQL = `
SELECT id, phone, name, dnc, optin_date, optin_source, optout_date
FROM customers
WHERE phone_digits = @digits
   OR (
     min(length(phone_digits), length(@digits)) >= @minDigits
     AND (
       substr(phone_digits, -length(@digits)) = @digits
       OR substr(@digits, -length(phone_digits)) = phone_digits
     )
   )
ORDER BY id ASC
LIMIT 1
`;

type CustomerRow = {
  id: number;
  phone: string;
  name: string | null;
  dnc: number;
  optin_date: string | null;
  optin_source: string | null;
  optout_date: string | null;
};

type MessageRow = {
  sid: string | null;
  date: string | null;
  phone: string | null;
  type: string | null;
  message: string | null;
  status: string | null;
  error: string | null;
};

type ConsentUpdate = {
  dnc: 0 | 1;
  optin_date?: string;
  optin_source?: string;
  optout_date?: string;
};

function asMessageType(value: string | null): MessageType | "" {
  return value === "inbound" || value === "outbound" || value === "status-update" ? value : "";
}

/**
 * Consent + message log in an embedded SQLite file.
 *
 * Each operation opens its own connection and closes it when done, so no handle
 * is ever shared between concurrent background tasks.
 */
export class SqliteConsentStore implements ConsentBackend {
  private readonly clock: Clock;

  constructor(
    private readonly dbPath: string,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** Creates tables and indexes if they don't exist yet. Safe to call on every boot. */
  initialize(): void {
    this.withConnection((db) => {
      db.pragma("journal_mode = WAL");
      db.exec(SCHEMA);
    });
    logger.info("SQLite consent store ready", { dbPath: this.dbPath });
  }

  async recordUnsubscribe(phone: string): Promise<void> {
    this.upsertCustomer(phone, { dnc: 1, optout_date: isoNow(this.clock) });
    logger.info("[UNSUBSCRIBE] customer updated", { phone });
  }

  async recordResubscribe(phone: string): Promise<void> {
    this.upsertCustomer(phone, { dnc: 0, optin_source: "Resubscribe", optin_date: isoNow(this.clock) });
    logger.info("[RESUBSCRIBE] customer updated", { phone });
  }

  async findCustomer(phone: string): Promise<CustomerRecord | null> {
    const digits = phoneDigits(phone);
    if (!digits) return null;

    const row = this.withConnection((db) => this.selectCustomer(db, digits));
    if (!row) return null;
    return {
      phone: row.phone,
      name: row.name,
      dnc: row.dnc === 1,
      optinDate: row.optin_date,
      optinSource: row.optin_source,
      optoutDate: row.optout_date,
    };
  }

  async logInbound(phone: string, body: string, sid: string): Promise<void> {
    this.withConnection((db) => {
      db.prepare(
        `INSERT INTO messages (date, phone, type, message, sid, status, error)
         VALUES (@date, @phone, 'inbound', @message, @sid, 'received', '')`
      ).run({ date: isoNow(this.clock), phone, message: body, sid });
    });
  }

  async recordDeliveryStatus(update: DeliveryStatusUpdate): Promise<void> {
    const date = isoNow(this.clock);
    const changes = this.withConnection((db) =>
      db.transaction(() => {
        // A blank sid would match every inbound row logged without one.
        if (update.sid.trim()) {
          const res = db
            .prepare(`UPDATE messages SET status = @status, error = @error, date = @date WHERE sid = @sid`)
            .run({ status: update.status, error: update.error, date, sid: update.sid });
          if (res.changes > 0) return res.changes;
        }

        db.prepare(
          `INSERT INTO messages (date, phone, type, message, sid, status, error)
           VALUES (@date, @phone, 'status-update', '', @sid, @status, @error)`
        ).run({ date, phone: update.phone, sid: update.sid, status: update.status, error: update.error });
        return 0;
      })()
    );

    if (changes > 0) {
      logger.info("Delivery status updated", { sid: update.sid, status: update.status, rows: changes });
    } else {
      logger.info("Delivery status recorded for unseen sid", { sid: update.sid, status: update.status });
    }
  }

  async findMessages(sid: string): Promise<MessageRecord[]> {
    const rows = this.withConnection((db) =>
      db
        .prepare<[string], MessageRow>(
          `SELECT sid, date, phone, type, message, status, error FROM messages WHERE sid = ? ORDER BY id ASC`
        )
        .all(sid)
    );
    return rows.map((row) => ({
      sid: row.sid ?? "",
      date: row.date ?? "",
      phone: row.phone ?? "",
      type: asMessageType(row.type),
      message: row.message ?? "",
      status: row.status ?? "",
      error: row.error ?? "",
    }));
  }

  private selectCustomer(db: Database.Database, digits: string): CustomerRow | undefined {
    return db
      .prepare<{ digits: string; minDigits: number }, CustomerRow>(FIND_CUSTOMER_SQL)
      .get({ digits, minDigits: MIN_SUFFIX_MATCH_DIGITS });
  }

  private upsertCustomer(phone: string, update: ConsentUpdate): void {
    const digits = phoneDigits(phone);
    if (!digits) {
      throw new Error(`Cannot record consent for empty phone "${phone}"`);
    }

    this.withConnection((db) =>
      db.transaction(() => {
        const existing = this.selectCustomer(db, digits);
        const params = {
          dnc: update.dnc,
          optin_date: update.optin_date ?? null,
          optin_source: update.optin_source ?? null,
          optout_date: update.optout_date ?? null,
        };

        if (existing) {
          // COALESCE keeps the columns this event doesn't touch.
          db.prepare(
            `UPDATE customers
             SET dnc = @dnc,
                 optin_date = COALESCE(@optin_date, optin_date),
                 optin_source = COALESCE(@optin_source, optin_source),
                 optout_date = COALESCE(@optout_date, optout_date)
             WHERE id = @id`
          ).run({ ...params, id: existing.id });
          return;
        }

        db.prepare(
          `INSERT INTO customers (phone, phone_digits, dnc, optin_date, optin_source, optout_date)
           VALUES (@phone, @digits, @dnc, @optin_date, @optin_source, @optout_date)`
        ).run({ ...params, phone, digits });
      })()
    );
  }

  private withConnection<T>(fn: (db: Database.Database) => T): T {
    const db = new Database(this.dbPath, { timeout: 5000 });
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }
}
