export const CUSTOMER_FIELDS = ["phone", "name", "dnc", "optin_date", "optin_source", "optout_date"] as const;
export type CustomerField = (typeof CUSTOMER_FIELDS)[number];

export const MESSAGE_FIELDS = ["date", "phone", "type", "message", "sid", "status", "error"] as const;
export type MessageField = (typeof MESSAGE_FIELDS)[number];

/** Logical field -> the actual header text found in the sheet. Built once, never mutated. */
export type HeaderMap<F extends string> = Readonly<Partial<Record<F, string>>>;

export type HeaderSchema<F extends string> = {
  fields: readonly F[];
  aliases: Readonly<Record<F, readonly string[]>>;
};

// Spellings seen in hand-maintained sheets. Compared after normalizeHeader().
export const CUSTOMER_HEADERS: HeaderSchema<CustomerField> = {
  fields: CUSTOMER_FIELDS,
  aliases: {
    phone: ["phone", "phone number", "whatsapp", "telefono", "teléfono"],
    name: ["name", "customer name", "full name", "nombre"],
    dnc: ["dnc", "do_not contact", "do not contact", "do_not_contact", "donotcontact"],
    optin_date: ["opt in date", "opt_in date", "opt_in_date", "optindate"],
    optin_source: ["opt_in source", "opt in source", "optinsource"],
    optout_date: ["opt out date", "opt_out date", "opt_out_date", "optoutdate"],
  },
};

export const MESSAGE_HEADERS: HeaderSchema<MessageField> = {
  fields: MESSAGE_FIELDS,
  aliases: {
    date: ["date", "timestamp", "created at"],
    phone: ["phone", "phone number", "to"],
    type: ["type", "direction"],
    message: ["message", "body", "text"],
    sid: ["sid", "message sid", "messagesid"],
    status: ["status", "message status"],
    error: ["error", "error code", "error message"],
  },
};

/** Lower-case and keep letters/digits only: "Opt-In Date" => "optindate". */
export function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

/**
 * Resolves each logical field to the first live header that matches one of its
 * aliases. Fields with no matching header are left out of the map.
 */
export function buildHeaderMap<F extends string>(
  headers: readonly string[],
  schema: HeaderSchema<F>
): HeaderMap<F> {
  const normToActual = new Map<string, string>();
  for (const header of headers) {
    const norm = normalizeHeader(header);
    if (norm && !normToActual.has(norm)) {
      normToActual.set(norm, header);
    }
  }

  const result: Partial<Record<F, string>> = {};
  for (const field of schema.fields) {
    for (const variant of schema.aliases[field]) {
      const actual = normToActual.get(normalizeHeader(variant));
      if (actual !== undefined) {
        result[field] = actual;
        break;
      }
    }
  }
  return Object.freeze(result);
}

export function missingFields<F extends string>(map: HeaderMap<F>, schema: HeaderSchema<F>): F[] {
  return schema.fields.filter((field) => map[field] === undefined);
}

/**
 * Applies logical-field updates onto a row laid out by `headers`. Updates for
 * fields the map does not know (or whose header vanished) are dropped.
 */
export function applyRowUpdates<F extends string>(
  headers: readonly string[],
  row: readonly string[],
  map: HeaderMap<F>,
  schema: HeaderSchema<F>,
  updates: Partial<Record<F, string>>
): string[] {
  const next = headers.map((_, i) => row[i] ?? "");
  for (const field of schema.fields) {
    const value = updates[field];
    const actual = map[field];
    if (value === undefined || actual === undefined) continue;
    const idx = headers.indexOf(actual);
    if (idx >= 0) next[idx] = value;
  }
  return next;
}
