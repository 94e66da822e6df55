import path from "path";

export type StoreConfig =
  | { kind: "sqlite"; dbPath: string }
  | {
      kind: "sheets";
      sheetUrl: string;
      serviceAccountJson: string;
      customersSheet: string;
      messagesSheet: string;
    };

export type AppConfig = {
  port: number;
  /** Empty => signature validation disabled (local development). */
  twilioAuthToken: string;
  /** External base URL Twilio signs against, when we sit behind a proxy. */
  publicBaseUrl?: string;
  programName: string;
  backgroundConcurrency: number;
  store: StoreConfig;
};

export const SERVICE_NAME = "whatsapp-consent-webhook";

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, problems: string[]): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    problems.push(`${name} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readStore(env: Env, problems: string[]): StoreConfig {
  const sheetUrl = env.SHEET_URL?.trim() || "";
  const backend = env.CONSENT_BACKEND?.trim().toLowerCase() || (sheetUrl ? "sheets" : "sqlite");

  if (backend === "sqlite") {
    return { kind: "sqlite", dbPath: path.resolve(env.DB_PATH?.trim() || path.join(process.cwd(), "consent.db")) };
  }

  if (backend === "sheets") {
    const serviceAccountJson = env.SERVICE_ACCOUNT_JSON?.trim() || "";
    const missingVars: string[] = [];
    if (!sheetUrl) missingVars.push("SHEET_URL");
    if (!serviceAccountJson) missingVars.push("SERVICE_ACCOUNT_JSON");
    if (missingVars.length > 0) {
      problems.push(`Sheets backend env vars missing: ${missingVars.join(", ")}`);
    }
    return {
      kind: "sheets",
      sheetUrl,
      serviceAccountJson,
      customersSheet: env.CUSTOMERS_SHEET?.trim() || "Customers",
      messagesSheet: env.MESSAGES_SHEET?.trim() || "Messages",
    };
  }

  problems.push(`CONSENT_BACKEND must be "sqlite" or "sheets" (got "${backend}")`);
  return { kind: "sqlite", dbPath: path.resolve("consent.db") };
}

/**
 * Reads configuration from the environment (.env is loaded by index.ts).
 * Throws one error listing every problem found.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const config: AppConfig = {
    port: readInt(env, "PORT", 8080, problems),
    twilioAuthToken: env.TWILIO_AUTH_TOKEN?.trim() || "",
    publicBaseUrl: env.PUBLIC_BASE_URL?.trim().replace(/\/+$/, "") || undefined,
    programName: env.PROGRAM_NAME?.trim() || "our WhatsApp list",
    backgroundConcurrency: readInt(env, "BACKGROUND_CONCURRENCY", 4, problems),
    store: readStore(env, problems),
  };

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  return config;
}
