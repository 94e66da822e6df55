import type { StoreConfig } from "../../config/env";
import logger from "../../utils/logger";
import type { ConsentBackend } from "../types";
import {
  createSheetsClient,
  extractSpreadsheetId,
  GoogleSheetTab,
  parseServiceAccountJson,
} from "./sheetTab";
import { resolveSheetHeaderMaps, SheetsConsentStore } from "./sheetsConsentStore";
import { SqliteConsentStore } from "./sqliteConsentStore";

/**
 * Builds the configured backend and runs its one-time startup work
 * (schema creation for sqlite, header resolution for sheets).
 */
export async function createConsentBackend(config: StoreConfig): Promise<ConsentBackend> {
  if (config.kind === "sqlite") {
    const store = new SqliteConsentStore(config.dbPath);
    store.initialize();
    return store;
  }

  const spreadsheetId = extractSpreadsheetId(config.sheetUrl);
  if (!spreadsheetId) {
    throw new Error(`SHEET_URL does not look like a Google Sheets URL: ${config.sheetUrl}`);
  }

  const sheets = createSheetsClient(parseServiceAccountJson(config.serviceAccountJson));
  const tabs = {
    customers: new GoogleSheetTab(sheets, spreadsheetId, config.customersSheet),
    messages: new GoogleSheetTab(sheets, spreadsheetId, config.messagesSheet),
  };
  const headerMaps = await resolveSheetHeaderMaps(tabs);
  logger.info("Sheets consent store ready", { spreadsheetId, headerMaps });
  return new SheetsConsentStore(tabs, headerMaps);
}
