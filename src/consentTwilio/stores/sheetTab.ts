import { google, type sheets_v4 } from "googleapis";

/**
 * The slice of a spreadsheet tab the sheets store needs. Row numbers are
 * 1-based like the sheet itself; row 1 is the header row.
 */
export interface SheetTab {
  readonly title: string;
  /** Every row, header first. Cells are formatted strings; short rows are not padded. */
  readRows(): Promise<string[][]>;
  updateRow(rowNumber: number, values: string[]): Promise<void>;
  appendRow(values: string[]): Promise<void>;
}

export type ServiceAccountCredentials = {
  client_email: string;
  private_key: string;
};

const SHEETS_SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

export function extractSpreadsheetId(url: string): string | null {
  const match = url.match(/\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/);
  return match ? match[1] : null;
}

export function parseServiceAccountJson(raw: string): ServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`SERVICE_ACCOUNT_JSON is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("client_email" in parsed) ||
    !("private_key" in parsed) ||
    typeof parsed.client_email !== "string" ||
    typeof parsed.private_key !== "string"
  ) {
    throw new Error("SERVICE_ACCOUNT_JSON is missing client_email/private_key");
  }
  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

/** One authorized Sheets client, shared by every tab and every request. */
export function createSheetsClient(credentials: ServiceAccountCredentials): sheets_v4.Sheets {
  const auth = new google.auth.GoogleAuth({ credentials, scopes: SHEETS_SCOPES });
  return google.sheets({ version: "v4", auth });
}

function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export type CellValue = string | boolean;

/**
 * Rows are written RAW: inbound text starting with "=" stays text and phones
 * keep their "+". Only TRUE/FALSE are sent as booleans so checkbox columns
 * still tick.
 */
export function toCellValues(values: readonly string[]): CellValue[] {
  return values.map((value) => (value === "TRUE" ? true : value === "FALSE" ? false : value));
}

export function updateRowRequest(
  spreadsheetId: string,
  title: string,
  rowNumber: number,
  values: readonly string[]
): sheets_v4.Params$Resource$Spreadsheets$Values$Update {
  return {
    spreadsheetId,
    range: `${quoteTitle(title)}!A${rowNumber}`,
    valueInputOption: "RAW",
    requestBody: { values: [toCellValues(values)] },
  };
}

export function appendRowRequest(
  spreadsheetId: string,
  title: string,
  values: readonly string[]
): sheets_v4.Params$Resource$Spreadsheets$Values$Append {
  return {
    spreadsheetId,
    range: `${quoteTitle(title)}!A1`,
    valueInputOption: "RAW",
    insertDataOption: "INSERT_ROWS",
    requestBody: { values: [toCellValues(values)] },
  };
}

export class GoogleSheetTab implements SheetTab {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    readonly title: string
  ) {}

  async readRows(): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteTitle(this.title),
      valueRenderOption: "FORMATTED_VALUE",
    });
    const values: unknown[][] = res.data.values ?? [];
    return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
  }

  async updateRow(rowNumber: number, values: string[]): Promise<void> {
    await this.sheets.spreadsheets.values.update(updateRowRequest(this.spreadsheetId, this.title, rowNumber, values));
  }

  async appendRow(values: string[]): Promise<void> {
    await this.sheets.spreadsheets.values.append(appendRowRequest(this.spreadsheetId, this.title, values));
  }
}
