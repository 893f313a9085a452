import { google, type drive_v3, type sheets_v4 } from "googleapis";
import type { JWT } from "google-auth-library";

import { createLogger } from "./logger";
import {
  SpreadsheetFile,
  type SheetResponse,
  type SpreadsheetInfo,
  type TServiceAccountCredential,
  type TSheetTab,
  type TSpreadsheetFile,
} from "./schemas";

const log = createLogger("sheets");

export const DRIVE_READONLY_SCOPE = "https://www.googleapis.com/auth/drive.readonly";
export const SHEETS_READONLY_SCOPE = "https://www.googleapis.com/auth/spreadsheets.readonly";

export const GOOGLE_SHEET_MIME = "application/vnd.google-apps.spreadsheet";
const TABULAR_MIME_TYPES = [
  GOOGLE_SHEET_MIME,
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/vnd.ms-excel",
  "text/csv",
];

const FILE_FIELDS = "nextPageToken, files(id, name, webViewLink, createdTime, modifiedTime, parents, mimeType)";
const MAX_PAGE_SIZE = 200;

/**
 * The Drive and Sheets calls this module makes, kept narrow so tests can
 * stand in for Google without the network.
 */
export interface SpreadsheetApi {
  listFiles(params: drive_v3.Params$Resource$Files$List): Promise<drive_v3.Schema$FileList>;
  getSpreadsheet(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<sheets_v4.Schema$Spreadsheet>;
  getValues(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<sheets_v4.Schema$ValueRange>;
}

export class SpreadsheetNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpreadsheetNotFoundError";
  }
}

export class PermissionDeniedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PermissionDeniedError";
  }
}

/** HTTP status from a gaxios error, whichever field carries it. */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("response" in error && typeof error.response === "object" && error.response !== null) {
    const response = error.response;
    if ("status" in response && typeof response.status === "number") {
      return response.status;
    }
  }
  if ("code" in error) {
    const code = Number(error.code);
    if (Number.isInteger(code) && code >= 100 && code < 600) {
      return code;
    }
  }
  return undefined;
}

function isRetryable(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status === 429 || (status !== undefined && status >= 500 && status < 600)) {
    return true;
  }
  const message = error instanceof Error ? error.message : "";
  return message.includes("ECONNRESET") || message.includes("ETIMEDOUT");
}

/**
 * Retry wrapper with exponential backoff for transient failures
 * (429, 5xx, connection resets and timeouts).
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    baseDelay?: number;
    operationName?: string;
  } = {}
): Promise<T> {
  const { maxRetries = 4, baseDelay = 1000, operationName = "API call" } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt > maxRetries) {
        throw error;
      }

      const delay = baseDelay * Math.pow(2, attempt - 1);
      const reason = error instanceof Error ? error.message : String(error);
      log.warn(
        `${operationName} failed (attempt ${attempt}/${maxRetries + 1}): ${reason}. Retrying in ${delay}ms...`
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

export function createAuthClient(credential: TServiceAccountCredential): JWT {
  return new google.auth.JWT({
    email: credential.client_email,
    key: credential.private_key,
    scopes: [DRIVE_READONLY_SCOPE, SHEETS_READONLY_SCOPE],
  });
}

export function createSpreadsheetApi(credential: TServiceAccountCredential): SpreadsheetApi {
  const auth = createAuthClient(credential);
  const drive = google.drive({ version: "v3", auth });
  const sheets = google.sheets({ version: "v4", auth });

  return {
    listFiles: async (params) => (await drive.files.list(params)).data,
    getSpreadsheet: async (params) => (await sheets.spreadsheets.get(params)).data,
    getValues: async (params) => (await sheets.spreadsheets.values.get(params)).data,
  };
}

export type ListSpreadsheetsOptions = {
  maxResults?: number;
  folderId?: string;
  /** Also list xlsx, xls and csv files, not only Google Sheets. */
  includeExcel?: boolean;
};

export function buildSpreadsheetQuery(options: Pick<ListSpreadsheetsOptions, "folderId" | "includeExcel">): string {
  const mimeTypes = options.includeExcel ? TABULAR_MIME_TYPES : [GOOGLE_SHEET_MIME];
  const mimeClause = mimeTypes.map((mime) => `mimeType='${mime}'`).join(" or ");
  let query = mimeTypes.length > 1 ? `(${mimeClause}) and trashed=false` : `${mimeClause} and trashed=false`;
  if (options.folderId) {
    query += ` and '${options.folderId.replace(/'/g, "\\'")}' in parents`;
  }
  return query;
}

export async function listSpreadsheets(
  api: SpreadsheetApi,
  options: ListSpreadsheetsOptions = {}
): Promise<TSpreadsheetFile[]> {
  const { maxResults = 100, folderId, includeExcel = false } = options;
  const q = buildSpreadsheetQuery({ folderId, includeExcel });
  log.debug(`Listing spreadsheets${folderId ? ` in folder ${folderId}` : ""}...`);

  const files: TSpreadsheetFile[] = [];
  let pageToken: string | undefined;

  try {
    while (true) {
      const pageSize = maxResults > 0 ? Math.min(MAX_PAGE_SIZE, maxResults - files.length) : MAX_PAGE_SIZE;
      if (pageSize <= 0) break;

      const page = await withRetry(
        () =>
          api.listFiles({
            q,
            pageSize,
            fields: FILE_FIELDS,
            orderBy: "modifiedTime desc",
            supportsAllDrives: true,
            includeItemsFromAllDrives: true,
            corpora: "allDrives",
            ...(pageToken ? { pageToken } : {}),
          }),
        { operationName: "Drive file search" }
      );

      for (const file of page.files ?? []) {
        const parsed = SpreadsheetFile.safeParse(file);
        if (parsed.success) {
          files.push(parsed.data);
        }
      }

      pageToken = page.nextPageToken ?? undefined;
      if (!pageToken || (maxResults > 0 && files.length >= maxResults)) break;
    }
  } catch (error) {
    const status = httpStatusOf(error);
    if (status === 404) {
      log.warn("No files found, or the service account cannot see them.");
      return [];
    }
    if (status === 403) {
      throw new PermissionDeniedError(
        "Permission denied listing Google Drive files. Check the service account's access."
      );
    }
    throw error;
  }

  log.debug(`Found ${files.length} spreadsheet(s)`);
  return maxResults > 0 ? files.slice(0, maxResults) : files;
}

function translateSheetError(error: unknown, what: string): unknown {
  const status = httpStatusOf(error);
  if (status === 404) {
    return new SpreadsheetNotFoundError(`${what} not found`);
  }
  if (status === 403) {
    return new PermissionDeniedError(`No permission to read ${what}. Share it with the service account.`);
  }
  return error;
}

export async function getSpreadsheetInfo(api: SpreadsheetApi, spreadsheetId: string): Promise<SpreadsheetInfo> {
  let spreadsheet: sheets_v4.Schema$Spreadsheet;
  try {
    spreadsheet = await withRetry(() => api.getSpreadsheet({ spreadsheetId }), {
      operationName: "Get spreadsheet",
    });
  } catch (error) {
    throw translateSheetError(error, `Spreadsheet ${spreadsheetId}`);
  }

  const sheets: TSheetTab[] = (spreadsheet.sheets ?? []).map((sheet) => {
    const props = sheet.properties ?? {};
    return {
      title: props.title ?? "Sheet1",
      sheetId: props.sheetId ?? 0,
      rowCount: props.gridProperties?.rowCount ?? 0,
      columnCount: props.gridProperties?.columnCount ?? 0,
    };
  });

  const info = { title: spreadsheet.properties?.title ?? "Untitled", sheets };
  log.debug(`Spreadsheet "${info.title}" has ${sheets.length} tab(s)`);
  return info;
}

/**
 * First row is the header; every later row becomes a header → cell
 * record, with missing trailing cells filled with "".
 */
export function rowsToResponses(values: unknown[][]): SheetResponse[] {
  if (values.length === 0) {
    return [];
  }
  const [headerRow = [], ...rows] = values;
  const headers = headerRow.map((cell) => String(cell ?? ""));

  return rows.map((row) => {
    const record: SheetResponse = {};
    headers.forEach((header, index) => {
      const cell = row[index];
      record[header] = cell === undefined || cell === null ? "" : String(cell);
    });
    return record;
  });
}

/** A1 range for a tab, quoting the tab name the way Sheets expects. */
export function sheetRange(sheetName: string, rangeNotation: string): string {
  return `'${sheetName.replace(/'/g, "''")}'!${rangeNotation}`;
}

export async function getSheetResponses(
  api: SpreadsheetApi,
  spreadsheetId: string,
  sheetName?: string,
  rangeNotation = "A:Z"
): Promise<SheetResponse[]> {
  let tab = sheetName;
  if (tab === undefined) {
    const info = await getSpreadsheetInfo(api, spreadsheetId);
    const first = info.sheets[0];
    if (!first) {
      log.warn(`Spreadsheet ${spreadsheetId} has no tabs`);
      return [];
    }
    tab = first.title;
  }

  const range = sheetRange(tab, rangeNotation);
  log.debug(`Reading responses from ${spreadsheetId} (${range})...`);

  let valueRange: sheets_v4.Schema$ValueRange;
  try {
    valueRange = await withRetry(() => api.getValues({ spreadsheetId, range }), {
      operationName: "Read sheet values",
    });
  } catch (error) {
    throw translateSheetError(error, `Spreadsheet or tab "${tab}"`);
  }

  const responses = rowsToResponses(valueRange.values ?? []);
  log.debug(`Loaded ${responses.length} response(s)`);
  return responses;
}
