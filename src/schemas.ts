import { z } from "zod";

/** === Service account credentials === */
export const SERVICE_ACCOUNT_TYPE = "service_account" as const;

export const PEM_PRIVATE_KEY_HEADER = /-----BEGIN (?:RSA |EC |ENCRYPTED )?PRIVATE KEY-----/;

export const FilledString = z.string().regex(/\S/);
export const ServiceAccountType = z.literal(SERVICE_ACCOUNT_TYPE);
export const ClientEmail = z.string().trim().email();
export const PemPrivateKey = z.string().regex(PEM_PRIVATE_KEY_HEADER);

export const ServiceAccountCredential = z
  .object({
    type: ServiceAccountType,
    project_id: z.string().optional(),
    private_key: PemPrivateKey,        // sensitive: never logged or displayed
    client_email: ClientEmail,
  })
  .passthrough();                      // private_key_id, token_uri, etc. kept as-is
export type TServiceAccountCredential = z.infer<typeof ServiceAccountCredential>;

/** Any JSON object, before semantic validation. */
export type CredentialObject = Record<string, unknown>;

/** === Chat === */
export type ChatRole = "system" | "user" | "assistant";

export type TChatMessage = {
  role: ChatRole;
  content: string;
};

/** === Drive / Sheets === */
export const SpreadsheetFile = z.object({
  id: z.string(),
  name: z.string(),
  mimeType: z.string().nullable().optional(),
  webViewLink: z.string().nullable().optional(),
  createdTime: z.string().nullable().optional(),
  modifiedTime: z.string().nullable().optional(),
  parents: z.array(z.string()).nullable().optional(),
});
export type TSpreadsheetFile = z.infer<typeof SpreadsheetFile>;

export type TSheetTab = {
  title: string;
  sheetId: number;
  rowCount: number;
  columnCount: number;
};

export type SpreadsheetInfo = {
  title: string;
  sheets: TSheetTab[];
};

/** One data row keyed by the header row's cells. */
export type SheetResponse = Record<string, string>;
