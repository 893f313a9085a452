import { spreadsheetLabel } from "./assistant";
import {
  GOOGLE_SHEET_MIME,
  getSheetResponses,
  listSpreadsheets,
  type SpreadsheetApi,
} from "./googleSheets";

export type LocalCommand = "list-spreadsheets" | "show-responses";

const LIST_PHRASES = [
  "list spreadsheets",
  "list the spreadsheets",
  "show spreadsheets",
  "available spreadsheets",
  "liste as planilhas",
  "listar planilhas",
  "mostrar planilhas",
  "planilhas disponíveis",
];

const RESPONSES_PHRASES = [
  "spreadsheet responses",
  "responses from the spreadsheet",
  "respostas da planilha",
  "respostas do planilha",
];

const PREVIEW_COUNT = 3;

export function detectCommand(prompt: string): LocalCommand | null {
  const text = prompt.toLowerCase().trim();
  if (LIST_PHRASES.some((phrase) => text.includes(phrase))) {
    return "list-spreadsheets";
  }
  if (RESPONSES_PHRASES.some((phrase) => text.includes(phrase))) {
    return "show-responses";
  }
  return null;
}

async function listCommand(api: SpreadsheetApi, folderId?: string): Promise<string> {
  const sheets = await listSpreadsheets(api, { includeExcel: true, folderId });
  if (sheets.length === 0) {
    return "No spreadsheets found in Google Drive.";
  }

  let response = `**Found ${sheets.length} spreadsheet(s) in Google Drive:**\n\n`;
  sheets.forEach((sheet, index) => {
    response += `${index + 1}. **${sheet.name}**${spreadsheetLabel(sheet)}\n`;
    response += `   - ID: \`${sheet.id}\`\n`;
    response += `   - Modified: ${sheet.modifiedTime ?? "N/A"}\n\n`;
  });
  return response;
}

async function responsesCommand(api: SpreadsheetApi, folderId?: string): Promise<string> {
  const sheets = await listSpreadsheets(api, { includeExcel: true, folderId });
  if (sheets.length === 0) {
    return "No spreadsheets found in Google Drive.";
  }

  const candidate = sheets.find((sheet) => sheet.mimeType === GOOGLE_SHEET_MIME);
  if (!candidate) {
    // Converting xlsx/csv needs a write scope, which this assistant never requests.
    return `Only Excel/CSV files are available (first: "${sheets[0]?.name}"). Convert one to a Google Sheet in Drive to read its responses.`;
  }

  const responses = await getSheetResponses(api, candidate.id);
  if (responses.length === 0) {
    return `No responses found in spreadsheet '${candidate.name}'.`;
  }

  let response = `**Responses from spreadsheet '${candidate.name}':**\n\nTotal responses: **${responses.length}**\n\n`;
  responses.slice(0, PREVIEW_COUNT).forEach((row, index) => {
    response += `**Response ${index + 1}:**\n`;
    for (const [key, value] of Object.entries(row)) {
      response += `- ${key}: ${value}\n`;
    }
    response += "\n";
  });

  if (responses.length > PREVIEW_COUNT) {
    response += `_... and ${responses.length - PREVIEW_COUNT} more response(s)._`;
  }
  return response;
}

/**
 * Command handler for a ChatSession. Without a SpreadsheetApi the Drive
 * commands explain why they are unavailable instead of reaching the LLM.
 */
export function createCommandHandler(api: SpreadsheetApi | undefined, folderId?: string) {
  return async (prompt: string): Promise<string | null> => {
    const command = detectCommand(prompt);
    if (!command) {
      return null;
    }
    if (!api) {
      return "Google Drive is not available: the service account credentials did not pass the check. Run /recheck after fixing them.";
    }

    try {
      return command === "list-spreadsheets"
        ? await listCommand(api, folderId)
        : await responsesCommand(api, folderId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return command === "list-spreadsheets"
        ? `Error listing spreadsheets: ${message}`
        : `Error reading responses: ${message}`;
    }
  };
}
