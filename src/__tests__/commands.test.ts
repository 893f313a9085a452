import { describe, expect, it, vi } from "vitest";

import { createCommandHandler, detectCommand } from "../commands";
import { GOOGLE_SHEET_MIME, type SpreadsheetApi } from "../googleSheets";

function fakeApi(overrides: Partial<SpreadsheetApi> = {}): SpreadsheetApi {
  return {
    listFiles: vi.fn().mockResolvedValue({ files: [] }),
    getSpreadsheet: vi.fn().mockResolvedValue({ sheets: [{ properties: { title: "Answers" } }] }),
    getValues: vi.fn().mockResolvedValue({ values: [] }),
    ...overrides,
  };
}

describe("commands", () => {
  describe("detectCommand", () => {
    it("recognises listing phrases in English and Portuguese", () => {
      expect(detectCommand("Please LIST SPREADSHEETS")).toBe("list-spreadsheets");
      expect(detectCommand("Liste as planilhas disponíveis")).toBe("list-spreadsheets");
    });

    it("recognises response phrases", () => {
      expect(detectCommand("show me the spreadsheet responses")).toBe("show-responses");
      expect(detectCommand("Mostre as respostas da planilha")).toBe("show-responses");
    });

    it("leaves other prompts to the model", () => {
      expect(detectCommand("What was total revenue last month?")).toBeNull();
    });
  });

  describe("createCommandHandler", () => {
    it("returns null for ordinary prompts", async () => {
      await expect(createCommandHandler(fakeApi())("hello")).resolves.toBeNull();
    });

    it("explains when Drive is unavailable", async () => {
      const reply = await createCommandHandler(undefined)("list spreadsheets");
      expect(reply).toBe(
        "Google Drive is not available: the service account credentials did not pass the check. Run /recheck after fixing them."
      );
    });

    it("lists spreadsheets with ids and modified times", async () => {
      const api = fakeApi({
        listFiles: vi.fn().mockResolvedValue({
          files: [
            { id: "s1", name: "Sales", mimeType: GOOGLE_SHEET_MIME, modifiedTime: "2024-10-19T14:20:00.000Z" },
            { id: "x1", name: "Legacy.xlsx", mimeType: "application/vnd.ms-excel" },
          ],
        }),
      });

      const reply = await createCommandHandler(api, "folder-1")("list spreadsheets");

      expect(reply).toBe(
        "**Found 2 spreadsheet(s) in Google Drive:**\n\n" +
          "1. **Sales**\n   - ID: `s1`\n   - Modified: 2024-10-19T14:20:00.000Z\n\n" +
          "2. **Legacy.xlsx** [Excel]\n   - ID: `x1`\n   - Modified: N/A\n\n"
      );
      expect(api.listFiles).toHaveBeenCalledWith(
        expect.objectContaining({ q: expect.stringContaining("'folder-1' in parents") })
      );
    });

    it("previews the first three responses of the first Google Sheet", async () => {
      const api = fakeApi({
        listFiles: vi.fn().mockResolvedValue({
          files: [
            { id: "x1", name: "Legacy.xlsx", mimeType: "application/vnd.ms-excel" },
            { id: "s1", name: "Survey", mimeType: GOOGLE_SHEET_MIME },
          ],
        }),
        getValues: vi.fn().mockResolvedValue({
          values: [["Name"], ["Ana"], ["Bruno"], ["Carla"], ["Davi"]],
        }),
      });

      const reply = await createCommandHandler(api)("spreadsheet responses");

      expect(reply).toBe(
        "**Responses from spreadsheet 'Survey':**\n\nTotal responses: **4**\n\n" +
          "**Response 1:**\n- Name: Ana\n\n" +
          "**Response 2:**\n- Name: Bruno\n\n" +
          "**Response 3:**\n- Name: Carla\n\n" +
          "_... and 1 more response(s)._"
      );
      expect(api.getValues).toHaveBeenCalledWith({ spreadsheetId: "s1", range: "'Answers'!A:Z" });
    });

    it("does not convert Excel-only results", async () => {
      const api = fakeApi({
        listFiles: vi.fn().mockResolvedValue({
          files: [{ id: "x1", name: "Legacy.xlsx", mimeType: "application/vnd.ms-excel" }],
        }),
      });

      const reply = await createCommandHandler(api)("respostas da planilha");

      expect(reply).toBe(
        'Only Excel/CSV files are available (first: "Legacy.xlsx"). Convert one to a Google Sheet in Drive to read its responses.'
      );
      expect(api.getValues).not.toHaveBeenCalled();
    });

    it("turns Drive errors into a reply", async () => {
      const api = fakeApi({ listFiles: vi.fn().mockRejectedValue(new Error("quota exceeded")) });
      await expect(createCommandHandler(api)("list spreadsheets")).resolves.toBe(
        "Error listing spreadsheets: quota exceeded"
      );
    });
  });
});
