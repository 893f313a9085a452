#!/usr/bin/env node
import readline from "node:readline";

import { ChatSession, createOpenAIBackend } from "./assistant";
import { createCommandHandler } from "./commands";
import { appConfig, createOpenAIClient, credentialLookup } from "./config";
import { checkCredentials, formatDiagnostic } from "./credentialDiagnostics";
import { createSpreadsheetApi, listSpreadsheets, type SpreadsheetApi } from "./googleSheets";

const HELP = `Commands:
  /recheck  re-run the Google credential check
  /reload   refresh the list of spreadsheets sent to the assistant
  /clear    clear the conversation history
  /help     show this help
  /exit     quit`;

function connectGoogle(): SpreadsheetApi | undefined {
  const check = checkCredentials(credentialLookup());
  console.log(formatDiagnostic(check.diagnostic));
  if (check.source) {
    console.log(`   source: ${check.source.origin}`);
  }
  return check.credential ? createSpreadsheetApi(check.credential) : undefined;
}

async function main() {
  const folderId = appConfig.google.driveFolderId;
  let api = connectGoogle();

  const llm = appConfig.llm;
  if (llm) {
    console.log(`LLM backend: ${llm.provider} (${llm.model})`);
  } else {
    console.log("No LLM backend configured; only spreadsheet commands will answer.");
  }

  const session = new ChatSession({
    backend: llm
      ? createOpenAIBackend({ client: createOpenAIClient(llm), model: llm.model, temperature: llm.temperature })
      : undefined,
    loadSpreadsheets: async () => (api ? listSpreadsheets(api, { includeExcel: true, folderId }) : []),
    handleCommand: (prompt) => createCommandHandler(api, folderId)(prompt),
  });

  console.log(`\n${HELP}\n`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "you> ",
  });
  rl.prompt();

  for await (const rawLine of rl) {
    const line = rawLine.trim();

    if (line === "/exit" || line === "/quit") {
      break;
    }

    if (line === "/help") {
      console.log(HELP);
    } else if (line === "/recheck") {
      api = connectGoogle();
      await session.reloadContext();
    } else if (line === "/reload") {
      const count = await session.reloadContext();
      console.log(`Refreshed • ${count} spreadsheet(s)`);
    } else if (line === "/clear") {
      session.clear();
      console.log("History cleared.");
    } else if (line.length > 0) {
      process.stdout.write("assistant> ");
      await session.send(line, (delta) => process.stdout.write(delta));
      process.stdout.write(`\n\n`);
    }

    rl.prompt();
  }

  rl.close();
  console.log(`${session.messageCount} message(s) in history. Bye.`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exitCode = 1;
});
