import type OpenAI from "openai";

import { createLogger } from "./logger";
import type { TChatMessage, TSpreadsheetFile } from "./schemas";
import { GOOGLE_SHEET_MIME } from "./googleSheets";

const log = createLogger("assistant");

export const HISTORY_WINDOW = 10;
export const CONTEXT_SPREADSHEET_LIMIT = 20;

/** Anything that can turn a message list into a stream of text deltas. */
export interface ChatBackend {
  streamChat(messages: TChatMessage[]): AsyncIterable<string>;
}

type StreamedChunk = {
  choices: Array<{ delta?: { content?: string | null } }>;
};

/** The slice of the OpenAI client the backend calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming
      ): Promise<AsyncIterable<StreamedChunk>>;
    };
  };
}

export type OpenAIBackendOptions = {
  client: ChatCompletionsClient;
  model: string;
  temperature: number;
};

type CompletionMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toCompletionMessage(message: TChatMessage): CompletionMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * Chat completions over the OpenAI SDK. Works for the routing proxy and
 * Gemini as well, since both expose the same wire format.
 */
export function createOpenAIBackend({ client, model, temperature }: OpenAIBackendOptions): ChatBackend {
  return {
    async *streamChat(messages) {
      const stream = await client.chat.completions.create({
        model,
        temperature,
        messages: messages.map(toCompletionMessage),
        stream: true,
      });

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    },
  };
}

export function spreadsheetLabel(file: TSpreadsheetFile): string {
  return file.mimeType && file.mimeType !== GOOGLE_SHEET_MIME ? " [Excel]" : "";
}

export function buildSheetsContext(files: TSpreadsheetFile[]): string {
  if (files.length === 0) {
    return "";
  }
  const lines = files
    .slice(0, CONTEXT_SPREADSHEET_LIMIT)
    .map((file) => `- ${file.name}${spreadsheetLabel(file)} (ID: ${file.id})`);
  return `**Spreadsheets available in Google Drive:**\n${lines.join("\n")}`;
}

export function buildSystemPrompt(sheetsContext: string): string {
  return `You are the data analysis assistant for this workspace.
${sheetsContext ? `\n${sheetsContext}\n` : ""}
You can help the user to:
- analyse data
- answer questions about the spreadsheets above
- produce insights and reports
- process information held in spreadsheets

Be objective and professional. Answer in the language the user writes in.`;
}

export function buildMessages(history: TChatMessage[], sheetsContext: string): TChatMessage[] {
  const recent = history.filter((message) => message.role !== "system").slice(-HISTORY_WINDOW);
  return [{ role: "system", content: buildSystemPrompt(sheetsContext) }, ...recent];
}

export type ContextLoader = () => Promise<TSpreadsheetFile[]>;

export type CommandHandler = (prompt: string) => Promise<string | null>;

export type ChatSessionOptions = {
  /** Undefined when no LLM backend is configured. */
  backend?: ChatBackend;
  /** Undefined when Google credentials are not usable. */
  loadSpreadsheets?: ContextLoader;
  /** Answers a prompt locally, or returns null to fall through to the LLM. */
  handleCommand?: CommandHandler;
};

/**
 * One user's conversation. History and the spreadsheet context cache
 * live here, so nothing leaks between sessions.
 */
export class ChatSession {
  private readonly history: TChatMessage[] = [];
  private sheetsContext: string | null = null;

  constructor(private readonly options: ChatSessionOptions) {}

  get messages(): readonly TChatMessage[] {
    return this.history;
  }

  get messageCount(): number {
    return this.history.length;
  }

  clear(): void {
    this.history.length = 0;
  }

  /** Drops the cached spreadsheet list; returns how many are now visible. */
  async reloadContext(): Promise<number> {
    this.sheetsContext = null;
    const files = await this.fetchSpreadsheets();
    this.sheetsContext = buildSheetsContext(files);
    return files.length;
  }

  async getSheetsContext(): Promise<string> {
    if (this.sheetsContext === null) {
      this.sheetsContext = buildSheetsContext(await this.fetchSpreadsheets());
    }
    return this.sheetsContext;
  }

  private async fetchSpreadsheets(): Promise<TSpreadsheetFile[]> {
    if (!this.options.loadSpreadsheets) {
      return [];
    }
    try {
      return await this.options.loadSpreadsheets();
    } catch (error) {
      log.error("Failed to load spreadsheets from Drive", error);
      return [];
    }
  }

  /**
   * Records the prompt, answers it (locally or through the backend) and
   * records the reply. `onDelta` sees the reply as it streams in.
   */
  async send(prompt: string, onDelta: (delta: string) => void = () => {}): Promise<string> {
    this.history.push({ role: "user", content: prompt });

    const local = this.options.handleCommand ? await this.options.handleCommand(prompt) : null;
    if (local !== null) {
      onDelta(local);
      this.history.push({ role: "assistant", content: local });
      return local;
    }

    const { backend } = this.options;
    if (!backend) {
      const reply =
        "No LLM backend is configured. Set ABACUS_API_KEY, GEMINI_API_KEY or OPENAI_API_KEY to enable chat.";
      onDelta(reply);
      this.history.push({ role: "assistant", content: reply });
      return reply;
    }

    const messages = buildMessages(this.history, await this.getSheetsContext());
    let reply = "";
    try {
      for await (const delta of backend.streamChat(messages)) {
        reply += delta;
        onDelta(delta);
      }
    } catch (error) {
      log.error("LLM request failed", error);
      const message = error instanceof Error ? error.message : String(error);
      const note = `\n\n**API error:** ${message}`;
      onDelta(note);
      reply += note;
    }

    this.history.push({ role: "assistant", content: reply });
    return reply;
  }
}
