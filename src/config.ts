import fs from "node:fs";
import path from "node:path";

import dotenv from "dotenv";
import OpenAI from "openai";
import { z } from "zod";

import type { CredentialLookup } from "./credentialLocator";
import { createLogger, parseLogLevel, setLogLevel, type LogLevel } from "./logger";

const log = createLogger("config");

// src/ when run through tsx, dist/src/ once built
function findRootDir(moduleDir: string): string {
  const parent = path.resolve(moduleDir, "..");
  return path.basename(parent) === "dist" ? path.resolve(parent, "..") : parent;
}

export const ROOT_DIR = findRootDir(__dirname);
const ENV_FILES = [
  path.join(ROOT_DIR, ".env.local"),
  path.join(ROOT_DIR, ".env"),
];

for (const file of ENV_FILES) {
  if (fs.existsSync(file)) {
    dotenv.config({ path: file });
  }
}

export const LLM_PROVIDERS = ["routellm", "gemini", "openai"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

const DEFAULT_BASE_URLS: Record<LlmProvider, string | undefined> = {
  routellm: "https://routellm.abacus.ai/v1",
  gemini: "https://generativelanguage.googleapis.com/v1beta/openai/",
  openai: undefined,
};

export type LlmConfig = {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  baseURL?: string;
  temperature: number;
};

const optionalTrimmed = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const llmEnvSchema = z.object({
  LLM_PROVIDER: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.enum(LLM_PROVIDERS).optional()),
  LLM_BASE_URL: optionalTrimmed.pipe(z.string().url().optional()),
  LLM_TEMPERATURE: optionalTrimmed,
  GEMINI_TEMPERATURE: optionalTrimmed,
  ABACUS_API_KEY: optionalTrimmed,
  ABACUS_MODEL: z.string().trim().default("gemini-2.0-flash-exp"),
  GEMINI_API_KEY: optionalTrimmed,
  GOOGLE_API_KEY: optionalTrimmed,
  GEMINI_MODEL: z.string().trim().default("gemini-2.0-flash-exp"),
  OPENAI_API_KEY: optionalTrimmed,
  OPENAI_MODEL: z.string().trim().default("gpt-4o-mini"),
});

// Plain strings with defaults: any process environment satisfies this part.
const appEnvSchema = z.object({
  KEYS_DIR: z.string().trim().default("keys"),
  GOOGLE_DRIVE_FOLDER_ID: optionalTrimmed,
  LOG_LEVEL: z.string().trim().optional(),
});

type LlmEnv = z.infer<typeof llmEnvSchema>;

const Temperature = z.coerce.number().min(0).max(2);

function resolveTemperature(env: LlmEnv): number {
  const raw = env.LLM_TEMPERATURE ?? env.GEMINI_TEMPERATURE;
  if (raw === undefined) {
    return 0.7;
  }
  const parsed = Temperature.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Invalid value for LLM_TEMPERATURE ("${raw}"). Falling back to default of 0.7.`);
    return 0.7;
  }
  return parsed.data;
}

function providerCredentials(env: LlmEnv, provider: LlmProvider): { apiKey?: string; model: string } {
  switch (provider) {
    case "routellm":
      return { apiKey: env.ABACUS_API_KEY, model: env.ABACUS_MODEL };
    case "gemini":
      return { apiKey: env.GEMINI_API_KEY ?? env.GOOGLE_API_KEY, model: env.GEMINI_MODEL };
    case "openai":
      return { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL };
  }
}

/**
 * An explicit LLM_PROVIDER wins; otherwise the first provider with an API
 * key, in routellm → gemini → openai order. Undefined means chat is off.
 */
function selectLlm(env: LlmEnv): LlmConfig | undefined {
  const candidates = env.LLM_PROVIDER ? [env.LLM_PROVIDER] : LLM_PROVIDERS;

  for (const provider of candidates) {
    const { apiKey, model } = providerCredentials(env, provider);
    if (!apiKey) continue;
    const baseURL = env.LLM_BASE_URL ?? DEFAULT_BASE_URLS[provider];
    return {
      provider,
      apiKey,
      model,
      ...(baseURL ? { baseURL } : {}),
      temperature: resolveTemperature(env),
    };
  }

  return undefined;
}

type Env = Readonly<Record<string, string | undefined>>;

/** A malformed LLM setting turns chat off; it never stops the credential check. */
function loadLlmConfig(env: Env): LlmConfig | undefined {
  const parsed = llmEnvSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      log.warn(`Invalid value for ${issue.path.join(".")}: ${issue.message}. Chat is disabled.`);
    }
    return undefined;
  }
  return selectLlm(parsed.data);
}

export function loadAppConfig(env: Env, rootDir: string = ROOT_DIR) {
  const parsed = appEnvSchema.parse(env);
  const logLevel: LogLevel = parseLogLevel(parsed.LOG_LEVEL);

  return {
    rootDir,
    logLevel,
    llm: loadLlmConfig(env),
    google: {
      keysDir: path.resolve(rootDir, parsed.KEYS_DIR),
      driveFolderId: parsed.GOOGLE_DRIVE_FOLDER_ID,
    },
  };
}

export type AppConfig = ReturnType<typeof loadAppConfig>;

export const appConfig: AppConfig = loadAppConfig(process.env);
setLogLevel(appConfig.logLevel);

/**
 * Lookup for one credential check. The environment is snapshotted per
 * call, never shared between sessions.
 */
export function credentialLookup(config: AppConfig = appConfig): CredentialLookup {
  return {
    env: { ...process.env },
    fallbackDir: config.google.keysDir,
    cwd: config.rootDir,
  };
}

export function createOpenAIClient(llm: LlmConfig): OpenAI {
  return new OpenAI({ apiKey: llm.apiKey, baseURL: llm.baseURL });
}
