import fs from "node:fs";
import path from "node:path";

import { createLogger } from "./logger";

const log = createLogger("credentials");

export const CREDENTIALS_JSON_ENV = "GOOGLE_SERVICE_ACCOUNT_JSON";
export const CREDENTIALS_FILE_ENV = "GOOGLE_SERVICE_ACCOUNT_FILE";

export type CredentialSourceKind = "env-json" | "env-file" | "local-file";

export type CredentialSource =
  | {
      readonly kind: "env-json";
      readonly origin: typeof CREDENTIALS_JSON_ENV;
      readonly payload: string;
    }
  | {
      readonly kind: "env-file" | "local-file";
      /** Absolute path of the file that was read. */
      readonly origin: string;
      readonly payload: Uint8Array;
    };

export type LocateResult =
  | { found: true; source: CredentialSource }
  | { found: false };

/**
 * Everything the locator reads, passed in explicitly so a lookup never
 * depends on ambient process state.
 */
export type CredentialLookup = {
  env: Readonly<Record<string, string | undefined>>;
  /** Directory scanned for `*.json` key files when no env var matches. */
  fallbackDir: string;
  /** Base for a relative GOOGLE_SERVICE_ACCOUNT_FILE; defaults to process.cwd(). */
  cwd?: string;
};

function readEnv(env: CredentialLookup["env"], name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readRegularFile(filePath: string): Uint8Array | undefined {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return undefined;
    }
    return fs.readFileSync(filePath);
  } catch (error) {
    const code = error instanceof Error && "code" in error ? String(error.code) : "unknown";
    log.debug(`Cannot read ${filePath} (${code})`);
    return undefined;
  }
}

/**
 * `*.json` entries of the fallback directory in lexicographic order, so
 * the pick is stable when several key files are present.
 */
export function listFallbackKeyFiles(fallbackDir: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(fallbackDir, { withFileTypes: true });
  } catch {
    return [];
  }

  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".json"))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.resolve(fallbackDir, name));
}

export function locateCredentialSource(lookup: CredentialLookup): LocateResult {
  const inline = readEnv(lookup.env, CREDENTIALS_JSON_ENV);
  if (inline) {
    return {
      found: true,
      source: { kind: "env-json", origin: CREDENTIALS_JSON_ENV, payload: inline },
    };
  }

  const fileEnv = readEnv(lookup.env, CREDENTIALS_FILE_ENV);
  if (fileEnv) {
    const resolved = path.resolve(lookup.cwd ?? process.cwd(), fileEnv);
    const payload = readRegularFile(resolved);
    if (payload) {
      return { found: true, source: { kind: "env-file", origin: resolved, payload } };
    }
    log.warn(
      `${CREDENTIALS_FILE_ENV} points to "${resolved}", which is not a readable file. Trying ${lookup.fallbackDir}.`
    );
  }

  for (const candidate of listFallbackKeyFiles(lookup.fallbackDir)) {
    const payload = readRegularFile(candidate);
    if (payload) {
      return { found: true, source: { kind: "local-file", origin: candidate, payload } };
    }
  }

  return { found: false };
}
