import { createLogger } from "./logger";
import type { CredentialObject } from "./schemas";

const log = createLogger("credentials");

export type NormalizationFailure =
  | { kind: "invalid-format"; message: string; hint?: string }
  | { kind: "invalid-encoding"; message: string };

export type NormalizationResult =
  | { ok: true; value: CredentialObject; format: PayloadFormat }
  | { ok: false; failure: NormalizationFailure };

export type PayloadFormat = "json" | "base64";

type ParseAttempt = {
  format: PayloadFormat;
  parse(text: string): NormalizationResult;
};

export const TRUNCATED_BASE64_HINT =
  "looks like truncated base64 (length is not a multiple of 4); re-encode the complete JSON file and check base64 padding";

const BASE64_TEXT = /^[A-Za-z0-9+/_-]+={0,2}$/;

function isJsonObject(value: unknown): value is CredentialObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalidFormat(message: string, hint?: string): NormalizationResult {
  return { ok: false, failure: hint ? { kind: "invalid-format", message, hint } : { kind: "invalid-format", message } };
}

function invalidEncoding(message: string): NormalizationResult {
  return { ok: false, failure: { kind: "invalid-encoding", message } };
}

/** Strict UTF-8: malformed byte sequences are rejected instead of replaced. */
function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function parseJsonObject(text: string): CredentialObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

const jsonAttempt: ParseAttempt = {
  format: "json",
  parse(text) {
    const value = parseJsonObject(text);
    if (!value) {
      return invalidFormat("payload is not a JSON object");
    }
    return { ok: true, value, format: "json" };
  },
};

const base64Attempt: ParseAttempt = {
  format: "base64",
  parse(text) {
    const candidate = text.replace(/[\r\n]/g, "").trim();
    if (!BASE64_TEXT.test(candidate)) {
      return invalidFormat("payload is neither a JSON object nor base64 text");
    }

    const lengthAligned = candidate.length % 4 === 0;
    if (!lengthAligned) {
      log.debug(`base64 payload length ${candidate.length} is not a multiple of 4`);
      return invalidFormat("base64 payload is incomplete", TRUNCATED_BASE64_HINT);
    }

    const decoded = decodeUtf8(Buffer.from(candidate, "base64"));
    if (decoded === undefined) {
      return invalidEncoding("decoded base64 payload is not valid UTF-8");
    }

    const value = parseJsonObject(decoded);
    if (!value) {
      return invalidFormat("decoded base64 payload is not a JSON object");
    }
    return { ok: true, value, format: "base64" };
  },
};

const ATTEMPTS: readonly ParseAttempt[] = [jsonAttempt, base64Attempt];

/**
 * Decode a raw credential payload (JSON text, base64-encoded JSON, or
 * file bytes holding either) into a JSON object. Field semantics are
 * left to the validator.
 */
export function normalizeCredentialPayload(payload: string | Uint8Array): NormalizationResult {
  const decoded = typeof payload === "string" ? payload : decodeUtf8(payload);
  if (decoded === undefined) {
    return invalidEncoding("credential file is not valid UTF-8 text");
  }
  // TextDecoder drops a byte-order mark from files; env values keep theirs
  const text = decoded.replace(/^\uFEFF/, "");

  let last: NormalizationResult = invalidFormat("credential payload is empty");
  for (const attempt of ATTEMPTS) {
    last = attempt.parse(text);
    if (last.ok) {
      log.debug(`credential payload decoded as ${attempt.format}`);
      return last;
    }
    log.debug(`credential payload is not ${attempt.format}: ${last.failure.message}`);
  }
  return last;
}
