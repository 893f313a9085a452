import {
  CREDENTIALS_FILE_ENV,
  CREDENTIALS_JSON_ENV,
  locateCredentialSource,
  type CredentialLookup,
  type CredentialSourceKind,
} from "./credentialLocator";
import { normalizeCredentialPayload, type NormalizationFailure } from "./credentialPayload";
import { validateServiceAccount, type InvalidReason } from "./credentialValidator";
import { createLogger } from "./logger";
import type { TServiceAccountCredential } from "./schemas";

const log = createLogger("credentials");

export type DiagnosticResult =
  | { level: "ok"; clientEmail: string }
  | { level: "warning"; message: string; hint: string }
  | { level: "error"; message: string; hint: string };

/**
 * What the reporter is allowed to see: stage outcomes and the extracted
 * client_email, never the credential record itself.
 */
export type PipelineOutcome =
  | { stage: "locate"; found: false }
  | { stage: "normalize"; failure: NormalizationFailure }
  | { stage: "validate"; valid: false; reason: InvalidReason }
  | { stage: "validate"; valid: true; clientEmail: string };

export type CredentialCheck = {
  diagnostic: DiagnosticResult;
  /** Kind and origin label of the source that was used, if any. */
  source?: { kind: CredentialSourceKind; origin: string };
  /** Only set when the diagnostic is ok; hand it to the API client and drop it. */
  credential?: TServiceAccountCredential;
};

const REDOWNLOAD_HINT = "re-download the service account JSON key from the Google Cloud console";

export function reportDiagnostic(outcome: PipelineOutcome): DiagnosticResult {
  switch (outcome.stage) {
    case "locate":
      return {
        level: "error",
        message: "no credential source found",
        hint: `set ${CREDENTIALS_JSON_ENV} or ${CREDENTIALS_FILE_ENV}, or add keys/*.json`,
      };
    case "normalize":
      if (outcome.failure.kind === "invalid-encoding") {
        return {
          level: "error",
          message: "payload is not valid text/JSON",
          hint: "save the key as UTF-8 JSON, or base64-encode the UTF-8 JSON text",
        };
      }
      return {
        level: "error",
        message: "cannot parse credential payload",
        hint: outcome.failure.hint ?? "check base64 padding, or that the JSON is complete",
      };
    case "validate":
      if (outcome.valid) {
        return { level: "ok", clientEmail: outcome.clientEmail };
      }
      return reportInvalid(outcome.reason);
  }
}

function reportInvalid(reason: InvalidReason): DiagnosticResult {
  switch (reason.kind) {
    case "missing-field":
      return { level: "error", message: `missing field ${reason.field}`, hint: REDOWNLOAD_HINT };
    case "wrong-type":
      return {
        level: "warning",
        message: "unexpected credential type",
        hint: 'expected a key with "type": "service_account"; OAuth client or user credentials are not supported',
      };
    case "malformed-key":
      return {
        level: "error",
        message: "private key header not recognized",
        hint: `private_key must be a PEM block with a BEGIN PRIVATE KEY header; ${REDOWNLOAD_HINT}`,
      };
  }
}

/**
 * Locate, decode and validate the service account credentials for one
 * session. Nothing is cached: each call reads the environment and
 * filesystem snapshot it is given.
 */
export function checkCredentials(lookup: CredentialLookup): CredentialCheck {
  const located = locateCredentialSource(lookup);
  if (!located.found) {
    return { diagnostic: reportDiagnostic({ stage: "locate", found: false }) };
  }

  const { kind, origin, payload } = located.source;
  const source = { kind, origin };
  log.debug(`Checking credentials from ${origin}`);

  const normalized = normalizeCredentialPayload(payload);
  if (!normalized.ok) {
    return { diagnostic: reportDiagnostic({ stage: "normalize", failure: normalized.failure }), source };
  }

  const validated = validateServiceAccount(normalized.value);
  if (!validated.valid) {
    return {
      diagnostic: reportDiagnostic({ stage: "validate", valid: false, reason: validated.reason }),
      source,
    };
  }

  return {
    diagnostic: reportDiagnostic({ stage: "validate", valid: true, clientEmail: validated.clientEmail }),
    source,
    credential: validated.credential,
  };
}

const LEVEL_LABEL: Record<DiagnosticResult["level"], string> = {
  ok: "✅",
  warning: "⚠️ ",
  error: "❌",
};

/** Status line plus an optional indented hint line. */
export function formatDiagnostic(result: DiagnosticResult): string {
  if (result.level === "ok") {
    return `${LEVEL_LABEL.ok} Google service account: ${result.clientEmail}`;
  }
  return `${LEVEL_LABEL[result.level]} Google credentials: ${result.message}\n   → ${result.hint}`;
}
