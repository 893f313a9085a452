import {
  ClientEmail,
  FilledString,
  PemPrivateKey,
  ServiceAccountCredential,
  ServiceAccountType,
  type CredentialObject,
  type TServiceAccountCredential,
} from "./schemas";

export type RequiredField = "type" | "client_email" | "private_key";

export type InvalidReason =
  | { kind: "missing-field"; field: RequiredField }
  | { kind: "wrong-type" }
  | { kind: "malformed-key" };

export type ValidationResult =
  | { valid: true; clientEmail: string; credential: TServiceAccountCredential }
  | { valid: false; reason: InvalidReason };

function missing(field: RequiredField): ValidationResult {
  return { valid: false, reason: { kind: "missing-field", field } };
}

/** Keys pasted through env files often arrive with literal "\n" sequences. */
export function normalizePrivateKey(privateKey: string): string {
  if (privateKey.includes("\n")) {
    return privateKey;
  }
  return privateKey.replace(/\\n/g, "\n");
}

export function hasPemPrivateKeyHeader(privateKey: string): boolean {
  return PemPrivateKey.safeParse(privateKey).success;
}

/**
 * Checks the fields the Drive/Sheets client needs. The key is only
 * pattern-matched, never parsed, and no returned reason carries any of it.
 */
export function validateServiceAccount(candidate: CredentialObject): ValidationResult {
  if (!FilledString.safeParse(candidate.type).success) {
    return missing("type");
  }
  if (!ServiceAccountType.safeParse(candidate.type).success) {
    return { valid: false, reason: { kind: "wrong-type" } };
  }
  if (!ClientEmail.safeParse(candidate.client_email).success) {
    return missing("client_email");
  }

  const privateKey = FilledString.safeParse(candidate.private_key);
  if (!privateKey.success) {
    return missing("private_key");
  }

  const { project_id: projectId, ...rest } = candidate;
  const parsed = ServiceAccountCredential.safeParse({
    ...rest,
    // a non-string project_id is dropped rather than failing the credential
    ...(typeof projectId === "string" ? { project_id: projectId } : {}),
    private_key: normalizePrivateKey(privateKey.data),
  });
  // type, client_email and presence of the key passed above; only the PEM header is left
  if (!parsed.success) {
    return { valid: false, reason: { kind: "malformed-key" } };
  }

  return { valid: true, clientEmail: parsed.data.client_email, credential: parsed.data };
}
