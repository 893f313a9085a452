import { appConfig, credentialLookup } from "../src/config";
import { checkCredentials, formatDiagnostic } from "../src/credentialDiagnostics";

async function main() {
  const check = checkCredentials(credentialLookup());

  console.log(formatDiagnostic(check.diagnostic));

  if (check.source) {
    const label = check.source.kind === "env-json" ? "environment variable" : "file";
    console.log(`Credentials sourced from ${label}: ${check.source.origin}`);
  } else {
    console.log(`Searched GOOGLE_SERVICE_ACCOUNT_JSON, GOOGLE_SERVICE_ACCOUNT_FILE and ${appConfig.google.keysDir}`);
  }

  if (check.credential?.project_id) {
    console.log(`  project_id: ${check.credential.project_id}`);
  }

  const llm = appConfig.llm;
  console.log(llm ? `LLM backend: ${llm.provider} (${llm.model})` : "LLM backend: not configured");

  if (check.diagnostic.level === "error") {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Failed to inspect service account configuration:", error);
  process.exitCode = 1;
});
