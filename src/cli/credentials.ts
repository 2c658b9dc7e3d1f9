import { createInterface } from "node:readline/promises";
import { AuthError } from "../errors";
import type { CliEnv } from "./env";

export const TOKEN_PROMPT = "Please enter your GitHub Personal Access Token: ";

export interface CredentialSource {
  env: Pick<CliEnv, "GITHUB_TOKEN" | "AUDIT_LOG_TOKEN">;
  /** Whether a person can answer a prompt (stdin is a TTY). */
  interactive: boolean;
  prompt?: (question: string) => Promise<string>;
}

export async function promptStdin(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/**
 * Environment first, then an interactive prompt. Fails with `AuthError`
 * before any request is made when neither yields a token.
 */
export async function resolveCredential(source: CredentialSource): Promise<string> {
  const fromEnv = (source.env.GITHUB_TOKEN ?? source.env.AUDIT_LOG_TOKEN ?? "").trim();
  if (fromEnv !== "") return fromEnv;

  if (!source.interactive) {
    throw new AuthError(
      "No API token: set GITHUB_TOKEN (or AUDIT_LOG_TOKEN) or run interactively",
    );
  }

  const answer = (await (source.prompt ?? promptStdin)(TOKEN_PROMPT)).trim();
  if (answer === "") {
    throw new AuthError("No API token entered");
  }
  return answer;
}
