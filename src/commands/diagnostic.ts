import { CertError, errorMessage } from "../errors.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

/** Shared result shape of every command. */
export type CommandResult<T> =
  | { ok: true; value: T; exitCode: ExitCode; warnings: Diagnostic[] }
  | { ok: false; error: Diagnostic; exitCode: ExitCode };

export type CommandFailure = Extract<CommandResult<never>, { ok: false }>;

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Turn a thrown error into the failure branch of a command result. */
export function failure(err: unknown, stage?: string): CommandFailure {
  const code = err instanceof CertError ? err.code : "INTERNAL";
  const details = stage ? { stage } : undefined;
  return { ok: false, error: diag("error", code, errorMessage(err), details ? { details } : undefined), exitCode: exitCodeFor(err) };
}

export function warnings(messages: string[], code = "WARNING"): Diagnostic[] {
  return messages.map((m) => diag("warn", code, m));
}

/** Write one diagnostic: a JSON line, or a plain line on stdout/stderr. */
export function emit(d: Diagnostic, format: OutputFormat): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(d) + "\n");
  } else if (d.level === "info") {
    process.stdout.write(d.message + "\n");
  } else {
    process.stderr.write(`${d.level}: ${d.message}\n`);
  }
}
