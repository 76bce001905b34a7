import fs from "node:fs";

export type DiagnosticLevel = "error" | "warn" | "info" | "debug";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type LogFormat = "human" | "jsonl";

let format: LogFormat = "human";

/** Switch stderr diagnostics between plain lines and JSONL records. */
export function setLogFormat(next: LogFormat): void {
  format = next;
}

export function diag(
  level: DiagnosticLevel,
  code: string,
  message: string,
  details?: Record<string, unknown>,
): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}

export function formatDiagnostic(d: Diagnostic, as: LogFormat = format): string {
  if (as === "jsonl") return JSON.stringify(d);
  const suffix = d.details ? ` ${JSON.stringify(d.details)}` : "";
  return `[${d.level.toUpperCase()}] ${d.code}: ${d.message}${suffix}`;
}

export function emit(d: Diagnostic): void {
  process.stderr.write(formatDiagnostic(d) + "\n");
}

export function info(code: string, message: string, details?: Record<string, unknown>): void {
  emit(diag("info", code, message, details));
}

export function warn(code: string, message: string, details?: Record<string, unknown>): void {
  emit(diag("warn", code, message, details));
}

export function error(code: string, message: string, details?: Record<string, unknown>): void {
  emit(diag("error", code, message, details));
}

/** Debug output, only when QUALITYCTL_DEBUG is set; mirrored to QUALITYCTL_LOG_FILE if given. */
export function debug(message: string, details?: Record<string, unknown>): void {
  if (!process.env["QUALITYCTL_DEBUG"]) return;
  const line = formatDiagnostic(diag("debug", "DEBUG", `${new Date().toISOString()} ${message}`, details));
  process.stderr.write(line + "\n");
  const logFile = process.env["QUALITYCTL_LOG_FILE"];
  if (logFile) {
    fs.appendFileSync(logFile, line + "\n");
  }
}
