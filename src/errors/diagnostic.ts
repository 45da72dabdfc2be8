export type Severity = "error" | "warning" | "info" | "debug";

export type DiagnosticKind =
  | "invalid-handle"
  | "invalid-pointer"
  | "missing-capability"
  | "missing-required-capability"
  | "async-failure"
  | "version-mismatch"
  | "missing-function"
  | "gl-error"
  | "shader-compile"
  | "guest-trap"
  | "guest-log"
  | "load-failure"
  | "info";

export interface BridgeDiagnostic {
  severity: Severity;
  kind: DiagnosticKind;
  message: string;
  help?: string;
  /** Underlying host error or value, kept for inspection. Never sent to the guest. */
  detail?: unknown;
}

export function error(kind: DiagnosticKind, message: string, help?: string): BridgeDiagnostic {
  return { severity: "error", kind, message, help };
}

export function warning(kind: DiagnosticKind, message: string, help?: string): BridgeDiagnostic {
  return { severity: "warning", kind, message, help };
}

export function info(kind: DiagnosticKind, message: string): BridgeDiagnostic {
  return { severity: "info", kind, message };
}

export function debug(kind: DiagnosticKind, message: string): BridgeDiagnostic {
  return { severity: "debug", kind, message };
}

export const SEVERITY_RANK: Record<Severity, number> = {
  error: 3,
  warning: 2,
  info: 1,
  debug: 0,
};

export function isSeverity(value: string): value is Severity {
  return value === "error" || value === "warning" || value === "info" || value === "debug";
}

/** Render an unknown thrown value the way host errors are logged. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
