import {
  SEVERITY_RANK,
  type BridgeDiagnostic,
  type DiagnosticKind,
  type Severity,
} from "./diagnostic.js";

export type LogSink = (diag: BridgeDiagnostic) => void;

const SEVERITY_TAG: Record<Severity, string> = {
  error: "[ERROR]",
  warning: "[WARN]",
  info: "[INFO]",
  debug: "[DEBUG]",
};

export const consoleSink: LogSink = (diag) => {
  const line = `${SEVERITY_TAG[diag.severity]} ${diag.message}`;
  switch (diag.severity) {
    case "error":
      console.error(line);
      break;
    case "warning":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
};

export interface DiagnosticLogOptions {
  sink?: LogSink;
  /** Diagnostics below this severity are neither kept nor forwarded. */
  minSeverity?: Severity;
  /** Number of entries kept in memory; the oldest are dropped first. */
  limit?: number;
}

/**
 * Collects every diagnostic the bridge produces and forwards it to a sink.
 *
 * Nothing here throws: a diagnostic is the terminal form of every failure that
 * originates in the bridge, so that guest calls always return.
 */
export class DiagnosticLog {
  private readonly sink: LogSink;
  private readonly minRank: number;
  private readonly limit: number;
  private readonly kept: BridgeDiagnostic[] = [];
  private readonly onceKeys = new Set<string>();

  constructor(options: DiagnosticLogOptions = {}) {
    this.sink = options.sink ?? consoleSink;
    this.minRank = SEVERITY_RANK[options.minSeverity ?? "info"];
    this.limit = options.limit ?? 1000;
  }

  get entries(): readonly BridgeDiagnostic[] {
    return this.kept;
  }

  ofKind(kind: DiagnosticKind): BridgeDiagnostic[] {
    return this.kept.filter((d) => d.kind === kind);
  }

  errors(): BridgeDiagnostic[] {
    return this.kept.filter((d) => d.severity === "error");
  }

  report(diag: BridgeDiagnostic): void {
    if (SEVERITY_RANK[diag.severity] < this.minRank) return;
    this.kept.push(diag);
    if (this.kept.length > this.limit) this.kept.shift();
    this.sink(diag);
  }

  /** Report `diag` only the first time `key` is seen. */
  reportOnce(key: string, diag: BridgeDiagnostic): void {
    if (this.onceKeys.has(key)) return;
    this.onceKeys.add(key);
    this.report(diag);
  }

  warnOnce(key: string, kind: DiagnosticKind, message: string): void {
    this.reportOnce(key, { severity: "warning", kind, message });
  }

  error(kind: DiagnosticKind, message: string, detail?: unknown): void {
    this.report({ severity: "error", kind, message, detail });
  }

  warn(kind: DiagnosticKind, message: string, detail?: unknown): void {
    this.report({ severity: "warning", kind, message, detail });
  }

  info(kind: DiagnosticKind, message: string): void {
    this.report({ severity: "info", kind, message });
  }

  debug(kind: DiagnosticKind, message: string): void {
    this.report({ severity: "debug", kind, message });
  }

  clear(): void {
    this.kept.length = 0;
    this.onceKeys.clear();
  }
}
