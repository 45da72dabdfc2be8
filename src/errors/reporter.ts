import chalk from "chalk";
import type { BridgeDiagnostic } from "./diagnostic.js";

function severityLabel(diag: BridgeDiagnostic): string {
  switch (diag.severity) {
    case "error":
      return chalk.red.bold("error");
    case "warning":
      return chalk.yellow.bold("warning");
    case "info":
      return chalk.blue.bold("info");
    case "debug":
      return chalk.gray("debug");
  }
}

export function formatDiagnostic(diag: BridgeDiagnostic): string {
  let output = `${severityLabel(diag)}${chalk.gray(`[${diag.kind}]`)}: ${chalk.bold(diag.message)}\n`;
  if (diag.help) {
    output += `  ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }
  return output;
}

export function formatDiagnostics(diagnostics: BridgeDiagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(d)).join("");
}
