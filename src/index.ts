#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { readFile, writeFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { isSeverity, warning, type BridgeDiagnostic } from "./errors/diagnostic.js";
import { consoleSink } from "./errors/log.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { transpile, type ShaderDialect } from "./graphics/shader-transpiler.js";
import { createHeadlessHost } from "./host/headless.js";
import { loadGuest } from "./loader.js";
import { defaultCallTable, inspectModule } from "./plugins/inspect.js";

function parseDialect(raw: string): ShaderDialect {
  if (raw === "glsl100" || raw === "glsl300es") return raw;
  throw new Error(`Unknown dialect "${raw}". Expected glsl100 or glsl300es.`);
}

function fail(e: unknown): never {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}

const program = new Command()
  .name("hostbridge")
  .description("Host bridge for sandboxed WebAssembly guests")
  .version("0.3.0");

program
  .command("transpile <file>")
  .description("Rewrite a GLSL ES 1.00 shader for a GLSL ES 3.00 context")
  .option("-o, --output <file>", "Write the result to a file instead of stdout")
  .option("-t, --target <dialect>", "Target dialect (glsl100 or glsl300es)", "glsl300es")
  .action(async (file: string, opts: { output?: string; target: string }) => {
    try {
      const source = await readFile(file, "utf-8");
      const result = transpile(source, parseDialect(opts.target));
      if (opts.output) {
        await writeFile(opts.output, result);
        console.log(`Transpiled ${file} -> ${opts.output}`);
      } else {
        process.stdout.write(result);
      }
    } catch (e) {
      fail(e);
    }
  });

program
  .command("check <wasm>")
  .description("Compare a guest module's imports and exports against the host call table")
  .option("--json", "Output as JSON")
  .action(async (file: string, opts: { json?: boolean }) => {
    try {
      const module = await WebAssembly.compile(new Uint8Array(await readFile(file)));
      const report = inspectModule(module);
      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      const byPlugin = new Map<string, string[]>();
      for (const { name, plugin } of report.provided) {
        byPlugin.set(plugin, [...(byPlugin.get(plugin) ?? []), name]);
      }
      for (const [plugin, names] of byPlugin) {
        console.log(`${chalk.green.bold(plugin)} ${chalk.gray(`(${names.length})`)} ${names.join(", ")}`);
      }
      const diagnostics: BridgeDiagnostic[] = report.missing.map((name) =>
        warning("missing-function", `no host function ${name}`, "the guest gets a stub returning 0"),
      );
      if (!report.hasMain) diagnostics.push(warning("missing-function", "guest does not export main"));
      if (diagnostics.length > 0) console.error(formatDiagnostics(diagnostics));
      console.log(
        `${report.provided.length} provided, ${report.missing.length} stubbed, ` +
          `version exports: ${report.versionExports.join(", ") || "none"}`,
      );
    } catch (e) {
      fail(e);
    }
  });

program
  .command("run <wasm>")
  .description("Load a guest against a headless host and drive its event loop")
  .option("-d, --duration <ms>", "How long to keep the event loop running", "1000")
  .option("--blocking", "Only run frames the guest schedules")
  .option("--log-level <level>", "Lowest severity to print (error, warning, info, debug)")
  .action(async (file: string, opts: { duration: string; blocking?: boolean; logLevel?: string }) => {
    try {
      const duration = Number(opts.duration);
      if (!Number.isFinite(duration) || duration < 0) throw new Error(`Invalid duration "${opts.duration}"`);
      const logLevel = opts.logLevel;
      if (logLevel !== undefined && !isSeverity(logLevel)) throw new Error(`Unknown log level "${logLevel}"`);

      const host = createHeadlessHost({ onAlert: (message) => console.error(chalk.red(message)) });
      const result = await loadGuest(new Uint8Array(await readFile(file)), host, {
        sink: consoleSink,
        config: {
          ...(opts.blocking ? { blockingEventLoop: true } : {}),
          ...(logLevel !== undefined ? { logLevel } : {}),
        },
      });
      if (!result.ok) {
        console.error(formatDiagnostics(result.errors));
        process.exit(1);
      }
      const { bridge } = result;
      await sleep(duration);
      const faulted = bridge.guest.faulted;
      bridge.dispose();
      if (faulted) process.exit(1);
    } catch (e) {
      fail(e);
    }
  });

program
  .command("introspect")
  .description("List the host plugins and the functions each provides (JSON)")
  .option("--plugin <name>", "Only show one plugin")
  .action((opts: { plugin?: string }) => {
    const { plugins } = defaultCallTable();
    const shown = opts.plugin === undefined ? plugins : plugins.filter((p) => p.name === opts.plugin);
    if (shown.length === 0) fail(new Error(`No plugin named "${opts.plugin ?? ""}"`));
    console.log(JSON.stringify({ version: "0.3.0", plugins: shown }, null, 2));
  });

program.parseAsync().catch(fail);
