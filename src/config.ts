import { isSeverity, type Severity } from "./errors/diagnostic.js";

export type AudioPanning = "stereo" | "mono";

export interface BridgeConfig {
  /** Scale the canvas backing store and pointer coordinates by the device pixel ratio. */
  highDpi: boolean;
  /** When set, `frame` only runs on explicit `app_schedule_update` requests. */
  blockingEventLoop: boolean;
  /**
   * Graphics context version to create before the guest is instantiated.
   * `null` leaves context creation to the guest's `init_webgl` call.
   */
  glVersion: 1 | 2 | null;
  audioPanning: AudioPanning;
  logLevel: Severity;
  diagnosticsLimit: number;
}

export const DEFAULT_CONFIG: BridgeConfig = {
  highDpi: false,
  blockingEventLoop: false,
  glVersion: null,
  audioPanning: "stereo",
  logLevel: "info",
  diagnosticsLimit: 1000,
};

// Environment variables read by resolveConfig():
//   HOSTBRIDGE_HIGH_DPI       "1"/"true" or "0"/"false"
//   HOSTBRIDGE_BLOCKING_LOOP  "1"/"true" or "0"/"false"
//   HOSTBRIDGE_GL_VERSION     "1" or "2"
//   HOSTBRIDGE_AUDIO_PANNING  "stereo" or "mono"
//   HOSTBRIDGE_LOG_LEVEL      "error", "warning", "info" or "debug"
// Values that do not parse are ignored.

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true") return true;
  if (v === "0" || v === "false") return false;
  return undefined;
}

function parseGlVersion(raw: string | undefined): 1 | 2 | undefined {
  const v = raw?.trim();
  if (v === "1") return 1;
  if (v === "2") return 2;
  return undefined;
}

function parsePanning(raw: string | undefined): AudioPanning | undefined {
  const v = raw?.trim().toLowerCase();
  return v === "stereo" || v === "mono" ? v : undefined;
}

function parseLogLevel(raw: string | undefined): Severity | undefined {
  const v = raw?.trim().toLowerCase();
  return v !== undefined && isSeverity(v) ? v : undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<BridgeConfig> {
  const out: Partial<BridgeConfig> = {};
  const highDpi = parseFlag(env.HOSTBRIDGE_HIGH_DPI);
  if (highDpi !== undefined) out.highDpi = highDpi;
  const blocking = parseFlag(env.HOSTBRIDGE_BLOCKING_LOOP);
  if (blocking !== undefined) out.blockingEventLoop = blocking;
  const glVersion = parseGlVersion(env.HOSTBRIDGE_GL_VERSION);
  if (glVersion !== undefined) out.glVersion = glVersion;
  const panning = parsePanning(env.HOSTBRIDGE_AUDIO_PANNING);
  if (panning !== undefined) out.audioPanning = panning;
  const logLevel = parseLogLevel(env.HOSTBRIDGE_LOG_LEVEL);
  if (logLevel !== undefined) out.logLevel = logLevel;
  return out;
}

/** Explicit overrides win over the environment, which wins over defaults. */
export function resolveConfig(
  overrides: Partial<BridgeConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): BridgeConfig {
  return { ...DEFAULT_CONFIG, ...configFromEnv(env), ...overrides };
}
