import type { BridgeContext } from "../context.js";
import { describeError, type Severity } from "../errors/diagnostic.js";
import type { BridgePlugin, CallTable } from "../plugins/plugin.js";
import { EventLoopDriver } from "./event-loop.js";

export const APP_PLUGIN_VERSION = 2;

/** Largest value `rand` returns, exclusive. */
export const RAND_LIMIT = 2147483647;

export interface AppPlugin extends BridgePlugin {
  readonly driver: EventLoopDriver;
}

/**
 * Window, timing, console and event loop functions. Everything the guest
 * needs to run without any other plugin.
 */
export function createAppPlugin(ctx: BridgeContext): AppPlugin {
  const { log, memory, host } = ctx;
  const driver = new EventLoopDriver(ctx);

  function guestLog(severity: Severity): (ptr: number, len?: number) => void {
    return (ptr: number, len?: number): void => {
      const message = memory.readUtf8(ptr, len, "console");
      log.report({ severity, kind: "guest-log", message });
    };
  }

  function register(table: CallTable): void {
    table.defineAll({
      console_debug: guestLog("debug"),
      console_log: guestLog("info"),
      console_info: guestLog("info"),
      console_warn: guestLog("warning"),
      console_error: guestLog("error"),

      rand: () => Math.floor(host.random() * RAND_LIMIT),
      now: () => host.now() / 1000,
      dpi_scale: () => driver.dpiScale(),
      canvas_width: () => Math.floor(host.canvas.width),
      canvas_height: () => Math.floor(host.canvas.height),
      setup_canvas_size(highDpi) {
        driver.setHighDpi(highDpi !== 0);
      },

      run_animation_loop(blocking) {
        if (ctx.halted) {
          log.error("load-failure", `event loop not started: ${ctx.haltMessage ?? "bridge halted"}`);
          return;
        }
        driver.start(blocking !== 0);
      },
      app_schedule_update() {
        driver.scheduleUpdate();
      },

      app_set_window_size(width, height) {
        driver.resizeTo(width, height);
      },
      app_is_fullscreen: () => {
        const element = host.document.fullscreenElement;
        return element !== null && element.id === host.canvas.id ? 1 : 0;
      },
      app_set_fullscreen(fullscreen) {
        const pending = fullscreen !== 0 ? host.canvas.requestFullscreen() : host.document.exitFullscreen();
        pending.catch((e: unknown) => {
          log.warn("async-failure", `could not change fullscreen state: ${describeError(e)}`, e);
        });
      },
      app_set_cursor_grab(grab) {
        if (grab !== 0) host.canvas.requestPointerLock();
        else host.document.exitPointerLock();
      },
      app_set_cursor(ptr, len) {
        host.canvas.style.cursor = memory.readUtf8(ptr, len, "app_set_cursor");
      },
      app_set_clipboard(ptr, len) {
        driver.clipboard = memory.readUtf8(ptr, len, "app_set_clipboard");
      },
    });
  }

  return {
    name: "app",
    version: APP_PLUGIN_VERSION,
    driver,
    register,
    dispose() {
      driver.stop();
    },
  };
}
