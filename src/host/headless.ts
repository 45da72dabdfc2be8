import { clearTimeout, setTimeout } from "node:timers";
import type {
  CanvasEventMap,
  DocumentEventMap,
  HostCanvas,
  HostDocument,
  HostEnvironment,
  HostEventTarget,
  HostFetch,
  HostWindow,
  WindowEventMap,
} from "./host.js";

export interface HeadlessOptions {
  width?: number;
  height?: number;
  /** Milliseconds between animation ticks. */
  frameInterval?: number;
  fetch?: HostFetch;
  onAlert?: (message: string) => void;
}

/** Event target that accepts listeners and never fires. */
function inertTarget<M>(): HostEventTarget<M> {
  return {
    addEventListener() {},
    removeEventListener() {},
  };
}

/**
 * A host with no display, input or audio. Animation ticks run on timers, so
 * a guest's event loop can be driven from the command line.
 */
export function createHeadlessHost(options: HeadlessOptions = {}): HostEnvironment {
  const width = options.width ?? 800;
  const height = options.height ?? 600;
  const frameInterval = options.frameInterval ?? 16;
  const timers = new Map<number, NodeJS.Timeout>();
  let nextTimer = 1;

  const canvas: HostCanvas = {
    ...inertTarget<CanvasEventMap>(),
    id: "headless",
    width,
    height,
    clientWidth: width,
    clientHeight: height,
    style: { cursor: "default" },
    getBoundingClientRect: () => ({ left: 0, top: 0 }),
    getContext: () => null,
    requestPointerLock() {},
    requestFullscreen: () => Promise.reject(new Error("headless host has no display")),
  };

  const window: HostWindow = {
    ...inertTarget<WindowEventMap>(),
    devicePixelRatio: 1,
    requestAnimationFrame(callback) {
      const handle = nextTimer++;
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle);
          callback(performance.now());
        }, frameInterval),
      );
      return handle;
    },
    cancelAnimationFrame(handle) {
      const timer = timers.get(handle);
      if (timer === undefined) return;
      clearTimeout(timer);
      timers.delete(handle);
    },
    alert(message) {
      options.onAlert?.(message);
    },
  };

  const document: HostDocument = {
    ...inertTarget<DocumentEventMap>(),
    fullscreenElement: null,
    hasFocus: () => true,
    exitPointerLock() {},
    exitFullscreen: () => Promise.resolve(),
  };

  return {
    canvas,
    window,
    document,
    fetch: options.fetch,
    now: () => performance.now(),
    random: () => Math.random(),
  };
}
