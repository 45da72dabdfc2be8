import type {
  CanvasEventMap,
  DocumentEventMap,
  HostCanvas,
  HostClipboardEvent,
  HostDocument,
  HostDragEvent,
  HostEnvironment,
  HostEventTarget,
  HostFetch,
  HostFile,
  HostKeyboardEvent,
  HostMouseEvent,
  HostTouch,
  HostTouchEvent,
  HostWebSocket,
  HostWindow,
  WindowEventMap,
} from "../../src/host/host.js";
import type { HostAudioContext } from "../../src/audio/audio-context.js";
import type { GLContext } from "../../src/graphics/gl-context.js";

interface Registered {
  type: string;
  listener: Function;
}

export class FakeTarget<M> implements HostEventTarget<M> {
  private listeners: Registered[] = [];

  addEventListener<K extends keyof M & string>(type: K, listener: (event: M[K]) => void): void {
    this.listeners.push({ type, listener });
  }

  removeEventListener<K extends keyof M & string>(type: K, listener: (event: M[K]) => void): void {
    this.listeners = this.listeners.filter((l) => !(l.type === type && l.listener === listener));
  }

  dispatch<K extends keyof M & string>(type: K, event: M[K]): void {
    for (const l of this.listeners.filter((entry) => entry.type === type)) {
      Reflect.apply(l.listener, undefined, [event]);
    }
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}

export class FakeCanvas extends FakeTarget<CanvasEventMap> implements HostCanvas {
  id = "canvas";
  width = 0;
  height = 0;
  clientWidth = 320;
  clientHeight = 200;
  style = { cursor: "default" };
  contexts: Partial<Record<"webgl" | "webgl2", GLContext>> = {};
  pointerLocked = false;
  fullscreenRequests = 0;

  getBoundingClientRect(): { left: number; top: number } {
    return { left: 10, top: 20 };
  }

  getContext(kind: "webgl" | "webgl2"): GLContext | null {
    return this.contexts[kind] ?? null;
  }

  requestPointerLock(): void {
    this.pointerLocked = true;
  }

  requestFullscreen(): Promise<void> {
    this.fullscreenRequests++;
    return Promise.resolve();
  }
}

export class FakeWindow extends FakeTarget<WindowEventMap> implements HostWindow {
  devicePixelRatio = 1;
  readonly alerts: string[] = [];
  private readonly frames = new Map<number, (time: number) => void>();
  private nextHandle = 1;

  requestAnimationFrame(callback: (time: number) => void): number {
    const handle = this.nextHandle++;
    this.frames.set(handle, callback);
    return handle;
  }

  cancelAnimationFrame(handle: number): void {
    this.frames.delete(handle);
  }

  alert(message: string): void {
    this.alerts.push(message);
  }

  get pendingFrames(): number {
    return this.frames.size;
  }

  /** Run the callbacks queued so far; ones they queue wait for the next call. */
  runFrame(time = 0): number {
    const due = [...this.frames.values()];
    this.frames.clear();
    for (const callback of due) callback(time);
    return due.length;
  }
}

export class FakeDocument extends FakeTarget<DocumentEventMap> implements HostDocument {
  fullscreenElement: { id: string } | null = null;
  focused = true;
  pointerLockExits = 0;

  hasFocus(): boolean {
    return this.focused;
  }

  exitPointerLock(): void {
    this.pointerLockExits++;
  }

  exitFullscreen(): Promise<void> {
    this.fullscreenElement = null;
    return Promise.resolve();
  }
}

export interface FakeHost extends HostEnvironment {
  canvas: FakeCanvas;
  window: FakeWindow;
  document: FakeDocument;
  /** Milliseconds returned by `now()`. */
  clock: { time: number };
}

export interface FakeHostOptions {
  createAudioContext?: () => HostAudioContext;
  createWebSocket?: (url: string) => HostWebSocket;
  fetch?: HostFetch;
}

export function createFakeHost(options: FakeHostOptions = {}): FakeHost {
  const clock = { time: 0 };
  return {
    canvas: new FakeCanvas(),
    window: new FakeWindow(),
    document: new FakeDocument(),
    clock,
    now: () => clock.time,
    random: () => 0.5,
    ...options,
  };
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface Recorded {
  defaultPrevented: boolean;
  propagationStopped: boolean;
}

const noModifiers = { shiftKey: false, ctrlKey: false, altKey: false, metaKey: false };

export function mouseEvent(init: Partial<HostMouseEvent> = {}): HostMouseEvent & Recorded {
  return {
    ...noModifiers,
    clientX: 0,
    clientY: 0,
    movementX: 0,
    movementY: 0,
    button: 0,
    defaultPrevented: false,
    propagationStopped: false,
    preventDefault() {
      this.defaultPrevented = true;
    },
    ...init,
  };
}

export function keyEvent(code: string, init: Partial<HostKeyboardEvent> = {}): HostKeyboardEvent & Recorded {
  return {
    ...noModifiers,
    code,
    repeat: false,
    charCode: 0,
    defaultPrevented: false,
    propagationStopped: false,
    preventDefault() {
      this.defaultPrevented = true;
    },
    ...init,
  };
}

export function touchEvent(touches: HostTouch[]): HostTouchEvent & Recorded {
  return {
    changedTouches: touches,
    defaultPrevented: false,
    propagationStopped: false,
    preventDefault() {
      this.defaultPrevented = true;
    },
  };
}

export class FakeClipboard {
  readonly data = new Map<string, string>();

  getData(format: string): string {
    return this.data.get(format) ?? "";
  }

  setData(format: string, value: string): void {
    this.data.set(format, value);
  }
}

export function clipboardEvent(clipboard: FakeClipboard | null): HostClipboardEvent & Recorded {
  return {
    clipboardData: clipboard,
    defaultPrevented: false,
    propagationStopped: false,
    preventDefault() {
      this.defaultPrevented = true;
    },
    stopPropagation() {
      this.propagationStopped = true;
    },
  };
}

export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export function fakeFile(name: string, text: string): HostFile {
  return {
    name,
    arrayBuffer: () => Promise.resolve(toArrayBuffer(new TextEncoder().encode(text))),
  };
}

export function dropEvent(files: HostFile[]): HostDragEvent & Recorded {
  return {
    dataTransfer: { files },
    defaultPrevented: false,
    propagationStopped: false,
    preventDefault() {
      this.defaultPrevented = true;
    },
  };
}

export const uiEvent = { preventDefault() {} };
