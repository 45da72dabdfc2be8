import type { BridgeContext } from "../context.js";
import { describeError } from "../errors/diagnostic.js";
import type {
  CanvasEventMap,
  DocumentEventMap,
  HostClipboardEvent,
  HostDragEvent,
  HostEventTarget,
  HostFile,
  HostKeyboardEvent,
  HostMouseEvent,
  HostTouchEvent,
  WindowEventMap,
} from "../host/host.js";
import { encodeUtf8 } from "../memory/guest-memory.js";
import {
  KEY_DELETE,
  SUPPRESSED_KEYS,
  SUPPRESSED_PRINTABLE,
  TOUCH_BEGAN,
  TOUCH_CANCELLED,
  TOUCH_ENDED,
  TOUCH_MOVED,
  keycodeOf,
  modifierMask,
  mouseButtonOf,
  MOD_CTRL,
} from "./keycodes.js";

/**
 * Drives the guest: host input events become guest export calls, and each
 * animation tick calls `frame`. In blocking mode a tick happens only when
 * the guest asks for one with `scheduleUpdate`.
 */
export class EventLoopDriver {
  /** Text the guest last put on the clipboard; served to copy and cut. */
  clipboard: string | null = null;

  private highDpi: boolean;
  private blocking = false;
  private running = false;
  private frameHandle: number | null = null;
  private focused = false;
  private readonly detachers: (() => void)[] = [];

  constructor(private readonly ctx: BridgeContext) {
    this.highDpi = ctx.config.highDpi;
    this.blocking = ctx.config.blockingEventLoop;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isBlocking(): boolean {
    return this.blocking;
  }

  get frameRequested(): boolean {
    return this.frameHandle !== null;
  }

  dpiScale(): number {
    if (!this.highDpi) return 1;
    const ratio = this.ctx.host.window.devicePixelRatio;
    return ratio > 0 ? ratio : 1;
  }

  setHighDpi(highDpi: boolean): void {
    this.highDpi = highDpi;
    this.resize(false);
  }

  /** Match the drawing buffer to the canvas's displayed size; tell the guest when it changed. */
  resize(notify: boolean): void {
    const canvas = this.ctx.host.canvas;
    const dpi = this.dpiScale();
    const width = Math.floor(canvas.clientWidth * dpi);
    const height = Math.floor(canvas.clientHeight * dpi);
    if (canvas.width === width && canvas.height === height) return;
    canvas.width = width;
    canvas.height = height;
    if (notify) this.call("resize", width, height);
  }

  /** Set the drawing buffer size directly, as the guest asked for it. */
  resizeTo(width: number, height: number): void {
    const canvas = this.ctx.host.canvas;
    if (canvas.width === width && canvas.height === height) return;
    canvas.width = width;
    canvas.height = height;
    this.call("resize", width, height);
  }

  /** Attach input listeners and request the first tick. False when the guest cannot run. */
  start(blocking: boolean): boolean {
    const guest = this.ctx.guest;
    if (this.ctx.halted || guest === null || guest.faulted) {
      this.ctx.log.error("guest-trap", "event loop not started: the guest is not runnable");
      return false;
    }
    this.blocking = blocking;
    if (this.running) return true;
    this.running = true;
    this.focused = this.ctx.host.document.hasFocus();
    this.attach();
    this.resize(true);
    this.requestFrame();
    return true;
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.frameHandle !== null) {
      this.ctx.host.window.cancelAnimationFrame(this.frameHandle);
      this.frameHandle = null;
    }
    for (const detach of this.detachers.splice(0)) detach();
  }

  /** One more tick; the only way a blocking loop advances. */
  scheduleUpdate(): void {
    if (this.running) this.requestFrame();
  }

  private requestFrame(): void {
    const window = this.ctx.host.window;
    if (this.frameHandle !== null) window.cancelAnimationFrame(this.frameHandle);
    this.frameHandle = window.requestAnimationFrame(this.onFrame);
  }

  private readonly onFrame = (): void => {
    this.frameHandle = null;
    if (!this.running) return;
    this.call("frame");
    if (this.running && !this.blocking) this.requestFrame();
  };

  private call(name: string, ...args: number[]): void {
    const guest = this.ctx.guest;
    if (guest === null) return;
    guest.call(name, ...args);
    if (guest.faulted && this.running) {
      this.ctx.log.error("guest-trap", `event loop stopped after a trap in ${name}`);
      this.stop();
    }
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  private listen<M, K extends keyof M & string>(
    target: HostEventTarget<M>,
    type: K,
    listener: (event: M[K]) => void,
  ): void {
    target.addEventListener(type, listener);
    this.detachers.push(() => target.removeEventListener(type, listener));
  }

  private attach(): void {
    const { canvas, window, document } = this.ctx.host;

    this.listen<CanvasEventMap, "mousemove">(canvas, "mousemove", (e) => this.mouseMove(e));
    this.listen<CanvasEventMap, "mousedown">(canvas, "mousedown", (e) => {
      this.ctx.notifyUserGesture();
      const [x, y] = this.position(e.clientX, e.clientY);
      this.call("mouse_down", x, y, mouseButtonOf(e.button));
    });
    this.listen<CanvasEventMap, "mouseup">(canvas, "mouseup", (e) => {
      const [x, y] = this.position(e.clientX, e.clientY);
      this.call("mouse_up", x, y, mouseButtonOf(e.button));
    });
    this.listen<CanvasEventMap, "wheel">(canvas, "wheel", (e) => {
      e.preventDefault();
      this.call("mouse_wheel", -e.deltaX, -e.deltaY);
    });

    this.listen<CanvasEventMap, "keydown">(canvas, "keydown", (e) => this.keyDown(e));
    this.listen<CanvasEventMap, "keyup">(canvas, "keyup", (e) => {
      const code = keycodeOf(e.code);
      if (code !== undefined) this.call("key_up", code, modifierMask(e));
    });
    this.listen<CanvasEventMap, "keypress">(canvas, "keypress", (e) => {
      const code = keycodeOf(e.code);
      if (code === KEY_DELETE || (modifierMask(e) & MOD_CTRL) !== 0) return;
      this.call("key_press", e.charCode);
    });

    this.listen<CanvasEventMap, "touchstart">(canvas, "touchstart", (e) => {
      this.ctx.notifyUserGesture();
      this.touch(TOUCH_BEGAN, e);
    });
    this.listen<CanvasEventMap, "touchmove">(canvas, "touchmove", (e) => this.touch(TOUCH_MOVED, e));
    this.listen<CanvasEventMap, "touchend">(canvas, "touchend", (e) => this.touch(TOUCH_ENDED, e));
    this.listen<CanvasEventMap, "touchcancel">(canvas, "touchcancel", (e) => this.touch(TOUCH_CANCELLED, e));

    this.listen<WindowEventMap, "resize">(window, "resize", () => this.resize(true));
    this.listen<WindowEventMap, "copy">(window, "copy", (e) => this.copy(e));
    this.listen<WindowEventMap, "cut">(window, "cut", (e) => this.copy(e));
    this.listen<WindowEventMap, "paste">(window, "paste", (e) => this.paste(e));
    this.listen<WindowEventMap, "dragover">(window, "dragover", (e) => e.preventDefault());
    this.listen<WindowEventMap, "drop">(window, "drop", (e) => this.drop(e));
    this.listen<WindowEventMap, "focus">(window, "focus", () => this.focusChanged());
    this.listen<WindowEventMap, "blur">(window, "blur", () => this.focusChanged());
    this.listen<DocumentEventMap, "visibilitychange">(document, "visibilitychange", () => this.focusChanged());
  }

  // ---------------------------------------------------------------------------
  // Normalization
  // ---------------------------------------------------------------------------

  private position(clientX: number, clientY: number): [number, number] {
    const rect = this.ctx.host.canvas.getBoundingClientRect();
    const dpi = this.dpiScale();
    return [(clientX - rect.left) * dpi, (clientY - rect.top) * dpi];
  }

  private mouseMove(e: HostMouseEvent): void {
    const [x, y] = this.position(e.clientX, e.clientY);
    this.call("mouse_move", Math.floor(x), Math.floor(y));
    if (e.movementX !== 0 || e.movementY !== 0) {
      this.call("raw_mouse_move", Math.floor(e.movementX), Math.floor(e.movementY));
    }
  }

  private keyDown(e: HostKeyboardEvent): void {
    this.ctx.notifyUserGesture();
    const code = keycodeOf(e.code);
    if (code === undefined) {
      this.ctx.log.debug("info", `unmapped key ${e.code}`);
      return;
    }
    if (SUPPRESSED_KEYS.has(code)) e.preventDefault();
    this.call("key_down", code, modifierMask(e), e.repeat ? 1 : 0);
    const char = SUPPRESSED_PRINTABLE.get(code);
    if (char !== undefined) this.call("key_press", char);
  }

  private touch(phase: number, e: HostTouchEvent): void {
    e.preventDefault();
    for (const touch of e.changedTouches) {
      const [x, y] = this.position(touch.clientX, touch.clientY);
      this.call("touch", phase, touch.identifier, x, y);
    }
  }

  private focusChanged(): void {
    const focused = this.ctx.host.document.hasFocus();
    if (focused === this.focused) return;
    this.focused = focused;
    this.call("focus", focused ? 1 : 0);
  }

  // ---------------------------------------------------------------------------
  // Clipboard and drops
  // ---------------------------------------------------------------------------

  private copy(e: HostClipboardEvent): void {
    if (this.clipboard === null) return;
    e.clipboardData?.setData("text/plain", this.clipboard);
    e.preventDefault();
  }

  private paste(e: HostClipboardEvent): void {
    e.stopPropagation();
    e.preventDefault();
    const text = e.clipboardData?.getData("text") ?? "";
    if (text.length === 0) return;
    const bytes = encodeUtf8(text);
    const ptr = this.toGuest(bytes);
    if (ptr !== null) this.call("on_clipboard_paste", ptr, bytes.length);
  }

  private drop(e: HostDragEvent): void {
    e.preventDefault();
    const files = e.dataTransfer === null ? [] : [...e.dataTransfer.files];
    if (files.length === 0) return;
    this.deliverDrop(files).catch((err: unknown) => {
      this.ctx.log.error("async-failure", `could not read dropped files: ${describeError(err)}`, err);
    });
  }

  private async deliverDrop(files: HostFile[]): Promise<void> {
    // Read every file first so the guest sees the whole drop between start and finish.
    const contents = await Promise.all(files.map(async (file) => new Uint8Array(await file.arrayBuffer())));
    if (!this.running) return;
    this.call("on_files_dropped_start");
    files.forEach((file, i) => {
      const name = encodeUtf8(file.name);
      const data = contents[i] ?? new Uint8Array(0);
      const namePtr = this.toGuest(name);
      const dataPtr = this.toGuest(data);
      if (namePtr === null || dataPtr === null) return;
      this.call("on_file_dropped", namePtr, name.length, dataPtr, data.length);
    });
    this.call("on_files_dropped_finish");
  }

  /** Copy `bytes` into a guest-allocated buffer. */
  private toGuest(bytes: Uint8Array): number | null {
    const guest = this.ctx.guest;
    if (guest === null) return null;
    const ptr = guest.allocate(bytes.length);
    if (ptr === null) return null;
    this.ctx.memory.copyIn(bytes, ptr, bytes.length, "host copy");
    return ptr;
  }
}
