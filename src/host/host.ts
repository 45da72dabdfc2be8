// Structural view of the host environment.
//
// The bridge never reaches for DOM globals. An embedding page hands over its
// canvas, window, document and factories; tests hand over in-process fakes.

import type { GLContext } from "../graphics/gl-context.js";
import type { HostAudioContext } from "../audio/audio-context.js";

export interface HostEventTarget<M> {
  addEventListener<K extends keyof M & string>(type: K, listener: (event: M[K]) => void): void;
  removeEventListener<K extends keyof M & string>(type: K, listener: (event: M[K]) => void): void;
}

export interface HostUiEvent {
  preventDefault(): void;
}

export interface HostModifierState {
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

export interface HostMouseEvent extends HostUiEvent, HostModifierState {
  clientX: number;
  clientY: number;
  movementX: number;
  movementY: number;
  button: number;
}

export interface HostWheelEvent extends HostUiEvent {
  deltaX: number;
  deltaY: number;
}

export interface HostKeyboardEvent extends HostUiEvent, HostModifierState {
  /** Physical key name, e.g. "KeyA" or "ArrowUp". */
  code: string;
  repeat: boolean;
  charCode: number;
}

export interface HostTouch {
  identifier: number;
  clientX: number;
  clientY: number;
}

export interface HostTouchEvent extends HostUiEvent {
  changedTouches: Iterable<HostTouch>;
}

export interface HostClipboardData {
  getData(format: string): string;
  setData(format: string, data: string): void;
}

export interface HostClipboardEvent extends HostUiEvent {
  clipboardData: HostClipboardData | null;
  stopPropagation(): void;
}

export interface HostFile {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HostDragEvent extends HostUiEvent {
  dataTransfer: { files: Iterable<HostFile> } | null;
}

export interface CanvasEventMap {
  mousemove: HostMouseEvent;
  mousedown: HostMouseEvent;
  mouseup: HostMouseEvent;
  wheel: HostWheelEvent;
  keydown: HostKeyboardEvent;
  keyup: HostKeyboardEvent;
  keypress: HostKeyboardEvent;
  touchstart: HostTouchEvent;
  touchmove: HostTouchEvent;
  touchend: HostTouchEvent;
  touchcancel: HostTouchEvent;
}

export interface WindowEventMap {
  resize: HostUiEvent;
  copy: HostClipboardEvent;
  cut: HostClipboardEvent;
  paste: HostClipboardEvent;
  dragover: HostDragEvent;
  drop: HostDragEvent;
  focus: HostUiEvent;
  blur: HostUiEvent;
}

export interface DocumentEventMap {
  visibilitychange: HostUiEvent;
}

export interface HostCanvas extends HostEventTarget<CanvasEventMap> {
  id: string;
  width: number;
  height: number;
  readonly clientWidth: number;
  readonly clientHeight: number;
  style: { cursor: string };
  getBoundingClientRect(): { left: number; top: number };
  getContext(kind: "webgl" | "webgl2", attributes?: Record<string, unknown>): GLContext | null;
  requestPointerLock(): void;
  requestFullscreen(): Promise<void>;
}

export interface HostWindow extends HostEventTarget<WindowEventMap> {
  readonly devicePixelRatio: number;
  requestAnimationFrame(callback: (time: number) => void): number;
  cancelAnimationFrame(handle: number): void;
  alert(message: string): void;
}

export interface HostDocument extends HostEventTarget<DocumentEventMap> {
  readonly fullscreenElement: { id: string } | null;
  hasFocus(): boolean;
  exitPointerLock(): void;
  exitFullscreen(): Promise<void>;
}

export interface HostWebSocket {
  binaryType: string;
  onopen: (() => void) | null;
  onmessage: ((event: { data: string | ArrayBuffer }) => void) | null;
  onclose: ((event: { code: number; reason: string }) => void) | null;
  onerror: ((event: unknown) => void) | null;
  send(data: string | ArrayBuffer | Uint8Array): void;
  close(): void;
}

export interface HostFetchResponse {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HostFetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

export type HostFetch = (url: string, init?: HostFetchInit) => Promise<HostFetchResponse>;

export interface HostEnvironment {
  canvas: HostCanvas;
  window: HostWindow;
  document: HostDocument;
  createAudioContext?: () => HostAudioContext;
  createWebSocket?: (url: string) => HostWebSocket;
  fetch?: HostFetch;
  /** Milliseconds from an arbitrary origin, as `performance.now()`. */
  now(): number;
  random(): number;
}
