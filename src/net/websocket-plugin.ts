import type { BridgeContext } from "../context.js";
import { describeError } from "../errors/diagnostic.js";
import { bytesValue, recordValue, stringValue, type HostValue } from "../handles/host-values.js";
import type { HostWebSocket } from "../host/host.js";
import type { CallTable } from "../plugins/plugin.js";

/** Sentinel returned by `ws_try_recv` while the queue is empty. */
export const NO_MESSAGE = -1;

/**
 * One persistent socket. Received frames queue up until the guest drains
 * them with `ws_try_recv`; each entry is a `{isText, data}` record.
 */
export class WebSocketBridge {
  private socket: HostWebSocket | null = null;
  private connected = false;
  private readonly received: HostValue[] = [];

  constructor(private readonly ctx: BridgeContext) {}

  get isConnected(): boolean {
    return this.connected;
  }

  get queued(): number {
    return this.received.length;
  }

  connect(url: string): void {
    const factory = this.ctx.host.createWebSocket;
    if (factory === undefined) {
      this.ctx.log.warnOnce("ws-unavailable", "missing-capability", "host has no WebSocket support");
      return;
    }
    this.close();

    let socket: HostWebSocket;
    try {
      socket = factory(url);
    } catch (e) {
      this.ctx.log.error("async-failure", `could not open WebSocket to ${url}: ${describeError(e)}`, e);
      return;
    }
    socket.binaryType = "arraybuffer";
    socket.onopen = () => {
      this.connected = true;
    };
    socket.onmessage = (event) => {
      const data = event.data;
      this.received.push(
        typeof data === "string"
          ? recordValue({ isText: 1, data: stringValue(data) })
          : recordValue({ isText: 0, data: bytesValue(new Uint8Array(data)) }),
      );
    };
    socket.onclose = (event) => {
      this.connected = false;
      this.ctx.log.info("info", `WebSocket to ${url} closed (${event.code}${event.reason ? `: ${event.reason}` : ""})`);
    };
    socket.onerror = (event) => {
      this.connected = false;
      this.ctx.log.error("async-failure", `WebSocket to ${url} failed`, event);
    };
    this.socket = socket;
  }

  send(value: HostValue): void {
    const socket = this.socket;
    if (socket === null || !this.connected) {
      this.ctx.log.warn("async-failure", "ws_send: socket is not connected; message dropped");
      return;
    }
    try {
      if (value.kind === "string") socket.send(value.value);
      else if (value.kind === "bytes") socket.send(value.value);
      else this.ctx.log.error("invalid-handle", `ws_send: cannot send a ${value.kind}`);
    } catch (e) {
      this.ctx.log.error("async-failure", `ws_send failed: ${describeError(e)}`, e);
    }
  }

  /** Oldest queued message, or undefined. */
  shift(): HostValue | undefined {
    return this.received.shift();
  }

  close(): void {
    const socket = this.socket;
    if (socket === null) return;
    this.socket = null;
    this.connected = false;
    socket.onopen = null;
    socket.onmessage = null;
    socket.onclose = null;
    socket.onerror = null;
    try {
      socket.close();
    } catch (e) {
      this.ctx.log.debug("info", `closing WebSocket: ${describeError(e)}`);
    }
  }

  register(table: CallTable): void {
    const values = this.ctx.hostValues;
    table.defineAll({
      ws_connect: (urlHandle) => {
        const url = values.consumeString(urlHandle, "ws_connect");
        if (url !== null) this.connect(url);
      },
      ws_is_connected: () => (this.connected ? 1 : 0),
      ws_send: (handle) => {
        const value = values.consume(handle, "ws_send");
        if (value !== null) this.send(value);
      },
      ws_try_recv: () => {
        const message = this.shift();
        return message === undefined ? NO_MESSAGE : values.wrap(message);
      },
    });
  }
}
