import type { BridgeContext } from "../context.js";
import type { BridgePlugin } from "../plugins/plugin.js";
import { HttpBridge } from "./http-plugin.js";
import { WebSocketBridge } from "./websocket-plugin.js";

export const NET_PLUGIN_VERSION = 1;

export interface NetPlugin extends BridgePlugin {
  readonly ws: WebSocketBridge;
  readonly http: HttpBridge;
}

export function createNetPlugin(ctx: BridgeContext): NetPlugin {
  const ws = new WebSocketBridge(ctx);
  const http = new HttpBridge(ctx);
  return {
    name: "net",
    version: NET_PLUGIN_VERSION,
    ws,
    http,
    register(table) {
      ws.register(table);
      http.register(table);
    },
    dispose() {
      ws.close();
    },
  };
}
