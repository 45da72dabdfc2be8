import { createAppPlugin, type AppPlugin } from "../app/app-plugin.js";
import { createAudioPlugin, type AudioPlugin } from "../audio/audio-plugin.js";
import type { BridgeContext } from "../context.js";
import { createFilePlugin, type FilePlugin } from "../fs/file-plugin.js";
import { createGraphicsPlugin, type GraphicsPlugin } from "../graphics/gl-plugin.js";
import { createHostValuesPlugin } from "../handles/host-values-plugin.js";
import { createNetPlugin, type NetPlugin } from "../net/net-plugin.js";
import type { BridgePlugin } from "./plugin.js";

export interface DefaultPlugins {
  app: AppPlugin;
  gl: GraphicsPlugin;
  audio: AudioPlugin;
  net: NetPlugin;
  fs: FilePlugin;
  hostValues: BridgePlugin;
}

export function createDefaultPlugins(ctx: BridgeContext): DefaultPlugins {
  return {
    app: createAppPlugin(ctx),
    gl: createGraphicsPlugin(ctx),
    audio: createAudioPlugin(ctx),
    net: createNetPlugin(ctx),
    fs: createFilePlugin(ctx),
    hostValues: createHostValuesPlugin(ctx),
  };
}

/** Registration order: later plugins may override earlier ones. */
export function defaultPluginList(plugins: DefaultPlugins): BridgePlugin[] {
  return [plugins.app, plugins.gl, plugins.audio, plugins.net, plugins.fs, plugins.hostValues];
}
