import type { BridgeContext } from "../context.js";
import { describeError } from "../errors/diagnostic.js";
import { HandleRegistry, IdCounter } from "../handles/handle-registry.js";
import type { BridgePlugin, CallTable } from "../plugins/plugin.js";
import type {
  HostAudioBuffer,
  HostAudioContext,
  HostAudioNode,
  HostAudioParam,
  HostBufferSource,
  HostGainNode,
} from "./audio-context.js";

export const AUDIO_PLUGIN_VERSION = 2;

/** Volume changes reach their target this many seconds after the call. */
export const VOLUME_RAMP_SECONDS = 1 / 120;

/**
 * One reusable voice. `soundKey === 0` marks the slot free. Gain nodes (and
 * the merger in stereo mode) live as long as the slot; the source node is
 * one-shot and replaced on every play.
 */
export interface PlaybackSlot {
  soundKey: number;
  playbackKey: number;
  source: HostBufferSource | null;
  gains: HostGainNode[];
  merger: HostAudioNode | null;
  ended: (() => void) | null;
}

export interface AudioPlugin extends BridgePlugin {
  /** Live view of the playback pool. */
  readonly slots: readonly PlaybackSlot[];
}

export function createAudioPlugin(ctx: BridgeContext): AudioPlugin {
  const { log, memory } = ctx;
  const stereo = ctx.config.audioPanning === "stereo";
  const sounds = new HandleRegistry<HostAudioBuffer>("sound", log, new IdCounter(1));
  const slots: PlaybackSlot[] = [];
  let nextPlaybackKey = 1;
  let audio: HostAudioContext | null = null;

  // ---------------------------------------------------------------------------
  // Context
  // ---------------------------------------------------------------------------

  function init(): HostAudioContext | null {
    if (audio !== null) return audio;
    const factory = ctx.host.createAudioContext;
    if (factory === undefined) {
      log.warnOnce("audio-unavailable", "missing-capability", "host has no audio output; audio calls do nothing");
      return null;
    }
    const created = factory();
    audio = created;

    // A one-sample silent buffer unlocks output on hosts that demand a gesture.
    const silence = created.createBufferSource();
    silence.buffer = created.createBuffer(1, 1, 22050);
    silence.connect(created.destination);
    silence.start(0);

    ctx.onUserGesture(() => {
      if (created.state !== "suspended") return;
      created.resume().catch((e: unknown) => {
        log.warn("async-failure", `could not resume audio output: ${describeError(e)}`, e);
      });
    });
    return created;
  }

  // ---------------------------------------------------------------------------
  // Pool
  // ---------------------------------------------------------------------------

  function recycle(ac: HostAudioContext): PlaybackSlot {
    const free = slots.find((slot) => slot.soundKey === 0);
    if (free !== undefined) return free;
    const gains = stereo ? [ac.createGain(), ac.createGain()] : [ac.createGain()];
    const slot: PlaybackSlot = {
      soundKey: 0,
      playbackKey: 0,
      source: null,
      gains,
      merger: stereo ? ac.createChannelMerger(2) : null,
      ended: null,
    };
    slots.push(slot);
    return slot;
  }

  function wire(ac: HostAudioContext, slot: PlaybackSlot, source: HostBufferSource): void {
    const merger = slot.merger;
    if (merger !== null) {
      slot.gains.forEach((gain, channel) => {
        source.connect(gain);
        gain.connect(merger, 0, channel);
      });
      merger.connect(ac.destination);
    } else {
      for (const gain of slot.gains) {
        source.connect(gain);
        gain.connect(ac.destination);
      }
    }
  }

  function channelVolumes(left: number, right: number): number[] {
    return stereo ? [left, right] : [(left + right) / 2];
  }

  function stopSlot(slot: PlaybackSlot, caller: string): void {
    if (slot.soundKey === 0 || slot.source === null) {
      log.info("info", `${caller}: playback already stopped`);
      return;
    }
    const source = slot.source;
    if (slot.ended !== null) source.removeEventListener("ended", slot.ended);
    try {
      source.stop();
    } catch (e) {
      // Throws when the source already ended on its own.
      log.debug("info", `${caller}: ${describeError(e)}`);
    }
    source.disconnect();
    for (const gain of slot.gains) gain.disconnect();
    slot.merger?.disconnect();
    slot.source = null;
    slot.ended = null;
    slot.soundKey = 0;
    slot.playbackKey = 0;
  }

  function ramp(ac: HostAudioContext, param: HostAudioParam, value: number): void {
    const now = ac.currentTime;
    param.cancelScheduledValues(now);
    param.setValueAtTime(param.value, now);
    param.linearRampToValueAtTime(value, now + VOLUME_RAMP_SECONDS);
  }

  function setSlotVolume(slot: PlaybackSlot, left: number, right: number): void {
    const ac = audio;
    if (ac === null) return;
    const volumes = channelVolumes(left, right);
    slot.gains.forEach((gain, i) => ramp(ac, gain.gain, volumes[i] ?? 0));
  }

  // ---------------------------------------------------------------------------
  // Call table
  // ---------------------------------------------------------------------------

  function addBuffer(ptr: number, len: number): number {
    const ac = init();
    if (ac === null) return 0;
    const bytes = memory.copyOut(ptr, len, "audio_add_buffer");
    const data = new ArrayBuffer(bytes.length);
    new Uint8Array(data).set(bytes);

    const key = sounds.allocate(null);
    ac.decodeAudioData(data).then(
      (buffer) => {
        // Deleted while decoding.
        if (sounds.isPending(key)) sounds.set(key, buffer);
      },
      (e: unknown) => {
        log.error("async-failure", `failed to decode audio buffer for sound ${key}: ${describeError(e)}`, e);
        if (sounds.isPending(key)) sounds.free(key, "audio decode");
      },
    );
    return key;
  }

  function play(soundKey: number, left: number, right: number, speed: number, loop: number): number {
    const ac = init();
    if (ac === null) return 0;
    const buffer = sounds.lookup(soundKey, "audio_play_buffer");
    if (buffer === null) return 0;

    const slot = recycle(ac);
    const source = ac.createBufferSource();
    const playbackKey = nextPlaybackKey++;
    slot.soundKey = soundKey;
    slot.playbackKey = playbackKey;
    slot.source = source;

    wire(ac, slot, source);
    const volumes = channelVolumes(left, right);
    slot.gains.forEach((gain, i) => {
      gain.gain.value = volumes[i] ?? 0;
    });
    source.playbackRate.value = speed;
    source.loop = loop !== 0;

    const ended = (): void => stopSlot(slot, "playback end");
    slot.ended = ended;
    source.addEventListener("ended", ended);

    source.buffer = buffer;
    try {
      source.start(0);
    } catch (e) {
      log.error("async-failure", `could not start sound ${soundKey}: ${describeError(e)}`, e);
      stopSlot(slot, "audio_play_buffer");
      return 0;
    }
    return playbackKey;
  }

  function register(table: CallTable): void {
    table.defineAll({
      audio_init() {
        init();
      },
      audio_add_buffer: addBuffer,
      audio_source_is_loaded: (soundKey) => (sounds.isReady(soundKey) ? 1 : 0),
      audio_play_buffer: play,
      audio_source_set_volume(soundKey, left, right) {
        for (const slot of slots) {
          if (slot.soundKey === soundKey && soundKey !== 0) setSlotVolume(slot, left, right);
        }
      },
      audio_playback_set_volume(playbackKey, left, right) {
        const slot = slots.find((s) => s.playbackKey === playbackKey && playbackKey !== 0);
        if (slot === undefined) {
          log.info("info", `audio_playback_set_volume: playback ${playbackKey} is not playing`);
          return;
        }
        setSlotVolume(slot, left, right);
      },
      audio_source_stop(soundKey) {
        for (const slot of [...slots]) {
          if (slot.soundKey === soundKey && soundKey !== 0) stopSlot(slot, "audio_source_stop");
        }
      },
      audio_playback_stop(playbackKey) {
        const slot = slots.find((s) => s.playbackKey === playbackKey && playbackKey !== 0);
        if (slot === undefined) {
          log.info("info", `audio_playback_stop: playback ${playbackKey} already stopped`);
          return;
        }
        stopSlot(slot, "audio_playback_stop");
      },
      audio_source_delete(soundKey) {
        for (const slot of [...slots]) {
          if (slot.soundKey === soundKey && soundKey !== 0) stopSlot(slot, "audio_source_delete");
        }
        sounds.free(soundKey, "audio_source_delete");
      },
    });
  }

  function dispose(): void {
    for (const slot of slots) {
      if (slot.soundKey !== 0) stopSlot(slot, "dispose");
    }
    const ac = audio;
    audio = null;
    ac?.close().catch((e: unknown) => {
      log.warn("async-failure", `could not close audio output: ${describeError(e)}`, e);
    });
  }

  return { name: "audio", version: AUDIO_PLUGIN_VERSION, slots, register, dispose };
}
