// The part of a Web Audio context the audio bridge uses.

export interface HostAudioParam {
  value: number;
  setValueAtTime(value: number, time: number): void;
  linearRampToValueAtTime(value: number, endTime: number): void;
  cancelScheduledValues(startTime: number): void;
}

export interface HostAudioNode {
  connect(destination: HostAudioNode, output?: number, input?: number): void;
  disconnect(): void;
}

export interface HostGainNode extends HostAudioNode {
  readonly gain: HostAudioParam;
}

export interface HostAudioBuffer {
  readonly duration: number;
}

export interface HostBufferSource extends HostAudioNode {
  buffer: HostAudioBuffer | null;
  loop: boolean;
  readonly playbackRate: HostAudioParam;
  start(when?: number): void;
  stop(when?: number): void;
  addEventListener(type: "ended", listener: () => void): void;
  removeEventListener(type: "ended", listener: () => void): void;
}

export interface HostAudioContext {
  readonly currentTime: number;
  /** "suspended", "running" or "closed". */
  readonly state: string;
  readonly destination: HostAudioNode;
  createBufferSource(): HostBufferSource;
  createGain(): HostGainNode;
  createChannelMerger(inputs: number): HostAudioNode;
  createBuffer(channels: number, length: number, sampleRate: number): HostAudioBuffer;
  decodeAudioData(data: ArrayBuffer): Promise<HostAudioBuffer>;
  resume(): Promise<void>;
  close(): Promise<void>;
}
