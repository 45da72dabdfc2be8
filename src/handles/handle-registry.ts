import type { DiagnosticLog } from "../errors/log.js";

/**
 * Free-running id source. Several registries may share one counter, in which
 * case an id is unique across all of them (graphics object kinds do this).
 */
export class IdCounter {
  private next: number;

  constructor(first = 1) {
    this.next = first;
  }

  take(): number {
    return this.next++;
  }

  peek(): number {
    return this.next;
  }
}

type Slot<T> =
  | { state: "live"; value: T }
  | { state: "pending" }
  | { state: "freed" };

/**
 * Slot table mapping small integers handed to the guest onto host objects.
 *
 * Ids are never reused. A slot allocated with `null` is pending until `set`
 * fills it; lookups on pending, freed or never-allocated ids report an
 * invalid-handle diagnostic and return `null`.
 */
export class HandleRegistry<T> {
  // Indexed by id. Holes are ids this registry never allocated (taken by a
  // sibling registry on a shared counter, or below the counter's start).
  private readonly slots: (Slot<T> | undefined)[] = [];
  private liveCount = 0;

  constructor(
    readonly kind: string,
    private readonly log: DiagnosticLog,
    private readonly counter: IdCounter = new IdCounter(),
  ) {}

  get size(): number {
    return this.liveCount;
  }

  allocate(value: T | null): number {
    const id = this.counter.take();
    while (this.slots.length < id) this.slots.push(undefined);
    if (value === null) {
      this.slots[id] = { state: "pending" };
    } else {
      this.slots[id] = { state: "live", value };
      this.liveCount++;
    }
    return id;
  }

  /** Fill a pending slot. Returns false when `id` is not pending. */
  set(id: number, value: T): boolean {
    const slot = this.slots[id];
    if (slot?.state !== "pending") {
      this.log.error("invalid-handle", `${this.kind} ${id}: cannot fulfil a slot that is not pending`);
      return false;
    }
    this.slots[id] = { state: "live", value };
    this.liveCount++;
    return true;
  }

  lookup(id: number, caller: string): T | null {
    const slot = this.slots[id];
    if (slot?.state === "live") return slot.value;
    this.log.error("invalid-handle", `${caller}: ${this.describe(id, slot)}`);
    return null;
  }

  /** Like `lookup`, but id 0 means "no object" and is not an error. */
  lookupOrNone(id: number, caller: string): T | null {
    return id === 0 ? null : this.lookup(id, caller);
  }

  /** Non-reporting lookup for code that probes ids itself. */
  peek(id: number): T | null {
    const slot = this.slots[id];
    return slot?.state === "live" ? slot.value : null;
  }

  isReady(id: number): boolean {
    return this.slots[id]?.state === "live";
  }

  isPending(id: number): boolean {
    return this.slots[id]?.state === "pending";
  }

  /** Reverse lookup; 0 when `value` is not held. */
  idOf(value: T): number {
    for (let id = 0; id < this.slots.length; id++) {
      const slot = this.slots[id];
      if (slot?.state === "live" && slot.value === value) return id;
    }
    return 0;
  }

  /** Empty a live or pending slot. Returns the freed value, if it was live. */
  free(id: number, caller: string): T | null {
    const slot = this.slots[id];
    if (slot === undefined || slot.state === "freed") {
      this.log.error("invalid-handle", `${caller}: ${this.describe(id, slot)}`);
      return null;
    }
    this.slots[id] = { state: "freed" };
    if (slot.state === "live") {
      this.liveCount--;
      return slot.value;
    }
    return null;
  }

  *entries(): IterableIterator<[number, T]> {
    for (let id = 0; id < this.slots.length; id++) {
      const slot = this.slots[id];
      if (slot?.state === "live") yield [id, slot.value];
    }
  }

  private describe(id: number, slot: Slot<T> | undefined): string {
    if (slot?.state === "freed") return `${this.kind} ${id} was already deleted`;
    if (slot?.state === "pending") return `${this.kind} ${id} is not ready yet`;
    return `invalid ${this.kind} id ${id}`;
  }
}
