import { IdCounter } from "./handle-registry.js";

type Entry<T> = { settled: false } | { settled: true; value: T };

/**
 * Results of host async operations waiting to be polled by the guest.
 *
 * A settled value is handed out exactly once; after `take` the id is gone and
 * every later poll sees nothing.
 */
export class PendingTable<T> {
  private readonly entries = new Map<number, Entry<T>>();

  constructor(private readonly counter: IdCounter = new IdCounter()) {}

  open(): number {
    const id = this.counter.take();
    this.entries.set(id, { settled: false });
    return id;
  }

  /** Returns false when `id` is unknown or already settled. */
  settle(id: number, value: T): boolean {
    if (this.entries.get(id)?.settled !== false) return false;
    this.entries.set(id, { settled: true, value });
    return true;
  }

  isSettled(id: number): boolean {
    return this.entries.get(id)?.settled === true;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  /** The settled value without consuming it. */
  peek(id: number): T | undefined {
    const entry = this.entries.get(id);
    return entry?.settled ? entry.value : undefined;
  }

  take(id: number): T | undefined {
    const entry = this.entries.get(id);
    if (!entry?.settled) return undefined;
    this.entries.delete(id);
    return entry.value;
  }

  /** Drop an entry whatever its state. */
  discard(id: number): void {
    this.entries.delete(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
