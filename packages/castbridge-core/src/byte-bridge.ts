import { BridgeClosedError, BridgeRoleError } from "./errors.js";

type Waker = () => void;

interface PendingPull {
  out: Uint8Array;
  read: number;
  returned: boolean;
}

/** Bounded single-producer, single-consumer byte FIFO. */
export class ByteBridge {
  readonly capacity: number;
  private readonly ring: Uint8Array;
  private head = 0;
  private length = 0;
  private closed = false;
  private pushing = false;
  private consumer: PendingPull | undefined;
  private carry: Uint8Array = new Uint8Array(0);
  private spaceWaker: Waker | undefined;
  private dataWaker: Waker | undefined;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Byte bridge capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.ring = new Uint8Array(capacity);
  }

  get size(): number {
    return this.length + this.carry.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new BridgeClosedError();
    }
    if (this.pushing) {
      throw new BridgeRoleError("producer");
    }

    this.pushing = true;
    try {
      let written = 0;
      while (written < bytes.length) {
        if (this.closed) {
          throw new BridgeClosedError();
        }
        if (this.length === this.capacity) {
          await this.waitForSpace();
          continue;
        }
        written += this.writeFrom(bytes, written);
        this.wake("data");
      }
    } finally {
      this.pushing = false;
    }
  }

  /**
   * Resolves with exactly `count` bytes. Once the bridge is closed the
   * remainder is returned, possibly short, and then `null`.
   *
   * Aborting rejects with the signal's reason. Bytes the aborted pull had
   * already taken are handed to the next pull first.
   */
  async pull(count: number, signal?: AbortSignal): Promise<Uint8Array | null> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Pull count must be a non-negative integer, got ${count}`);
    }
    if (this.consumer) {
      throw new BridgeRoleError("consumer");
    }

    const pending: PendingPull = { out: new Uint8Array(count), read: 0, returned: false };
    this.consumer = pending;
    try {
      const { out } = pending;
      while (pending.read < count) {
        signal?.throwIfAborted();
        if (this.carry.length > 0) {
          pending.read += this.takeCarry(out, pending.read);
          continue;
        }
        if (this.length === 0) {
          if (this.closed) {
            break;
          }
          await this.waitForData(pending, signal);
          continue;
        }
        pending.read += this.readInto(out, pending.read);
        this.wake("space");
      }

      if (pending.read === 0 && count > 0) {
        return null;
      }
      return pending.read === count ? out : out.slice(0, pending.read);
    } catch (error) {
      this.returnTaken(pending);
      throw error;
    } finally {
      if (this.consumer === pending) {
        this.consumer = undefined;
      }
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.wake("space");
    this.wake("data");
  }

  private writeFrom(bytes: Uint8Array, start: number): number {
    const free = this.capacity - this.length;
    const n = Math.min(free, bytes.length - start);
    const tail = (this.head + this.length) % this.capacity;
    const firstRun = Math.min(n, this.capacity - tail);
    this.ring.set(bytes.subarray(start, start + firstRun), tail);
    if (n > firstRun) {
      this.ring.set(bytes.subarray(start + firstRun, start + n), 0);
    }
    this.length += n;
    return n;
  }

  private takeCarry(out: Uint8Array, start: number): number {
    const n = Math.min(this.carry.length, out.length - start);
    out.set(this.carry.subarray(0, n), start);
    this.carry = this.carry.subarray(n);
    return n;
  }

  private returnTaken(pending: PendingPull): void {
    if (pending.returned || pending.read === 0) {
      return;
    }
    pending.returned = true;
    const merged = new Uint8Array(pending.read + this.carry.length);
    merged.set(pending.out.subarray(0, pending.read));
    merged.set(this.carry, pending.read);
    this.carry = merged;
  }

  private readInto(out: Uint8Array, start: number): number {
    const n = Math.min(this.length, out.length - start);
    const firstRun = Math.min(n, this.capacity - this.head);
    out.set(this.ring.subarray(this.head, this.head + firstRun), start);
    if (n > firstRun) {
      out.set(this.ring.subarray(0, n - firstRun), start + firstRun);
    }
    this.head = (this.head + n) % this.capacity;
    this.length -= n;
    return n;
  }

  private wake(which: "space" | "data"): void {
    const waker = which === "space" ? this.spaceWaker : this.dataWaker;
    if (which === "space") {
      this.spaceWaker = undefined;
    } else {
      this.dataWaker = undefined;
    }
    waker?.();
  }

  private waitForSpace(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.spaceWaker = resolve;
    });
  }

  private waitForData(pending: PendingPull, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        // Runs synchronously so a replacement reader sees the returned bytes and a free role.
        this.dataWaker = undefined;
        this.returnTaken(pending);
        this.consumer = undefined;
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.dataWaker = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
    });
  }
}
