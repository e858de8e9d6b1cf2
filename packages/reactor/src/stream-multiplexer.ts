import type { EventEmitter } from "node:events";
import { Readable, Writable } from "node:stream";
import type { Millis } from "@tickloop/clock";
import type { Readiness, ReadinessMultiplexer } from "./types.js";

export type StreamHandle = Readable | Writable;

const READ_WAKE_EVENTS = ["readable", "end", "close", "error"] as const;
const WRITE_WAKE_EVENTS = ["drain", "close", "error"] as const;

function isReadReady(handle: StreamHandle): boolean {
  if (!(handle instanceof Readable)) return false;
  return handle.destroyed || handle.readableEnded || handle.readableLength > 0;
}

function isWriteReady(handle: StreamHandle): boolean {
  if (!(handle instanceof Writable)) return false;
  return handle.destroyed || (handle.writable && !handle.writableNeedDrain);
}

/**
 * Level-triggered readiness over Node streams. Destroyed or ended streams
 * report ready so their watchers observe the condition and can cancel.
 */
export class StreamMultiplexer implements ReadinessMultiplexer<StreamHandle> {
  isHandle(value: unknown): value is StreamHandle {
    return (value instanceof Readable || value instanceof Writable) && !value.destroyed;
  }

  async select(
    read: readonly StreamHandle[],
    write: readonly StreamHandle[],
    timeoutMs: Millis,
  ): Promise<Readiness<StreamHandle>> {
    const ready = this.poll(read, write);
    if (ready.readable.length > 0 || ready.writable.length > 0 || timeoutMs <= 0) {
      // Always give the host one macrotask so stream events can land
      await new Promise((resolve) => setImmediate(resolve));
      return this.poll(read, write);
    }

    await new Promise<void>((resolve) => {
      const cleanup: (() => void)[] = [];
      const wake = () => {
        for (const fn of cleanup) fn();
        resolve();
      };

      const timer = setTimeout(wake, timeoutMs);
      cleanup.push(() => clearTimeout(timer));

      const listen = (emitter: EventEmitter, events: readonly string[]) => {
        for (const event of events) {
          emitter.once(event, wake);
          cleanup.push(() => emitter.removeListener(event, wake));
        }
      };

      for (const handle of read) listen(handle, READ_WAKE_EVENTS);
      for (const handle of write) listen(handle, WRITE_WAKE_EVENTS);
    });

    return this.poll(read, write);
  }

  private poll(read: readonly StreamHandle[], write: readonly StreamHandle[]): Readiness<StreamHandle> {
    return {
      readable: read.filter(isReadReady),
      writable: write.filter(isWriteReady),
    };
  }
}

export function createStreamMultiplexer(): StreamMultiplexer {
  return new StreamMultiplexer();
}
