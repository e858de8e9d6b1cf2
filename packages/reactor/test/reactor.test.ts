import { describe, it, expect, beforeEach } from "vitest";
import { createControlledClock, ms } from "@tickloop/clock";
import type { ControlledClock } from "@tickloop/clock";
import { createReactor, AlreadyRunningError, InvalidInputError } from "../src/index.js";
import type { CallbackContext, LoopEvent, Reactor, WatcherId } from "../src/index.js";
import { FakeHandle, FakeMultiplexer } from "./fake-multiplexer.js";

describe("Reactor", () => {
  let clock: ControlledClock;
  let multiplexer: FakeMultiplexer;
  let reactor: Reactor<FakeHandle>;
  let reported: Array<{ context: CallbackContext; error: unknown }>;

  beforeEach(() => {
    reported = [];
    clock = createControlledClock({ autoAdvance: true });
    multiplexer = new FakeMultiplexer(clock);
    reactor = createReactor({
      clock,
      multiplexer,
      reporter: { report: (context, error) => reported.push({ context, error }) },
    });
  });

  describe("defer()", () => {
    it("should run deferred callbacks in registration order", async () => {
      const order: string[] = [];
      reactor.defer(() => order.push("a"));
      reactor.defer(() => order.push("b"));
      reactor.defer(() => reactor.stop());

      expect(order).toEqual([]);
      await reactor.run();

      expect(order).toEqual(["a", "b"]);
    });

    it("should run callbacks deferred during a tick on the following tick", async () => {
      const order: string[] = [];
      reactor.defer(() => {
        order.push("a");
        reactor.defer(() => {
          order.push("c");
          reactor.stop();
        });
      });
      reactor.defer(() => order.push("b"));

      await reactor.run();

      expect(order).toEqual(["a", "b", "c"]);
    });

    it("should not wait for timers while deferred work is queued", async () => {
      let seenAt = -1;
      reactor.delay(ms(500), () => reactor.stop());
      reactor.defer(() => {
        reactor.defer(() => {
          seenAt = clock.now().monoMs;
        });
      });

      await reactor.run();

      // One idle millisecond between the two ticks, not the 500ms timer wait
      expect(seenAt).toBe(1);
    });

    it("should skip a deferred callback canceled before its tick", async () => {
      let fired = false;
      const id = reactor.defer(() => {
        fired = true;
      });
      reactor.defer(() => reactor.stop());
      reactor.cancel(id);

      await reactor.run();

      expect(fired).toBe(false);
    });
  });

  describe("delay()", () => {
    it("should fire once the deadline is reached", async () => {
      const firedAt: number[] = [];
      reactor.delay(ms(100), () => {
        firedAt.push(clock.now().monoMs);
        reactor.stop();
      });

      await reactor.run();

      expect(firedAt).toEqual([100]);
      expect(reactor.pending().delay).toBe(0);
    });

    it("should fire shorter delays first regardless of registration order", async () => {
      const order: string[] = [];
      reactor.delay(ms(200), () => order.push("late"));
      reactor.delay(ms(100), () => order.push("early"));
      reactor.delay(ms(300), () => reactor.stop());

      await reactor.run();

      expect(order).toEqual(["early", "late"]);
    });

    it("should fire timers due in the same tick in deadline order", async () => {
      const order: string[] = [];
      reactor.delay(ms(50), () => order.push("b"));
      reactor.delay(ms(20), () => order.push("a"));
      clock.advanceBy(ms(100));
      reactor.delay(ms(0), () => {
        order.push("stop");
        reactor.stop();
      });

      await reactor.run();

      expect(order).toEqual(["a", "b", "stop"]);
    });

    it("should pass the watcher id to the callback", async () => {
      let seen: unknown;
      const id = reactor.delay(ms(10), (own) => {
        seen = own;
        reactor.stop();
      });

      await reactor.run();

      expect(seen).toBe(id);
      expect(id).toEqual({ kind: "delay", seq: 1 });
    });

    it("should reject negative delays synchronously", () => {
      expect(() => reactor.delay(ms(-1), () => {})).toThrow(InvalidInputError);
      expect(() => reactor.delay(ms(-1), () => {})).toThrow("Delay must be non-negative");
      expect(() => reactor.delay(ms(Number.NaN), () => {})).toThrow(InvalidInputError);
      expect(reactor.pending().delay).toBe(0);
    });
  });

  describe("repeat()", () => {
    it("should fire every interval until canceled", async () => {
      const firedAt: number[] = [];
      reactor.repeat(ms(100), (id) => {
        firedAt.push(clock.now().monoMs);
        if (firedAt.length === 3) {
          reactor.cancel(id);
          reactor.stop();
        }
      });

      await reactor.run();

      expect(firedAt).toEqual([100, 200, 300]);
      expect(reactor.pending().repeat).toBe(0);
    });

    it("should reschedule from the firing instant without catching up", async () => {
      const firedAt: number[] = [];
      reactor.repeat(ms(100), () => {
        firedAt.push(clock.now().monoMs);
        if (firedAt.length === 1) {
          // Overrun: the callback takes 250ms
          clock.advanceBy(ms(250));
        }
        if (firedAt.length === 3) reactor.stop();
      });

      await reactor.run();

      expect(firedAt).toEqual([100, 450, 550]);
    });

    it("should reject negative intervals synchronously", () => {
      expect(() => reactor.repeat(ms(-5), () => {})).toThrow("Interval must be non-negative");
    });
  });

  describe("cancel()", () => {
    it("should prevent a pending timer from firing", async () => {
      let fired = false;
      const id = reactor.delay(ms(100), () => {
        fired = true;
      });
      reactor.delay(ms(50), () => reactor.cancel(id));
      reactor.delay(ms(200), () => reactor.stop());

      await reactor.run();

      expect(fired).toBe(false);
    });

    it("should prevent a timer canceled earlier in the same tick from firing", async () => {
      const order: string[] = [];
      const second = reactor.delay(ms(20), () => order.push("second"));
      reactor.delay(ms(10), () => {
        order.push("first");
        reactor.cancel(second);
      });
      clock.advanceBy(ms(30));
      reactor.delay(ms(0), () => reactor.stop());

      await reactor.run();

      expect(order).toEqual(["first"]);
    });

    it("should be a no-op for fired and unknown ids", async () => {
      const id = reactor.delay(ms(10), () => {});
      reactor.delay(ms(20), () => {
        reactor.cancel(id);
        reactor.stop();
      });

      await reactor.run();

      expect(() => reactor.cancel(id)).not.toThrow();
      const unknown: WatcherId = { kind: "readable", seq: 999 };
      expect(() => reactor.cancel(unknown)).not.toThrow();
    });

    it("should ignore ids that only look like its own", () => {
      const own = reactor.delay(ms(10), () => {});
      const lookalike: WatcherId = { kind: own.kind, seq: own.seq };

      reactor.cancel(lookalike);

      expect(reactor.pending().delay).toBe(1);
    });

    it("should ignore ids issued by another reactor", async () => {
      const other = createReactor({ clock, multiplexer: new FakeMultiplexer(clock), reporter: { report: () => {} } });
      const foreign = other.delay(ms(10), () => {});

      let fired = false;
      const own = reactor.delay(ms(10), () => {
        fired = true;
        reactor.stop();
      });
      expect(own).toEqual(foreign);

      reactor.cancel(foreign);
      await reactor.run();

      expect(fired).toBe(true);
      expect(other.pending().delay).toBe(1);
    });

    it("should never reuse watcher ids", () => {
      const handle = new FakeHandle("h");
      const ids = [
        reactor.defer(() => {}),
        reactor.delay(ms(1), () => {}),
        reactor.repeat(ms(1), () => {}),
        reactor.onReadable(handle, () => {}),
        reactor.onWritable(handle, () => {}),
      ];

      expect(ids.map((id) => id.seq)).toEqual([1, 2, 3, 4, 5]);
      expect(ids.map((id) => id.kind)).toEqual(["defer", "delay", "repeat", "readable", "writable"]);
    });
  });

  describe("callback failures", () => {
    it("should report failures and keep running the tick", async () => {
      const deferFailure = new Error("defer failed");
      const timerFailure = new Error("timer failed");
      const order: string[] = [];

      reactor.defer(() => {
        throw deferFailure;
      });
      reactor.defer(() => order.push("after"));
      reactor.delay(ms(0), () => {
        throw timerFailure;
      });
      reactor.delay(ms(10), () => reactor.stop());

      await reactor.run();

      expect(order).toEqual(["after"]);
      expect(reported).toEqual([
        { context: "defer", error: deferFailure },
        { context: "delay", error: timerFailure },
      ]);
    });

    it("should keep a failing repeat scheduled", async () => {
      let count = 0;
      reactor.repeat(ms(10), () => {
        count++;
        if (count === 2) reactor.stop();
        throw new Error(`tick ${count}`);
      });

      await reactor.run();

      expect(count).toBe(2);
      expect(reported.map((r) => r.context)).toEqual(["repeat", "repeat"]);
    });

    it("should emit failures when only an emit function is configured", async () => {
      const events: LoopEvent[] = [];
      const failure = new Error("boom");
      const emitting = createReactor({ clock, multiplexer, emit: (event) => events.push(event) });

      emitting.defer(() => {
        throw failure;
      });
      emitting.defer(() => emitting.stop());
      await emitting.run();

      expect(events.filter((e) => e.type === "loop:callback:error")).toEqual([
        { type: "loop:callback:error", context: "defer", error: failure },
      ]);
    });
  });

  describe("run() and stop()", () => {
    it("should refuse a reentrant run", async () => {
      let caught: unknown;
      reactor.defer(() => {
        try {
          void reactor.run();
        } catch (error) {
          caught = error;
        }
        reactor.stop();
      });

      await reactor.run();

      expect(caught).toBeInstanceOf(AlreadyRunningError);
      expect(reactor.isRunning()).toBe(false);
    });

    it("should throw synchronously when already running", async () => {
      const running = reactor.run();

      expect(() => reactor.run()).toThrow("Event loop is already running");

      reactor.stop();
      await running;
    });

    it("should finish the current tick after stop", async () => {
      const order: string[] = [];
      reactor.defer(() => reactor.stop());
      reactor.defer(() => order.push("deferred"));
      reactor.delay(ms(0), () => order.push("timer"));

      await reactor.run();

      expect(order).toEqual(["deferred", "timer"]);
    });

    it("should idle until stopped when nothing is scheduled", async () => {
      const running = reactor.run();
      await clock.flush();
      await clock.flush();

      expect(reactor.isRunning()).toBe(true);

      reactor.stop();
      await running;
      expect(reactor.isRunning()).toBe(false);
    });

    it("should ignore a stop requested before run", async () => {
      let fired = false;
      reactor.stop();
      reactor.delay(ms(10), () => {
        fired = true;
        reactor.stop();
      });

      await reactor.run();

      expect(fired).toBe(true);
    });

    it("should be restartable after stopping", async () => {
      const order: string[] = [];
      reactor.defer(() => {
        order.push("first");
        reactor.stop();
      });
      await reactor.run();

      reactor.defer(() => {
        order.push("second");
        reactor.stop();
      });
      await reactor.run();

      expect(order).toEqual(["first", "second"]);
    });

    it("should emit run lifecycle events", async () => {
      const events: LoopEvent[] = [];
      const emitting = createReactor({ clock, multiplexer, emit: (event) => events.push(event) });
      emitting.defer(() => emitting.stop());

      await emitting.run();

      expect(events).toEqual([
        { type: "loop:run:start", at: 0 },
        { type: "loop:run:stop", ticks: 1, at: 1 },
      ]);
    });
  });

  describe("stream watchers", () => {
    let handle: FakeHandle;

    beforeEach(() => {
      handle = new FakeHandle("socket");
    });

    it("should fire every tick while the handle stays ready", async () => {
      let count = 0;
      multiplexer.readyToRead.add(handle);
      reactor.onReadable(handle, (ready, id) => {
        expect(ready).toBe(handle);
        count++;
        if (count === 3) {
          reactor.cancel(id);
          reactor.stop();
        }
      });

      await reactor.run();

      expect(count).toBe(3);
      expect(multiplexer.calls[0]).toEqual({ read: [handle], write: [], timeoutMs: 1000 });
      expect(reactor.pending().readable).toBe(0);
    });

    it("should dispatch read before write for a handle ready both ways", async () => {
      const order: string[] = [];
      multiplexer.readyToRead.add(handle);
      multiplexer.readyToWrite.add(handle);
      reactor.onWritable(handle, () => {
        order.push("write");
        reactor.stop();
      });
      reactor.onReadable(handle, () => order.push("read"));

      await reactor.run();

      expect(order).toEqual(["read", "write"]);
    });

    it("should bound the wait by the nearest timer", async () => {
      let fired = false;
      reactor.onReadable(handle, () => {
        fired = true;
      });
      reactor.delay(ms(250), () => reactor.stop());

      await reactor.run();

      expect(fired).toBe(false);
      expect(multiplexer.calls.map((c) => c.timeoutMs)).toEqual([250, 1000]);
    });

    it("should cap the wait at one second", async () => {
      reactor.onWritable(handle, () => {});
      reactor.delay(ms(2500), () => reactor.stop());

      await reactor.run();

      expect(multiplexer.calls.map((c) => c.timeoutMs)).toEqual([1000, 1000, 500, 1000]);
    });

    it("should pass each handle to the multiplexer once", async () => {
      multiplexer.readyToRead.add(handle);
      let count = 0;
      reactor.onReadable(handle, () => count++);
      reactor.onReadable(handle, () => {
        count++;
        reactor.stop();
      });

      await reactor.run();

      expect(count).toBe(2);
      expect(multiplexer.calls[0]?.read).toEqual([handle]);
    });

    it("should reject invalid handles synchronously", () => {
      handle.closed = true;

      expect(() => reactor.onReadable(handle, () => {})).toThrow(InvalidInputError);
      expect(() => reactor.onWritable(handle, () => {})).toThrow("Handle is not a watchable I/O handle");
    });

    it("should abandon the I/O phase when the multiplexer fails", async () => {
      const failure = new Error("select failed");
      let count = 0;
      multiplexer.readyToRead.add(handle);
      multiplexer.failNext(failure);
      reactor.onReadable(handle, () => {
        count++;
        reactor.stop();
      });

      await reactor.run();

      expect(count).toBe(1);
      expect(multiplexer.calls).toHaveLength(2);
      expect(reported).toEqual([{ context: "select", error: failure }]);
    });

    it("should report readiness callback failures", async () => {
      const failure = new Error("read failed");
      multiplexer.readyToWrite.add(handle);
      reactor.onWritable(handle, () => {
        reactor.stop();
        throw failure;
      });

      await reactor.run();

      expect(reported).toEqual([{ context: "writable", error: failure }]);
    });
  });

  describe("pending()", () => {
    it("should count scheduled work per table", () => {
      const handle = new FakeHandle("h");
      reactor.defer(() => {});
      reactor.delay(ms(10), () => {});
      reactor.delay(ms(20), () => {});
      const repeat = reactor.repeat(ms(10), () => {});
      reactor.onReadable(handle, () => {});
      reactor.cancel(repeat);

      expect(reactor.pending()).toEqual({ defer: 1, delay: 2, repeat: 0, readable: 1, writable: 0 });
    });
  });
});
