// src/runtime/concurrency.ts
//
// Tasks and streams.
//
// `launch { ... }` starts the lambda right away on the host event loop and
// returns a Deferred. The deferred records how the task settled, so a task
// nobody awaits never surfaces as an unhandled rejection; `await()` rethrows
// the task's failure in the awaiting code instead.
//
// `flow { emit(x) }` is cold: nothing runs until a collector subscribes, and
// every collection runs the producer again.

import { Obj } from "./values";
import type { Value } from "./values";

type Settled = { state: "active" } | { state: "done"; value: Value } | { state: "failed"; error: unknown };

export class DeferredObj extends Obj {
  public readonly typeName = "Deferred";
  private settled: Settled = { state: "active" };
  private readonly promise: Promise<void>;

  constructor(task: Promise<Value>) {
    super();
    this.promise = task.then(
      (value) => {
        this.settled = { state: "done", value };
      },
      (error: unknown) => {
        this.settled = { state: "failed", error };
      },
    );
  }

  public get isCompleted(): boolean {
    return this.settled.state !== "active";
  }

  public get isActive(): boolean {
    return this.settled.state === "active";
  }

  public async await(): Promise<Value> {
    await this.promise;
    const s = this.settled;
    if (s.state === "failed") throw s.error;
    if (s.state === "done") return s.value;
    return null;
  }
}

/** Producer receives an `emit` callback; resolves when the producer returns. */
export type FlowProducer = (emit: (v: Value) => Promise<void>) => Promise<void>;

export class FlowObj extends Obj {
  public readonly typeName = "Flow";

  constructor(private readonly producer: FlowProducer) {
    super();
  }

  public collect(collector: (v: Value) => Promise<void>): Promise<void> {
    return this.producer(collector);
  }

  public async toArray(): Promise<Value[]> {
    const out: Value[] = [];
    await this.collect(async (v) => {
      out.push(v);
    });
    return out;
  }
}
