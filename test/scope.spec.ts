// test/scope.spec.ts

import { describe, expect, it } from "vitest";

import { Scope } from "../src/core/scope";
import { ScopePool } from "../src/core/scopePool";
import { ScopeCycleError } from "../src/diagnostics/scriptErrors";

describe("Scope", () => {
  it("refuses to become its own ancestor", () => {
    const outer = new Scope(null);
    const inner = new Scope(outer);
    const deepest = new Scope(inner);

    expect(() => outer.attach(deepest)).toThrow(ScopeCycleError);
    expect(() => outer.attach(outer)).toThrow(`scope ${outer.frameId} would become its own ancestor`);
    expect(outer.parent).toBeNull();
    expect(deepest.hasAncestor(outer)).toBe(true);
  });

  it("gets a fresh frame id on every attach", () => {
    const root = new Scope(null);
    const frame = new Scope(root);
    const first = frame.frameId;
    frame.clear();
    frame.attach(root);
    expect(frame.frameId).toBeGreaterThan(first);
  });
});

describe("ScopePool", () => {
  it("falls back to a new frame when reuse would form a cycle", () => {
    const pool = new ScopePool();
    const root = new Scope(null);
    const frame = pool.borrow(root);
    const child = new Scope(frame);
    pool.release(frame);

    const next = pool.borrow(child);
    expect(next).not.toBe(frame);
    expect(next.parent).toBe(child);
    expect(pool.stats()).toEqual({ borrowed: 2, reused: 0, fallbacks: 1, idle: 1 });

    const reused = pool.borrow(root);
    expect(reused).toBe(frame);
    expect(reused.parent).toBe(root);
    expect(pool.stats()).toEqual({ borrowed: 3, reused: 1, fallbacks: 1, idle: 0 });
  });

  it("hands out released frames cleared", () => {
    const pool = new ScopePool();
    const root = new Scope(null);
    const frame = pool.borrow(root, { args: [1n] });
    frame.define("x", 1n);
    const id = frame.frameId;
    pool.release(frame);

    const again = pool.borrow(root);
    expect(again).toBe(frame);
    expect(again.getLocal("x")).toBeNull();
    expect(again.args).toEqual([]);
    expect(again.frameId).toBeGreaterThan(id);
  });

  it("keeps at most maxIdle frames", () => {
    const pool = new ScopePool(1);
    const root = new Scope(null);
    const a = pool.borrow(root);
    const b = pool.borrow(root);
    pool.release(a);
    pool.release(b);
    expect(pool.stats().idle).toBe(1);
  });
});
