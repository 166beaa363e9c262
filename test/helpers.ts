// test/helpers.ts

import { Engine } from "../src/core/engine";
import type { EngineOptions } from "../src/core/engine";
import type { Value } from "../src/runtime/values";

export type TestEngine = {
  engine: Engine;
  /** Everything the script printed; println lines without their newline. */
  lines: string[];
};

export async function testEngine(options: EngineOptions = {}): Promise<TestEngine> {
  const lines: string[] = [];
  const engine = await Engine.create({
    ...options,
    host: {
      print: (line) => {
        lines.push(line);
      },
      write: (text) => {
        lines.push(text);
      },
      ...options.host,
    },
  });
  return { engine, lines };
}

export type EvalResult = {
  value: Value;
  /** The value as the language prints it. */
  text: string;
  lines: string[];
};

export async function evalText(code: string, options: EngineOptions = {}): Promise<EvalResult> {
  const { engine, lines } = await testEngine(options);
  const value = await engine.eval(code);
  return { value, text: await engine.evaluator().stringify(value), lines };
}

/** The rejection of `promise`; fails the test when it resolves. */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error("expected the promise to reject");
}

export function lines(...source: string[]): string {
  return source.join("\n");
}
