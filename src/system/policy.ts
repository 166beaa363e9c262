// src/system/policy.ts
//
// Access policies for the host capability modules. A module asks its policy
// before every operation; `require` turns a denial into a catchable
// IllegalOperationException. The rules themselves belong to the embedder:
// the factories below are the common cases.
//
// Defaults: the filesystem is open, processes are closed.

import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import { isWithin } from "../utils/paths";

export type AccessDecision = { allowed: true } | { allowed: false; reason: string };

const ALLOW: AccessDecision = { allowed: true };

function deny(reason: string): AccessDecision {
  return { allowed: false, reason };
}

export abstract class AccessPolicy<Op extends { kind: string }> {
  public abstract check(op: Op): AccessDecision;

  public require(op: Op): void {
    const decision = this.check(op);
    if (!decision.allowed) throw new QuillRuntimeError("IllegalOperationException", decision.reason);
  }
}

/* =========================================================
   Filesystem
   ========================================================= */

export type FsAccessOp =
  | { kind: "ListDir"; path: string }
  | { kind: "OpenRead"; path: string }
  | { kind: "OpenWrite"; path: string }
  | { kind: "OpenAppend"; path: string }
  | { kind: "CreateFile"; path: string }
  | { kind: "Delete"; path: string }
  | { kind: "Rename"; from: string; to: string };

export function fsOpPaths(op: FsAccessOp): string[] {
  return op.kind === "Rename" ? [op.from, op.to] : [op.path];
}

export class FsAccessPolicy extends AccessPolicy<FsAccessOp> {
  constructor(private readonly rule: (op: FsAccessOp) => AccessDecision) {
    super();
  }

  public check(op: FsAccessOp): AccessDecision {
    return this.rule(op);
  }

  public static permitAll(): FsAccessPolicy {
    return new FsAccessPolicy(() => ALLOW);
  }

  public static denyAll(): FsAccessPolicy {
    return new FsAccessPolicy((op) => deny(`filesystem access denied: ${op.kind}`));
  }

  /** Every path an operation touches must lie inside one of `roots`. Empty list: permit all. */
  public static roots(roots: string[]): FsAccessPolicy {
    if (roots.length === 0) return FsAccessPolicy.permitAll();
    return new FsAccessPolicy((op) => {
      const outside = fsOpPaths(op).find((p) => !roots.some((r) => isWithin(r, p)));
      return outside === undefined ? ALLOW : deny(`${op.kind} outside the allowed directories: ${outside}`);
    });
  }

  /** Reads and listings only. */
  public static readOnly(): FsAccessPolicy {
    return new FsAccessPolicy((op) =>
      op.kind === "OpenRead" || op.kind === "ListDir" ? ALLOW : deny(`filesystem is read-only: ${op.kind}`),
    );
  }
}

/* =========================================================
   Processes
   ========================================================= */

export type ProcessAccessOp = { kind: "Execute"; command: string; args: string[] } | { kind: "Shell"; command: string };

export class ProcessAccessPolicy extends AccessPolicy<ProcessAccessOp> {
  constructor(private readonly rule: (op: ProcessAccessOp) => AccessDecision) {
    super();
  }

  public check(op: ProcessAccessOp): AccessDecision {
    return this.rule(op);
  }

  public static permitAll(): ProcessAccessPolicy {
    return new ProcessAccessPolicy(() => ALLOW);
  }

  public static denyAll(): ProcessAccessPolicy {
    return new ProcessAccessPolicy((op) => deny(`process access denied: ${op.kind}`));
  }

  /** `Execute` of the named commands only; `Shell` is always denied. */
  public static allowCommands(commands: string[]): ProcessAccessPolicy {
    return new ProcessAccessPolicy((op) => {
      if (op.kind === "Shell") return deny("shell access denied");
      return commands.includes(op.command) ? ALLOW : deny(`command not allowed: ${op.command}`);
    });
  }
}
