// src/core/engine.ts
//
// Quill Engine
// ------------
// One engine = one root scope, one frame pool, one module registry and the
// host services scripts print and sleep through. Engines share nothing, so a
// worker thread simply creates its own.
//
//   const engine = await Engine.create({ logger });
//   await engine.eval(`println("hi")`);
//
// Each execution gets its own Evaluator bound to the caller's AbortSignal; the
// root scope, the pool and the registry outlive it.

import { ModuleRegistry } from "../modules/registry";
import type { ModuleHost } from "../modules/registry";
import { allowAll } from "../modules/security";
import type { SecurityManager } from "../modules/security";
import { installBuiltins } from "../runtime/builtins";
import { defaultHostServices } from "../runtime/interop";
import type { HostServices } from "../runtime/interop";
import { PRELUDE_FILE, PRELUDE_SOURCE } from "../runtime/prelude";
import type { Value } from "../runtime/values";
import { FS_PACKAGE, fileModule } from "../system/file";
import { FsAccessPolicy, ProcessAccessPolicy } from "../system/policy";
import { PROCESS_PACKAGE, processModule } from "../system/process";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { compile } from "./compiler";
import type { Script } from "./compiler";
import { Evaluator } from "./evaluator";
import { ModuleScope, Scope } from "./scope";
import { ScopePool } from "./scopePool";
import type { ScopePoolStats } from "./scopePool";

export type EngineOptions = {
  logger?: Logger;
  host?: Partial<HostServices>;
  /** Recycle frames of closure-free functions (default true). */
  usePool?: boolean;
  security?: SecurityManager;
  /** Default: permit all. */
  fsPolicy?: FsAccessPolicy;
  /** Default: deny all. */
  processPolicy?: ProcessAccessPolicy;
  /** Name used for sources passed to eval() without one. */
  fileName?: string;
  /** Base directory of relative paths in the host modules. */
  cwd?: string;
};

export type ExecuteOptions = {
  signal?: AbortSignal;
};

export type EvalOptions = ExecuteOptions & {
  fileName?: string;
  scope?: Scope;
};

export class Engine implements ModuleHost {
  public readonly rootScope: Scope;
  public readonly modules: ModuleRegistry;
  public readonly host: HostServices;
  public readonly logger: Logger;

  private readonly pool: ScopePool | null;
  private readonly fileName: string;
  private readonly options: EngineOptions;
  private readying: Promise<void> | null = null;

  constructor(options: EngineOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger();
    this.host = { ...defaultHostServices(), ...options.host };
    this.fileName = options.fileName ?? "<eval>";
    this.pool = options.usePool === false ? null : new ScopePool(64, this.logger.child("pool"));

    this.rootScope = new Scope(null, { fileName: "<root>" });
    installBuiltins(this.rootScope);

    this.modules = new ModuleRegistry(this, {
      security: options.security ?? allowAll(),
      logger: this.logger.child("modules"),
    });
  }

  /** An engine whose prelude and host modules are in place. */
  public static async create(options: EngineOptions = {}): Promise<Engine> {
    const engine = new Engine(options);
    await engine.ready();
    return engine;
  }

  /** Registers the host modules and runs the prelude; runs once. */
  public ready(): Promise<void> {
    this.readying ??= this.initialize();
    return this.readying;
  }

  private async initialize(): Promise<void> {
    const o = this.options;
    await this.modules.registerAll({
      [FS_PACKAGE]: fileModule({
        policy: o.fsPolicy ?? FsAccessPolicy.permitAll(),
        cwd: o.cwd,
        logger: this.logger.child("fs"),
      }),
      [PROCESS_PACKAGE]: processModule({
        policy: o.processPolicy ?? ProcessAccessPolicy.denyAll(),
        cwd: o.cwd,
        logger: this.logger.child("process"),
      }),
    });

    const prelude = compile(PRELUDE_SOURCE, { fileName: PRELUDE_FILE });
    await this.evaluator().evaluateProgram(prelude.program, this.rootScope);
  }

  /* =========================================================
     Compile / run
     ========================================================= */

  /** Compiles with the registry's security manager. */
  public compile(text: string, fileName = this.fileName): Script {
    return compile(text, { fileName, security: this.modules.security });
  }

  public async eval(code: string, options: EvalOptions = {}): Promise<Value> {
    await this.ready();
    const script = this.compile(code, options.fileName ?? this.fileName);
    return this.execute(script, options.scope, { signal: options.signal });
  }

  /**
   * Runs `script` with `scope` as its top-level frame (default: a fresh child
   * of the root scope). Uncaught language exceptions reject with ExecutionError.
   */
  public async execute(script: Script, scope?: Scope, options: ExecuteOptions = {}): Promise<Value> {
    await this.ready();
    const target = scope ?? this.createScope(script.source.fileName);
    const timer = this.logger.time(`execute ${script.source.fileName}`);
    try {
      return await this.evaluator(options.signal).evaluateProgram(script.program, target);
    } finally {
      timer.end();
    }
  }

  /* =========================================================
     Scopes
     ========================================================= */

  public createScope(fileName = this.fileName): Scope {
    return new Scope(this.rootScope, { fileName });
  }

  /** A detached module scope; it is not registered. */
  public createModuleScope(packageName: string): ModuleScope {
    return new ModuleScope(packageName, this.rootScope);
  }

  /** An interpreter bound to this engine; used by natives outside a running script (codec, embedders). */
  public evaluator(signal?: AbortSignal): Evaluator {
    return new Evaluator({
      rootScope: this.rootScope,
      host: this.host,
      logger: this.logger,
      pool: this.pool,
      modules: this.modules,
      signal,
    });
  }

  public poolStats(): ScopePoolStats | null {
    return this.pool?.stats() ?? null;
  }
}
