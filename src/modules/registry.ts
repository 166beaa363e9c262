// src/modules/registry.ts
//
// Quill Module Registry
// ---------------------
// Maps a package name to a builder. Registration only records the builder;
// the builder runs on first import, and the module scope it fills is cached
// and handed to every later importer.
//
// Provider kinds:
//   - register(name, builder)     native builders (host modules, embedders)
//   - registerSource(text)        Quill source; package name from its header
//   - registerSources(texts)      several sources; files sharing a package
//                                 are merged into one module, evaluated in
//                                 registration order in one scope
//
// Concurrency: the lock covers registration and the start of a build. Racing
// first imports share one build promise. A failed build leaves nothing cached
// and may be retried. Builders may import other packages; the lock is not
// held while a builder runs. An import made while its own package is still
// building, directly or through other packages, is an ImportError.

import { UNKNOWN_POSITION } from "../core/ast";
import { checkImports, compile } from "../core/compiler";
import type { Script } from "../core/compiler";
import { ModuleScope } from "../core/scope";
import type { Scope } from "../core/scope";
import { ImportError, ScriptError, toSourcePosition } from "../diagnostics/scriptErrors";
import type { SourcePosition } from "../diagnostics/scriptErrors";
import type { Value } from "../runtime/values";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { AsyncMutex } from "./mutex";
import type { ImportProvider } from "./provider";
import { allowAll } from "./security";
import type { SecurityManager } from "./security";

/** What a registry needs from the engine that owns it. */
export interface ModuleHost {
  readonly rootScope: Scope;
  /** Runs a compiled script with `scope` as its top-level frame. */
  execute(script: Script, scope: Scope): Promise<Value>;
}

export type ModuleBuilder = (scope: ModuleScope, host: ModuleHost) => Promise<void> | void;

export type ModuleRegistryOptions = {
  security?: SecurityManager;
  logger?: Logger;
};

type Provider = { kind: "builder"; build: ModuleBuilder } | { kind: "source"; scripts: Script[] };

const REGISTRY_POS: SourcePosition = toSourcePosition("<registry>", UNKNOWN_POSITION);

export class ModuleRegistry implements ImportProvider {
  public readonly security: SecurityManager;
  private readonly logger: Logger;
  private readonly mutex = new AsyncMutex();

  private readonly providers = new Map<string, Provider>();
  private readonly built = new Map<string, ModuleScope>();
  private readonly building = new Map<string, Promise<ModuleScope>>();
  /** Building package -> the package whose build it is waiting for. */
  private readonly waits = new Map<string, string>();

  constructor(
    private readonly host: ModuleHost,
    options: ModuleRegistryOptions = {},
  ) {
    this.security = options.security ?? allowAll();
    this.logger = options.logger ?? silentLogger();
  }

  /* =========================================================
     Registration
     ========================================================= */

  public register(name: string, builder: ModuleBuilder): Promise<void> {
    return this.mutex.runExclusive(() => this.add(name, { kind: "builder", build: builder }));
  }

  public registerAll(builders: Record<string, ModuleBuilder>): Promise<void> {
    return this.mutex.runExclusive(() => {
      for (const [name, build] of Object.entries(builders)) this.add(name, { kind: "builder", build });
    });
  }

  /** Registers one source file; returns its package name. */
  public async registerSource(text: string, fileName?: string): Promise<string> {
    const [name] = await this.registerSources([{ text, fileName }]);
    return name;
  }

  /**
   * Registers several source files at once. Files declaring the same package
   * join one module; a package already registered by another call is an error.
   */
  public async registerSources(sources: { text: string; fileName?: string }[]): Promise<string[]> {
    const scripts = sources.map((s) => {
      const script = compile(s.text, { fileName: s.fileName, security: this.security });
      if (script.packageName === null) {
        throw new ScriptError(toSourcePosition(script.source.fileName, UNKNOWN_POSITION), "source module needs a 'package' header");
      }
      return { script, packageName: script.packageName };
    });

    return this.mutex.runExclusive(() => {
      const grouped = new Map<string, Script[]>();
      for (const { script, packageName } of scripts) {
        const list = grouped.get(packageName) ?? [];
        list.push(script);
        grouped.set(packageName, list);
      }
      for (const name of grouped.keys()) this.assertUnregistered(name);
      for (const [name, list] of grouped) this.add(name, { kind: "source", scripts: list });
      return [...grouped.keys()];
    });
  }

  private assertUnregistered(name: string): void {
    if (this.providers.has(name)) throw new ImportError(REGISTRY_POS, name, `package '${name}' is already registered`);
  }

  private add(name: string, provider: Provider): void {
    this.assertUnregistered(name);
    this.providers.set(name, provider);
    this.logger.debug("module registered", { name, kind: provider.kind });
  }

  public isRegistered(name: string): boolean {
    return this.providers.has(name);
  }

  public packageNames(): string[] {
    return [...this.providers.keys()].sort();
  }

  /** Modules built so far, by package name. */
  public loadedModules(): ModuleScope[] {
    return [...this.built.keys()].sort().flatMap((name) => this.built.get(name) ?? []);
  }

  /** Drops every built module; registrations stay. */
  public teardown(): void {
    this.built.clear();
    this.logger.debug("module cache dropped");
  }

  /* =========================================================
     Import
     ========================================================= */

  public importModule(name: string, pos?: SourcePosition, from?: Scope): Promise<ModuleScope> {
    return this.import(name, pos, from);
  }

  public async import(name: string, pos: SourcePosition = REGISTRY_POS, from?: Scope): Promise<ModuleScope> {
    if (!this.security.canImportModule(name)) {
      this.logger.warn("import denied", { name });
      throw new ImportError(pos, name, `import of package '${name}' is not allowed`);
    }

    // a build waiting on itself would never settle
    const chain = from?.moduleScope()?.buildChain ?? [];
    if (chain.includes(name)) {
      throw new ImportError(pos, name, `cyclic import of '${name}' (${[...chain, name].join(" -> ")})`);
    }

    const cached = this.built.get(name);
    if (cached) return cached;

    const importer = chain.length > 0 ? chain[chain.length - 1] : null;

    // wrapped so the lock is released before the build settles
    const { pending } = await this.mutex.runExclusive(() => {
      const done = this.built.get(name);
      if (done) return { pending: Promise.resolve(done) };
      const inFlight = this.building.get(name);
      if (inFlight) {
        if (importer !== null && this.waitsOn(name, importer)) {
          throw new ImportError(pos, name, `cyclic import of '${name}' (${importer} -> ${name} -> ${importer})`);
        }
        return { pending: inFlight };
      }

      const provider = this.providers.get(name);
      if (!provider) throw new ImportError(pos, name, `package '${name}' is not registered`);

      const build = this.build(name, provider, chain);
      this.building.set(name, build);
      return { pending: build };
    });
    if (importer === null) return pending;

    this.waits.set(importer, name);
    try {
      return await pending;
    } finally {
      this.waits.delete(importer);
    }
  }

  /** True when the build of `from` is, through other builds, waiting for `target`. */
  private waitsOn(from: string, target: string): boolean {
    const seen = new Set<string>();
    for (let cur: string | undefined = from; cur !== undefined && !seen.has(cur); cur = this.waits.get(cur)) {
      if (cur === target) return true;
      seen.add(cur);
    }
    return false;
  }

  private async build(name: string, provider: Provider, chain: readonly string[]): Promise<ModuleScope> {
    const timer = this.logger.time(`build ${name}`);
    const scope = new ModuleScope(name, this.host.rootScope);
    scope.buildChain = [...chain, name];
    try {
      if (provider.kind === "builder") {
        await provider.build(scope, this.host);
      } else {
        for (const script of provider.scripts) {
          checkImports(script.imports, this.security, script.source.fileName);
          scope.fileName = script.source.fileName;
          await this.host.execute(script, scope);
        }
      }
      this.built.set(name, scope);
      timer.end({ name });
      return scope;
    } catch (e) {
      this.logger.error("module build failed", { name, error: e instanceof Error ? e.message : String(e) });
      throw e;
    } finally {
      scope.buildChain = [];
      this.building.delete(name);
    }
  }
}
