// src/codec/codec.ts
//
// Quill binary codec
// ------------------
// Layout: magic byte, version byte, then one value. Every value is a tag byte
// followed by its payload:
//
//   Null Void False True        (no payload)
//   Int                         zig-zag varint of the 64-bit value
//   Real                        float64 LE
//   String                      varint byte length + UTF-8
//   Char                        as String
//   List / Set                  varint count + values
//   Map                         varint count + key, value pairs
//   MapEntry                    key, value
//   Range                       start, end, inclusive byte
//   Instance                    simple class name, ctor fields, body fields
//   EnumEntry                   simple enum name, entry name
//   Ref                         varint index of a container written earlier
//
// Containers (lists, maps, sets, instances) get an index the first time they
// are written; later occurrences are Refs, so shared and cyclic structure
// survives a round trip. An instance is only addressable once its
// constructor has run: a cycle through constructor fields cannot be decoded.
//
// Decoding an instance constructs it with the decoded constructor fields
// (transient parameters take their default, or null), which runs every
// initializer; non-transient body fields are then overwritten with the
// decoded values and `onDeserialized()` is called when the class has it.

import { UNKNOWN_RANGE } from "../core/ast";
import { construct } from "../core/declarations";
import type { Evaluator } from "../core/evaluator";
import type { Scope } from "../core/scope";
import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import type { ModuleRegistry } from "../modules/registry";
import { ClassObj, EnumEntryObj, InstanceObj, QualifiedView } from "../runtime/classes";
import type { Args } from "../runtime/interop";
import { describe, illegalArgument } from "../runtime/natives";
import { CharObj, ListObj, MapEntryObj, MapObj, Obj, RangeObj, SetObj, VOID, VoidObj } from "../runtime/values";
import type { Value } from "../runtime/values";
import type { Logger } from "../utils/logger";
import { ByteReader, ByteWriter } from "./buffer";
import type { Bytes } from "./buffer";
import { ClassResolver } from "./resolver";
import { CODEC_MAGIC, CODEC_VERSION, Tag } from "./tags";

/** What the codec needs from an engine. */
export interface CodecHost {
  readonly modules: ModuleRegistry;
  readonly logger: Logger;
  evaluator(signal?: AbortSignal): Evaluator;
}

/* =========================================================
   Encoding
   ========================================================= */

export function encode(value: Value, host: CodecHost): Bytes {
  const out = new ByteWriter();
  out.byte(CODEC_MAGIC);
  out.byte(CODEC_VERSION);
  new Encoder(out).write(value);
  const bytes = out.toBytes();
  host.logger.trace("encoded", { bytes: bytes.length });
  return bytes;
}

class Encoder {
  private readonly refs = new Map<Obj, number>();

  constructor(private readonly out: ByteWriter) {}

  /** Writes a Ref and returns true when `obj` was written before. */
  private ref(obj: Obj): boolean {
    const index = this.refs.get(obj);
    if (index !== undefined) {
      this.out.byte(Tag.Ref);
      this.out.length32(index);
      return true;
    }
    this.refs.set(obj, this.refs.size);
    return false;
  }

  public write(v: Value): void {
    const out = this.out;
    if (v === null) return out.byte(Tag.Null);

    switch (typeof v) {
      case "boolean":
        return out.byte(v ? Tag.True : Tag.False);
      case "bigint":
        out.byte(Tag.Int);
        return out.int(v);
      case "number":
        out.byte(Tag.Real);
        return out.real(v);
      case "string":
        out.byte(Tag.String);
        return out.string(v);
    }

    if (v instanceof VoidObj) return out.byte(Tag.Void);
    if (v instanceof CharObj) {
      out.byte(Tag.Char);
      return out.string(v.value);
    }
    if (v instanceof MapEntryObj) {
      out.byte(Tag.MapEntry);
      this.write(v.key);
      return this.write(v.value);
    }
    if (v instanceof RangeObj) {
      out.byte(Tag.Range);
      this.write(v.start);
      this.write(v.end);
      return out.byte(v.inclusive ? 1 : 0);
    }
    if (v instanceof EnumEntryObj) {
      out.byte(Tag.EnumEntry);
      out.string(v.cls.name);
      return out.string(v.name);
    }
    if (v instanceof QualifiedView) return this.write(v.instance);

    if (v instanceof ListObj) {
      if (this.ref(v)) return;
      out.byte(Tag.List);
      out.length32(v.items.length);
      for (const item of v.items) this.write(item);
      return;
    }
    if (v instanceof SetObj) {
      if (this.ref(v)) return;
      const items = v.values();
      out.byte(Tag.Set);
      out.length32(items.length);
      for (const item of items) this.write(item);
      return;
    }
    if (v instanceof MapObj) {
      if (this.ref(v)) return;
      const entries = v.entries();
      out.byte(Tag.Map);
      out.length32(entries.length);
      for (const e of entries) {
        this.write(e.key);
        this.write(e.value);
      }
      return;
    }
    if (v instanceof InstanceObj) {
      if (this.ref(v)) return;
      return this.writeInstance(v);
    }

    throw illegalArgument(`cannot encode a value of type ${describe(v)}`);
  }

  private writeInstance(inst: InstanceObj): void {
    const cls = inst.cls;
    this.out.byte(Tag.Instance);
    this.out.string(cls.name);
    if (cls.kind === "object") return;

    const { ctor, body } = cls.serialLayout();
    for (const name of [...ctor, ...body]) this.write(inst.fields.get(name) ?? null);
  }
}

/* =========================================================
   Decoding
   ========================================================= */

/**
 * Decodes `bytes` resolving class names from `scope`. Errors surface as they
 * would in a script: ExecutionError with SymbolNotFoundException for an
 * unknown class, IllegalArgumentException for malformed input.
 */
export async function decode(bytes: Bytes, scope: Scope, host: CodecHost, signal?: AbortSignal): Promise<Value> {
  const ev = host.evaluator(signal);
  try {
    return await decodeWith(ev, bytes, scope, host.modules);
  } catch (e) {
    if (e instanceof QuillRuntimeError) throw ev.materialize(e, UNKNOWN_RANGE, scope);
    throw e;
  }
}

/** Decoding inside a running evaluation; QuillRuntimeErrors propagate unchanged. */
export async function decodeWith(ev: Evaluator, bytes: Bytes, scope: Scope, modules: ModuleRegistry | null): Promise<Value> {
  const input = new ByteReader(bytes);
  if (input.byte() !== CODEC_MAGIC) throw illegalArgument("not a Quill codec stream");
  const version = input.byte();
  if (version !== CODEC_VERSION) throw illegalArgument(`unsupported codec version ${version}`);

  const value = await new Decoder(ev, input, new ClassResolver(scope, modules)).read();
  if (!input.atEnd) throw illegalArgument(`trailing bytes after the value at byte ${input.offset}`);
  return value;
}

const PENDING = Symbol("pending");

class Decoder {
  private readonly refs: (Value | typeof PENDING)[] = [];

  constructor(
    private readonly ev: Evaluator,
    private readonly input: ByteReader,
    private readonly classes: ClassResolver,
  ) {}

  private resolveClass(name: string): ClassObj {
    const cls = this.classes.resolve(name);
    if (!cls) throw new QuillRuntimeError("SymbolNotFoundException", `class '${name}' is not visible from the decode scope`);
    return cls;
  }

  public async read(): Promise<Value> {
    const input = this.input;
    const at = input.offset;
    const tag = input.byte();

    switch (tag) {
      case Tag.Null:
        return null;
      case Tag.Void:
        return VOID;
      case Tag.False:
        return false;
      case Tag.True:
        return true;
      case Tag.Int:
        return input.int();
      case Tag.Real:
        return input.real();
      case Tag.String:
        return input.string();
      case Tag.Char: {
        const s = input.string();
        if ([...s].length !== 1) throw illegalArgument(`bad Char at byte ${at}`);
        return new CharObj(s);
      }
      case Tag.MapEntry: {
        const key = await this.read();
        return new MapEntryObj(key, await this.read());
      }
      case Tag.Range: {
        const start = await this.read();
        const end = await this.read();
        return new RangeObj(start, end, input.byte() === 1);
      }
      case Tag.List: {
        const list = new ListObj([]);
        this.refs.push(list);
        const n = input.length32();
        for (let i = 0; i < n; i++) list.items.push(await this.read());
        return list;
      }
      case Tag.Set: {
        const set = new SetObj();
        this.refs.push(set);
        const n = input.length32();
        for (let i = 0; i < n; i++) set.add(await this.read());
        return set;
      }
      case Tag.Map: {
        const map = new MapObj();
        this.refs.push(map);
        const n = input.length32();
        for (let i = 0; i < n; i++) {
          const key = await this.read();
          map.set(key, await this.read());
        }
        return map;
      }
      case Tag.EnumEntry: {
        const cls = this.resolveClass(input.string());
        const name = input.string();
        const entry = this.ev.enumEntry(cls, name);
        if (!entry) throw new QuillRuntimeError("SymbolNotFoundException", `${cls.name} has no entry '${name}'`);
        return entry;
      }
      case Tag.Instance:
        return this.readInstance();
      case Tag.Ref: {
        const index = input.index();
        const target = this.refs[index];
        if (target === undefined) throw illegalArgument(`reference #${index} at byte ${at} points past the decoded values`);
        if (target === PENDING) throw illegalArgument(`reference #${index} at byte ${at} is cyclic through constructor fields`);
        return target;
      }
      default:
        throw illegalArgument(`unknown tag ${tag} at byte ${at}`);
    }
  }

  private async readInstance(): Promise<Value> {
    const cls = this.resolveClass(this.input.string());
    const slot = this.refs.length;

    if (cls.kind === "object") {
      if (!cls.singleton) throw new QuillRuntimeError("IllegalStateException", `object ${cls.name} is not initialized`);
      this.refs.push(cls.singleton);
      return cls.singleton;
    }
    if (cls.kind !== "class") throw illegalArgument(`${cls.name} is not a class`);
    this.refs.push(PENDING);

    const { ctor, body } = cls.serialLayout();
    const args: Args = { positional: [], named: new Map() };
    for (const name of ctor) args.named.set(name, await this.read());
    for (const p of cls.constructorParams) {
      if (p.transient && p.defaultValue === null) args.named.set(p.name, null);
    }

    const inst = await construct(this.ev, cls, args, UNKNOWN_RANGE);
    this.refs[slot] = inst;

    for (const name of body) inst.fields.set(name, await this.read());
    if (cls.findMember("onDeserialized")) await this.ev.invokeMethod(inst, "onDeserialized", []);
    return inst;
  }
}
