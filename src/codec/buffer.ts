// src/codec/buffer.ts
//
// Growable byte writer and bounds-checked reader: unsigned LEB128 varints,
// zig-zag signed 64-bit ints, float64 little-endian and UTF-8 strings.

import { illegalArgument } from "../runtime/natives";

export type Bytes = Uint8Array;

export class ByteWriter {
  private buf: Buffer = Buffer.alloc(64);
  private length = 0;

  private ensure(extra: number): void {
    if (this.length + extra <= this.buf.length) return;
    let size = this.buf.length * 2;
    while (size < this.length + extra) size *= 2;
    const next = Buffer.alloc(size);
    this.buf.copy(next, 0, 0, this.length);
    this.buf = next;
  }

  public byte(b: number): void {
    this.ensure(1);
    this.buf[this.length++] = b & 0xff;
  }

  public uvarint(n: bigint): void {
    let v = n;
    do {
      let b = Number(v & 0x7fn);
      v >>= 7n;
      if (v !== 0n) b |= 0x80;
      this.byte(b);
    } while (v !== 0n);
  }

  public length32(n: number): void {
    this.uvarint(BigInt(n));
  }

  /** Zig-zag over the 64-bit two's complement value of `n`. */
  public int(n: bigint): void {
    const v = BigInt.asIntN(64, n);
    this.uvarint(BigInt.asUintN(64, (v << 1n) ^ (v >> 63n)));
  }

  public real(x: number): void {
    this.ensure(8);
    this.buf.writeDoubleLE(x, this.length);
    this.length += 8;
  }

  public string(s: string): void {
    const bytes = Buffer.from(s, "utf8");
    this.length32(bytes.length);
    this.ensure(bytes.length);
    bytes.copy(this.buf, this.length);
    this.length += bytes.length;
  }

  public toBytes(): Bytes {
    return Uint8Array.from(this.buf.subarray(0, this.length));
  }
}

export class ByteReader {
  private readonly buf: Buffer;
  private pos = 0;

  constructor(bytes: Bytes) {
    this.buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  public get atEnd(): boolean {
    return this.pos >= this.buf.length;
  }

  public get offset(): number {
    return this.pos;
  }

  private need(n: number): void {
    if (this.pos + n > this.buf.length) throw illegalArgument(`truncated input at byte ${this.pos}`);
  }

  public byte(): number {
    this.need(1);
    return this.buf[this.pos++];
  }

  public uvarint(): bigint {
    let result = 0n;
    let shift = 0n;
    for (;;) {
      if (shift > 63n) throw illegalArgument(`varint too long at byte ${this.pos}`);
      const b = this.byte();
      result |= BigInt(b & 0x7f) << shift;
      if ((b & 0x80) === 0) return result;
      shift += 7n;
    }
  }

  public length32(): number {
    const n = this.uvarint();
    // every counted element takes at least one byte
    if (n > BigInt(this.buf.length - this.pos)) throw illegalArgument(`length ${n} exceeds the remaining input`);
    return Number(n);
  }

  /** A varint that indexes earlier data rather than counting what follows. */
  public index(): number {
    const n = this.uvarint();
    if (n > BigInt(Number.MAX_SAFE_INTEGER)) throw illegalArgument(`index ${n} out of range`);
    return Number(n);
  }

  public int(): bigint {
    const zz = this.uvarint();
    return BigInt.asIntN(64, (zz >> 1n) ^ -(zz & 1n));
  }

  public real(): number {
    this.need(8);
    const x = this.buf.readDoubleLE(this.pos);
    this.pos += 8;
    return x;
  }

  public string(): string {
    const n = this.length32();
    this.need(n);
    const s = this.buf.toString("utf8", this.pos, this.pos + n);
    this.pos += n;
    return s;
  }
}
