// src/codec/tags.ts

/** One byte in front of every encoded value. Values are part of the format: append only. */
export const Tag = {
  Null: 0,
  Void: 1,
  False: 2,
  True: 3,
  Int: 4,
  Real: 5,
  String: 6,
  Char: 7,
  List: 8,
  Map: 9,
  Set: 10,
  Range: 11,
  Instance: 12,
  EnumEntry: 13,
  Ref: 14,
  MapEntry: 15,
} as const;

export type Tag = (typeof Tag)[keyof typeof Tag];

/** Format marker written before the first value. */
export const CODEC_MAGIC = 0x51;
export const CODEC_VERSION = 1;
