import { VARIABLE_TYPES, type TaskValue, type VariableType } from "../values/task-value.js";

/**
 * Binary layout of a serialized blackboard (little-endian):
 *
 *   u32 count
 *   repeated count times:
 *     u32 nameLength, nameLength bytes of UTF-8 name
 *     u8  type tag
 *     payload: Bool u8 | Int i32 | Float f32 | Vector 3 x f32 | EntityId u64 | String u32 length + UTF-8
 */
export const TYPE_TAGS: Readonly<Record<VariableType, number>> = {
  Bool: 1,
  Int: 2,
  Float: 3,
  Vector: 4,
  EntityId: 5,
  String: 6,
};

const TAG_TO_TYPE = new Map<number, VariableType>(VARIABLE_TYPES.map((type) => [TYPE_TAGS[type], type]));

export function typeForTag(tag: number): VariableType | undefined {
  return TAG_TO_TYPE.get(tag);
}

export type EncodedEntry = {
  name: string;
  value: TaskValue;
};

export type DecodedEntry =
  | { kind: "value"; name: string; value: TaskValue }
  | { kind: "stop"; reason: "truncated" | "malformed"; detail: string };

function payloadSize(value: TaskValue): number {
  switch (value.type) {
    case "Bool":
      return 1;
    case "Int":
    case "Float":
      return 4;
    case "Vector":
      return 12;
    case "EntityId":
      return 8;
    case "String":
      return 4 + Buffer.byteLength(value.value, "utf8");
  }
}

export function encodeEntries(entries: readonly EncodedEntry[]): Buffer {
  let size = 4;
  for (const entry of entries) {
    size += 4 + Buffer.byteLength(entry.name, "utf8") + 1 + payloadSize(entry.value);
  }

  const buf = Buffer.alloc(size);
  let offset = buf.writeUInt32LE(entries.length, 0);

  for (const { name, value } of entries) {
    offset = buf.writeUInt32LE(Buffer.byteLength(name, "utf8"), offset);
    offset += buf.write(name, offset, "utf8");
    offset = buf.writeUInt8(TYPE_TAGS[value.type], offset);

    switch (value.type) {
      case "Bool":
        offset = buf.writeUInt8(value.value ? 1 : 0, offset);
        break;
      case "Int":
        offset = buf.writeInt32LE(value.value, offset);
        break;
      case "Float":
        offset = buf.writeFloatLE(value.value, offset);
        break;
      case "Vector":
        offset = buf.writeFloatLE(value.value.x, offset);
        offset = buf.writeFloatLE(value.value.y, offset);
        offset = buf.writeFloatLE(value.value.z, offset);
        break;
      case "EntityId":
        offset = buf.writeBigUInt64LE(value.value, offset);
        break;
      case "String":
        offset = buf.writeUInt32LE(Buffer.byteLength(value.value, "utf8"), offset);
        offset += buf.write(value.value, offset, "utf8");
        break;
    }
  }

  return buf;
}

class Reader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  has(bytes: number): boolean {
    return this.offset + bytes <= this.buf.length;
  }

  u8(): number {
    const v = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return v;
  }

  u32(): number {
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  i32(): number {
    const v = this.buf.readInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  f32(): number {
    const v = this.buf.readFloatLE(this.offset);
    this.offset += 4;
    return v;
  }

  u64(): bigint {
    const v = this.buf.readBigUInt64LE(this.offset);
    this.offset += 8;
    return v;
  }

  utf8(length: number): string {
    const v = this.buf.toString("utf8", this.offset, this.offset + length);
    this.offset += length;
    return v;
  }
}

function readPayload(reader: Reader, type: VariableType): TaskValue | undefined {
  switch (type) {
    case "Bool":
      return reader.has(1) ? { type, value: reader.u8() !== 0 } : undefined;
    case "Int":
      return reader.has(4) ? { type, value: reader.i32() } : undefined;
    case "Float":
      return reader.has(4) ? { type, value: reader.f32() } : undefined;
    case "Vector":
      return reader.has(12) ? { type, value: { x: reader.f32(), y: reader.f32(), z: reader.f32() } } : undefined;
    case "EntityId":
      return reader.has(8) ? { type, value: reader.u64() } : undefined;
    case "String": {
      if (!reader.has(4)) return undefined;
      const len = reader.u32();
      return reader.has(len) ? { type, value: reader.utf8(len) } : undefined;
    }
  }
}

/**
 * Walk an encoded buffer entry by entry. Yields a `stop` entry and ends
 * as soon as the buffer is truncated or carries a tag it cannot size.
 */
export function* decodeEntries(bytes: Uint8Array): Generator<DecodedEntry> {
  const reader = new Reader(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));

  if (!reader.has(4)) {
    yield { kind: "stop", reason: "truncated", detail: "missing variable count" };
    return;
  }
  const count = reader.u32();

  for (let i = 0; i < count; i++) {
    if (!reader.has(4)) {
      yield { kind: "stop", reason: "truncated", detail: `entry ${i}: missing name length` };
      return;
    }
    const nameLen = reader.u32();
    if (!reader.has(nameLen + 1)) {
      yield { kind: "stop", reason: "truncated", detail: `entry ${i}: name or type tag cut short` };
      return;
    }
    const name = reader.utf8(nameLen);
    const tag = reader.u8();
    const type = typeForTag(tag);
    if (!type) {
      yield { kind: "stop", reason: "malformed", detail: `entry ${i} ("${name}"): unknown type tag ${tag}` };
      return;
    }
    const value = readPayload(reader, type);
    if (!value) {
      yield { kind: "stop", reason: "truncated", detail: `entry ${i} ("${name}"): ${type} payload cut short` };
      return;
    }
    yield { kind: "value", name, value };
  }
}
