import { isUtf8 } from 'buffer';

/**
 * Minimal protobuf wire codec for the handful of fixed messages Steam's
 * IAuthenticationService / ITwoFactorService calls use. There is no schema:
 * callers write fields by number and read them back by number.
 */

export const WireType = {
  Varint: 0,
  Fixed64: 1,
  LengthDelimited: 2,
  Fixed32: 5
} as const;

export type ProtoField =
  | { wireType: typeof WireType.Varint; value: bigint }
  | { wireType: typeof WireType.Fixed64; value: bigint }
  | { wireType: typeof WireType.LengthDelimited; value: Buffer; text?: string }
  | { wireType: typeof WireType.Fixed32; value: Buffer };

export type Uint64Input = bigint | number | string;

const UINT64_MAX = (1n << 64n) - 1n;

export function toUint64(value: Uint64Input): bigint {
  const parsed = typeof value === 'bigint' ? value : BigInt(value);
  if (parsed < 0n || parsed > UINT64_MAX) {
    throw new RangeError(`Value out of uint64 range: ${String(value)}`);
  }
  return parsed;
}

function encodeVarint(value: bigint): Buffer {
  const bytes: number[] = [];
  let rest = value;
  while (rest >= 0x80n) {
    bytes.push(Number(rest & 0x7fn) | 0x80);
    rest >>= 7n;
  }
  bytes.push(Number(rest));
  return Buffer.from(bytes);
}

export class ProtoWriter {
  private readonly chunks: Buffer[] = [];

  private tag(field: number, wireType: number): void {
    this.chunks.push(encodeVarint(BigInt((field << 3) | wireType)));
  }

  /** uint64 / uint32 / enum. Always written, zero included. */
  varint(field: number, value: Uint64Input): this {
    this.tag(field, WireType.Varint);
    this.chunks.push(encodeVarint(toUint64(value)));
    return this;
  }

  uint64(field: number, value: Uint64Input): this {
    return this.varint(field, value);
  }

  enum(field: number, value: number): this {
    return this.varint(field, value);
  }

  /** Little-endian 8 bytes. Always written, zero included. */
  fixed64(field: number, value: Uint64Input): this {
    this.tag(field, WireType.Fixed64);
    const buffer = Buffer.alloc(8);
    buffer.writeBigUInt64LE(toUint64(value));
    this.chunks.push(buffer);
    return this;
  }

  /** Omitted when false. */
  bool(field: number, value: boolean): this {
    if (value) {
      this.varint(field, 1);
    }
    return this;
  }

  /** Omitted when empty. */
  string(field: number, value: string | undefined): this {
    if (value) {
      this.bytes(field, Buffer.from(value, 'utf8'));
    }
    return this;
  }

  /** Opaque bytes, written as given. */
  bytes(field: number, value: Uint8Array): this {
    this.tag(field, WireType.LengthDelimited);
    this.chunks.push(encodeVarint(BigInt(value.length)));
    this.chunks.push(Buffer.from(value));
    return this;
  }

  finish(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

export class ProtoReader {
  private readonly fields = new Map<number, ProtoField[]>();
  private offset = 0;
  /** False when parsing stopped early on truncated or unsupported data. */
  readonly complete: boolean;

  constructor(private readonly data: Buffer) {
    this.complete = this.parse();
  }

  private readVarint(): bigint | null {
    let result = 0n;
    let shift = 0n;
    while (this.offset < this.data.length) {
      const byte = this.data[this.offset];
      this.offset += 1;
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) {
        return result;
      }
      shift += 7n;
      if (shift >= 70n) {
        return null;
      }
    }
    return null;
  }

  private take(length: number): Buffer | null {
    if (this.offset + length > this.data.length) {
      return null;
    }
    const slice = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  private store(field: number, value: ProtoField): void {
    const list = this.fields.get(field) ?? [];
    list.push(value);
    this.fields.set(field, list);
  }

  private parse(): boolean {
    while (this.offset < this.data.length) {
      const tag = this.readVarint();
      if (tag === null || tag === 0n) {
        return false;
      }

      const field = Number(tag >> 3n);
      const wireType = Number(tag & 0x7n);

      if (wireType === WireType.Varint) {
        const value = this.readVarint();
        if (value === null) {
          return false;
        }
        this.store(field, { wireType, value });
      } else if (wireType === WireType.Fixed64) {
        const raw = this.take(8);
        if (!raw) {
          return false;
        }
        this.store(field, { wireType, value: raw.readBigUInt64LE(0) });
      } else if (wireType === WireType.LengthDelimited) {
        const length = this.readVarint();
        if (length === null || length > BigInt(this.data.length)) {
          return false;
        }
        const raw = this.take(Number(length));
        if (!raw) {
          return false;
        }
        const value = Buffer.from(raw);
        this.store(field, { wireType, value, text: isUtf8(value) ? value.toString('utf8') : undefined });
      } else if (wireType === WireType.Fixed32) {
        const raw = this.take(4);
        if (!raw) {
          return false;
        }
        this.store(field, { wireType, value: Buffer.from(raw) });
      } else {
        return false;
      }
    }

    return true;
  }

  private last(field: number): ProtoField | undefined {
    const list = this.fields.get(field);
    return list?.[list.length - 1];
  }

  has(field: number): boolean {
    return this.fields.has(field);
  }

  fieldNumbers(): number[] {
    return [...this.fields.keys()];
  }

  getUint64(field: number): bigint | undefined {
    const entry = this.last(field);
    if (entry?.wireType === WireType.Varint || entry?.wireType === WireType.Fixed64) {
      return entry.value;
    }
    return undefined;
  }

  getNumber(field: number): number | undefined {
    const value = this.getUint64(field);
    return value === undefined ? undefined : Number(value);
  }

  /** Varint read as a signed 32-bit value (int32 / enum fields). */
  getInt32(field: number): number | undefined {
    const value = this.getUint64(field);
    return value === undefined ? undefined : Number(BigInt.asIntN(32, value));
  }

  getBool(field: number): boolean {
    return (this.getUint64(field) ?? 0n) !== 0n;
  }

  getString(field: number): string | undefined {
    const entry = this.last(field);
    return entry?.wireType === WireType.LengthDelimited ? entry.text : undefined;
  }

  getBytes(field: number): Buffer | undefined {
    const entry = this.last(field);
    return entry?.wireType === WireType.LengthDelimited ? entry.value : undefined;
  }

  getFloat(field: number): number | undefined {
    const entry = this.last(field);
    return entry?.wireType === WireType.Fixed32 ? entry.value.readFloatLE(0) : undefined;
  }

  getRepeatedBytes(field: number): Buffer[] {
    const list = this.fields.get(field) ?? [];
    return list.flatMap((entry) => (entry.wireType === WireType.LengthDelimited ? [entry.value] : []));
  }

  getMessages(field: number): ProtoReader[] {
    return this.getRepeatedBytes(field).map((bytes) => new ProtoReader(bytes));
  }
}
