import { ProtoReader, ProtoWriter } from '../src/utils/protobuf';

describe('protobuf wire codec', () => {
  it('keeps zero-valued varint, fixed64 and enum fields', () => {
    const reader = new ProtoReader(new ProtoWriter().uint64(1, 0).fixed64(2, 0n).enum(3, 0).finish());

    expect(reader.complete).toBe(true);
    expect(reader.fieldNumbers()).toEqual([1, 2, 3]);
    expect(reader.getUint64(1)).toBe(0n);
    expect(reader.getUint64(2)).toBe(0n);
    expect(reader.getNumber(3)).toBe(0);
  });

  it('omits empty strings and false booleans', () => {
    const reader = new ProtoReader(new ProtoWriter().string(4, '').bool(5, false).bool(6, true).finish());

    expect(reader.has(4)).toBe(false);
    expect(reader.has(5)).toBe(false);
    expect(reader.getBool(6)).toBe(true);
  });

  it('round-trips a 64-bit steamid without precision loss', () => {
    const steamid = 76561197960287930n;
    const encoded = new ProtoWriter().fixed64(2, '76561197960287930').uint64(1, steamid).finish();
    const reader = new ProtoReader(encoded);

    expect(reader.getUint64(2)).toBe(steamid);
    expect(reader.getUint64(1)).toBe(steamid);
    expect(encoded.subarray(0, 1)).toEqual(Buffer.from([0x11]));
  });

  it('encodes multi-byte varints little-end first', () => {
    expect(new ProtoWriter().varint(1, 300).finish()).toEqual(Buffer.from([0x08, 0xac, 0x02]));
  });

  it('reads int32 fields written as negative 64-bit varints', () => {
    const reader = new ProtoReader(new ProtoWriter().varint(10, (1n << 64n) - 1n).finish());
    expect(reader.getInt32(10)).toBe(-1);
  });

  it('reads fixed32 floats', () => {
    const value = Buffer.alloc(4);
    value.writeFloatLE(1.5);
    const reader = new ProtoReader(Buffer.concat([Buffer.from([(3 << 3) | 5]), value]));

    expect(reader.getFloat(3)).toBe(1.5);
  });

  it('reads repeated nested messages in order', () => {
    const encoded = new ProtoWriter()
      .bytes(4, new ProtoWriter().enum(1, 3).finish())
      .bytes(4, new ProtoWriter().enum(1, 2).finish())
      .finish();

    const nested = new ProtoReader(encoded).getMessages(4);
    expect(nested.map((message) => message.getNumber(1))).toEqual([3, 2]);
  });

  it('keeps raw bytes and exposes utf-8 text only when valid', () => {
    const reader = new ProtoReader(
      new ProtoWriter().bytes(2, Buffer.from([0xff, 0xfe])).string(3, 'hello').finish()
    );

    expect(reader.getBytes(2)).toEqual(Buffer.from([0xff, 0xfe]));
    expect(reader.getString(2)).toBeUndefined();
    expect(reader.getString(3)).toBe('hello');
  });

  it('stops without throwing on truncated input', () => {
    const truncatedVarint = new ProtoReader(Buffer.from([0x08]));
    expect(truncatedVarint.complete).toBe(false);
    expect(truncatedVarint.has(1)).toBe(false);

    const full = new ProtoWriter().uint64(1, 7).string(2, 'abcdef').finish();
    const truncated = new ProtoReader(full.subarray(0, full.length - 2));
    expect(truncated.complete).toBe(false);
    expect(truncated.getNumber(1)).toBe(7);
    expect(truncated.has(2)).toBe(false);
  });

  it('rejects values outside the uint64 range', () => {
    expect(() => new ProtoWriter().uint64(1, -1)).toThrow(RangeError);
  });
});
