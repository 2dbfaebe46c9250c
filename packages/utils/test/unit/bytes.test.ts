import {describe, it, expect} from "vitest";
import {byteArrayEquals, compareBytes, concatBytes, formatBytes, prettyBytes, toHex, toPrefixedHex} from "../../src/index.js";

describe("toHex", () => {
  const testCases: {input: Uint8Array; output: string}[] = [
    {input: new Uint8Array([]), output: ""},
    {input: new Uint8Array([0]), output: "00"},
    {input: new Uint8Array([1, 15, 16, 255]), output: "010f10ff"},
    {input: new Uint8Array([0xde, 0xad, 0xbe, 0xef]), output: "deadbeef"},
  ];
  for (const {input, output} of testCases) {
    it(`should render ${output || "empty"}`, () => {
      expect(toHex(input)).toBe(output);
    });
  }

  it("should prefix for logs", () => {
    expect(toPrefixedHex(new Uint8Array([0xab, 0x01]))).toBe("0xab01");
  });
});

describe("compareBytes", () => {
  const testCases: {id: string; a: number[]; b: number[]; result: -1 | 0 | 1}[] = [
    {id: "equal", a: [1, 2, 3], b: [1, 2, 3], result: 0},
    {id: "first byte differs", a: [0, 9, 9], b: [1, 0, 0], result: -1},
    {id: "last byte differs", a: [1, 2, 4], b: [1, 2, 3], result: 1},
    {id: "prefix sorts first", a: [1, 2], b: [1, 2, 0], result: -1},
    {id: "longer sorts last", a: [1, 2, 0], b: [1, 2], result: 1},
    {id: "both empty", a: [], b: [], result: 0},
  ];
  for (const {id, a, b, result} of testCases) {
    it(id, () => {
      expect(compareBytes(new Uint8Array(a), new Uint8Array(b))).toBe(result);
    });
  }
});

describe("byteArrayEquals", () => {
  it("should compare content, not identity", () => {
    expect(byteArrayEquals(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(byteArrayEquals(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(byteArrayEquals(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(false);
  });
});

describe("concatBytes", () => {
  it("should join in argument order", () => {
    expect(concatBytes(new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3]))).toEqual(
      new Uint8Array([1, 2, 3])
    );
  });
});

describe("formatBytes", () => {
  const testCases: {input: number; output: string}[] = [
    {input: 0, output: "0 Bytes"},
    {input: 512, output: "512.00 Bytes"},
    {input: 1024, output: "1.00 KB"},
    {input: 1536, output: "1.50 KB"},
    {input: 5 * 1024 * 1024, output: "5.00 MB"},
  ];
  for (const {input, output} of testCases) {
    it(`should format ${input}`, () => {
      expect(formatBytes(input)).toBe(output);
    });
  }
});

describe("prettyBytes", () => {
  it("should keep the prefix, two bytes and the last two bytes", () => {
    expect(prettyBytes(new Uint8Array([0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc]))).toBe("0x1234…9abc");
    expect(prettyBytes("0xdeadbeefcafe")).toBe("0xdead…cafe");
  });
});
