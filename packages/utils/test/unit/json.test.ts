import {describe, it, expect} from "vitest";
import {ChunktreeError, errorToJson, errorToString, logCtxToJson, logCtxToString} from "../../src/index.js";

describe("log context rendering", () => {
  const context = {source: "data.bin", leaves: 3, equal: false, root: new Uint8Array([0xaa, 0x01]), parent: null};

  it("should render bytes as hex in JSON", () => {
    expect(logCtxToJson(context)).toEqual({source: "data.bin", leaves: 3, equal: false, root: "0xaa01", parent: null});
  });

  it("should render key=value pairs in insertion order", () => {
    expect(logCtxToString(context)).toBe("source=data.bin, leaves=3, equal=false, root=0xaa01, parent=null");
  });

  it("should render an empty context as an empty string", () => {
    expect(logCtxToString({})).toBe("");
  });
});

describe("error rendering", () => {
  it("should render a plain error by its message", () => {
    const error = new Error("foo");
    error.stack = "$STACK";
    expect(errorToJson(error)).toEqual({message: "foo", stack: "$STACK"});
    expect(errorToString(error)).toBe("foo\n$STACK");
  });

  it("should render a typed error by its metadata", () => {
    const error = new ChunktreeError({code: "SAMPLE_ERROR", source: "data.bin", offset: 8}, "could not read");
    error.stack = "$STACK";
    expect(errorToJson(error)).toEqual({code: "SAMPLE_ERROR", source: "data.bin", offset: 8, stack: "$STACK"});
    expect(errorToString(error)).toBe("code=SAMPLE_ERROR, source=data.bin, offset=8\n$STACK");
  });

  it("should omit a missing stack", () => {
    const error = new Error("foo");
    error.stack = undefined;
    expect(errorToJson(error)).toEqual({message: "foo"});
    expect(errorToString(error)).toBe("foo");
  });
});
