import {ChunktreeError} from "@chunktree/utils";
import {LogData, LogFormat} from "../../src/index.js";

type TestCase = {
  id: string;
  opts?: {module?: string};
  message: string;
  context?: LogData;
  error?: Error;
  output: {[P in LogFormat]: string};
};

export const formatsTestCases: (TestCase | (() => TestCase))[] = [
  {
    id: "regular log with metadata",
    message: "foo bar",
    context: {meta: "data"},
    output: {
      human: "[]                 \u001b[33mwarn\u001b[39m: foo bar meta=data",
      json: '{"context":{"meta":"data"},"level":"warn","message":"foo bar","module":""}',
    },
  },

  {
    id: "regular log with bytes metadata",
    message: "root",
    context: {root: new Uint8Array([0xab, 0xcd]), leaves: 11},
    output: {
      human: "[]                 \u001b[33mwarn\u001b[39m: root root=0xabcd, leaves=11",
      json: '{"context":{"leaves":11,"root":"0xabcd"},"level":"warn","message":"root","module":""}',
    },
  },

  () => {
    const error = new Error("err message");
    error.stack = "$STACK";
    return {
      id: "regular log with error",
      opts: {module: "merkle"},
      message: "foo bar",
      context: {},
      error: error,
      output: {
        human: `[merkle]           \u001b[33mwarn\u001b[39m: foo bar - err message\n${error.stack}`,
        json: '{"context":{},"error":{"message":"err message","stack":"$STACK"},"level":"warn","message":"foo bar","module":"merkle"}',
      },
    };
  },

  () => {
    const error = new Error("err message");
    error.stack = "$STACK";
    return {
      id: "regular log with error and metadata",
      opts: {module: "merkle"},
      message: "foo bar",
      context: {meta: "data"},
      error: error,
      output: {
        human: `[merkle]           \u001b[33mwarn\u001b[39m: foo bar meta=data - err message\n${error.stack}`,
        json: '{"context":{"meta":"data"},"error":{"message":"err message","stack":"$STACK"},"level":"warn","message":"foo bar","module":"merkle"}',
      },
    };
  },

  () => {
    const error = new ChunktreeError({code: "SAMPLE_ERROR", source: "data.bin", offset: 8});
    error.stack = "$STACK";
    return {
      id: "error with metadata",
      opts: {module: "merkle"},
      message: "foo bar",
      context: {},
      error: error,
      output: {
        human: `[merkle]           \u001b[33mwarn\u001b[39m: foo bar code=SAMPLE_ERROR, source=data.bin, offset=8\n${error.stack}`,
        json: '{"context":{},"error":{"code":"SAMPLE_ERROR","offset":8,"source":"data.bin","stack":"$STACK"},"level":"warn","message":"foo bar","module":"merkle"}',
      },
    };
  },

  () => {
    const error = new ChunktreeError({code: "SAMPLE_ERROR", source: "data.bin", offset: 8});
    error.stack = "$STACK";
    return {
      id: "error and log with metadata",
      opts: {module: "merkle"},
      message: "foo bar",
      context: {meta: "data"},
      error: error,
      output: {
        human: `[merkle]           \u001b[33mwarn\u001b[39m: foo bar meta=data, code=SAMPLE_ERROR, source=data.bin, offset=8\n${error.stack}`,
        json: '{"context":{"meta":"data"},"error":{"code":"SAMPLE_ERROR","offset":8,"source":"data.bin","stack":"$STACK"},"level":"warn","message":"foo bar","module":"merkle"}',
      },
    };
  },
];
