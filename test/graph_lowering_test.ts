import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { GraphLowering } from "../src/Lowering/GraphLowering.js";
import { OpCapabilityTable } from "../src/Lowering/OpCapabilities.js";
import { HostTensor, OutputTensorInfo } from "../src/Lowering/DryRun.js";
import { PaddingMode, TransferTables } from "../src/Lowering/TransferParams.js";
import { verificationString } from "../src/Lowering/Dump.js";
import { DataType } from "../src/Onnx/OnnxTypes.js";
import { decodeModel } from "../src/onnx2json.js";
import { encodeModel } from "../src/json2onnx.js";
import {
  DependencyUnresolvedError,
  DryRunFailure,
  GraphLoadError,
  LoweringInvariantError,
  RankExceededError,
  ShapeInconsistencyError,
  UnboundNameError,
  UnsupportedOperationError,
} from "../src/Lowering/Errors.js";
import {
  FailingEngine,
  FakeEngine,
  RecordingCapabilities,
  TEST_OPS,
  convModel,
  int64Initializer,
  ints,
  model,
  node,
  reluModel,
  str,
  valueInfo,
} from "./model_builder.js";

const SCENARIO_A = [
  "const,0,w,3,3,1,2,w,72",
  "op,1,x,INPUT,0,0,0,1",
  "op,2,conv,Conv,3,2,2,1",
  "op,3,y,OUTPUT,1,0,1,0",
  "in,1",
  "in,2,1:0,0:0",
  "in,3,2:0",
  "out,1,64",
  "out,2,32",
  "out,3",
].join("\n");

function lowering(options = {}) {
  return new GraphLowering(new OpCapabilityTable(TEST_OPS), { verbosity: 0, ...options });
}

function observed(tensors: Record<string, HostTensor>): OutputTensorInfo {
  const outputTensorMap = new Map(Object.entries(tensors));
  return { outputTensors: [...outputTensorMap.values()], outputTensorMap };
}

function expectEmpty(l: GraphLowering) {
  expect(l.getOpNodeParams()).toEqual([]);
  expect(l.getConstNodeParams()).toEqual([]);
  expect(l.getNodeInputParams()).toEqual([]);
  expect(l.getNodeOutputParams()).toEqual([]);
}

function allIds(tables: TransferTables): number[] {
  return [...tables.constNodes, ...tables.opNodes].map(n => n.nodeId).sort((a, b) => a - b);
}

function flattenModel() {
  return model({
    input: [valueInfo("x", [1, 2, 3, 4])],
    initializer: [int64Initializer("shape", [1, 24])],
    node: [node("Reshape", ["x", "shape"], ["y"], "r")],
    output: [valueInfo("y", [1, 24])],
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GraphLowering", () => {
  it("lowers a single convolution", async () => {
    const lowered = await lowering().loadGraph(convModel(), [{ name: "x" }], ["y"]);
    expect(verificationString(lowered.tables)).toBe(SCENARIO_A);
  });

  it("exposes the tables through its getters", async () => {
    const l = lowering();
    const lowered = await l.loadGraph(convModel(), [{ name: "x" }], ["y"]);

    expect(l.getOpNodeParams()).toEqual(lowered.tables.opNodes);
    expect(l.getConstNodeParams()).toEqual([
      { name: "w", nodeId: 0, shape: [3, 3, 1, 2], dataName: "w", dataSize: 72 },
    ]);
    expect(l.getNodeInputParams()[1]).toEqual({
      nodeId: 2,
      inputs: [{ nodeId: 1, outputPort: 0 }, { nodeId: 0, outputPort: 0 }],
    });
    expect(l.getNodeOutputParams().map(o => o.maxSizes)).toEqual([[64], [32], []]);
  });

  it("interns padding shapes as extra inputs", async () => {
    const lowered = await lowering().loadGraph(
      convModel([ints("kernel_shape", [3, 3]), ints("strides", [1, 1])]),
      [{ name: "x" }],
      ["y"],
    );

    expect(lowered.tables.constNodes.map(c => [c.nodeId, c.name, c.dataSize])).toEqual([
      [0, "w", 72],
      [2, "__shape_1x1x3x3", 0],
      [3, "__shape_1x1x1x1", 0],
    ]);
    const conv = lowered.tables.opNodes.find(op => op.name === "conv");
    expect(conv).toMatchObject({ nodeId: 4, inputsSize: 4, padding: PaddingMode.VALID });
    expect(lowered.tables.nodeInputs.find(e => e.nodeId === 4)?.inputs).toEqual([
      { nodeId: 1, outputPort: 0 },
      { nodeId: 0, outputPort: 0 },
      { nodeId: 2, outputPort: 0 },
      { nodeId: 3, outputPort: 0 },
    ]);
  });

  it("shares interned shapes between ops", async () => {
    const pool = (input: string, output: string, name: string) =>
      node("MaxPool", [input], [output], name, [ints("kernel_shape", [2, 2]), ints("strides", [1, 1])]);
    const lowered = await lowering().loadGraph(
      model({
        input: [valueInfo("x", [1, 1, 4, 4])],
        node: [pool("x", "a", "p1"), pool("a", "y", "p2")],
        output: [valueInfo("y", [1, 1, 2, 2])],
      }),
      [{ name: "x" }],
      ["y"],
    );

    expect(lowered.tables.constNodes).toHaveLength(2);
    expect(lowered.tables.nodeInputs.find(e => e.nodeId === 4)?.inputs).toEqual([
      { nodeId: 3, outputPort: 0 },
      { nodeId: 1, outputPort: 0 },
      { nodeId: 2, outputPort: 0 },
    ]);
    expect(lowered.tables.nodeOutputs.find(e => e.nodeId === 3)?.maxSizes).toEqual([36]);
  });

  it("derives the padding mode from the attributes", async () => {
    const cases: [Parameters<typeof convModel>[0], PaddingMode][] = [
      [[str("auto_pad", "SAME_UPPER")], PaddingMode.SAME],
      [[str("auto_pad", "VALID")], PaddingMode.VALID],
      [[ints("pads", [1, 1, 1, 1])], PaddingMode.EXPLICIT],
      [[ints("pads", [0, 0, 0, 0])], PaddingMode.VALID],
    ];
    for (const [attributes, padding] of cases) {
      const lowered = await lowering().loadGraph(convModel(attributes), [{ name: "x" }], ["y"]);
      expect(lowered.tables.opNodes.find(op => op.name === "conv")?.padding).toBe(padding);
    }
  });

  it("assigns contiguous ids in dependency order", async () => {
    const lowered = await lowering().loadGraph(
      convModel([ints("kernel_shape", [3, 3]), ints("strides", [1, 1])]),
      [{ name: "x" }],
      ["y"],
    );

    const ids = allIds(lowered.tables);
    expect(ids).toEqual(ids.map((_, i) => i));
    for (const entry of lowered.tables.nodeInputs) {
      for (const input of entry.inputs) expect(input.nodeId).toBeLessThan(entry.nodeId);
    }
  });

  it("does not depend on the order nodes are listed in", async () => {
    const chain = (order: "forward" | "reverse") => {
      const first = node("Relu", ["x"], ["a"], "r1");
      const second = node("Relu", ["a"], ["y"], "r2");
      return model({
        input: [valueInfo("x", [2, 3])],
        node: order === "forward" ? [first, second] : [second, first],
        output: [valueInfo("y", [2, 3])],
      });
    };

    const forward = await lowering().loadGraph(chain("forward"), [{ name: "x" }], ["y"]);
    const reverse = await lowering().loadGraph(chain("reverse"), [{ name: "x" }], ["y"]);
    expect(verificationString(reverse.tables)).toBe(verificationString(forward.tables));
  });

  it("leaves out nodes the outputs do not depend on", async () => {
    const lowered = await lowering().loadGraph(
      model({
        input: [valueInfo("x", [2, 3])],
        node: [node("Relu", ["x"], ["y"], "relu"), node("Relu", ["x"], ["unused"], "dead")],
        output: [valueInfo("y", [2, 3])],
      }),
      [{ name: "x" }],
      ["y"],
    );
    expect(lowered.tables.opNodes.map(op => op.name)).toEqual(["x", "relu", "y"]);
  });

  it("lowers a reshape into the innermost dim as a flatten", async () => {
    const capabilities = new RecordingCapabilities();
    const lowered = await new GraphLowering(capabilities, { verbosity: 0 }).loadGraph(flattenModel(), [{ name: "x" }], ["y"]);

    expect(lowered.tables.constNodes).toEqual([
      { name: "shape", nodeId: 0, shape: [1, 1, 1, 2], dataName: "shape", dataSize: 16 },
    ]);
    expect(lowered.tables.opNodes.find(op => op.name === "r")).toEqual({
      name: "r",
      nodeId: 2,
      type: "Reshape",
      targetOpId: 2,
      padding: PaddingMode.NA,
      inputsSize: 2,
      outputsSize: 1,
    });
    expect(lowered.tables.nodeOutputs.find(e => e.nodeId === 1)?.maxSizes).toEqual([96]);
    expect(capabilities.calls).not.toContain("isSupported:Reshape");
    expect(capabilities.calls).not.toContain("targetId:Reshape");
  });

  it("rejects other reshapes the target does not support", async () => {
    const l = lowering();
    const error = await l.loadGraph(
      model({
        input: [valueInfo("x", [2, 3])],
        initializer: [int64Initializer("shape", [3, 2])],
        node: [node("Reshape", ["x", "shape"], ["y"], "r")],
        output: [valueInfo("y", [3, 2])],
      }),
      [{ name: "x" }],
      ["y"],
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedOperationError);
    if (error instanceof UnsupportedOperationError) {
      expect(error.opKind).toBe("Reshape");
      expect(error.nodeName).toBe("r");
    }
    expectEmpty(l);
  });

  it("fails on a declared output that is not in the graph", async () => {
    const l = lowering();
    await expect(l.loadGraph(reluModel(), [{ name: "x" }], ["missing"])).rejects.toThrow(
      new UnboundNameError("missing", "output"),
    );
    await expect(l.loadGraph(reluModel(), [{ name: "x" }], ["missing"])).rejects.toThrow(
      "output 'missing' not found in graph",
    );
    expectEmpty(l);
  });

  it("fails on a declared input that is not in the graph", async () => {
    await expect(lowering().loadGraph(reluModel(), [{ name: "nope" }], ["y"])).rejects.toThrow(
      "input 'nope' not found in graph",
    );
  });

  it("fails on graph inputs consumed without being declared", async () => {
    const graph = model({
      input: [valueInfo("x", [2]), valueInfo("z", [2])],
      node: [node("Add", ["x", "z"], ["y"], "add")],
      output: [valueInfo("y", [2])],
    });
    await expect(lowering().loadGraph(graph, [{ name: "x" }], ["y"])).rejects.toThrow(
      "input 'z' is consumed by the graph but not declared as an input",
    );
  });

  it("reports units stuck on a cycle", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const l = lowering();
    const error = await l.loadGraph(
      model({
        input: [valueInfo("x", [2])],
        node: [
          node("Relu", ["b"], ["a"], "A"),
          node("Relu", ["a"], ["b"], "B"),
          node("Add", ["a", "x"], ["y"], "add"),
        ],
        output: [valueInfo("y", [2])],
      }),
      [{ name: "x" }],
      ["y"],
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DependencyUnresolvedError);
    if (error instanceof DependencyUnresolvedError) {
      expect(error.pending).toEqual(["A", "B", "add", "y"]);
    }
    expectEmpty(l);
  });

  it("folds rank 5 shapes and rejects higher ranks", async () => {
    const relu = (dims: number[]) =>
      model({
        input: [valueInfo("x", dims)],
        node: [node("Relu", ["x"], ["y"], "relu")],
        output: [valueInfo("y", dims)],
      });

    const lowered = await lowering().loadGraph(relu([1, 2, 3, 4, 5]), [{ name: "x" }], ["y"]);
    expect(lowered.tables.nodeOutputs.map(o => o.maxSizes)).toEqual([[480], [480], []]);

    await expect(lowering().loadGraph(relu([1, 1, 1, 1, 1, 1]), [{ name: "x" }], ["y"])).rejects.toThrow(
      RankExceededError,
    );
  });

  it("clears previous tables when a later load fails", async () => {
    const l = lowering();
    await l.loadGraph(convModel(), [{ name: "x" }], ["y"]);
    expect(l.getOpNodeParams()).toHaveLength(3);

    await expect(l.loadGraph(convModel(), [{ name: "x" }], ["missing"])).rejects.toThrow(UnboundNameError);
    expectEmpty(l);
  });

  it("starts every load from id 0", async () => {
    const l = lowering();
    await l.loadGraph(reluModel(), [{ name: "x" }], ["y"]);
    const second = await l.loadGraph(convModel(), [{ name: "x" }], ["y"]);
    expect(verificationString(second.tables)).toBe(SCENARIO_A);
  });

  it("reads constant data by node id", async () => {
    const lowered = await lowering().loadGraph(
      convModel([ints("kernel_shape", [3, 3])]),
      [{ name: "x" }],
      ["y"],
    );

    const bytes = lowered.readConstData(0);
    expect(bytes.byteLength).toBe(72);
    expect(new DataView(bytes.buffer, bytes.byteOffset).getFloat32(0, true)).toBe(1);
    expect(lowered.readConstData(2)).toEqual(new Uint8Array(0));
    expect(() => lowered.readConstData(1)).toThrow(LoweringInvariantError);
  });

  it("logs a summary at verbosity 1", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await lowering({ verbosity: 1 }).loadGraph(convModel(), [{ name: "x" }], ["y"]);
    expect(log).toHaveBeenCalledWith("[GraphLowering] Lowered 'test_graph': 4 nodes (3 op, 1 const, 0 interned shapes)");
  });
});

describe("shape checking", () => {
  const mismatch = observed({ y: { dataType: DataType.FLOAT, dims: [2, 4] } });

  it("is strict by default", () => {
    expect(lowering().strictCheckMode).toBe(true);
    expect(lowering({ strictCheck: false }).strictCheckMode).toBe(false);
  });

  it("rejects dry-run shapes that disagree in strict mode", async () => {
    const l = lowering();
    const error = await l.loadGraph(reluModel(), [{ name: "x" }], ["y"], mismatch).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ShapeInconsistencyError);
    if (error instanceof ShapeInconsistencyError) {
      expect(error.nodeName).toBe("y");
      expect(error.expected).toEqual([2, 3]);
      expect(error.actual).toEqual([2, 4]);
    }
    expectEmpty(l);
  });

  it("keeps the static shape with a warning otherwise", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const l = lowering();
    l.enableStrictCheckMode(false);

    const lowered = await l.loadGraph(reluModel(), [{ name: "x" }], ["y"], mismatch);

    expect(lowered.tables.nodeOutputs.find(e => e.nodeId === 1)?.maxSizes).toEqual([24]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("accepts dry-run shapes that encode the same", async () => {
    const same = observed({ y: { dataType: DataType.FLOAT, dims: [1, 2, 3] } });
    const lowered = await lowering().loadGraph(reluModel(), [{ name: "x" }], ["y"], same);
    expect(lowered.tables.nodeOutputs.find(e => e.nodeId === 1)?.maxSizes).toEqual([24]);
  });
});

describe("dry run", () => {
  const argMaxModel = () =>
    model({
      input: [valueInfo("x", [2, 5])],
      node: [node("ArgMax", ["x"], ["y"], "am")],
      output: [valueInfo("y", undefined, DataType.INT64)],
    });

  it("runs once to resolve unknown shapes", async () => {
    const engine = new FakeEngine({ y: { dataType: DataType.INT64, dims: [2, 1] } });
    const lowered = await lowering({ engine }).loadGraph(argMaxModel(), [{ name: "x" }], ["y"]);

    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].fetches).toEqual(["y"]);
    expect(engine.calls[0].feeds.get("x")?.data).toEqual(new Float32Array(10));
    expect(lowered.tables.nodeOutputs.find(e => e.nodeId === 1)?.maxSizes).toEqual([16]);
    expect(lowered.outputTensorInfo?.outputTensorMap.get("y")?.dims).toEqual([2, 1]);
  });

  it("is skipped when every shape is static", async () => {
    const engine = new FakeEngine({});
    await lowering({ engine }).loadGraph(reluModel(), [{ name: "x" }], ["y"]);
    expect(engine.calls).toHaveLength(0);
  });

  it("is skipped when output tensors are given", async () => {
    const engine = new FakeEngine({});
    const given = observed({ y: { dataType: DataType.INT64, dims: [2, 1] } });
    const lowered = await lowering({ engine }).loadGraph(argMaxModel(), [{ name: "x" }], ["y"], given);

    expect(engine.calls).toHaveLength(0);
    expect(lowered.tables.nodeOutputs.find(e => e.nodeId === 1)?.maxSizes).toEqual([16]);
  });

  it("fails without a result for an unknown shape", async () => {
    await expect(lowering().loadGraph(argMaxModel(), [{ name: "x" }], ["y"])).rejects.toThrow(DryRunFailure);
    await expect(
      lowering({ engine: new FakeEngine({}), dryRunForUnknownShape: false }).loadGraph(argMaxModel(), [{ name: "x" }], ["y"]),
    ).rejects.toThrow(DryRunFailure);
  });

  it("surfaces engine failures", async () => {
    const l = lowering({ engine: new FailingEngine() });
    const error = await l.loadGraph(argMaxModel(), [{ name: "x" }], ["y"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DryRunFailure);
    if (error instanceof DryRunFailure) expect(error.cause).toBeInstanceOf(Error);
    expectEmpty(l);
  });
});

describe("a bound input", () => {
  const symbolicRelu = (outputDims: (number | string)[]) =>
    model({
      input: [valueInfo("x", ["N", 3])],
      node: [node("Relu", ["x"], ["y"], "relu")],
      output: [valueInfo("y", outputDims)],
    });
  const boundX: HostTensor = { dataType: DataType.FLOAT, dims: [2, 3], data: Float32Array.from([1, 2, 3, 4, 5, 6]) };

  it("resolves a symbolic batch dim through the dry run", async () => {
    const engine = new FakeEngine({ y: { dataType: DataType.FLOAT, dims: [2, 3] } });
    const lowered = await lowering({ engine }).loadGraph(symbolicRelu(["N", 3]), [{ name: "x", tensor: boundX }], ["y"]);

    expect(engine.calls).toHaveLength(1);
    expect(lowered.tables.nodeOutputs.map(o => o.maxSizes)).toEqual([[24], [24], []]);
    expect(lowered.outputTensorInfo?.outputTensorMap.get("x")?.dims).toEqual([2, 3]);
  });

  it("gives its dims without a dry run", async () => {
    const engine = new FakeEngine({});
    const lowered = await lowering({ engine }).loadGraph(symbolicRelu([2, 3]), [{ name: "x", tensor: boundX }], ["y"]);

    expect(engine.calls).toHaveLength(0);
    expect(lowered.tables.nodeOutputs.map(o => o.maxSizes)).toEqual([[24], [24], []]);
  });

  it("stands in for the cut-off producer of an intermediate", async () => {
    const boundA: HostTensor = { dataType: DataType.FLOAT, dims: [2, 3], data: Float32Array.from([6, 5, 4, 3, 2, 1]) };
    const engine = new FakeEngine({ y: { dataType: DataType.FLOAT, dims: [2, 3] } });
    const lowered = await lowering({ engine, initializeByZero: false }).loadGraph(
      model({
        input: [valueInfo("x", ["N", 3])],
        node: [node("Relu", ["x"], ["a"], "first"), node("Relu", ["a"], ["y"], "second")],
        output: [valueInfo("y", ["N", 3])],
      }),
      [{ name: "a", tensor: boundA }],
      ["y"],
    );

    expect(engine.calls[0].feeds.get("a")).toBe(boundA);
    expect(engine.calls[0].model.graph?.node?.map(n => n.name)).toEqual(["second"]);
    expect(lowered.tables.opNodes.map(op => [op.nodeId, op.name, op.type])).toEqual([
      [0, "a", "INPUT"],
      [1, "second", "Relu"],
      [2, "y", "OUTPUT"],
    ]);
    expect(lowered.tables.nodeOutputs.map(o => o.maxSizes)).toEqual([[24], [24], []]);
  });

  it("is checked against static shapes in strict mode", async () => {
    const wrong: HostTensor = { dataType: DataType.FLOAT, dims: [4, 3] };
    await expect(lowering().loadGraph(reluModel(), [{ name: "x", tensor: wrong }], ["y"])).rejects.toThrow(
      ShapeInconsistencyError,
    );
  });
});

describe("loading from files", () => {
  const dirs: string[] = [];
  const tmpFile = (name: string, contents: string | Uint8Array) => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "lowering-"));
    dirs.push(dir);
    const file = path.join(dir, name);
    fs.writeFileSync(file, contents);
    return file;
  };

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lowers the JSON form of a model", async () => {
    const file = tmpFile("conv.json", JSON.stringify(convModel()));
    const lowered = await lowering().loadGraphFromFile(file, [{ name: "x" }], ["y"], true, false);
    expect(verificationString(lowered.tables)).toBe(SCENARIO_A);
  });

  it("lowers a binary model", async () => {
    const file = tmpFile("conv.onnx", await encodeModel(convModel()));
    const lowered = await lowering().loadGraphFromFile(file, [{ name: "x" }], ["y"], false, false);
    expect(verificationString(lowered.tables)).toBe(SCENARIO_A);
  });

  it("checks the extension against the format", async () => {
    const file = tmpFile("conv.json", JSON.stringify(convModel()));
    const l = lowering();
    await expect(l.loadGraphFromFile(file, [{ name: "x" }], ["y"], false, false)).rejects.toThrow(GraphLoadError);
    expectEmpty(l);
  });

  it("keeps the lowering across a binary round trip", async () => {
    const decoded = await decodeModel(await encodeModel(convModel()));
    const lowered = await lowering().loadGraph(decoded, [{ name: "x" }], ["y"]);
    expect(verificationString(lowered.tables)).toBe(SCENARIO_A);
  });
});
