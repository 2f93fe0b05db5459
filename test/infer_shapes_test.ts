import { describe, it, expect } from "vitest";
import { createGraph } from "../src/initGraph.js";
import { DataType, NodeProto, TensorProto, ValueInfoProto } from "../src/Onnx/OnnxTypes.js";
import { floatInitializer, int, int64Initializer, ints, model, node, valueInfo } from "./model_builder.js";

function infer(
  inputs: ValueInfoProto[],
  nodes: NodeProto[],
  initializer: TensorProto[] = [],
) {
  return createGraph(model({ input: inputs, initializer, node: nodes, output: [] }));
}

describe("inferShapes", () => {
  it("infers Conv with pads and strides", () => {
    const graph = infer(
      [valueInfo("x", [1, 3, 8, 8])],
      [node("Conv", ["x", "w"], ["y"], "conv", [ints("pads", [1, 1, 1, 1]), ints("strides", [2, 2])])],
      [floatInitializer("w", [16, 3, 3, 3])],
    );
    expect(graph.getTensor("y")?.shape).toEqual([1, 16, 4, 4]);
    expect(graph.getTensor("y")?.literalType).toBe(DataType.FLOAT);
  });

  it("infers pooling with SAME padding", () => {
    const graph = infer(
      [valueInfo("x", [1, 2, 5, 5])],
      [node("MaxPool", ["x"], ["y"], "pool", [ints("kernel_shape", [3, 3]), ints("strides", [2, 2]), { name: "auto_pad", s: "SAME_UPPER" }])],
    );
    expect(graph.getTensor("y")?.shape).toEqual([1, 2, 3, 3]);
  });

  it("broadcasts MatMul batch dims", () => {
    const graph = infer(
      [valueInfo("a", [2, 1, 4, 5]), valueInfo("b", [3, 5, 6])],
      [node("MatMul", ["a", "b"], ["y"], "mm")],
    );
    expect(graph.getTensor("y")?.shape).toEqual([2, 3, 4, 6]);
  });

  it("resolves Reshape targets with 0 and -1", () => {
    const graph = infer(
      [valueInfo("x", [2, 3, 4])],
      [node("Reshape", ["x", "target"], ["y"], "reshape")],
      [int64Initializer("target", [0, -1])],
    );
    expect(graph.getTensor("y")?.shape).toEqual([2, 12]);
  });

  it("chains through Transpose and Concat", () => {
    const graph = infer(
      [valueInfo("x", [2, 3, 4]), valueInfo("z", [4, 5, 2])],
      [
        node("Transpose", ["x"], ["t"], "transpose"),
        node("Concat", ["t", "z"], ["y"], "concat", [int("axis", 1)]),
      ],
    );
    expect(graph.getTensor("t")?.shape).toEqual([4, 3, 2]);
    expect(graph.getTensor("y")?.shape).toEqual([4, 8, 2]);
  });

  it("takes Unsqueeze axes from a constant input", () => {
    const graph = infer(
      [valueInfo("x", [3, 4])],
      [node("Unsqueeze", ["x", "axes"], ["y"], "unsqueeze")],
      [int64Initializer("axes", [0])],
    );
    expect(graph.getTensor("y")?.shape).toEqual([1, 3, 4]);
  });

  it("sets element types of Shape and comparisons", () => {
    const graph = infer(
      [valueInfo("x", [2, 3]), valueInfo("z", [3])],
      [node("Shape", ["x"], ["s"], "shape"), node("Equal", ["x", "z"], ["e"], "equal")],
    );
    expect(graph.getTensor("s")?.shape).toEqual([2]);
    expect(graph.getTensor("s")?.literalType).toBe(DataType.INT64);
    expect(graph.getTensor("e")?.shape).toEqual([2, 3]);
    expect(graph.getTensor("e")?.literalType).toBe(DataType.BOOL);
  });

  it("visits operations out of source order", () => {
    const graph = infer(
      [valueInfo("x", [2, 6])],
      [node("Relu", ["a"], ["b"], "second"), node("Flatten", ["x"], ["a"], "first", [int("axis", 0)])],
    );
    expect(graph.getTensor("a")?.shape).toEqual([1, 12]);
    expect(graph.getTensor("b")?.shape).toEqual([1, 12]);
  });

  it("leaves unknown ops and symbolic inputs unresolved", () => {
    const graph = infer(
      [valueInfo("x", ["N", 3])],
      [node("ArgMax", ["x"], ["i"], "argmax"), node("Flatten", ["x"], ["f"], "flatten")],
    );
    expect(graph.getTensor("i")?.shape).toBeUndefined();
    expect(graph.getTensor("i")?.literalType).toBe(DataType.UNDEFINED);
    expect(graph.getTensor("f")?.shape).toBeUndefined();
  });

  it("keeps declared shapes", () => {
    const graph = createGraph(model({
      input: [valueInfo("x", [2, 3])],
      node: [node("Relu", ["x"], ["y"], "relu")],
      output: [valueInfo("y", [2, 4])],
    }));
    expect(graph.getTensor("y")?.shape).toEqual([2, 4]);
  });
});
