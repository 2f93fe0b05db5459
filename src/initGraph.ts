import Graph from "@specs-feup/flow/graph/Graph";
import OnnxGraph from "./Onnx/OnnxGraph.js";
import TensorNode from "./Onnx/TensorNode.js";
import OperationNode from "./Onnx/OperationNode.js";
import OnnxEdge from "./Onnx/OnnxEdge.js";
import inferShapes from "./Onnx/InferShapes.js";
import {
  AttributeProto,
  AttributeType,
  AttributeValue,
  DataType,
  GraphProto,
  ModelProto,
  NodeProto,
  RawBytes,
  TensorProto,
  TypeProto,
  ValueInfoProto,
} from "./Onnx/OnnxTypes.js";
import { toDataType, toNum, toU8, uniq } from "./Onnx/Utils.js";
import { GraphLoadError } from "./Lowering/Errors.js";

export type ValueType = { dataType: DataType; shape: TensorNode.Dim[] | undefined };

// Helper function to convert a declared type to element type + shape
export function parseValueType(type: TypeProto | undefined): ValueType {
  const tensorType = type?.tensorType;
  const dims = tensorType?.shape?.dim;
  return {
    dataType: toDataType(tensorType?.elemType),
    shape: dims === undefined
      ? undefined
      : dims.map((dim, i) => toNum(dim.dimValue) ?? (dim.dimParam || `?${i}`)),
  };
}

function decodeText(raw: RawBytes | undefined): string {
  if (raw === undefined) return "";
  // JSON graphs written by hand carry attribute strings verbatim
  if (typeof raw === "string") return raw;
  const bytes = toU8(raw);
  return bytes ? Buffer.from(bytes).toString("utf8") : "";
}

function attributeKind(attr: AttributeProto): AttributeType {
  if (typeof attr.type === "number") return attr.type;
  if (typeof attr.type === "string") {
    const byName = Object.entries(AttributeType).find(([key]) => key === attr.type)?.[1];
    if (typeof byName === "number" && byName !== AttributeType.UNDEFINED) return byName;
  }
  // untyped JSON attributes: go by the populated field
  if (attr.t !== undefined) return AttributeType.TENSOR;
  if (attr.ints?.length) return AttributeType.INTS;
  if (attr.floats?.length) return AttributeType.FLOATS;
  if (attr.strings?.length) return AttributeType.STRINGS;
  if (attr.s !== undefined && attr.s !== "") return AttributeType.STRING;
  if (attr.i !== undefined) return AttributeType.INT;
  if (attr.f !== undefined) return AttributeType.FLOAT;
  return AttributeType.UNDEFINED;
}

function parseAttribute(attr: AttributeProto): AttributeValue | undefined {
  switch (attributeKind(attr)) {
    case AttributeType.FLOAT:
      return Number(attr.f ?? 0);
    case AttributeType.INT:
      return toNum(attr.i) ?? 0;
    case AttributeType.STRING:
      return decodeText(attr.s);
    case AttributeType.FLOATS:
      return (attr.floats ?? []).map(Number);
    case AttributeType.INTS:
      return (attr.ints ?? []).map(v => toNum(v) ?? 0);
    case AttributeType.STRINGS:
      return (attr.strings ?? []).map(decodeText);
    case AttributeType.TENSOR:
      return attr.t;
    default:
      console.warn(`[createGraph] Unhandled attribute type '${attr.type}' for '${attr.name}'`);
      return undefined;
  }
}

function parseAttributes(node: NodeProto): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {};
  for (const attr of node.attribute ?? []) {
    if (!attr.name) continue;
    const value = parseAttribute(attr);
    if (value !== undefined) attributes[attr.name] = value;
  }
  return attributes;
}

// The value of a Constant op, from whichever value_* attribute it uses
function constantValueOf(node: NodeProto): TensorProto {
  for (const attr of node.attribute ?? []) {
    switch (attr.name) {
      case "value":
        if (attr.t) return attr.t;
        break;
      case "value_float":
        return { dataType: DataType.FLOAT, dims: [], floatData: [Number(attr.f ?? 0)] };
      case "value_floats":
        return { dataType: DataType.FLOAT, dims: [attr.floats?.length ?? 0], floatData: attr.floats ?? [] };
      case "value_int":
        return { dataType: DataType.INT64, dims: [], int64Data: [attr.i ?? 0] };
      case "value_ints":
        return { dataType: DataType.INT64, dims: [attr.ints?.length ?? 0], int64Data: attr.ints ?? [] };
    }
  }
  throw new GraphLoadError(`Constant node '${node.name ?? node.output?.[0]}' has no supported value attribute`);
}

function addTensor(
  graph: OnnxGraph.Class,
  name: string,
  dataType: DataType,
  shape: TensorNode.Dim[] | undefined,
  kind: TensorNode.Kind,
  constantValue?: TensorProto,
): TensorNode.Class {
  if (!name) {
    throw new GraphLoadError(`${kind} tensor without a name`);
  }
  if (graph.hasNode(name)) {
    throw new GraphLoadError(`tensor '${name}' is defined more than once`);
  }
  return graph.addNode(name)
    .init(new TensorNode.Builder(dataType, shape, kind, constantValue))
    .as(TensorNode);
}

// Add initializers
function addInitializers(data: GraphProto, graph: OnnxGraph.Class) {
  for (const tensor of data.initializer ?? []) {
    const shape = (tensor.dims ?? []).map(d => toNum(d) ?? 0);
    addTensor(graph, tensor.name ?? "", toDataType(tensor.dataType), shape, "initializer", tensor);
  }
}

// Add input nodes to the graph; older models also list their initializers as inputs
function addInputNodes(data: GraphProto, graph: OnnxGraph.Class) {
  for (const input of data.input ?? []) {
    if (graph.getTensor(input.name)?.type === "initializer") continue;
    const { dataType, shape } = parseValueType(input.type);
    addTensor(graph, input.name, dataType, shape, "input");
  }
}

// Add constant-op outputs and every value produced by an operation
function addProducedTensors(data: GraphProto, graph: OnnxGraph.Class, valueInfo: Map<string, ValueType>) {
  const declaredOutputs = new Map<string, ValueInfoProto>();
  for (const output of data.output ?? []) declaredOutputs.set(output.name, output);

  for (const node of data.node ?? []) {
    if (node.opType === "Constant") {
      const name = node.output?.[0] ?? "";
      const value = constantValueOf(node);
      const shape = (value.dims ?? []).map(d => toNum(d) ?? 0);
      addTensor(graph, name, toDataType(value.dataType), shape, "constant", value);
      continue;
    }

    for (const output of node.output ?? []) {
      if (!output) continue;
      const declared = declaredOutputs.get(output);
      if (declared) {
        const { dataType, shape } = parseValueType(declared.type);
        addTensor(graph, output, dataType, shape, "output");
      } else {
        const info = valueInfo.get(output);
        addTensor(graph, output, info?.dataType ?? DataType.UNDEFINED, info?.shape, "intermediate");
      }
    }
  }

  for (const name of declaredOutputs.keys()) {
    if (!graph.hasNode(name)) {
      throw new GraphLoadError(`graph output '${name}' is not produced by any node`);
    }
  }
}

// Add operation nodes to the graph, after every tensor so generated ids cannot clash
function addNodes(data: GraphProto, graph: OnnxGraph.Class) {
  (data.node ?? []).forEach((node, index) => {
    if (node.opType === "Constant") return;
    if (!node.opType) {
      throw new GraphLoadError(`node #${index} has no op type`);
    }

    const inputs = (node.input ?? []).filter(input => input !== "");
    for (const input of inputs) {
      if (!graph.hasNode(input)) {
        throw new GraphLoadError(`node '${node.name || index}' consumes undefined tensor '${input}'`);
      }
    }

    const id = uniq(graph, node.name || `${node.opType}_${index}`);
    graph.addNode(id)
      .init(new OperationNode.Builder(node.opType, node.name ?? "", inputs, node.output ?? [], parseAttributes(node)))
      .as(OperationNode);
  });
}

// Connect tensors to their consumers and producers to their outputs
function addEdges(graph: OnnxGraph.Class) {
  for (const op of graph.getOperationNodes().toArray()) {
    op.inputNames.forEach(name => {
      const tensor = graph.getTensor(name);
      if (!tensor) return;
      graph.addEdge(tensor, op).init(new OnnxEdge.Builder(tensor.shape)).as(OnnxEdge);
    });
    op.outputNames.forEach(name => {
      const tensor = graph.getTensor(name);
      if (!tensor) return;
      graph.addEdge(op, tensor).init(new OnnxEdge.Builder(tensor.shape)).as(OnnxEdge);
    });
  }
}

// Create the graph using the implemented classes
export function createGraph(model: ModelProto): OnnxGraph.Class {
  const data = model.graph;
  if (!data) {
    throw new GraphLoadError("model has no graph");
  }

  const graph = Graph.create().init(new OnnxGraph.Builder(data.name ?? "")).as(OnnxGraph);

  const valueInfo = new Map<string, ValueType>();
  for (const info of data.valueInfo ?? []) {
    valueInfo.set(info.name, parseValueType(info.type));
  }

  addInitializers(data, graph);
  addInputNodes(data, graph);
  addProducedTensors(data, graph, valueInfo);
  addNodes(data, graph);

  inferShapes(graph);
  addEdges(graph);

  return graph;
}
