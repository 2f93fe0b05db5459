export { createGraph } from './initGraph.js';
export { default as inferShapes } from './Onnx/InferShapes.js';
export { onnx2json, loadModel, decodeModel, parseModelJson } from './onnx2json.js';
export { json2onnx, encodeModel } from './json2onnx.js';
export { type LoweringOptions, defaultLoweringOptions } from './LoweringOptions.js';

export { GraphLowering } from './Lowering/GraphLowering.js';
export {
  type OpCapabilities,
  type OpDefinition,
  OpCapabilityTable,
  loadCapabilities,
  parseOpDefinitions,
  INPUT_OP,
  OUTPUT_OP,
  FLATTEN_OP,
} from './Lowering/OpCapabilities.js';
export {
  type HostExecutionEngine,
  type HostTensor,
  type InputNodeInfo,
  type OutputTensorInfo,
  dryRunInference,
  dryRunInferenceForAllNodes,
  withBoundIntermediates,
} from './Lowering/DryRun.js';
export { OrtHostEngine } from './Lowering/OrtHostEngine.js';
export {
  type ShapeDescriptor,
  MAX_SUPPORTED_RANK,
  SHAPE_ARRAY_SIZE,
  encodeShape,
} from './Lowering/ShapeEncoding.js';
export {
  type ConstNodeTransferParams,
  LoweredGraph,
  type NodeInputParams,
  type NodeOutputParams,
  type NodeTransferParams,
  PaddingMode,
  type TransferTables,
} from './Lowering/TransferParams.js';
export { dumpTransferParams, verificationString, nodeIdsOf } from './Lowering/Dump.js';
export * from './Lowering/Errors.js';

export { default as OnnxGraph } from './Onnx/OnnxGraph.js';
export { default as OnnxDotFormatter } from './Onnx/dot/OnnxDotFormatter.js';
