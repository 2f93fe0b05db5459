import fs from 'fs';
import path from 'path';
import { ModelProto } from './Onnx/OnnxTypes.js';
import { modelType, parseModelJson } from './onnx2json.js';
import { GraphLoadError } from './Lowering/Errors.js';

/**
 * Recursively traverses a value and converts any { type: 'Buffer', data: [...] }
 * back into actual Node.js Buffers for protobuf compatibility.
 */
function fixBuffers(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(fixBuffers);
  }
  if (value instanceof Uint8Array) {
    return value;
  }
  if (value && typeof value === 'object') {
    if ('type' in value && value.type === 'Buffer' && 'data' in value && Array.isArray(value.data)) {
      return Buffer.from(value.data);
    }
    return fixBufferFields(value);
  }
  return value;
}

function fixBufferFields(obj: object): { [key: string]: unknown } {
  return Object.fromEntries(Object.entries(obj).map(([key, v]) => [key, fixBuffers(v)]));
}

const defaultFields = {
  irVersion: 9,
  opsetImport: [{ domain: '', version: 17 }],
  producerName: 'onnx-transfer',
  producerVersion: '0.1.0',
  modelVersion: 1,
};

/** Encodes a ModelProto to the binary wire format, filling in the usual model header fields. */
export async function encodeModel(model: ModelProto): Promise<Uint8Array> {
  const ModelProtoType = await modelType();
  const complete = fixBufferFields({
    ...defaultFields,
    ...model,
    graph: {
      name: model.graph?.name ?? 'default_graph',
      ...model.graph,
    },
  });

  try {
    const message = ModelProtoType.fromObject(complete);
    return ModelProtoType.encode(message).finish();
  } catch (error) {
    throw new GraphLoadError(
      'Error encoding ONNX model: ' + (error instanceof Error ? error.message : String(error)),
      { cause: error },
    );
  }
}

export async function json2onnx(jsonFilePath: string, outputOnnxPath: string): Promise<void> {
  if (path.extname(jsonFilePath) !== '.json') {
    throw new GraphLoadError('The specified file is not a JSON file. Please provide a valid .json file.');
  }

  const model = parseModelJson(fs.readFileSync(jsonFilePath, 'utf-8'));
  const buffer = await encodeModel(model);

  fs.writeFileSync(outputOnnxPath, buffer);
  console.log(`ONNX model successfully written to ${outputOnnxPath}`);
}
