import fs from 'fs';
import path from 'path';
import protobuf from 'protobufjs';
import { ModelProto } from './Onnx/OnnxTypes.js';
import { resolveSourceAsset } from './Onnx/Utils.js';
import { GraphLoadError } from './Lowering/Errors.js';

let onnxRoot: Promise<protobuf.Root> | undefined;

/** The ONNX protobuf schema, loaded once per process. */
export function loadOnnxSchema(): Promise<protobuf.Root> {
    onnxRoot ??= protobuf.load(resolveSourceAsset('Onnx', 'onnx.proto'));
    return onnxRoot;
}

export async function modelType(): Promise<protobuf.Type> {
    const root = await loadOnnxSchema();
    return root.lookupType('onnx.ModelProto');
}

function isModelProto(value: unknown): value is ModelProto {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
    if (!('graph' in value) || value.graph === undefined) return true;
    return value.graph !== null && typeof value.graph === 'object';
}

/** Decodes a binary ModelProto; int64 values come back as numbers and enums as their codes. */
export async function decodeModel(buffer: Uint8Array): Promise<ModelProto> {
    const ModelProtoType = await modelType();
    let modelJson: unknown;
    try {
        const model = ModelProtoType.decode(buffer);
        modelJson = ModelProtoType.toObject(model, {
            longs: Number,
            enums: Number,
            defaults: false,
            arrays: true,
        });
    } catch (error) {
        throw new GraphLoadError(
            'Error decoding ONNX model: ' + (error instanceof Error ? error.message : String(error)),
            { cause: error },
        );
    }
    if (!isModelProto(modelJson)) {
        throw new GraphLoadError('Decoded ONNX model is not a ModelProto');
    }
    return modelJson;
}

/** Parses the JSON form of a model, as written by `onnx2json` or by hand. */
export function parseModelJson(text: string): ModelProto {
    let modelJson: unknown;
    try {
        modelJson = JSON.parse(text);
    } catch (error) {
        throw new GraphLoadError(
            'Error parsing JSON model: ' + (error instanceof Error ? error.message : String(error)),
            { cause: error },
        );
    }
    if (!isModelProto(modelJson)) {
        throw new GraphLoadError('JSON model is not a ModelProto object');
    }
    return modelJson;
}

/**
 * Loads a model from disk.
 * Binary models must use the .onnx extension; the text form is the JSON rendering of a ModelProto.
 */
export async function loadModel(filePath: string, isTextProto: boolean): Promise<ModelProto> {
    const expected = isTextProto ? '.json' : '.onnx';
    if (path.extname(filePath) !== expected) {
        throw new GraphLoadError(`The specified file is not a ${expected} file: ${filePath}`);
    }

    let contents: Buffer;
    try {
        contents = fs.readFileSync(filePath);
    } catch (error) {
        throw new GraphLoadError(
            `Error reading model ${filePath}: ` + (error instanceof Error ? error.message : String(error)),
            { cause: error },
        );
    }

    return isTextProto ? parseModelJson(contents.toString('utf-8')) : decodeModel(contents);
}

export async function onnx2json(onnxFilePath: string): Promise<ModelProto> {
    return loadModel(onnxFilePath, false);
}
