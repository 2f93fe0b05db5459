import { DataType, ModelProto, ValueInfoProto } from "../Onnx/OnnxTypes.js";
import { isStaticShape, prod } from "../Onnx/Utils.js";
import { parseValueType } from "../initGraph.js";
import { DryRunFailure, LoweringError } from "./Errors.js";

export type HostTensorData =
    | Float32Array
    | Float64Array
    | Int8Array
    | Uint8Array
    | Int16Array
    | Uint16Array
    | Int32Array
    | Uint32Array
    | BigInt64Array
    | BigUint64Array;

/** A concrete tensor observed on, or fed to, the host engine. */
export interface HostTensor {
    dataType: DataType;
    dims: number[];
    data?: HostTensorData;
}

/** A declared input boundary, optionally bound to a concrete value. */
export interface InputNodeInfo {
    name: string;
    tensor?: HostTensor;
}

export interface OutputTensorInfo {
    outputTensors: HostTensor[];
    /** Tensor name to the dry-run value observed for it */
    outputTensorMap: Map<string, HostTensor>;
}

/** Runs a whole model once on the host. */
export interface HostExecutionEngine {
    run(model: ModelProto, feeds: ReadonlyMap<string, HostTensor>, fetches: readonly string[]): Promise<Map<string, HostTensor>>;
}

function allocate(dataType: DataType, length: number, name: string): HostTensorData {
    switch (dataType) {
        case DataType.FLOAT: return new Float32Array(length);
        case DataType.DOUBLE: return new Float64Array(length);
        case DataType.INT8: return new Int8Array(length);
        case DataType.UINT8:
        case DataType.BOOL: return new Uint8Array(length);
        case DataType.INT16: return new Int16Array(length);
        case DataType.UINT16:
        case DataType.FLOAT16:
        case DataType.BFLOAT16: return new Uint16Array(length);
        case DataType.INT32: return new Int32Array(length);
        case DataType.UINT32: return new Uint32Array(length);
        case DataType.INT64: return new BigInt64Array(length);
        case DataType.UINT64: return new BigUint64Array(length);
        default:
            throw new DryRunFailure(`cannot zero-fill input '${name}' of type ${DataType[dataType]}`, name);
    }
}

export function zeroTensor(dataType: DataType, dims: readonly number[], name: string): HostTensor {
    return { dataType, dims: [...dims], data: allocate(dataType, prod([...dims]), name) };
}

/** Tensors produced by the model's nodes, in node order. */
export function producedTensorNames(model: ModelProto): string[] {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const node of model.graph?.node ?? []) {
        for (const name of node.output ?? []) {
            if (!name || seen.has(name)) continue;
            seen.add(name);
            names.push(name);
        }
    }
    return names;
}

/** Copy of a model whose graph outputs are exactly the given tensors. */
export function withGraphOutputs(model: ModelProto, names: readonly string[]): ModelProto {
    const graph = model.graph ?? {};
    const known = new Map<string, ValueInfoProto>();
    for (const info of [...(graph.valueInfo ?? []), ...(graph.output ?? [])]) {
        known.set(info.name, info);
    }
    return {
        ...model,
        graph: { ...graph, output: names.map(name => known.get(name) ?? { name }) },
    };
}

/**
 * Copy of a model in which every intermediate tensor bound to a value becomes a graph input.
 * Nodes producing such a tensor are dropped, and so are undeclared graph inputs no remaining node consumes.
 */
export function withBoundIntermediates(model: ModelProto, inputs: readonly InputNodeInfo[]): ModelProto {
    const produced = new Set(producedTensorNames(model));
    const bound = new Map<string, HostTensor>();
    for (const input of inputs) {
        if (input.tensor && produced.has(input.name)) bound.set(input.name, input.tensor);
    }
    if (bound.size === 0) return model;

    const graph = model.graph ?? {};
    const boundInputs: ValueInfoProto[] = [...bound].map(([name, tensor]) => ({
        name,
        type: {
            tensorType: {
                elemType: tensor.dataType,
                shape: { dim: tensor.dims.map(dimValue => ({ dimValue })) },
            },
        },
    }));
    const nodes = (graph.node ?? []).filter(node => !(node.output ?? []).some(name => bound.has(name)));
    const consumed = new Set([...nodes.flatMap(node => node.input ?? []), ...inputs.map(input => input.name)]);
    return {
        ...model,
        graph: {
            ...graph,
            node: nodes,
            input: [...(graph.input ?? []).filter(input => consumed.has(input.name)), ...boundInputs],
        },
    };
}

/**
 * Builds the feeds of a dry run: bound values (or zeros of their type and dims),
 * and zeros for every other graph input whose shape is fully known.
 * Unbound intermediate tensors are accepted and left to the model to compute.
 */
export function bindInputs(model: ModelProto, inputs: readonly InputNodeInfo[], initializeByZero: boolean): Map<string, HostTensor> {
    const graph = model.graph ?? {};
    const initializers = new Set((graph.initializer ?? []).map(t => t.name ?? ""));
    const graphInputs = (graph.input ?? []).filter(input => !initializers.has(input.name));
    const known = new Set([...initializers, ...producedTensorNames(model), ...graphInputs.map(i => i.name)]);

    const bound = new Map<string, InputNodeInfo>();
    for (const input of inputs) {
        if (!known.has(input.name)) {
            throw new DryRunFailure(`input '${input.name}' is not in the graph`, input.name);
        }
        bound.set(input.name, input);
    }

    const feeds = new Map<string, HostTensor>();
    for (const input of graphInputs) {
        const binding = bound.get(input.name)?.tensor;
        if (binding && !initializeByZero) {
            feeds.set(input.name, binding);
            continue;
        }
        if (binding) {
            feeds.set(input.name, zeroTensor(binding.dataType, binding.dims, input.name));
            continue;
        }

        const { dataType, shape } = parseValueType(input.type);
        if (!isStaticShape(shape)) {
            throw new DryRunFailure(`input '${input.name}' has no value and no static shape to zero-fill`, input.name);
        }
        feeds.set(input.name, zeroTensor(dataType, shape, input.name));
    }
    return feeds;
}

async function execute(
    engine: HostExecutionEngine,
    model: ModelProto,
    feeds: ReadonlyMap<string, HostTensor>,
    fetches: readonly string[],
): Promise<Map<string, HostTensor>> {
    try {
        return await engine.run(model, feeds, fetches);
    } catch (error) {
        if (error instanceof LoweringError) throw error;
        throw new DryRunFailure(
            "host execution failed: " + (error instanceof Error ? error.message : String(error)),
            undefined,
            { cause: error },
        );
    }
}

interface DryRunResult {
    feeds: Map<string, HostTensor>;
    outputs: HostTensor[];
}

async function runOnce(
    model: ModelProto,
    inputs: readonly InputNodeInfo[],
    outputNames: readonly string[],
    initializeByZero: boolean,
    engine: HostExecutionEngine,
): Promise<DryRunResult> {
    const runnable = withBoundIntermediates(model, inputs);
    const produced = new Set(producedTensorNames(runnable));
    for (const name of outputNames) {
        if (!produced.has(name)) {
            throw new DryRunFailure(`'${name}' is not produced by any node`, name);
        }
    }

    const feeds = bindInputs(runnable, inputs, initializeByZero);
    const results = await execute(engine, withGraphOutputs(runnable, outputNames), feeds, outputNames);
    const outputs = outputNames.map(name => {
        const tensor = results.get(name);
        if (!tensor) {
            throw new DryRunFailure(`dry run did not produce '${name}'`, name);
        }
        return tensor;
    });
    return { feeds, outputs };
}

/**
 * Runs the model once and returns the values of the requested tensors, in request order.
 * Bound intermediate tensors are fed as inputs, so they cannot be requested.
 */
export async function dryRunInference(
    model: ModelProto,
    inputs: readonly InputNodeInfo[],
    outputNames: readonly string[],
    initializeByZero: boolean,
    engine: HostExecutionEngine,
): Promise<HostTensor[]> {
    const { outputs } = await runOnce(model, inputs, outputNames, initializeByZero, engine);
    return outputs;
}

/** Runs the model once, observing every fed tensor and every tensor produced by a node. */
export async function dryRunInferenceForAllNodes(
    model: ModelProto,
    inputs: readonly InputNodeInfo[],
    initializeByZero: boolean,
    engine: HostExecutionEngine,
): Promise<OutputTensorInfo> {
    const names = producedTensorNames(withBoundIntermediates(model, inputs));
    const { feeds, outputs } = await runOnce(model, inputs, names, initializeByZero, engine);

    const outputTensorMap = new Map(feeds);
    names.forEach((name, i) => outputTensorMap.set(name, outputs[i]));
    return { outputTensors: [...outputTensorMap.values()], outputTensorMap };
}
