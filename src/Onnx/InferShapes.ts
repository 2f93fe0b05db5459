import OnnxGraph from "./OnnxGraph.js";
import TensorNode from "./TensorNode.js";
import OperationNode from "./OperationNode.js";
import { DataType } from "./OnnxTypes.js";
import {
    Dim,
    Shape,
    broadcastShapes,
    decodeIntegerVector,
    inferPoolDim,
    isNum,
    isStaticShape,
    normalizeAxis,
    prod,
} from "./Utils.js";

type Info = { shape: Shape | undefined; dtype: DataType };
type Inferred = { shapes: (Shape | undefined)[]; dtypes: DataType[] };

const UNARY_OPS = new Set([
    "Relu", "LeakyRelu", "PRelu", "Sigmoid", "HardSigmoid", "Tanh", "Exp", "Log", "Abs", "Neg",
    "Sqrt", "Reciprocal", "Floor", "Ceil", "Round", "Erf", "Gelu", "Elu", "Selu", "Softplus",
    "Identity", "Clip", "Softmax", "LogSoftmax", "BatchNormalization", "InstanceNormalization",
    "LayerNormalization", "LRN", "Dropout", "Not", "Sign",
]);

const BROADCAST_OPS = new Set(["Add", "Sub", "Mul", "Div", "Pow", "Min", "Max", "Mod", "Sum", "Mean"]);
const COMPARISON_OPS = new Set(["Equal", "Less", "LessOrEqual", "Greater", "GreaterOrEqual", "And", "Or", "Xor"]);
const REDUCE_OPS = new Set(["ReduceMean", "ReduceSum", "ReduceMax", "ReduceMin", "ReduceProd", "ReduceL2"]);

/** Ops sorted so that producers come before consumers; cyclic leftovers are dropped. */
export function topologicalSortOperationNodes(graph: OnnxGraph.Class): OperationNode.Class[] {
    const ops = graph.getOperationNodes().toArray();
    const producers = new Map<string, OperationNode.Class>();
    for (const op of ops) {
        for (const output of op.outputNames) producers.set(output, op);
    }

    const sorted: OperationNode.Class[] = [];
    const visited = new Set<string>();
    const temp = new Set<string>();

    const visit = (op: OperationNode.Class) => {
        if (visited.has(op.id)) return;
        if (temp.has(op.id)) {
            console.warn(`[TopoSort] Cycle or back-edge detected at node: ${op.id}`);
            return;
        }
        temp.add(op.id);
        for (const input of op.inputNames) {
            const pred = producers.get(input);
            if (pred) visit(pred);
        }
        temp.delete(op.id);
        visited.add(op.id);
        sorted.push(op);
    };

    ops.forEach(visit);
    return sorted;
}

function constInts(graph: OnnxGraph.Class, name: string | undefined): number[] | undefined {
    if (!name) return undefined;
    const tensor = graph.getTensor(name);
    return tensor?.isConstant() ? decodeIntegerVector(tensor.constantValue) : undefined;
}

function axesOf(graph: OnnxGraph.Class, node: OperationNode.Class, rank: number): number[] | undefined {
    const axes = node.getIntsAttribute("axes") ?? constInts(graph, node.inputNames[1]);
    return axes?.map(a => normalizeAxis(a, rank));
}

function reshapeTarget(input: Shape, target: number[]): Shape | undefined {
    const out: Shape = target.map((d, i) => (d === 0 ? input[i] ?? 0 : d));
    const unknown = out.findIndex(d => d === -1);
    if (unknown < 0) return out;
    if (!isStaticShape(input)) return undefined;
    const known = out.filter((d, i) => i !== unknown);
    if (!isStaticShape(known)) return undefined;
    out[unknown] = prod(input) / prod(known);
    return out;
}

function spatialOutput(node: OperationNode.Class, x: Shape, kernel: number[]): Shape | undefined {
    const spatial = x.slice(2);
    if (!isStaticShape(spatial) || kernel.length !== spatial.length) return undefined;

    const strides = node.getIntsAttribute("strides") ?? kernel.map(() => 1);
    const dilations = node.getIntsAttribute("dilations") ?? kernel.map(() => 1);
    const pads = node.getIntsAttribute("pads") ?? kernel.map(() => 0).concat(kernel.map(() => 0));
    const autoPad = node.getStringAttribute("auto_pad") ?? "NOTSET";

    return spatial.map((d, i) => {
        const stride = strides[i] ?? 1;
        if (autoPad === "SAME_UPPER" || autoPad === "SAME_LOWER") return Math.ceil(d / stride);
        if (autoPad === "VALID") return inferPoolDim(d, kernel[i], stride, 0, 0, dilations[i] ?? 1);
        return inferPoolDim(d, kernel[i], stride, pads[i] ?? 0, pads[i + kernel.length] ?? 0, dilations[i] ?? 1);
    });
}

function inferNode(graph: OnnxGraph.Class, node: OperationNode.Class, infos: Info[]): Inferred | undefined {
    const first = infos[0];
    const one = (shape: Shape | undefined, dtype: DataType = first?.dtype ?? DataType.UNDEFINED): Inferred =>
        ({ shapes: [shape], dtypes: [dtype] });

    if (UNARY_OPS.has(node.type)) return one(first?.shape);
    if (BROADCAST_OPS.has(node.type) || COMPARISON_OPS.has(node.type)) {
        const shapes = infos.map(i => i.shape);
        if (!shapes.every((s): s is Shape => s !== undefined)) return undefined;
        return one(broadcastShapes(...shapes), COMPARISON_OPS.has(node.type) ? DataType.BOOL : first?.dtype);
    }
    if (REDUCE_OPS.has(node.type)) {
        const x = first?.shape;
        if (!x) return undefined;
        const keepDims = (node.getIntAttribute("keepdims") ?? 1) === 1;
        const axes = axesOf(graph, node, x.length) ?? x.map((_, i) => i);
        const out: Shape = [];
        x.forEach((d, i) => {
            if (!axes.includes(i)) out.push(d);
            else if (keepDims) out.push(1);
        });
        return one(out);
    }

    switch (node.type) {
        case "Cast":
            return one(first?.shape, node.getIntAttribute("to") ?? DataType.UNDEFINED);

        case "Shape":
            return one(first?.shape ? [first.shape.length] : undefined, DataType.INT64);

        case "Where": {
            const shapes = infos.map(i => i.shape);
            if (!shapes.every((s): s is Shape => s !== undefined)) return undefined;
            return one(broadcastShapes(...shapes), infos[1]?.dtype);
        }

        case "MatMul": {
            const [a, b] = [infos[0]?.shape, infos[1]?.shape];
            if (!a || !b || a.length < 2 || b.length < 2) return undefined;
            const batch = broadcastShapes(a.slice(0, -2), b.slice(0, -2));
            return batch ? one([...batch, a[a.length - 2], b[b.length - 1]]) : undefined;
        }

        case "Gemm": {
            const [a, b] = [infos[0]?.shape, infos[1]?.shape];
            if (!a || !b || a.length !== 2 || b.length !== 2) return undefined;
            const m = node.getIntAttribute("transA") === 1 ? a[1] : a[0];
            const n = node.getIntAttribute("transB") === 1 ? b[0] : b[1];
            return one([m, n]);
        }

        case "Conv": {
            const [x, w] = [infos[0]?.shape, infos[1]?.shape];
            if (!x || !w || x.length < 3) return undefined;
            const kernel = node.getIntsAttribute("kernel_shape") ?? w.slice(2).filter(isNum);
            const spatial = spatialOutput(node, x, kernel);
            return spatial ? one([x[0], w[0], ...spatial]) : undefined;
        }

        case "MaxPool":
        case "AveragePool": {
            const x = first?.shape;
            const kernel = node.getIntsAttribute("kernel_shape");
            if (!x || !kernel) return undefined;
            const spatial = spatialOutput(node, x, kernel);
            return spatial ? one([x[0], x[1], ...spatial]) : undefined;
        }

        case "GlobalAveragePool":
        case "GlobalMaxPool": {
            const x = first?.shape;
            return x ? one([x[0], x[1], ...x.slice(2).map(() => 1)]) : undefined;
        }

        case "Reshape": {
            const x = first?.shape;
            const target = constInts(graph, node.inputNames[1]);
            return x && target ? one(reshapeTarget(x, target)) : undefined;
        }

        case "Flatten": {
            const x = first?.shape;
            if (!isStaticShape(x)) return undefined;
            const axis = normalizeAxis(node.getIntAttribute("axis") ?? 1, x.length);
            return one([prod(x.slice(0, axis)), prod(x.slice(axis))]);
        }

        case "Transpose": {
            const x = first?.shape;
            if (!x) return undefined;
            const perm = node.getIntsAttribute("perm") ?? x.map((_, i) => x.length - 1 - i);
            return one(perm.map(p => x[p] ?? 1));
        }

        case "Concat": {
            const shapes = infos.map(i => i.shape);
            if (!shapes.every((s): s is Shape => s !== undefined) || shapes.length === 0) return undefined;
            const axis = normalizeAxis(node.getIntAttribute("axis") ?? 0, shapes[0].length);
            const sizes = shapes.map(s => s[axis]);
            if (!sizes.every(isNum)) return undefined;
            const out = [...shapes[0]];
            out[axis] = sizes.reduce((a, b) => a + b, 0);
            return one(out);
        }

        case "Squeeze": {
            const x = first?.shape;
            if (!x) return undefined;
            const axes = axesOf(graph, node, x.length);
            return one(axes ? x.filter((_, i) => !axes.includes(i)) : x.filter(d => d !== 1));
        }

        case "Unsqueeze": {
            const x = first?.shape;
            const rawAxes = node.getIntsAttribute("axes") ?? constInts(graph, node.inputNames[1]);
            if (!x || !rawAxes) return undefined;
            const out: Dim[] = [...x];
            rawAxes
                .map(a => normalizeAxis(a, x.length + rawAxes.length))
                .sort((a, b) => a - b)
                .forEach(axis => out.splice(axis, 0, 1));
            return one(out);
        }

        case "Gather": {
            const [data, indices] = [infos[0]?.shape, infos[1]?.shape];
            if (!data || !indices) return undefined;
            const axis = normalizeAxis(node.getIntAttribute("axis") ?? 0, data.length);
            return one([...data.slice(0, axis), ...indices, ...data.slice(axis + 1)]);
        }

        default:
            return undefined;
    }
}

/**
 * Static shape inference over the operation nodes.
 * Fills in element types and shapes the model does not declare;
 * values whose shape cannot be derived here are left unknown.
 */
export default function inferShapes(graph: OnnxGraph.Class): void {
    for (const node of topologicalSortOperationNodes(graph)) {
        const infos: Info[] = node.inputNames.map(name => {
            const tensor = graph.getTensor(name);
            return {
                shape: tensor?.shape,
                dtype: tensor?.literalType ?? DataType.UNDEFINED,
            };
        });

        const inferred = inferNode(graph, node, infos);
        if (!inferred) continue;

        node.outputNames.forEach((name, slot) => {
            const tensor: TensorNode.Class | undefined = graph.getTensor(name);
            if (!tensor) return;
            const shape = inferred.shapes[slot];
            const dtype = inferred.dtypes[slot];
            if (tensor.shape === undefined && shape !== undefined) {
                tensor.setShape(shape);
            }
            if (tensor.literalType === DataType.UNDEFINED && dtype !== undefined) {
                tensor.setLiteralType(dtype);
            }
        });
    }
}
