import OnnxGraph from "../Onnx/OnnxGraph.js";
import TensorNode from "../Onnx/TensorNode.js";
import OperationNode from "../Onnx/OperationNode.js";
import { LoweringInvariantError } from "./Errors.js";

/** A consumed tensor, resolved to the unit and slot producing it. */
export interface UnitInput {
    tensor: string;
    producer: number;
    slot: number;
}

interface UnitBase {
    /** Position in the arena */
    index: number;
    name: string;
    inputs: UnitInput[];
    /** Tensors of the output slots, in slot order */
    outputs: string[];
}

/**
 * A node of the lowered graph.
 * `source` units introduce a tensor (graph input, initializer, Constant op, or a value
 * declared as an input); `operation` units wrap one op; `output` units mark a declared
 * output computed by an op.
 */
export type LoweringUnit =
    | UnitBase & { kind: "source"; tensor: TensorNode.Class }
    | UnitBase & { kind: "operation"; operation: OperationNode.Class }
    | UnitBase & { kind: "output"; tensor: TensorNode.Class };

export interface UnitArena {
    units: LoweringUnit[];
    /** Units the declared outputs depend on, plus the declared inputs */
    required: Set<number>;
}

function isSource(tensor: TensorNode.Class, declaredInputs: ReadonlySet<string>): boolean {
    return tensor.type === "input" || tensor.isConstant() || declaredInputs.has(tensor.id);
}

/**
 * Projects the graph into an arena of units linked by index.
 * Sources come first in graph order, then operations in graph order, then output markers
 * in declaration order. A declared input shadows the op producing it.
 */
export function projectGraph(
    graph: OnnxGraph.Class,
    declaredInputs: ReadonlySet<string>,
    declaredOutputs: readonly string[],
): UnitArena {
    const units: LoweringUnit[] = [];
    const producers = new Map<string, { unit: number; slot: number }>();

    for (const tensor of graph.getTensorNodes().toArray()) {
        if (!isSource(tensor, declaredInputs)) continue;
        const index = units.length;
        units.push({ kind: "source", index, name: tensor.id, inputs: [], outputs: [tensor.id], tensor });
        producers.set(tensor.id, { unit: index, slot: 0 });
    }

    const operations = graph.getOperationNodes().toArray();
    for (const operation of operations) {
        const index = units.length;
        units.push({ kind: "operation", index, name: operation.id, inputs: [], outputs: [...operation.outputNames], operation });
        operation.outputNames.forEach((tensor, slot) => {
            if (!producers.has(tensor)) producers.set(tensor, { unit: index, slot });
        });
    }

    const resolve = (tensor: string, consumer: string): UnitInput => {
        const producer = producers.get(tensor);
        if (!producer) {
            throw new LoweringInvariantError(`'${consumer}' consumes '${tensor}', which nothing produces`, consumer);
        }
        return { tensor, producer: producer.unit, slot: producer.slot };
    };

    for (const unit of units) {
        if (unit.kind === "operation") {
            unit.inputs = unit.operation.inputNames.map(tensor => resolve(tensor, unit.name));
        }
    }

    const roots: number[] = [];
    for (const name of new Set(declaredOutputs)) {
        const tensor = graph.getTensor(name);
        if (!tensor) {
            throw new LoweringInvariantError(`declared output '${name}' is not a tensor`, name);
        }
        const input = resolve(name, name);
        if (units[input.producer].kind === "source") {
            roots.push(input.producer);
            continue;
        }
        const index = units.length;
        units.push({ kind: "output", index, name, inputs: [input], outputs: [], tensor });
        roots.push(index);
    }

    for (const name of declaredInputs) {
        const producer = producers.get(name);
        if (producer) roots.push(producer.unit);
    }

    return { units, required: requiredUnits(units, roots) };
}

function requiredUnits(units: readonly LoweringUnit[], roots: readonly number[]): Set<number> {
    const required = new Set<number>();
    const stack = [...roots];
    while (stack.length > 0) {
        const index = stack.pop();
        if (index === undefined || required.has(index)) continue;
        required.add(index);
        for (const input of units[index].inputs) stack.push(input.producer);
    }
    return required;
}
