import OperationNode from "../Onnx/OperationNode.js";
import TensorNode from "../Onnx/TensorNode.js";
import { LoweringUnit } from "./LoweringUnits.js";
import { OpCapabilities } from "./OpCapabilities.js";
import { PaddingMode } from "./TransferParams.js";
import { ShapeDescriptor, descriptorElementCount } from "./ShapeEncoding.js";
import { UnboundNameError, UnsupportedOperationError } from "./Errors.js";

/** How a unit is lowered; decided once, in priority order. */
export type Classification =
    | { kind: "input"; unit: LoweringUnit; tensor: TensorNode.Class }
    | { kind: "constant"; unit: LoweringUnit; tensor: TensorNode.Class }
    | { kind: "output"; unit: LoweringUnit }
    | { kind: "flatten"; unit: LoweringUnit; operation: OperationNode.Class }
    | { kind: "padded"; unit: LoweringUnit; operation: OperationNode.Class; padding: PaddingMode }
    | { kind: "generic"; unit: LoweringUnit; operation: OperationNode.Class };

export interface ClassificationContext {
    declaredInputs: ReadonlySet<string>;
    capabilities: OpCapabilities;
    /** Encoded shape of a tensor, as lowering resolves it */
    descriptorOf(tensor: string, nodeName: string): ShapeDescriptor;
}

const RESHAPE_KINDS = new Set(["Reshape", "Flatten"]);

/** A reshape whose output is its input collapsed into the innermost dim. */
function isFlatten(operation: OperationNode.Class, context: ClassificationContext): boolean {
    const [input] = operation.inputNames;
    const [output] = operation.outputNames;
    if (!RESHAPE_KINDS.has(operation.type) || !input || !output) return false;

    const out = context.descriptorOf(output, operation.id);
    const elements = descriptorElementCount(context.descriptorOf(input, operation.id));
    return out[0] === 1 && out[1] === 1 && out[2] === 1 && out[3] === elements;
}

export function paddingModeOf(operation: OperationNode.Class): PaddingMode {
    switch (operation.getStringAttribute("auto_pad") ?? "NOTSET") {
        case "SAME_UPPER":
        case "SAME_LOWER":
            return PaddingMode.SAME;
        case "VALID":
            return PaddingMode.VALID;
        default: {
            const pads = operation.getIntsAttribute("pads") ?? [];
            return pads.some(p => p !== 0) ? PaddingMode.EXPLICIT : PaddingMode.VALID;
        }
    }
}

export function classify(unit: LoweringUnit, context: ClassificationContext): Classification {
    switch (unit.kind) {
        case "source": {
            if (context.declaredInputs.has(unit.name)) {
                return { kind: "input", unit, tensor: unit.tensor };
            }
            if (unit.tensor.isConstant()) {
                return { kind: "constant", unit, tensor: unit.tensor };
            }
            throw new UnboundNameError(unit.name, "input", "is consumed by the graph but not declared as an input");
        }

        case "output":
            return { kind: "output", unit };

        case "operation": {
            const { operation } = unit;
            if (isFlatten(operation, context)) {
                return { kind: "flatten", unit, operation };
            }
            if (!context.capabilities.isSupported(operation.type)) {
                throw new UnsupportedOperationError(operation.type, operation.id);
            }
            if (context.capabilities.requiresPaddingInfo(operation.type)) {
                return { kind: "padded", unit, operation, padding: paddingModeOf(operation) };
            }
            return { kind: "generic", unit, operation };
        }
    }
}
