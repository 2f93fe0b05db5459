import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Node from "@specs-feup/flow/graph/Node";
import { EdgeCollection } from "@specs-feup/flow/graph/EdgeCollection";
import OnnxEdge from "./OnnxEdge.js";
import { DataType, TensorProto } from "./OnnxTypes.js";

namespace TensorNode {

    export const TAG = "__onnx_transfer__tensor_node";
    export const VERSION = "1";

    /**
     * Where a tensor value comes from:
     * graph inputs, initializers, outputs of `Constant` ops, values produced
     * by other operations, and declared graph outputs.
     */
    export type Kind = "input" | "initializer" | "constant" | "intermediate" | "output";

    export type Dim = number | string;

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseNode.Class<D, S> {

        get literalType(): DataType {
            return this.data[TAG].literalType;
        }

        setLiteralType(literalType: DataType): void {
            this.data[TAG].literalType = literalType;
        }

        /** Static shape; `undefined` when the graph carries no shape information. */
        get shape(): Dim[] | undefined {
            return this.data[TAG].shape;
        }

        setShape(shape: Dim[] | undefined): void {
            this.data[TAG].shape = shape;
        }

        get type(): Kind {
            return this.data[TAG].type;
        }

        get constantValue(): TensorProto | undefined {
            return this.data[TAG].constantValue;
        }

        isConstant(): boolean {
            return this.type === "initializer" || this.type === "constant";
        }

        get getIncomers(): EdgeCollection<OnnxEdge.Class> {
            return this.incomers.filterIs(OnnxEdge);
        }

        get getOutgoers(): EdgeCollection<OnnxEdge.Class> {
            return this.outgoers.filterIs(OnnxEdge);
        }
    }

    export class Builder implements Node.Builder<Data, ScratchData> {

        private literalType: DataType;
        private shape: Dim[] | undefined;
        private type: Kind;
        private constantValue?: TensorProto;

        constructor(literalType: DataType, shape: Dim[] | undefined, type: Kind, constantValue?: TensorProto) {
            this.literalType = literalType;
            this.shape = shape;
            this.type = type;
            this.constantValue = constantValue;
        }

        buildData(data: BaseNode.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    literalType: this.literalType,
                    shape: this.shape,
                    type: this.type,
                    constantValue: this.constantValue,
                },
            };
        }

        buildScratchData(scratchData: BaseNode.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Node.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseNode.Data {
        [TAG]: {
            version: typeof VERSION;
            literalType: DataType;
            shape: Dim[] | undefined;
            type: Kind;
            constantValue?: TensorProto;
        };
    }

    export interface ScratchData extends BaseNode.ScratchData {}

}
export default TensorNode;
