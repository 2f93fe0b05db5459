import BaseEdge from "@specs-feup/flow/graph/BaseEdge";
import Edge from "@specs-feup/flow/graph/Edge";

namespace OnnxEdge {
    export const TAG = "__onnx_transfer__onnx_edge";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseEdge.Class<D, S> {
        get shape(): (number | string)[] | undefined {
            return this.data[TAG].shape;
        }
    }

    export class Builder implements Edge.Builder<Data, ScratchData> {
        private shape: (number | string)[] | undefined;

        constructor(shape: (number | string)[] | undefined) {
            this.shape = shape;
        }

        buildData(data: BaseEdge.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    shape: this.shape,
                },
            };
        }

        buildScratchData(scratchData: BaseEdge.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Edge.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseEdge.Data {
        [TAG]: {
            version: typeof VERSION;
            shape: (number | string)[] | undefined;
        };
    }

    export interface ScratchData extends BaseEdge.ScratchData {}
}
export default OnnxEdge;
