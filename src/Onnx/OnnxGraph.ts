import BaseGraph from "@specs-feup/flow/graph/BaseGraph";
import Graph from "@specs-feup/flow/graph/Graph";
import { NodeCollection } from "@specs-feup/flow/graph/NodeCollection";
import TensorNode from "./TensorNode.js";
import OperationNode from "./OperationNode.js";

namespace OnnxGraph {

    export const TAG = "__onnx_transfer__onnx_graph";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseGraph.Class<D, S> {

        get name(): string {
            return this.data[TAG].name;
        }

        // Retrieve all TensorNodes with type 'input'
        getInputTensorNodes(): NodeCollection<TensorNode.Class> {
            return this.nodes.filterIs(TensorNode).filter(n => n.type === "input");
        }

        // Retrieve all TensorNodes with type 'output'
        getOutputTensorNodes(): NodeCollection<TensorNode.Class> {
            return this.nodes.filterIs(TensorNode).filter(n => n.type === "output");
        }

        // Retrieve all TensorNodes
        getTensorNodes(): NodeCollection<TensorNode.Class> {
            return this.nodes.filterIs(TensorNode);
        }

        // Retrieve all OperationNodes
        getOperationNodes(): NodeCollection<OperationNode.Class> {
            return this.nodes.filterIs(OperationNode);
        }

        hasNode(id: string): boolean {
            return this.getNodeById(id) !== undefined;
        }

        getTensor(name: string): TensorNode.Class | undefined {
            return this.getNodeById(name)?.tryAs(TensorNode);
        }
    }

    export class Builder implements Graph.Builder<Data, ScratchData> {

        private name: string;

        constructor(name: string = "") {
            this.name = name;
        }

        buildData(data: BaseGraph.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    name: this.name,
                },
            };
        }
        buildScratchData(scratchData: BaseGraph.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Graph.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseGraph.Data {
        [TAG]: {
            version: typeof VERSION;
            name: string;
        };
    }

    export interface ScratchData extends BaseGraph.ScratchData {}

}
export default OnnxGraph;
