import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Node from "@specs-feup/flow/graph/Node";
import { EdgeCollection } from "@specs-feup/flow/graph/EdgeCollection";
import OnnxEdge from "./OnnxEdge.js";
import { AttributeValue } from "./OnnxTypes.js";

namespace OperationNode {

  export const TAG = "__onnx_transfer__operation_node";
  export const VERSION = "1";

  export class Class<
    D extends Data = Data,
    S extends ScratchData = ScratchData,
  > extends BaseNode.Class<D, S> {

    /** ONNX op kind, e.g. "Conv" */
    get type(): string {
      return this.data[TAG].type;
    }

    /** Name of the ONNX node this operation was built from (may be empty) */
    get name(): string {
      return this.data[TAG].name;
    }

    get attributes(): Record<string, AttributeValue> {
      return this.data[TAG].attributes;
    }

    getAttribute(name: string): AttributeValue | undefined {
      return this.data[TAG].attributes[name];
    }

    getIntsAttribute(name: string): number[] | undefined {
      const value = this.getAttribute(name);
      if (!Array.isArray(value)) return undefined;
      const ints: number[] = [];
      for (const v of value) {
        if (typeof v !== "number") return undefined;
        ints.push(v);
      }
      return ints;
    }

    getIntAttribute(name: string): number | undefined {
      const value = this.getAttribute(name);
      return typeof value === "number" ? value : undefined;
    }

    getStringAttribute(name: string): string | undefined {
      const value = this.getAttribute(name);
      return typeof value === "string" ? value : undefined;
    }

    /** Input tensor names in argument order; optional inputs left out by the model are dropped */
    get inputNames(): string[] {
      return this.data[TAG].inputs;
    }

    /** Output tensor names in slot order */
    get outputNames(): string[] {
      return this.data[TAG].outputs;
    }

    get getIncomers(): EdgeCollection<OnnxEdge.Class> {
      return this.incomers.filterIs(OnnxEdge);
    }

    get getOutgoers(): EdgeCollection<OnnxEdge.Class> {
      return this.outgoers.filterIs(OnnxEdge);
    }
  }

  export class Builder implements Node.Builder<Data, ScratchData> {
    private type: string;
    private name: string;
    private inputs: string[];
    private outputs: string[];
    private attributes: Record<string, AttributeValue>;

    constructor(
      type: string,
      name: string,
      inputs: string[],
      outputs: string[],
      attributes: Record<string, AttributeValue> = {},
    ) {
      this.type = type;
      this.name = name;
      this.inputs = inputs;
      this.outputs = outputs;
      this.attributes = attributes;
    }

    buildData(data: BaseNode.Data): Data {
      return {
        ...data,
        [TAG]: {
          version: VERSION,
          type: this.type,
          name: this.name,
          inputs: [...this.inputs],
          outputs: [...this.outputs],
          attributes: { ...this.attributes },
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
      type: string;
      name: string;
      inputs: string[];
      outputs: string[];
      attributes: Record<string, AttributeValue>;
    };
  }

  export interface ScratchData extends BaseNode.ScratchData {}

}

export default OperationNode;
