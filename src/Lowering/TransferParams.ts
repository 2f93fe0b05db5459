import { TensorProto } from "../Onnx/OnnxTypes.js";
import { tensorProtoToBytes } from "../Onnx/Utils.js";
import type { OutputTensorInfo } from "./DryRun.js";
import { ShapeDescriptor } from "./ShapeEncoding.js";
import { LoweringInvariantError } from "./Errors.js";

/** Padding scheme of ops that carry padding/stride information. */
export enum PaddingMode {
    NA = 0,
    SAME = 1,
    VALID = 2,
    EXPLICIT = 3,
}

export interface NodeTransferParams {
    name: string;
    nodeId: number;
    /** Op kind, kept for diagnostics */
    type: string;
    targetOpId: number;
    padding: PaddingMode;
    /** Declared inputs plus interned extra inputs */
    inputsSize: number;
    outputsSize: number;
}

export interface ConstNodeTransferParams {
    name: string;
    nodeId: number;
    shape: ShapeDescriptor;
    /** Name of the tensor holding the payload; empty for interned shapes */
    dataName: string;
    dataSize: number;
}

export interface NodeInput {
    nodeId: number;
    outputPort: number;
}

export interface NodeInputParams {
    nodeId: number;
    inputs: NodeInput[];
}

export interface NodeOutputParams {
    nodeId: number;
    /** Maximum byte size of each output slot */
    maxSizes: number[];
}

export interface TransferTables {
    opNodes: readonly NodeTransferParams[];
    constNodes: readonly ConstNodeTransferParams[];
    nodeInputs: readonly NodeInputParams[];
    nodeOutputs: readonly NodeOutputParams[];
}

/** Append-only store of the four tables of one lowering run. */
export class TransferTableAssembler {
    private opNodes: NodeTransferParams[] = [];
    private constNodes: ConstNodeTransferParams[] = [];
    private nodeInputs: NodeInputParams[] = [];
    private nodeOutputs: NodeOutputParams[] = [];

    appendOpNode(params: NodeTransferParams): void {
        this.opNodes.push(params);
    }

    appendConstNode(params: ConstNodeTransferParams): void {
        this.constNodes.push(params);
    }

    appendNodeInputs(params: NodeInputParams): void {
        this.nodeInputs.push(params);
    }

    appendNodeOutputs(params: NodeOutputParams): void {
        this.nodeOutputs.push(params);
    }

    get opNodeParams(): readonly NodeTransferParams[] {
        return this.opNodes;
    }

    get constNodeParams(): readonly ConstNodeTransferParams[] {
        return this.constNodes;
    }

    get nodeInputParams(): readonly NodeInputParams[] {
        return this.nodeInputs;
    }

    get nodeOutputParams(): readonly NodeOutputParams[] {
        return this.nodeOutputs;
    }

    /** Copy of the current tables; later appends do not show through. */
    snapshot(): TransferTables {
        return {
            opNodes: [...this.opNodes],
            constNodes: [...this.constNodes],
            nodeInputs: [...this.nodeInputs],
            nodeOutputs: [...this.nodeOutputs],
        };
    }

    clear(): void {
        this.opNodes = [];
        this.constNodes = [];
        this.nodeInputs = [];
        this.nodeOutputs = [];
    }
}

/** Result of a successful lowering run. */
export class LoweredGraph {
    readonly tables: TransferTables;
    readonly outputTensorInfo?: OutputTensorInfo;
    private readonly constData: ReadonlyMap<number, TensorProto>;

    constructor(tables: TransferTables, constData: ReadonlyMap<number, TensorProto>, outputTensorInfo?: OutputTensorInfo) {
        this.tables = tables;
        this.constData = constData;
        this.outputTensorInfo = outputTensorInfo;
    }

    /** Payload of a constant node, little-endian; interned shapes have none. */
    readConstData(nodeId: number): Uint8Array {
        const entry = this.tables.constNodes.find(c => c.nodeId === nodeId);
        if (!entry) {
            throw new LoweringInvariantError(`node ${nodeId} is not a constant`);
        }
        const tensor = this.constData.get(nodeId);
        return tensor ? tensorProtoToBytes(tensor) : new Uint8Array(0);
    }
}
