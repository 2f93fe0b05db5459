import OnnxGraph from "../Onnx/OnnxGraph.js";
import { DataType, ModelProto, TensorProto } from "../Onnx/OnnxTypes.js";
import { elementSize, isStaticShape, tensorProtoByteSize } from "../Onnx/Utils.js";
import { createGraph } from "../initGraph.js";
import { loadModel } from "../onnx2json.js";
import { LoweringOptions, defaultLoweringOptions } from "../LoweringOptions.js";
import { HostTensor, InputNodeInfo, OutputTensorInfo, dryRunInferenceForAllNodes } from "./DryRun.js";
import { LoweringUnit, UnitArena, projectGraph } from "./LoweringUnits.js";
import { Classification, classify } from "./Classification.js";
import { FLATTEN_OP, INPUT_OP, OUTPUT_OP, OpCapabilities } from "./OpCapabilities.js";
import { NodeIdCache } from "./NodeIdCache.js";
import { ConstShapeInterner } from "./ConstShapeInterner.js";
import { ShapeDescriptor, descriptorElementCount, descriptorsEqual, encodeShape } from "./ShapeEncoding.js";
import {
    ConstNodeTransferParams,
    LoweredGraph,
    NodeInput,
    NodeInputParams,
    NodeOutputParams,
    NodeTransferParams,
    PaddingMode,
    TransferTableAssembler,
} from "./TransferParams.js";
import {
    DependencyUnresolvedError,
    DryRunFailure,
    LoweringInvariantError,
    ShapeInconsistencyError,
    UnboundNameError,
    UnsupportedOperationError,
} from "./Errors.js";

/** State of the run in progress. */
interface LoweringRun {
    graph: OnnxGraph.Class;
    arena: UnitArena;
    declaredInputs: ReadonlySet<string>;
    /** Values the caller bound to declared inputs */
    bindings: ReadonlyMap<string, HostTensor>;
    outputTensorInfo?: OutputTensorInfo;
    /** Arena index to assigned node id */
    unitIds: Map<number, number>;
}

/** Attributes of padded ops encoded as extra shape inputs, in this order. */
const PADDING_SHAPE_ATTRIBUTES = ["kernel_shape", "strides"];

/**
 * Lowers an ONNX model into the four transfer tables.
 *
 * Units are registered once all their producers are, constants first; the
 * dry run, when needed, happens once before registration starts. A failed
 * load leaves every table empty.
 */
export class GraphLowering {
    private readonly capabilities: OpCapabilities;
    private readonly options: LoweringOptions;
    private strictCheck: boolean;

    private readonly cache = new NodeIdCache();
    private readonly tables = new TransferTableAssembler();
    private readonly interner = new ConstShapeInterner(this.cache, this.tables);
    private constData = new Map<number, TensorProto>();

    constructor(capabilities: OpCapabilities, options: Partial<LoweringOptions> = {}) {
        this.capabilities = capabilities;
        this.options = { ...defaultLoweringOptions, ...options };
        this.strictCheck = this.options.strictCheck;
    }

    enableStrictCheckMode(enable: boolean): void {
        this.strictCheck = enable;
    }

    get strictCheckMode(): boolean {
        return this.strictCheck;
    }

    /**
     * Lowers an in-memory model.
     * `outputTensors`, when given, stands in for the dry run.
     */
    async loadGraph(
        model: ModelProto,
        inputs: readonly InputNodeInfo[],
        outputNames: readonly string[],
        outputTensors?: OutputTensorInfo,
    ): Promise<LoweredGraph> {
        return this.lower(model, inputs, outputNames, outputTensors, this.options.dryRunForUnknownShape);
    }

    async loadGraphFromFile(
        filePath: string,
        inputs: readonly InputNodeInfo[],
        outputNames: readonly string[],
        isTextProto: boolean,
        dryRunForUnknownShape: boolean,
    ): Promise<LoweredGraph> {
        this.clearCache();
        const model = await loadModel(filePath, isTextProto);
        return this.lower(model, inputs, outputNames, undefined, dryRunForUnknownShape);
    }

    getOpNodeParams(): readonly NodeTransferParams[] {
        return this.tables.opNodeParams;
    }

    getConstNodeParams(): readonly ConstNodeTransferParams[] {
        return this.tables.constNodeParams;
    }

    getNodeInputParams(): readonly NodeInputParams[] {
        return this.tables.nodeInputParams;
    }

    getNodeOutputParams(): readonly NodeOutputParams[] {
        return this.tables.nodeOutputParams;
    }

    clearCache(): void {
        this.cache.clear();
        this.tables.clear();
        this.interner.clear();
        this.constData = new Map();
    }

    private async lower(
        model: ModelProto,
        inputs: readonly InputNodeInfo[],
        outputNames: readonly string[],
        outputTensors: OutputTensorInfo | undefined,
        dryRunForUnknownShape: boolean,
    ): Promise<LoweredGraph> {
        this.clearCache();
        try {
            const graph = createGraph(model);
            const declaredInputs = new Set(inputs.map(input => input.name));
            this.checkDeclaredNames(graph, declaredInputs, outputNames);

            const bindings = new Map<string, HostTensor>();
            for (const input of inputs) {
                if (input.tensor) bindings.set(input.name, input.tensor);
            }

            const arena = projectGraph(graph, declaredInputs, outputNames);
            let outputTensorInfo = outputTensors;
            if (!outputTensorInfo && dryRunForUnknownShape && this.hasUnknownShapes(graph, arena, bindings)) {
                outputTensorInfo = await this.dryRun(model, inputs);
            }

            this.registerAll({ graph, arena, declaredInputs, bindings, outputTensorInfo, unitIds: new Map() });

            if (this.options.verbosity >= 1) {
                console.log(
                    `[GraphLowering] Lowered '${graph.name}': ${this.cache.size} nodes ` +
                    `(${this.tables.opNodeParams.length} op, ${this.tables.constNodeParams.length} const, ` +
                    `${this.interner.size} interned shapes)`,
                );
            }
            return new LoweredGraph(this.tables.snapshot(), new Map(this.constData), outputTensorInfo);
        } catch (error) {
            this.clearCache();
            throw error;
        }
    }

    private checkDeclaredNames(graph: OnnxGraph.Class, inputs: ReadonlySet<string>, outputs: readonly string[]): void {
        for (const name of inputs) {
            if (!graph.getTensor(name)) throw new UnboundNameError(name, "input");
        }
        for (const name of outputs) {
            if (!graph.getTensor(name)) throw new UnboundNameError(name, "output");
        }
    }

    private hasUnknownShapes(graph: OnnxGraph.Class, arena: UnitArena, bindings: ReadonlyMap<string, HostTensor>): boolean {
        for (const index of arena.required) {
            for (const name of arena.units[index].outputs) {
                if (name && !bindings.has(name) && !isStaticShape(graph.getTensor(name)?.shape)) return true;
            }
        }
        return false;
    }

    private async dryRun(model: ModelProto, inputs: readonly InputNodeInfo[]): Promise<OutputTensorInfo | undefined> {
        const { engine } = this.options;
        if (!engine) return undefined;
        if (this.options.verbosity >= 1) {
            console.log("[GraphLowering] Running dry run to resolve unknown shapes");
        }
        return dryRunInferenceForAllNodes(model, inputs, this.options.initializeByZero, engine);
    }

    private registerAll(run: LoweringRun): void {
        const pending = run.arena.units.filter(unit => run.arena.required.has(unit.index));

        for (const unit of pending) {
            if (unit.kind !== "source") continue;
            const classification = this.classify(run, unit);
            if (classification.kind === "constant") this.register(run, classification);
        }

        let remaining = pending.filter(unit => !run.unitIds.has(unit.index));
        while (remaining.length > 0) {
            const blocked: LoweringUnit[] = [];
            for (const unit of remaining) {
                if (unit.inputs.every(input => run.unitIds.has(input.producer))) {
                    this.register(run, this.classify(run, unit));
                } else {
                    blocked.push(unit);
                }
            }
            if (blocked.length === remaining.length) {
                throw new DependencyUnresolvedError(blocked.map(unit => unit.name));
            }
            remaining = blocked;
        }
    }

    private classify(run: LoweringRun, unit: LoweringUnit): Classification {
        return classify(unit, {
            declaredInputs: run.declaredInputs,
            capabilities: this.capabilities,
            descriptorOf: (tensor, nodeName) => this.descriptorOf(run, tensor, nodeName),
        });
    }

    private register(run: LoweringRun, classification: Classification): void {
        const { unit } = classification;

        switch (classification.kind) {
            case "constant": {
                const { tensor } = classification;
                const shape = this.descriptorOf(run, tensor.id, unit.name);
                const value = tensor.constantValue;
                const nodeId = this.assignId(run, unit);
                this.tables.appendConstNode({
                    name: unit.name,
                    nodeId,
                    shape,
                    dataName: tensor.id,
                    dataSize: value ? tensorProtoByteSize(value) : 0,
                });
                if (value) this.constData.set(nodeId, value);
                return;
            }

            case "input": {
                const maxSizes = this.outputSizes(run, unit);
                this.appendNode(run, unit, INPUT_OP, this.capabilities.targetId(INPUT_OP), PaddingMode.NA, [], maxSizes);
                return;
            }

            case "output": {
                const inputs = this.wireInputs(run, unit);
                this.appendNode(run, unit, OUTPUT_OP, this.capabilities.targetId(OUTPUT_OP), PaddingMode.NA, inputs, []);
                return;
            }

            case "flatten": {
                const inputs = this.wireInputs(run, unit);
                const maxSizes = this.outputSizes(run, unit);
                this.appendNode(run, unit, classification.operation.type, this.capabilities.targetId(FLATTEN_OP), PaddingMode.NA, inputs, maxSizes);
                return;
            }

            case "padded": {
                const { operation } = classification;
                const inputs = this.wireInputs(run, unit);
                const maxSizes = this.outputSizes(run, unit);
                const targetOpId = this.capabilities.targetId(operation.type);
                for (const attribute of PADDING_SHAPE_ATTRIBUTES) {
                    const values = operation.getIntsAttribute(attribute);
                    if (!values) continue;
                    const shapeId = this.interner.intern(encodeShape(values, unit.name));
                    inputs.push({ nodeId: shapeId, outputPort: 0 });
                }
                this.appendNode(run, unit, operation.type, targetOpId, classification.padding, inputs, maxSizes);
                return;
            }

            case "generic": {
                const { operation } = classification;
                const inputs = this.wireInputs(run, unit);
                const maxSizes = this.outputSizes(run, unit);
                this.appendNode(run, unit, operation.type, this.capabilities.targetId(operation.type), PaddingMode.NA, inputs, maxSizes);
                return;
            }
        }
    }

    private assignId(run: LoweringRun, unit: LoweringUnit): number {
        const nodeId = this.cache.register(unit.name);
        run.unitIds.set(unit.index, nodeId);
        if (this.options.verbosity >= 2) {
            console.log(`[GraphLowering] Registered ${unit.kind} '${unit.name}' as node ${nodeId}`);
        }
        return nodeId;
    }

    private appendNode(
        run: LoweringRun,
        unit: LoweringUnit,
        type: string,
        targetOpId: number,
        padding: PaddingMode,
        inputs: NodeInput[],
        maxSizes: number[],
    ): void {
        const nodeId = this.assignId(run, unit);
        this.tables.appendOpNode({
            name: unit.name,
            nodeId,
            type,
            targetOpId,
            padding,
            inputsSize: inputs.length,
            outputsSize: maxSizes.length,
        });
        this.tables.appendNodeInputs({ nodeId, inputs });
        this.tables.appendNodeOutputs({ nodeId, maxSizes });
    }

    private wireInputs(run: LoweringRun, unit: LoweringUnit): NodeInput[] {
        return unit.inputs.map(input => {
            const nodeId = run.unitIds.get(input.producer);
            if (nodeId === undefined) {
                throw new LoweringInvariantError(`producer of '${input.tensor}' is not registered before '${unit.name}'`, unit.name);
            }
            return { nodeId, outputPort: input.slot };
        });
    }

    private outputSizes(run: LoweringRun, unit: LoweringUnit): number[] {
        return unit.outputs.map(tensor => {
            if (!tensor) return 0;
            const count = descriptorElementCount(this.descriptorOf(run, tensor, unit.name));
            return count * this.elementSizeOf(run, tensor, unit.name);
        });
    }

    private elementSizeOf(run: LoweringRun, tensor: string, nodeName: string): number {
        let dataType = run.graph.getTensor(tensor)?.literalType ?? DataType.UNDEFINED;
        if (dataType === DataType.UNDEFINED) {
            dataType = this.observedTensor(run, tensor)?.dataType ?? DataType.UNDEFINED;
        }
        if (dataType === DataType.UNDEFINED) {
            throw new DryRunFailure(`element type of '${tensor}' is unknown`, nodeName);
        }
        const size = elementSize(dataType);
        if (size === undefined) {
            throw new UnsupportedOperationError(`${DataType[dataType]} tensor '${tensor}'`, nodeName);
        }
        return size;
    }

    private descriptorOf(run: LoweringRun, tensor: string, nodeName: string): ShapeDescriptor {
        return encodeShape(this.resolveDims(run, tensor, nodeName), nodeName);
    }

    /** Dry-run value of a tensor, or the caller's binding when the dry run has none. */
    private observedTensor(run: LoweringRun, tensor: string): HostTensor | undefined {
        return run.outputTensorInfo?.outputTensorMap.get(tensor) ?? run.bindings.get(tensor);
    }

    /** Static shape when fully known, checked against the observed value; otherwise the observed shape. */
    private resolveDims(run: LoweringRun, tensor: string, nodeName: string): readonly number[] {
        const staticShape = run.graph.getTensor(tensor)?.shape;
        const observed = this.observedTensor(run, tensor);

        if (isStaticShape(staticShape)) {
            if (observed) this.checkShape(tensor, staticShape, observed.dims);
            return staticShape;
        }
        if (observed) return observed.dims;
        throw new DryRunFailure(`shape of '${tensor}' is not statically known and no dry-run result covers it`, nodeName);
    }

    private checkShape(tensor: string, expected: readonly number[], actual: readonly number[]): void {
        if (descriptorsEqual(encodeShape(expected, tensor), encodeShape(actual, tensor))) return;
        if (this.strictCheck) {
            throw new ShapeInconsistencyError(tensor, expected, actual);
        }
        console.warn(
            `[GraphLowering] Shape of '${tensor}' differs between static inference [${expected.join(",")}] ` +
            `and dry run [${actual.join(",")}]; keeping the static shape`,
        );
    }
}
