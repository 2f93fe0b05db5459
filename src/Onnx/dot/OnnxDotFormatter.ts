import DefaultDotFormatter from "@specs-feup/flow/graph/dot/DefaultDotFormatter";
import BaseEdge from "@specs-feup/flow/graph/BaseEdge";
import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Dot, { DotEdge, DotGraph, DotNode } from "@specs-feup/flow/graph/dot/dot";
import Edge from "@specs-feup/flow/graph/Edge";
import Node from "@specs-feup/flow/graph/Node";
import TensorNode from "../TensorNode.js";
import OperationNode from "../OperationNode.js";
import OnnxEdge from "../OnnxEdge.js";
import OnnxGraph from "../OnnxGraph.js";

/**
 * Renders the ONNX graph, with intermediate tensors folded into edges.
 * When given lowered node ids, labels carry them as `#<id>`.
 */
export default class OnnxDotFormatter<
    G extends OnnxGraph.Class = OnnxGraph.Class,
> extends DefaultDotFormatter<G> {
    private readonly nodeIds: ReadonlyMap<string, number>;

    static defaultGetNodeAttrs(
        node: BaseNode.Class,
        nodeIds: ReadonlyMap<string, number> = new Map(),
    ): Record<string, string> {
        const result: Record<string, string> = { label: node.id, shape: "box" };
        node.switch(
            Node.Case(TensorNode, (n) => {
                result.shape = "ellipse";
                if (n.type === "input") {
                    result.color = "#00FF00";
                } else if (n.type === "output") {
                    result.color = "#FF0000";
                } else if (n.isConstant()) {
                    result.color = "#A52A2A";
                }
            }),
            Node.Case(OperationNode, (n) => {
                result.label = n.type;
                result.color = "#0000FF";
            }),
        );
        const id = nodeIds.get(node.id);
        if (id !== undefined) result.label += ` #${id}`;
        return result;
    }

    static defaultGetEdgeAttrs(edge: BaseEdge.Class): Record<string, string> {
        const result: Record<string, string> = {};
        edge.switch(
            Edge.Case(OnnxEdge, (e) => {
                result.label = e.shape && e.shape.length > 0 ? `{${e.shape.join(',')}}` : "";
            }),
        );
        return result;
    }

    static defaultGetGraphAttrs(): Record<string, string> {
        return {
            rankdir: "LR",
            ...DefaultDotFormatter.defaultGetGraphAttrs(),
        };
    }

    constructor(nodeIds: ReadonlyMap<string, number> = new Map()) {
        super(
            (node) => OnnxDotFormatter.defaultGetNodeAttrs(node, nodeIds),
            OnnxDotFormatter.defaultGetEdgeAttrs,
            undefined,
            OnnxDotFormatter.defaultGetGraphAttrs,
        );
        this.nodeIds = nodeIds;
    }

    override nodeToDot(node: BaseNode.Class): DotNode {
        return Dot.node(node.id, OnnxDotFormatter.defaultGetNodeAttrs(node, this.nodeIds));
    }

    override edgeToDot(edge: BaseEdge.Class): DotEdge {
        return Dot.edge(edge.source.id, edge.target.id, OnnxDotFormatter.defaultGetEdgeAttrs(edge));
    }

    override toDot(graph: G): DotGraph {
        const dot = Dot.graph().graphAttrs(this.getGraphAttrs());

        for (const node of graph.nodes) {
            const tensorNode = node.tryAs(TensorNode);
            if (tensorNode?.type === "intermediate") {
                for (const inEdge of tensorNode.getIncomers) {
                    const edgeAttrs = OnnxDotFormatter.defaultGetEdgeAttrs(inEdge);
                    for (const outEdge of tensorNode.getOutgoers) {
                        dot.statements(Dot.edge(inEdge.source.id, outEdge.target.id, edgeAttrs));
                    }
                }
                continue;
            }
            dot.statements(this.nodeToDot(node));
        }

        for (const edge of graph.edges) {
            if (
                edge.source.tryAs(TensorNode)?.type === "intermediate" ||
                edge.target.tryAs(TensorNode)?.type === "intermediate"
            ) continue;
            dot.statements(this.edgeToDot(edge));
        }

        return dot;
    }
}
