import { PaddingMode, TransferTables } from "./TransferParams.js";
import { formatDescriptor } from "./ShapeEncoding.js";

/** Node name to lowered id, over both node tables. */
export function nodeIdsOf(tables: TransferTables): Map<string, number> {
    const ids = new Map<string, number>();
    for (const node of [...tables.constNodes, ...tables.opNodes]) ids.set(node.name, node.nodeId);
    return ids;
}

export function dumpTransferParams(tables: TransferTables): string {
    const lines: string[] = [];

    lines.push(`Op nodes (${tables.opNodes.length})`);
    for (const op of tables.opNodes) {
        lines.push(
            `  [${op.nodeId}] ${op.name} type=${op.type} target=${op.targetOpId} ` +
            `padding=${PaddingMode[op.padding]} inputs=${op.inputsSize} outputs=${op.outputsSize}`,
        );
    }

    lines.push(`Const nodes (${tables.constNodes.length})`);
    for (const c of tables.constNodes) {
        const data = c.dataName ? ` data=${c.dataName} (${c.dataSize} bytes)` : "";
        lines.push(`  [${c.nodeId}] ${c.name} shape=${formatDescriptor(c.shape)}${data}`);
    }

    lines.push(`Node inputs (${tables.nodeInputs.length})`);
    for (const entry of tables.nodeInputs) {
        const inputs = entry.inputs.map(i => `(${i.nodeId}:${i.outputPort})`).join(" ");
        lines.push(`  [${entry.nodeId}] ${inputs || "-"}`);
    }

    lines.push(`Node outputs (${tables.nodeOutputs.length})`);
    for (const entry of tables.nodeOutputs) {
        lines.push(`  [${entry.nodeId}] ${entry.maxSizes.join(" ") || "-"}`);
    }

    return lines.join("\n");
}

/**
 * One CSV line per table entry, tables in the order const, op, inputs, outputs:
 *   const,<id>,<name>,<s0>,<s1>,<s2>,<s3>,<dataName>,<dataSize>
 *   op,<id>,<name>,<type>,<targetId>,<padding>,<inputsSize>,<outputsSize>
 *   in,<id>,<producer>:<port>,...
 *   out,<id>,<size>,...
 */
export function verificationString(tables: TransferTables): string {
    const lines: string[] = [];
    for (const c of tables.constNodes) {
        lines.push(["const", c.nodeId, c.name, ...c.shape, c.dataName, c.dataSize].join(","));
    }
    for (const op of tables.opNodes) {
        lines.push(["op", op.nodeId, op.name, op.type, op.targetOpId, op.padding, op.inputsSize, op.outputsSize].join(","));
    }
    for (const entry of tables.nodeInputs) {
        lines.push(["in", entry.nodeId, ...entry.inputs.map(i => `${i.nodeId}:${i.outputPort}`)].join(","));
    }
    for (const entry of tables.nodeOutputs) {
        lines.push(["out", entry.nodeId, ...entry.maxSizes].join(","));
    }
    return lines.join("\n");
}
