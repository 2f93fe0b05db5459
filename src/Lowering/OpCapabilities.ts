import fs from "fs";
import { resolveSourceAsset } from "../Onnx/Utils.js";
import { UnsupportedOperationError } from "./Errors.js";

/** Marker op kinds every target defines alongside its real ops. */
export const INPUT_OP = "INPUT";
export const OUTPUT_OP = "OUTPUT";
export const FLATTEN_OP = "FLATTEN";

/** What a target device can run, queried by op kind. */
export interface OpCapabilities {
    isSupported(opKind: string): boolean;
    /** Target-specific id; throws UnsupportedOperationError for unsupported kinds */
    targetId(opKind: string): number;
    requiresPaddingInfo(opKind: string): boolean;
}

export interface OpDefinition {
    opKind: string;
    padding?: boolean;
}

function isOpDefinition(value: unknown): value is OpDefinition {
    if (value === null || typeof value !== "object") return false;
    if (!("opKind" in value) || typeof value.opKind !== "string") return false;
    return !("padding" in value) || value.padding === undefined || typeof value.padding === "boolean";
}

/** Capabilities backed by an ordered op list; an op's id is its position. */
export class OpCapabilityTable implements OpCapabilities {
    private readonly ids = new Map<string, number>();
    private readonly padded = new Set<string>();

    constructor(definitions: readonly OpDefinition[]) {
        definitions.forEach((definition, index) => {
            if (this.ids.has(definition.opKind)) {
                throw new Error(`op kind '${definition.opKind}' is defined more than once`);
            }
            this.ids.set(definition.opKind, index);
            if (definition.padding) this.padded.add(definition.opKind);
        });
    }

    isSupported(opKind: string): boolean {
        return this.ids.has(opKind);
    }

    targetId(opKind: string): number {
        const id = this.ids.get(opKind);
        if (id === undefined) {
            throw new UnsupportedOperationError(opKind);
        }
        return id;
    }

    requiresPaddingInfo(opKind: string): boolean {
        return this.padded.has(opKind);
    }

    get size(): number {
        return this.ids.size;
    }
}

export function parseOpDefinitions(json: string): OpDefinition[] {
    const parsed: unknown = JSON.parse(json);
    if (!Array.isArray(parsed)) {
        throw new Error("op table must be a JSON array");
    }
    return parsed.map((entry, index) => {
        if (!isOpDefinition(entry)) {
            throw new Error(`op table entry #${index} is not an op definition`);
        }
        return { opKind: entry.opKind, padding: entry.padding };
    });
}

/** Loads an op table file; defaults to the bundled target_ops.json. */
export function loadCapabilities(filePath: string = resolveSourceAsset("Lowering", "target_ops.json")): OpCapabilityTable {
    return new OpCapabilityTable(parseOpDefinitions(fs.readFileSync(filePath, "utf-8")));
}
