import { NodeIdCache } from "./NodeIdCache.js";
import { TransferTableAssembler } from "./TransferParams.js";
import { ShapeDescriptor, formatDescriptor } from "./ShapeEncoding.js";

export const SHAPE_NODE_PREFIX = "__shape_";

export function shapeNodeName(shape: ShapeDescriptor): string {
    return SHAPE_NODE_PREFIX + formatDescriptor(shape);
}

/**
 * Gives each distinct shape descriptor one const node.
 * Ids come from the shared node cache, so interned shapes interleave with graph nodes.
 */
export class ConstShapeInterner {
    private readonly cache: NodeIdCache;
    private readonly tables: TransferTableAssembler;
    private interned = new Map<string, number>();

    constructor(cache: NodeIdCache, tables: TransferTableAssembler) {
        this.cache = cache;
        this.tables = tables;
    }

    intern(shape: ShapeDescriptor): number {
        const name = shapeNodeName(shape);
        const existing = this.interned.get(name);
        if (existing !== undefined) return existing;

        const nodeId = this.cache.register(name);
        this.tables.appendConstNode({ name, nodeId, shape, dataName: "", dataSize: 0 });
        this.interned.set(name, nodeId);
        return nodeId;
    }

    get size(): number {
        return this.interned.size;
    }

    clear(): void {
        this.interned.clear();
    }
}
