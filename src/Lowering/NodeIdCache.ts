import { LoweringInvariantError } from "./Errors.js";

/**
 * Registered node names of one run, graph units and interned shapes alike.
 * A node's id is its registration position.
 */
export class NodeIdCache {
    private ids = new Map<string, number>();

    register(name: string): number {
        if (this.ids.has(name)) {
            throw new LoweringInvariantError(`node '${name}' is registered twice`, name);
        }
        const id = this.ids.size;
        this.ids.set(name, id);
        return id;
    }

    get size(): number {
        return this.ids.size;
    }

    clear(): void {
        this.ids.clear();
    }
}
