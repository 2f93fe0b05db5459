import { describe, it, expect, beforeEach } from "vitest";
import { NodeIdCache } from "../src/Lowering/NodeIdCache.js";
import { ConstShapeInterner, shapeNodeName } from "../src/Lowering/ConstShapeInterner.js";
import { TransferTableAssembler } from "../src/Lowering/TransferParams.js";
import { LoweringInvariantError } from "../src/Lowering/Errors.js";

describe("NodeIdCache", () => {
  it("assigns ids from 0 in registration order", () => {
    const cache = new NodeIdCache();
    expect(cache.register("a")).toBe(0);
    expect(cache.register("b")).toBe(1);
    expect(cache.size).toBe(2);
  });

  it("refuses to register a name twice", () => {
    const cache = new NodeIdCache();
    cache.register("a");
    expect(() => cache.register("a")).toThrow(LoweringInvariantError);
  });

  it("starts over after clear", () => {
    const cache = new NodeIdCache();
    cache.register("a");
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.register("a")).toBe(0);
  });
});

describe("ConstShapeInterner", () => {
  let cache: NodeIdCache;
  let tables: TransferTableAssembler;
  let interner: ConstShapeInterner;

  beforeEach(() => {
    cache = new NodeIdCache();
    tables = new TransferTableAssembler();
    interner = new ConstShapeInterner(cache, tables);
  });

  it("returns the same id for the same descriptor", () => {
    const first = interner.intern([1, 1, 3, 3]);
    const second = interner.intern([1, 1, 3, 3]);
    expect(second).toBe(first);
    expect(tables.constNodeParams).toEqual([
      { name: "__shape_1x1x3x3", nodeId: 0, shape: [1, 1, 3, 3], dataName: "", dataSize: 0 },
    ]);
  });

  it("gives distinct descriptors distinct ids from the shared cache", () => {
    cache.register("x");
    expect(interner.intern([1, 1, 3, 3])).toBe(1);
    expect(interner.intern([1, 1, 1, 1])).toBe(2);
    expect(interner.intern([1, 1, 3, 3])).toBe(1);
    expect(interner.size).toBe(2);
    expect(tables.constNodeParams.map(c => c.name)).toEqual(["__shape_1x1x3x3", "__shape_1x1x1x1"]);
  });

  it("names shape nodes after their descriptor", () => {
    expect(shapeNodeName([2, 1, 1, 5])).toBe("__shape_2x1x1x5");
  });
});
