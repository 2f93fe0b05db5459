import { describe, it, expect } from "vitest";
import { dumpTransferParams, nodeIdsOf, verificationString } from "../src/Lowering/Dump.js";
import { GraphLowering } from "../src/Lowering/GraphLowering.js";
import { OpCapabilityTable } from "../src/Lowering/OpCapabilities.js";
import { PaddingMode, TransferTables } from "../src/Lowering/TransferParams.js";
import { TEST_OPS, convModel } from "./model_builder.js";

async function scenarioA(): Promise<TransferTables> {
  const lowered = await new GraphLowering(new OpCapabilityTable(TEST_OPS), { verbosity: 0 }).loadGraph(
    convModel(),
    [{ name: "x" }],
    ["y"],
  );
  return lowered.tables;
}

const withShape: TransferTables = {
  opNodes: [
    { name: "p", nodeId: 1, type: "MaxPool", targetOpId: 4, padding: PaddingMode.SAME, inputsSize: 2, outputsSize: 1 },
  ],
  constNodes: [{ name: "__shape_1x1x2x2", nodeId: 0, shape: [1, 1, 2, 2], dataName: "", dataSize: 0 }],
  nodeInputs: [{ nodeId: 1, inputs: [{ nodeId: 7, outputPort: 1 }, { nodeId: 0, outputPort: 0 }] }],
  nodeOutputs: [{ nodeId: 1, maxSizes: [16, 0] }],
};

describe("dumpTransferParams", () => {
  it("lists every table", async () => {
    expect(dumpTransferParams(await scenarioA())).toBe(
      [
        "Op nodes (3)",
        "  [1] x type=INPUT target=0 padding=NA inputs=0 outputs=1",
        "  [2] conv type=Conv target=3 padding=VALID inputs=2 outputs=1",
        "  [3] y type=OUTPUT target=1 padding=NA inputs=1 outputs=0",
        "Const nodes (1)",
        "  [0] w shape=3x3x1x2 data=w (72 bytes)",
        "Node inputs (3)",
        "  [1] -",
        "  [2] (1:0) (0:0)",
        "  [3] (2:0)",
        "Node outputs (3)",
        "  [1] 64",
        "  [2] 32",
        "  [3] -",
      ].join("\n"),
    );
  });

  it("omits data for interned shapes", () => {
    const lines = dumpTransferParams(withShape).split("\n");
    expect(lines[1]).toBe("  [1] p type=MaxPool target=4 padding=SAME inputs=2 outputs=1");
    expect(lines[3]).toBe("  [0] __shape_1x1x2x2 shape=1x1x2x2");
    expect(lines[5]).toBe("  [1] (7:1) (0:0)");
    expect(lines[7]).toBe("  [1] 16 0");
  });
});

describe("verificationString", () => {
  it("writes padding as its code", () => {
    expect(verificationString(withShape)).toBe(
      ["const,0,__shape_1x1x2x2,1,1,2,2,,0", "op,1,p,MaxPool,4,1,2,1", "in,1,7:1,0:0", "out,1,16,0"].join("\n"),
    );
  });

  it("is empty for empty tables", () => {
    expect(verificationString({ opNodes: [], constNodes: [], nodeInputs: [], nodeOutputs: [] })).toBe("");
  });
});

describe("nodeIdsOf", () => {
  it("maps names of both node tables", async () => {
    expect([...nodeIdsOf(await scenarioA())].sort((a, b) => a[1] - b[1])).toEqual([
      ["w", 0],
      ["x", 1],
      ["conv", 2],
      ["y", 3],
    ]);
  });
});
