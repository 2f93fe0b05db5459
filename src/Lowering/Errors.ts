export type LoweringErrorCode =
  | "GRAPH_LOAD"
  | "UNBOUND_NAME"
  | "UNSUPPORTED_OPERATION"
  | "RANK_EXCEEDED"
  | "DRY_RUN_FAILURE"
  | "SHAPE_INCONSISTENCY"
  | "DEPENDENCY_UNRESOLVED"
  | "INVARIANT";

/** Base class of every error surfaced by graph loading and lowering. */
export class LoweringError extends Error {
  readonly code: LoweringErrorCode;
  readonly nodeName?: string;

  constructor(code: LoweringErrorCode, message: string, nodeName?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.nodeName = nodeName;
  }
}

/** The graph source is malformed or cannot be parsed. */
export class GraphLoadError extends LoweringError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GRAPH_LOAD", message, undefined, options);
  }
}

/** A declared input/output name, or a consumed graph input, is not bound. */
export class UnboundNameError extends LoweringError {
  constructor(name: string, role: "input" | "output", detail = "not found in graph") {
    super("UNBOUND_NAME", `${role} '${name}' ${detail}`, name);
  }
}

export class UnsupportedOperationError extends LoweringError {
  readonly opKind: string;

  constructor(opKind: string, nodeName?: string) {
    super(
      "UNSUPPORTED_OPERATION",
      nodeName
        ? `${opKind} (node '${nodeName}') is not supported by the target`
        : `${opKind} is not supported by the target`,
      nodeName,
    );
    this.opKind = opKind;
  }
}

export class RankExceededError extends LoweringError {
  readonly rank: number;

  constructor(rank: number, maxRank: number, nodeName?: string) {
    super(
      "RANK_EXCEEDED",
      `shape rank ${rank} exceeds the supported maximum of ${maxRank}` + (nodeName ? ` (node '${nodeName}')` : ""),
      nodeName,
    );
    this.rank = rank;
  }
}

/** Host execution failed, or a requested tensor could not be produced by the dry run. */
export class DryRunFailure extends LoweringError {
  constructor(message: string, nodeName?: string, options?: { cause?: unknown }) {
    super("DRY_RUN_FAILURE", message, nodeName, options);
  }
}

export class ShapeInconsistencyError extends LoweringError {
  readonly expected: readonly number[];
  readonly actual: readonly number[];

  constructor(nodeName: string, expected: readonly number[], actual: readonly number[]) {
    super(
      "SHAPE_INCONSISTENCY",
      `shape of '${nodeName}' differs between static inference [${expected.join(",")}] and dry run [${actual.join(",")}]`,
      nodeName,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/** The traversal cannot make progress: a cycle, or a dependency that never becomes ready. */
export class DependencyUnresolvedError extends LoweringError {
  readonly pending: readonly string[];

  constructor(pending: readonly string[]) {
    super("DEPENDENCY_UNRESOLVED", `cannot resolve dependencies of: ${pending.join(", ")}`, pending[0]);
    this.pending = pending;
  }
}

/** Broken internal invariant; never caused by user input. */
export class LoweringInvariantError extends LoweringError {
  constructor(message: string, nodeName?: string) {
    super("INVARIANT", message, nodeName);
  }
}
