import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import OnnxGraph from "./OnnxGraph.js";
import { DataType, EnumLike, IntLike, RawBytes, TensorProto } from "./OnnxTypes.js";

export type Dim = number | string;
export type Shape = Dim[];

export const typeSizeMap: Record<number, number> = {
    0: 0,    // onnx.TensorProto.UNDEFINED
    1: 4,    // onnx.TensorProto.FLOAT
    2: 1,    // onnx.TensorProto.UINT8
    3: 1,    // onnx.TensorProto.INT8
    4: 2,    // onnx.TensorProto.UINT16
    5: 2,    // onnx.TensorProto.INT16
    6: 4,    // onnx.TensorProto.INT32
    7: 8,    // onnx.TensorProto.INT64
    8: -1,   // onnx.TensorProto.STRING (Variable size)
    9: 1,    // onnx.TensorProto.BOOL
    10: 2,   // onnx.TensorProto.FLOAT16
    11: 8,   // onnx.TensorProto.DOUBLE
    12: 4,   // onnx.TensorProto.UINT32
    13: 8,   // onnx.TensorProto.UINT64
    14: 8,   // onnx.TensorProto.COMPLEX64
    15: 16,  // onnx.TensorProto.COMPLEX128
    16: 2,   // onnx.TensorProto.BFLOAT16
};

/** Element size in bytes, or undefined for undefined/variable-size element types */
export function elementSize(dataType: DataType): number | undefined {
    const size = typeSizeMap[dataType];
    return size !== undefined && size > 0 ? size : undefined;
}

export function toNum(x: IntLike | undefined): number | undefined {
  if (typeof x === "number") return Number.isFinite(x) ? x : undefined;
  if (typeof x === "string" && /^-?[0-9]+$/.test(x)) return Number(x);
  return undefined;
}

/** Accepts the numeric code or the enum name ("FLOAT") of an ONNX data type */
export function toDataType(v: EnumLike | undefined): DataType {
  if (typeof v === "number") return v in DataType ? v : DataType.UNDEFINED;
  if (typeof v === "string") {
    const asNumber = toNum(v);
    if (asNumber !== undefined) return toDataType(asNumber);
    const byName = Object.entries(DataType).find(([key]) => key === v)?.[1];
    return typeof byName === "number" ? byName : DataType.UNDEFINED;
  }
  return DataType.UNDEFINED;
}

export function isNum(d: Dim | undefined): d is number {
  return typeof d === "number" && Number.isInteger(d) && d >= 0;
}

/** True when every dim is a known non-negative integer */
export function isStaticShape(shape: Shape | undefined): shape is number[] {
  return shape !== undefined && shape.every(isNum);
}

export function prod(dims: number[]): number {
  return dims.reduce((a, b) => a * b, 1);
}

export function toU8(raw: RawBytes | undefined): Uint8Array | undefined {
  if (raw === undefined) return undefined;
  if (raw instanceof Uint8Array) return raw;
  if (Array.isArray(raw)) return Uint8Array.from(raw);
  if (typeof raw === "string") return Uint8Array.from(Buffer.from(raw, "base64"));
  return Uint8Array.from(raw.data);
}

/** Number of elements declared by a TensorProto's dims (1 for scalars) */
export function tensorElementCount(t: TensorProto): number {
  return prod((t.dims ?? []).map(d => toNum(d) ?? 0));
}

/**
 * Payload bytes of a constant, in little-endian layout.
 * Typed fields are packed the same way the raw_data field would hold them.
 */
export function tensorProtoToBytes(t: TensorProto): Uint8Array {
  const raw = toU8(t.rawData);
  if (raw && raw.byteLength > 0) return raw;

  const dataType = toDataType(t.dataType);
  const size = elementSize(dataType) ?? 0;
  const values = typedValues(t);
  const out = new Uint8Array(values.length * size);
  const dv = new DataView(out.buffer);

  values.forEach((v, i) => {
    const off = i * size;
    switch (dataType) {
      case DataType.FLOAT: dv.setFloat32(off, v, true); break;
      case DataType.DOUBLE: dv.setFloat64(off, v, true); break;
      case DataType.INT64: dv.setBigInt64(off, BigInt(Math.trunc(v)), true); break;
      case DataType.UINT64: dv.setBigUint64(off, BigInt(Math.trunc(v)), true); break;
      case DataType.INT32: dv.setInt32(off, v, true); break;
      case DataType.UINT32: dv.setUint32(off, v, true); break;
      case DataType.INT16: dv.setInt16(off, v, true); break;
      case DataType.UINT16:
      case DataType.FLOAT16:
      case DataType.BFLOAT16: dv.setUint16(off, v, true); break;
      case DataType.INT8: dv.setInt8(off, v); break;
      case DataType.UINT8:
      case DataType.BOOL: dv.setUint8(off, v); break;
    }
  });
  return out;
}

function typedValues(t: TensorProto): number[] {
  if (t.floatData?.length) return t.floatData;
  if (t.doubleData?.length) return t.doubleData;
  if (t.int32Data?.length) return t.int32Data;
  if (t.int64Data?.length) return t.int64Data.map(v => toNum(v) ?? 0);
  if (t.uint64Data?.length) return t.uint64Data.map(v => toNum(v) ?? 0);
  return [];
}

/** Byte size of a constant payload: raw bytes when present, else element count x element size */
export function tensorProtoByteSize(t: TensorProto): number {
  const raw = toU8(t.rawData);
  if (raw && raw.byteLength > 0) return raw.byteLength;
  return tensorElementCount(t) * (elementSize(toDataType(t.dataType)) ?? 0);
}

/** Decode an integer vector (INT64 or INT32) from a TensorProto, e.g. a Reshape target shape. */
export function decodeIntegerVector(t: TensorProto | undefined): number[] | undefined {
  if (!t) return undefined;

  if (t.int64Data?.length) return t.int64Data.map(v => toNum(v) ?? 0);
  if (t.int32Data?.length) return [...t.int32Data];

  const u8 = toU8(t.rawData);
  if (!u8) return undefined;

  const dataType = toDataType(t.dataType);
  const elemBytes = dataType === DataType.INT64 ? 8 : 4;
  const dv = new DataView(u8.buffer, u8.byteOffset, u8.byteLength);
  const out: number[] = [];
  for (let off = 0; off + elemBytes <= u8.byteLength; off += elemBytes) {
    out.push(elemBytes === 8 ? Number(dv.getBigInt64(off, true)) : dv.getInt32(off, true));
  }
  return out;
}

export function uniq(g: OnnxGraph.Class, base: string): string {
  let i = 0, id = base;
  while (g.hasNode(id)) id = `${base}_${++i}`;
  return id;
}

export function normalizeAxis(axis: number, rank: number): number {
  return axis < 0 ? axis + rank : axis;
}

export function broadcastTwoShapes(a: Shape, b: Shape): Shape | undefined {
  const rank = Math.max(a.length, b.length);
  const out: Shape = [];
  for (let i = 0; i < rank; i++) {
    const da = a[a.length - rank + i] ?? 1;
    const db = b[b.length - rank + i] ?? 1;
    if (da === 1) out.push(db);
    else if (db === 1 || da === db) out.push(da);
    else if (isNum(da) && isNum(db)) return undefined;
    else out.push(isNum(da) ? db : da);
  }
  return out;
}

export function broadcastShapes(...shapes: Shape[]): Shape | undefined {
  let acc: Shape | undefined = [];
  for (const s of shapes) {
    if (acc === undefined) return undefined;
    acc = broadcastTwoShapes(acc, s);
  }
  return acc;
}

export function inferPoolDim(inDim: number, k: number, stride: number, padHead: number, padTail: number, dil: number) {
  // ONNX: floor((in + padHead + padTail - dil*(k-1) - 1)/stride + 1)
  const effectiveK = dil * (k - 1) + 1;
  return Math.floor((inDim + padHead + padTail - effectiveK) / stride + 1);
}

/**
 * Locates a file shipped next to the TypeScript sources (schemas, tables),
 * whether the code runs from src/ or from the compiled dist/src/.
 */
export function resolveSourceAsset(...segments: string[]): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const fromSource = path.join(here, "..", ...segments);
  if (fs.existsSync(fromSource)) return fromSource;
  return path.join(here, "..", "..", "..", "src", ...segments);
}
