// enums and message shapes for the ONNX protobuf schema (see onnx.proto)

export enum AttributeType {
  UNDEFINED = 0,
  FLOAT = 1,
  INT = 2,
  STRING = 3,
  TENSOR = 4,
  GRAPH = 5,
  FLOATS = 6,
  INTS = 7,
  STRINGS = 8,
  TENSORS = 9,
  GRAPHS = 10,
  SPARSE_TENSOR = 11,
  SPARSE_TENSORS = 12,
}

export enum DataType {
  UNDEFINED = 0,
  FLOAT = 1,
  UINT8 = 2,
  INT8 = 3,
  UINT16 = 4,
  INT16 = 5,
  INT32 = 6,
  INT64 = 7,
  STRING = 8,
  BOOL = 9,
  FLOAT16 = 10,
  DOUBLE = 11,
  UINT32 = 12,
  UINT64 = 13,
  COMPLEX64 = 14,
  COMPLEX128 = 15,
  BFLOAT16 = 16,
}

// Decoded models use numbers; JSON written by other tools may carry
// int64 values as strings and enum values by name.
export type IntLike = number | string;
export type EnumLike = number | string;

// Raw tensor bytes as they show up after protobuf decoding (Uint8Array),
// after JSON.stringify of a Buffer ({ type: "Buffer", data }), or in
// protobuf's canonical JSON form (base64 string).
export type RawBytes = Uint8Array | number[] | string | { type?: string; data: number[] };

// ONNX-compatible TensorProto definition
export type TensorProto = {
  name?: string;
  dataType?: EnumLike;
  dims?: IntLike[];
  rawData?: RawBytes;
  floatData?: number[];
  int32Data?: number[];
  int64Data?: IntLike[];
  stringData?: RawBytes[];
  doubleData?: number[];
  uint64Data?: IntLike[];
};

// ONNX-compatible AttributeProto definition
export type AttributeProto = {
  name: string;
  type?: EnumLike;
  i?: IntLike;
  f?: number;
  s?: RawBytes;
  ints?: IntLike[];
  floats?: number[];
  strings?: RawBytes[];
  t?: TensorProto;
  g?: GraphProto;
};

export type TensorShapeDimension = {
  dimValue?: IntLike;
  dimParam?: string;
};

export type TypeProto = {
  tensorType?: {
    elemType?: EnumLike;
    shape?: { dim?: TensorShapeDimension[] };
  };
};

export type ValueInfoProto = {
  name: string;
  type?: TypeProto;
  docString?: string;
};

export type NodeProto = {
  name?: string;
  opType: string;
  domain?: string;
  input?: string[];
  output?: string[];
  attribute?: AttributeProto[];
  docString?: string;
};

export type GraphProto = {
  name?: string;
  node?: NodeProto[];
  initializer?: TensorProto[];
  input?: ValueInfoProto[];
  output?: ValueInfoProto[];
  valueInfo?: ValueInfoProto[];
  docString?: string;
};

export type OperatorSetIdProto = {
  domain?: string;
  version?: IntLike;
};

export type ModelProto = {
  irVersion?: IntLike;
  opsetImport?: OperatorSetIdProto[];
  producerName?: string;
  producerVersion?: string;
  domain?: string;
  modelVersion?: IntLike;
  docString?: string;
  graph?: GraphProto;
};

// Attribute values as kept on OperationNode
export type AttributeValue = number | string | number[] | string[] | TensorProto;
