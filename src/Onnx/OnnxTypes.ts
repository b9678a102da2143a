// ONNX attribute and tensor element types, as numbered in onnx.proto

import { NetworkDataType } from "../Network/LayerTypes.js";

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

export const DEFAULT_DOMAINS = ["", "ai.onnx"];

/** Resolves an enum written either as its number or as its name. */
export function enumValue(enumeration: object, raw: unknown): number | undefined {
  if (typeof raw === "number") return raw;
  if (typeof raw !== "string") return undefined;
  const entry = Object.entries(enumeration).find(([key]) => key === raw);
  const value: unknown = entry?.[1];
  return typeof value === "number" ? value : undefined;
}

/** Element type a network tensor takes for an ONNX element type. */
export function toNetworkDataType(dataType: DataType): NetworkDataType | undefined {
  switch (dataType) {
    case DataType.FLOAT:
    case DataType.DOUBLE:
      return NetworkDataType.FLOAT;
    case DataType.FLOAT16:
      return NetworkDataType.HALF;
    case DataType.INT8:
      return NetworkDataType.INT8;
    case DataType.INT16:
    case DataType.UINT16:
    case DataType.INT32:
    case DataType.INT64:
      return NetworkDataType.INT32;
    case DataType.UINT8:
      return NetworkDataType.UINT8;
    case DataType.BOOL:
      return NetworkDataType.BOOL;
    default:
      return undefined;
  }
}
