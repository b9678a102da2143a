import { AttributeBag, AttributeValue } from "./Onnx/AttributeBag.js";
import { SourceGraph, SourceModel, SourceNode, ValueInfo } from "./Onnx/OnnxModel.js";
import { AttributeType, DataType, DEFAULT_DOMAINS, enumValue, toNetworkDataType } from "./Onnx/OnnxTypes.js";
import { NetworkDataType } from "./Network/LayerTypes.js";
import { Weights, volume } from "./Network/Weights.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "./Lowering/errors.js";
import { Logger } from "./Logger.js";

// Builds the typed source model from a decoded ONNX document: the object
// protobufjs produces for a ModelProto, or the same structure read from JSON.
// Byte fields may be Uint8Arrays, base64 strings (raw_data) or plain strings
// (string attributes).

export interface ModelBuildOptions {
  narrowInt64: boolean;
  logger: Logger;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

function toBytes(value: unknown): Uint8Array | undefined {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string") return Buffer.from(value, "base64");
  if (Array.isArray(value) && value.every((v) => typeof v === "number")) return Uint8Array.from(value);
  return undefined;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  return "";
}

function toNumbers(value: unknown, what: string): Result<number[]> {
  const out: number[] = [];
  for (const entry of asArray(value)) {
    const n = toNumber(entry);
    if (n === undefined) return invalid(`${what} holds a non-numeric entry`);
    out.push(n);
  }
  return ok(out);
}

function halfToFloat(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const fraction = bits & 0x3ff;
  if (exponent === 0) return sign * 2 ** -14 * (fraction / 1024);
  if (exponent === 0x1f) return fraction ? NaN : sign * Infinity;
  return sign * 2 ** (exponent - 15) * (1 + fraction / 1024);
}

function readRaw(bytes: Uint8Array, count: number, width: number, read: (view: DataView, offset: number) => number): number[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const available = Math.floor(bytes.byteLength / width);
  return Array.from({ length: Math.min(count, available) }, (_, i) => read(view, i * width));
}

function narrowInt64(values: number[], name: string, options: ModelBuildOptions): Result<Int32Array> {
  if (!options.narrowInt64) {
    return unsupported(`tensor '${name}' holds INT64 values and INT64 narrowing is disabled`);
  }
  options.logger.warnOnce(
    "int64",
    "model holds INT64 weights; they are narrowed to INT32 and out-of-range values are clamped",
  );
  return ok(Int32Array.from(values, (v) => Math.min(Math.max(v, INT32_MIN), INT32_MAX)));
}

/** Converts a TensorProto object into weights, narrowing INT64 and DOUBLE data. */
export function convertOnnxWeights(raw: unknown, options: ModelBuildOptions): Result<Weights> {
  if (!isRecord(raw)) return invalid("tensor is not an object");
  const name = toText(raw.name);
  const dims = toNumbers(raw.dims, `dims of tensor '${name}'`);
  if (!dims.ok) return dims;
  const shape = dims.value;
  const count = volume(shape);
  const dataType = enumValue(DataType, raw.dataType) ?? DataType.UNDEFINED;
  const rawBytes = toBytes(raw.rawData);
  const bytes = rawBytes !== undefined && rawBytes.byteLength > 0 ? rawBytes : undefined;

  const listed = (field: string): Result<number[]> => toNumbers(raw[field], `${field} of tensor '${name}'`);
  let weights: Weights;
  switch (dataType) {
    case DataType.FLOAT:
    case DataType.DOUBLE:
    case DataType.FLOAT16: {
      let values: Result<number[]>;
      if (bytes !== undefined) {
        values =
          dataType === DataType.FLOAT
            ? ok(readRaw(bytes, count, 4, (v, o) => v.getFloat32(o, true)))
            : dataType === DataType.DOUBLE
              ? ok(readRaw(bytes, count, 8, (v, o) => v.getFloat64(o, true)))
              : ok(readRaw(bytes, count, 2, (v, o) => halfToFloat(v.getUint16(o, true))));
      } else if (dataType === DataType.FLOAT16) {
        const bits = listed("int32Data");
        values = bits.ok ? ok(bits.value.map(halfToFloat)) : bits;
      } else {
        values = listed(dataType === DataType.FLOAT ? "floatData" : "doubleData");
      }
      if (!values.ok) return values;
      weights = { dataType: NetworkDataType.FLOAT, shape, values: Float32Array.from(values.value) };
      break;
    }
    case DataType.INT8:
    case DataType.INT16:
    case DataType.UINT16:
    case DataType.INT32: {
      let values: Result<number[]>;
      if (bytes !== undefined) {
        values =
          dataType === DataType.INT8
            ? ok(readRaw(bytes, count, 1, (v, o) => v.getInt8(o)))
            : dataType === DataType.INT16
              ? ok(readRaw(bytes, count, 2, (v, o) => v.getInt16(o, true)))
              : dataType === DataType.UINT16
                ? ok(readRaw(bytes, count, 2, (v, o) => v.getUint16(o, true)))
                : ok(readRaw(bytes, count, 4, (v, o) => v.getInt32(o, true)));
      } else {
        values = listed("int32Data");
      }
      if (!values.ok) return values;
      weights = { dataType: NetworkDataType.INT32, shape, values: Int32Array.from(values.value) };
      break;
    }
    case DataType.INT64: {
      const values =
        bytes !== undefined ? ok(readRaw(bytes, count, 8, (v, o) => Number(v.getBigInt64(o, true)))) : listed("int64Data");
      if (!values.ok) return values;
      const narrowed = narrowInt64(values.value, name, options);
      if (!narrowed.ok) return narrowed;
      weights = { dataType: NetworkDataType.INT32, shape, values: narrowed.value };
      break;
    }
    case DataType.UINT8:
    case DataType.BOOL: {
      const values = bytes !== undefined ? ok(Array.from(bytes.subarray(0, count))) : listed("int32Data");
      if (!values.ok) return values;
      weights = {
        dataType: dataType === DataType.BOOL ? NetworkDataType.BOOL : NetworkDataType.UINT8,
        shape,
        values: Uint8Array.from(values.value),
      };
      break;
    }
    default:
      return unsupported(`tensor '${name}' has unsupported element type ${DataType[dataType] ?? dataType}`);
  }
  if (weights.values.length !== count) {
    return invalid(`tensor '${name}' of shape [${shape.join(",")}] holds ${weights.values.length} values`);
  }
  return ok(weights);
}

function decodeAttribute(raw: unknown, options: ModelBuildOptions): Result<[string, AttributeValue] | undefined> {
  if (!isRecord(raw)) return invalid("attribute is not an object");
  const name = toText(raw.name);
  const type = enumValue(AttributeType, raw.type) ?? AttributeType.UNDEFINED;
  switch (type) {
    case AttributeType.FLOAT:
      return ok([name, { type: "float", value: toNumber(raw.f) ?? 0 }]);
    case AttributeType.INT:
      return ok([name, { type: "int", value: toNumber(raw.i) ?? 0 }]);
    case AttributeType.STRING:
      return ok([name, { type: "string", value: toText(raw.s) }]);
    case AttributeType.FLOATS:
    case AttributeType.INTS: {
      const values = toNumbers(type === AttributeType.FLOATS ? raw.floats : raw.ints, `attribute '${name}'`);
      if (!values.ok) return values;
      return ok([name, { type: type === AttributeType.FLOATS ? "floats" : "ints", value: values.value }]);
    }
    case AttributeType.STRINGS:
      return ok([name, { type: "strings", value: asArray(raw.strings).map(toText) }]);
    case AttributeType.TENSOR: {
      const tensor = convertOnnxWeights(raw.t, options);
      if (!tensor.ok) return tensor;
      return ok([name, { type: "tensor", value: tensor.value }]);
    }
    case AttributeType.GRAPH: {
      const graph = createGraph(raw.g, options);
      if (!graph.ok) return graph;
      return ok([name, { type: "graph", value: graph.value }]);
    }
    case AttributeType.UNDEFINED:
      return invalid(`attribute '${name}' has no type`);
    default:
      options.logger.verbose(`Ignoring attribute '${name}' of type ${AttributeType[type] ?? type}`);
      return ok(undefined);
  }
}

function decodeValueInfo(raw: unknown): Result<ValueInfo> {
  if (!isRecord(raw)) return invalid("value info is not an object");
  const name = toText(raw.name);
  const tensorType = isRecord(raw.type) && isRecord(raw.type.tensorType) ? raw.type.tensorType : undefined;
  if (tensorType === undefined) return unsupported(`value '${name}' is not a tensor`);
  const elemType = enumValue(DataType, tensorType.elemType) ?? DataType.UNDEFINED;
  const dataType = toNetworkDataType(elemType);
  if (dataType === undefined) {
    return unsupported(`value '${name}' has unsupported element type ${DataType[elemType] ?? elemType}`);
  }
  const shape = isRecord(tensorType.shape)
    ? asArray(tensorType.shape.dim).map((dim) => (isRecord(dim) ? toNumber(dim.dimValue) ?? -1 : -1))
    : undefined;
  return ok({ name, dataType, shape });
}

function decodeNode(raw: unknown, index: number, options: ModelBuildOptions): Result<SourceNode> {
  if (!isRecord(raw)) return invalid(`node ${index} is not an object`);
  const opType = toText(raw.opType);
  if (opType === "") return invalid(`node ${index} has no operator type`);
  const attributes: [string, AttributeValue][] = [];
  for (const attr of asArray(raw.attribute)) {
    const decoded = decodeAttribute(attr, options);
    if (!decoded.ok) return decoded;
    if (decoded.value !== undefined) attributes.push(decoded.value);
  }
  const name = toText(raw.name);
  return ok({
    name: name !== "" ? name : `${opType}_${index}`,
    opType,
    domain: toText(raw.domain),
    inputs: asArray(raw.input).map((input) => {
      const text = toText(input);
      return text !== "" ? text : undefined;
    }),
    outputs: asArray(raw.output).map(toText),
    attributes: new AttributeBag(attributes),
  });
}

export function createGraph(raw: unknown, options: ModelBuildOptions): Result<SourceGraph> {
  if (!isRecord(raw)) return invalid("graph is not an object");
  const nodes: SourceNode[] = [];
  for (const [index, node] of asArray(raw.node).entries()) {
    const decoded = decodeNode(node, index, options);
    if (!decoded.ok) return decoded;
    nodes.push(decoded.value);
  }
  const initializers = new Map<string, Weights>();
  for (const tensor of asArray(raw.initializer)) {
    const weights = convertOnnxWeights(tensor, options);
    if (!weights.ok) return weights;
    initializers.set(isRecord(tensor) ? toText(tensor.name) : "", weights.value);
  }
  const decodeInfos = (list: unknown): Result<ValueInfo[]> => {
    const infos: ValueInfo[] = [];
    for (const entry of asArray(list)) {
      const info = decodeValueInfo(entry);
      if (!info.ok) return info;
      infos.push(info.value);
    }
    return ok(infos);
  };
  // Initializers listed among the inputs are constants, not network inputs.
  const inputs = decodeInfos(asArray(raw.input).filter((i) => !(isRecord(i) && initializers.has(toText(i.name)))));
  if (!inputs.ok) return inputs;
  const outputs = decodeInfos(raw.output);
  if (!outputs.ok) return outputs;
  return ok({ name: toText(raw.name), nodes, initializers, inputs: inputs.value, outputs: outputs.value });
}

export function createModel(document: unknown, options: ModelBuildOptions): Result<SourceModel> {
  if (!isRecord(document)) return fail(ErrorKind.InvalidNode, "model document is not an object");
  let opsetVersion: number | undefined;
  for (const entry of asArray(document.opsetImport)) {
    if (isRecord(entry) && DEFAULT_DOMAINS.includes(toText(entry.domain))) {
      opsetVersion = toNumber(entry.version);
    }
  }
  if (opsetVersion === undefined) {
    options.logger.warn("model declares no default-domain opset; assuming version 1");
  }
  const graph = createGraph(document.graph, options);
  if (!graph.ok) return graph;
  return ok({
    irVersion: toNumber(document.irVersion) ?? 0,
    opsetVersion: opsetVersion ?? 1,
    producerName: toText(document.producerName),
    graph: graph.value,
  });
}
