import { NetworkDataType, ResizeMode } from "../../Network/LayerTypes.js";
import { Weights, boolWeights, weightsLike } from "../../Network/Weights.js";
import { DataType, toNetworkDataType } from "../../Onnx/OnnxTypes.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "../errors.js";
import { isDynamic, volume } from "../ShapeUtils.js";
import { Value, tensorValue, weightsValue } from "../Value.js";
import { ImporterTable, optionalWeights, outputWeights, outputs, requireInput, requireTensor } from "./helpers.js";

const cast: Importer = (ctx, node, inputs) => {
  const input = requireInput(inputs, 0);
  if (!input.ok) return input;
  const to = node.attributes.getInt("to");
  if (to === undefined) return invalid("Cast needs a target type");
  const dataType = toNetworkDataType(to);
  if (dataType === undefined) return unsupported(`Cast to ${DataType[to] ?? to}`);
  if (input.value.kind === "weights") {
    const { shape, values } = input.value.weights;
    const converted = dataType === NetworkDataType.BOOL ? Array.from(values, (v) => (v !== 0 ? 1 : 0)) : values;
    return outputWeights(ctx.arena.adopt(weightsLike(dataType, [...shape], converted)));
  }
  if (input.value.tensor.dataType === dataType) return ok([input.value]);
  return outputs(ctx.network.addIdentity(input.value.tensor, dataType));
};

/** Constant value attributes: `value` holds a tensor; from opset 12 also the scalar and list forms. */
function constantWeights(ctx: LoweringContext, node: SourceNode): Result<Weights> {
  const attrs = node.attributes;
  const tensor = attrs.getTensor("value");
  if (tensor !== undefined) return ok(tensor);
  if (attrs.has("sparse_value")) return unsupported("sparse constants");
  const float = attrs.get("value_float");
  if (float?.type === "float") return ok(ctx.arena.createTemp(NetworkDataType.FLOAT, [], [float.value]));
  const int = attrs.getInt("value_int");
  if (int !== undefined) return ok(ctx.arena.createTemp(NetworkDataType.INT32, [], [int]));
  const floats = attrs.getFloats("value_floats");
  if (floats !== undefined) return ok(ctx.arena.createTemp(NetworkDataType.FLOAT, [floats.length], floats));
  const ints = attrs.getInts("value_ints");
  if (ints !== undefined) return ok(ctx.arena.createTemp(NetworkDataType.INT32, [ints.length], ints));
  return invalid("Constant has no value");
}

const constant: Importer = (ctx, node) => {
  const weights = constantWeights(ctx, node);
  return weights.ok ? outputWeights(weights.value) : weights;
};

const constantOfShape: Importer = (ctx, node, inputs) => {
  const shapeInput = requireInput(inputs, 0);
  if (!shapeInput.ok) return shapeInput;
  if (shapeInput.value.kind !== "weights") return unsupported("ConstantOfShape needs a constant shape");
  const shape = Array.from(shapeInput.value.weights.values);
  if (shape.some((d) => d < 0)) return fail(ErrorKind.InvalidValue, `negative dimension in [${shape}]`);
  const fill = node.attributes.getTensor("value");
  if (fill !== undefined && fill.values.length !== 1) return invalid("ConstantOfShape value must hold one element");
  const dataType = fill?.dataType ?? NetworkDataType.FLOAT;
  const value = fill !== undefined ? fill.values[0] : 0;
  return outputWeights(ctx.arena.createTemp(dataType, shape, new Array<number>(volume(shape)).fill(value)));
};

/**
 * Inference-mode dropout is the identity. The optional mask output is an
 * identity below opset 10 and an all-true constant afterwards.
 */
const dropout: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const result: Value[] = [tensorValue(ctx.network.addIdentity(input.value))];
  if (node.outputs.length > 1 && node.outputs[1] !== "") {
    if (ctx.opsetVersion < 10) {
      result.push(tensorValue(ctx.network.addIdentity(input.value)));
    } else if (!isDynamic(input.value.shape)) {
      const shape = [...input.value.shape];
      result.push(weightsValue(ctx.arena.adopt(boolWeights(shape, new Array<number>(volume(shape)).fill(1)))));
    } else {
      return unsupported("Dropout mask of a dynamically shaped input");
    }
  }
  return ok(result);
};

const identity: Importer = (ctx, _node, inputs) => {
  const input = requireInput(inputs, 0);
  if (!input.ok) return input;
  if (input.value.kind === "weights") return ok([input.value]);
  return outputs(ctx.network.addIdentity(input.value.tensor));
};

function resizeMode(node: SourceNode, rank: number): Result<ResizeMode> {
  const mode = node.attributes.getString("mode", "nearest");
  if (mode === "nearest") return ok(ResizeMode.NEAREST);
  if (mode === "linear" || mode === "bilinear") {
    if (rank < 1 || rank > 3) return unsupported(`${node.opType} linear mode needs rank 1 to 3, got ${rank}`);
    return ok(ResizeMode.LINEAR);
  }
  return unsupported(`${node.opType} mode '${mode}'`);
}

function checkScales(node: SourceNode, scales: Weights, rank: number): Result<number[]> {
  if (scales.shape.length !== 1 || scales.values.length !== rank) {
    return unsupported(`${node.opType} needs ${rank} scales, got shape [${scales.shape}]`);
  }
  if (scales.dataType !== NetworkDataType.FLOAT) return invalid(`${node.opType} scales must be FLOAT`);
  return ok(Array.from(scales.values));
}

/**
 * Scales come from input 1 (opset 10) or input 2 (opset 11 on); `sizes` in
 * input 3 turns into scales when the input shape is static.
 */
const resize: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = input.value;
  const mode = resizeMode(node, tensor.rank);
  if (!mode.ok) return mode;
  const scaleIndex = ctx.opsetVersion < 11 ? 1 : 2;
  const scales = optionalWeights(inputs, scaleIndex, "Resize scales");
  if (!scales.ok) return scales;
  if (scales.value !== undefined && scales.value.values.length > 0) {
    const checked = checkScales(node, scales.value, tensor.rank);
    if (!checked.ok) return checked;
    return outputs(ctx.network.addResize(tensor, mode.value, checked.value));
  }
  const sizes = optionalWeights(inputs, 3, "Resize sizes");
  if (!sizes.ok) return sizes;
  if (sizes.value === undefined) return invalid("Resize needs scales or sizes");
  if (sizes.value.values.length !== tensor.rank) {
    return invalid(`Resize needs ${tensor.rank} sizes, got ${sizes.value.values.length}`);
  }
  if (isDynamic(tensor.shape)) return unsupported("Resize by sizes needs a static input shape");
  const target = Array.from(sizes.value.values);
  return outputs(
    ctx.network.addResize(
      tensor,
      mode.value,
      target.map((d, i) => d / tensor.shape[i]),
    ),
  );
};

const upsample: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = input.value;
  const mode = resizeMode(node, tensor.rank);
  if (!mode.ok) return mode;
  let scales: number[];
  if (ctx.opsetVersion < 9) {
    const attr = node.attributes.getFloats("scales");
    if (attr === undefined) return invalid("Upsample needs scales");
    if (attr.length !== tensor.rank) return unsupported(`Upsample needs ${tensor.rank} scales, got ${attr.length}`);
    scales = attr;
  } else {
    const weights = optionalWeights(inputs, 1, "Upsample scales");
    if (!weights.ok) return weights;
    if (weights.value === undefined) return invalid("Upsample needs scales");
    const checked = checkScales(node, weights.value, tensor.rank);
    if (!checked.ok) return checked;
    scales = checked.value;
  }
  return outputs(ctx.network.addResize(tensor, mode.value, scales));
};

export const miscImporters: ImporterTable = {
  Cast: cast,
  Constant: constant,
  ConstantOfShape: constantOfShape,
  Dropout: dropout,
  Identity: identity,
  Resize: resize,
  Upsample: upsample,
};
