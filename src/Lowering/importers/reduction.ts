import TensorNode from "../../Network/TensorNode.js";
import { ElementWiseOperation, ReduceOperation, TopKOperation, UnaryOperation } from "../../Network/LayerTypes.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "../errors.js";
import { axesToMask, convertAxis } from "../ShapeUtils.js";
import { flattenTensor, reshapeTensor, squeezeTensor } from "../TensorOps.js";
import { Value } from "../Value.js";
import { ImporterTable, optionalWeights, outputs, rejectInt32, requireTensor } from "./helpers.js";

/**
 * Reduction axes come from the `axes` attribute, or from a constant second
 * input (ReduceSum from opset 13). No axes reduce every dimension.
 */
function reductionAxes(node: SourceNode, inputs: (Value | undefined)[], rank: number): Result<number[]> {
  let axes = node.attributes.getInts("axes");
  if (axes === undefined) {
    const fromInput = optionalWeights(inputs, 1, `${node.opType} axes`);
    if (!fromInput.ok) return fromInput;
    axes = fromInput.value !== undefined ? Array.from(fromInput.value.values) : undefined;
  }
  if (axes === undefined || axes.length === 0) {
    return ok(Array.from({ length: rank }, (_, i) => i));
  }
  const converted: number[] = [];
  for (const axis of axes) {
    const c = convertAxis(axis, rank);
    if (!c.ok) return c;
    converted.push(c.value);
  }
  return ok(converted);
}

function reduceTensor(
  ctx: LoweringContext,
  node: SourceNode,
  inputs: (Value | undefined)[],
  tensor: TensorNode.Class,
  operation: ReduceOperation,
): Result<TensorNode.Class> {
  const axes = reductionAxes(node, inputs, tensor.rank);
  if (!axes.ok) return axes;
  const keepDims = node.attributes.getInt("keepdims", 1) !== 0;
  return ok(ctx.network.addReduce(tensor, operation, axesToMask(axes.value), keepDims));
}

type Stage = (ctx: LoweringContext, tensor: TensorNode.Class) => TensorNode.Class;

const unaryStage =
  (operation: UnaryOperation): Stage =>
  (ctx, tensor) =>
    ctx.network.addUnary(tensor, operation);

const square: Stage = (ctx, tensor) => ctx.network.addElementWise(tensor, tensor, ElementWiseOperation.PROD);

/** A reduction with optional element-wise stages before and after it. */
function reduce(operation: ReduceOperation, before: Stage[] = [], after: Stage[] = []): Importer {
  return (ctx, node, inputs) => {
    const input = requireTensor(ctx, inputs, 0);
    if (!input.ok) return input;
    const staged = before.reduce((t, stage) => stage(ctx, t), input.value);
    const reduced = reduceTensor(ctx, node, inputs, staged, operation);
    if (!reduced.ok) return reduced;
    return outputs(after.reduce((t, stage) => stage(ctx, t), reduced.value));
  };
}

/** ArgMax/ArgMin: the indices of a TopK with k = 1. */
function argMinMax(operation: TopKOperation): Importer {
  return (ctx, node, inputs) => {
    const input = requireTensor(ctx, inputs, 0);
    if (!input.ok) return input;
    const tensor = rejectInt32(input.value, node.opType);
    if (!tensor.ok) return tensor;
    const axis = convertAxis(node.attributes.getInt("axis", 0), tensor.value.rank);
    if (!axis.ok) return axis;
    const { indices } = ctx.network.addTopK(tensor.value, operation, 1, 1 << axis.value);
    if (node.attributes.getInt("keepdims", 1) !== 0) return outputs(indices);
    const squeezed = squeezeTensor(ctx, indices, [axis.value]);
    return squeezed.ok ? outputs(squeezed.value) : squeezed;
  };
}

/** `k` is an attribute before opset 10 and a constant input afterwards. */
function topKCount(ctx: LoweringContext, node: SourceNode, inputs: (Value | undefined)[]): Result<number> {
  if (ctx.opsetVersion < 10) {
    const k = node.attributes.getInt("k");
    return k !== undefined ? ok(k) : invalid("TopK needs k");
  }
  const k = optionalWeights(inputs, 1, "TopK k");
  if (!k.ok) return k;
  if (k.value === undefined) return invalid("TopK needs k");
  if (k.value.values.length !== 1) return unsupported("TopK k must hold a single value");
  return ok(k.value.values[0]);
}

const topK: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = rejectInt32(input.value, "TopK");
  if (!tensor.ok) return tensor;
  const k = topKCount(ctx, node, inputs);
  if (!k.ok) return k;
  if (k.value <= 0) return fail(ErrorKind.InvalidValue, `TopK k must be positive, got ${k.value}`);
  const axis = convertAxis(node.attributes.getInt("axis", -1), tensor.value.rank);
  if (!axis.ok) return axis;
  const size = tensor.value.shape[axis.value];
  if (size !== -1 && k.value > size) {
    return fail(ErrorKind.InvalidValue, `TopK k = ${k.value} exceeds the axis size ${size}`);
  }
  const largest = node.attributes.getInt("largest", 1) !== 0;
  const { values, indices } = ctx.network.addTopK(
    tensor.value,
    largest ? TopKOperation.MAX : TopKOperation.MIN,
    k.value,
    1 << axis.value,
  );
  return outputs(values, indices);
};

/**
 * Before opset 13 the input is coerced to 2-D around `axis` and the softmax
 * runs over the flattened inner dimensions; from opset 13 it runs over `axis`
 * alone.
 */
function softmaxTensor(ctx: LoweringContext, node: SourceNode, tensor: TensorNode.Class): Result<TensorNode.Class> {
  const modern = ctx.opsetVersion >= 13;
  const axis = convertAxis(node.attributes.getInt("axis", modern ? -1 : 1), tensor.rank);
  if (!axis.ok) return axis;
  if (modern || axis.value === tensor.rank - 1) {
    return ok(ctx.network.addSoftMax(tensor, 1 << axis.value));
  }
  const flattened = flattenTensor(ctx, tensor, axis.value);
  if (!flattened.ok) return flattened;
  const softmax = ctx.network.addSoftMax(flattened.value, 1 << 1);
  return reshapeTensor(ctx, softmax, tensor.shape);
}

const softmax: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const result = softmaxTensor(ctx, node, input.value);
  return result.ok ? outputs(result.value) : result;
};

const logSoftmax: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const result = softmaxTensor(ctx, node, input.value);
  if (!result.ok) return result;
  return outputs(ctx.network.addUnary(result.value, UnaryOperation.LOG));
};

export const reductionImporters: ImporterTable = {
  ReduceL1: reduce(ReduceOperation.SUM, [unaryStage(UnaryOperation.ABS)]),
  ReduceL2: reduce(ReduceOperation.SUM, [square], [unaryStage(UnaryOperation.SQRT)]),
  ReduceLogSum: reduce(ReduceOperation.SUM, [], [unaryStage(UnaryOperation.LOG)]),
  ReduceLogSumExp: reduce(ReduceOperation.SUM, [unaryStage(UnaryOperation.EXP)], [unaryStage(UnaryOperation.LOG)]),
  ReduceMax: reduce(ReduceOperation.MAX),
  ReduceMean: reduce(ReduceOperation.AVG),
  ReduceMin: reduce(ReduceOperation.MIN),
  ReduceProd: reduce(ReduceOperation.PROD),
  ReduceSum: reduce(ReduceOperation.SUM),
  ReduceSumSquare: reduce(ReduceOperation.SUM, [square]),
  ArgMax: argMinMax(TopKOperation.MAX),
  ArgMin: argMinMax(TopKOperation.MIN),
  TopK: topK,
  Softmax: softmax,
  LogSoftmax: logSoftmax,
};
