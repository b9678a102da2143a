import TensorNode from "../Network/TensorNode.js";
import { ElementWiseOperation } from "../Network/LayerTypes.js";
import { AttributeBag } from "../Onnx/AttributeBag.js";
import { LoweringContext } from "./LoweringContext.js";
import { Result, invalid, ok, unsupported } from "./errors.js";
import { Value, convertToTensor, shapeOf, tensorValue, weightsValue } from "./Value.js";
import { expandTensor } from "./TensorOps.js";
import { reshapeWeights } from "./ShapeUtils.js";

/**
 * Shape the right operand takes under pre-opset-7 broadcasting: `axis`
 * leading ones, its own dims, then trailing ones up to the left rank.
 */
export function legacyBroadcastShape(leftRank: number, right: readonly number[], axis: number): Result<number[]> {
  const trailing = leftRank - right.length - axis;
  if (axis < 0 || trailing < 0) {
    return invalid(`legacy broadcast of rank ${right.length} at axis ${axis} does not fit rank ${leftRank}`);
  }
  return ok([...new Array<number>(axis).fill(1), ...right, ...new Array<number>(trailing).fill(1)]);
}

function applyLegacyBroadcast(
  ctx: LoweringContext,
  attrs: AttributeBag,
  left: Value,
  right: Value,
): Result<Value> {
  const leftShape = shapeOf(left);
  const leftRank = leftShape.length;
  const rightShape = shapeOf(right);
  if (attrs.getInt("broadcast", 0) === 0) {
    const same = leftRank === rightShape.length && leftShape.every((d, i) => d === rightShape[i]);
    return same ? ok(right) : unsupported("operands of different shapes need broadcast=1 before opset 7");
  }
  if (rightShape.length >= leftRank) return ok(right);
  let axis = attrs.getInt("axis", leftRank - rightShape.length);
  if (axis < 0) axis += leftRank;
  const shape = legacyBroadcastShape(leftRank, rightShape, axis);
  if (!shape.ok) return shape;
  if (right.kind === "weights") return ok(weightsValue(reshapeWeights(right.weights, shape.value)));
  return ok(tensorValue(ctx.network.addShuffle(right.tensor, { reshape: shape.value })));
}

export interface CombineOptions {
  /** Honour the pre-opset-7 `broadcast`/`axis` attributes. */
  legacyBroadcast?: boolean;
  attrs?: AttributeBag;
}

/**
 * Folds `operation` left to right over the operands. Lower-rank operands get
 * leading size-1 dimensions; a single operand passes through an identity.
 */
export function combineTensorsElementwise(
  ctx: LoweringContext,
  operands: Value[],
  operation: ElementWiseOperation,
  options: CombineOptions = {},
): Result<TensorNode.Class> {
  if (operands.length === 0) return invalid("element-wise operation without operands");
  let values = operands;
  if (options.legacyBroadcast && options.attrs !== undefined && ctx.opsetVersion < 7) {
    if (operands.length !== 2) return invalid("legacy broadcasting takes exactly two operands");
    const right = applyLegacyBroadcast(ctx, options.attrs, operands[0], operands[1]);
    if (!right.ok) return right;
    values = [operands[0], right.value];
  }

  const maxRank = Math.max(...values.map((v) => shapeOf(v).length));
  const tensors: TensorNode.Class[] = [];
  for (const value of values) {
    const expanded = expandTensor(ctx, convertToTensor(ctx.network, value), maxRank);
    if (!expanded.ok) return expanded;
    tensors.push(expanded.value);
  }

  if (tensors.length === 1) {
    return ok(ctx.network.addIdentity(tensors[0]));
  }
  let combined = tensors[0];
  for (const next of tensors.slice(1)) {
    if (combined.rank !== maxRank || next.rank !== maxRank) {
      return unsupported(`element-wise operands of rank ${combined.rank} and ${next.rank}, expected ${maxRank}`);
    }
    const clash = combined.shape.findIndex((d, i) => d !== next.shape[i] && d > 1 && next.shape[i] > 1);
    if (clash >= 0) {
      return invalid(`cannot broadcast [${combined.shape}] with [${next.shape}] on axis ${clash}`);
    }
    combined = ctx.network.addElementWise(combined, next, operation);
  }
  return ok(combined);
}

/** Broadcasts two values to a common rank and returns them as tensors. */
export function broadcastTensors(ctx: LoweringContext, a: Value, b: Value): Result<[TensorNode.Class, TensorNode.Class]> {
  const rank = Math.max(shapeOf(a).length, shapeOf(b).length);
  const left = expandTensor(ctx, convertToTensor(ctx.network, a), rank);
  if (!left.ok) return left;
  const right = expandTensor(ctx, convertToTensor(ctx.network, b), rank);
  if (!right.ok) return right;
  return ok([left.value, right.value]);
}
