import TensorNode from "../../Network/TensorNode.js";
import { ElementWiseOperation, MatrixOperation, NetworkDataType } from "../../Network/LayerTypes.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { Result, invalid } from "../errors.js";
import { broadcastTensors } from "../Elementwise.js";
import { squeezeLeadingDims, squeezeTrailingDims, transposeWeights } from "../ShapeUtils.js";
import { addConstantScalar, expandTensor, flattenTensor, reshapeTensor } from "../TensorOps.js";
import { Value, convertToTensor, shapeOf } from "../Value.js";
import { ImporterTable, outputs, present, requireInput } from "./helpers.js";

function matrixOp(tensor: TensorNode.Class, transpose: boolean): MatrixOperation {
  if (tensor.rank === 1) return MatrixOperation.VECTOR;
  return transpose ? MatrixOperation.TRANSPOSE : MatrixOperation.NONE;
}

function scaleBy(ctx: LoweringContext, tensor: TensorNode.Class, factor: number): TensorNode.Class {
  if (factor === 1) return tensor;
  const constant = addConstantScalar(ctx, factor, NetworkDataType.FLOAT, tensor.shape.map(() => 1));
  return ctx.network.addElementWise(constant, tensor, ElementWiseOperation.PROD);
}

/**
 * Gemm computes `alpha * op(A) * op(B) + beta * C`. A rank-3 tensor A with a
 * rank-2 constant B and a rank-1 constant C at unit scales maps onto one
 * FullyConnected layer.
 */
const gemm: Importer = (ctx, node, inputs) => {
  const attrs = node.attributes;
  const alpha = attrs.getFloat("alpha", 1);
  const beta = attrs.getFloat("beta", 1);
  const transA = attrs.getInt("transA", 0) !== 0;
  let transB = attrs.getInt("transB", 0) !== 0;
  const a = requireInput(inputs, 0);
  if (!a.ok) return a;
  const b = requireInput(inputs, 1);
  if (!b.ok) return b;
  const c = present(inputs, 2);

  if (
    a.value.kind === "tensor" &&
    a.value.tensor.rank === 3 &&
    !transA &&
    b.value.kind === "weights" &&
    b.value.weights.shape.length === 2 &&
    c?.kind === "weights" &&
    c.weights.shape.length === 1 &&
    alpha === 1 &&
    beta === 1
  ) {
    ctx.logger.verbose("Gemm: all operands qualify for a fully connected layer");
    // The FC kernel is laid out [outputs, K].
    const kernel = transB ? b.value.weights : ctx.arena.adopt(transposeWeights(b.value.weights, [1, 0]));
    return outputs(ctx.network.addFullyConnected(a.value.tensor, c.weights.shape[0], kernel, c.weights));
  }

  let inputB: TensorNode.Class;
  if (b.value.kind === "weights") {
    let weights = b.value.weights;
    if (transB && weights.shape.length === 2) {
      weights = ctx.arena.adopt(transposeWeights(weights, [1, 0]));
      transB = false;
    }
    inputB = ctx.network.addConstant(weights);
  } else {
    inputB = b.value.tensor;
  }

  let inputA = convertToTensor(ctx.network, a.value);
  const squeezed = [...inputA.shape.slice(0, 2), ...squeezeTrailingDims(inputA.shape.slice(2))];
  if (squeezed.length < inputA.rank) {
    const reshaped = reshapeTensor(ctx, inputA, squeezed);
    if (!reshaped.ok) return reshaped;
    inputA = reshaped.value;
  }
  if (inputA.rank > 2) {
    const flattened = flattenTensor(ctx, inputA, 1);
    if (!flattened.ok) return flattened;
    inputA = flattened.value;
  }

  const opA = matrixOp(inputA, transA);
  const opB = matrixOp(inputB, transB);
  ctx.logger.verbose(`Gemm: A [${inputA.shape}] ${opA}, B [${inputB.shape}] ${opB}`);
  const product = scaleBy(ctx, ctx.network.addMatrixMultiply(inputA, opA, inputB, opB), alpha);
  if (c === undefined) return outputs(product);

  let bias = scaleBy(ctx, convertToTensor(ctx.network, c), beta);
  // Before opset 7 C may carry leading unit dims beyond the product's rank.
  if (ctx.opsetVersion < 7 && attrs.getInt("broadcast", 0) === 0) {
    const reshaped = reshapeTensor(ctx, bias, squeezeLeadingDims(bias.shape));
    if (!reshaped.ok) return reshaped;
    bias = reshaped.value;
  }
  if (bias.rank > product.rank) {
    return invalid(`Gemm bias [${bias.shape}] has a higher rank than the product [${product.shape}]`);
  }
  const operands = broadcastTensors(ctx, { kind: "tensor", tensor: product }, { kind: "tensor", tensor: bias });
  if (!operands.ok) return operands;
  return outputs(ctx.network.addElementWise(operands.value[0], operands.value[1], ElementWiseOperation.SUM));
};

/** Batch dimensions are broadcast; a rank-1 operand multiplies as a vector. */
function matmulOperand(ctx: LoweringContext, value: Value, batchRank: number): Result<TensorNode.Class> {
  const tensor = convertToTensor(ctx.network, value);
  const own = tensor.rank === 1 ? 1 : 2;
  return expandTensor(ctx, tensor, batchRank + own);
}

const matmul: Importer = (ctx, _node, inputs) => {
  const a = requireInput(inputs, 0);
  if (!a.ok) return a;
  const b = requireInput(inputs, 1);
  if (!b.ok) return b;
  const batchOf = (shape: number[]): number => Math.max(shape.length - (shape.length === 1 ? 1 : 2), 0);
  const batchRank = Math.max(batchOf(shapeOf(a.value)), batchOf(shapeOf(b.value)));
  const lhs = matmulOperand(ctx, a.value, batchRank);
  if (!lhs.ok) return lhs;
  const rhs = matmulOperand(ctx, b.value, batchRank);
  if (!rhs.ok) return rhs;
  const opA = shapeOf(a.value).length === 1 ? MatrixOperation.VECTOR : MatrixOperation.NONE;
  const opB = shapeOf(b.value).length === 1 ? MatrixOperation.VECTOR : MatrixOperation.NONE;
  return outputs(ctx.network.addMatrixMultiply(lhs.value, opA, rhs.value, opB));
};

export const matrixImporters: ImporterTable = {
  Gemm: gemm,
  MatMul: matmul,
};
