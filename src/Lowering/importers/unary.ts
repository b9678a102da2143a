import { ActivationType, UnaryOperation } from "../../Network/LayerTypes.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { Result, ok, unsupported } from "../errors.js";
import { Value } from "../Value.js";
import { ImporterTable, optionalWeights, outputs, requireTensor } from "./helpers.js";

const FLOAT_MAX = 3.4028234663852886e38;

/** ONNX default alpha/beta of each activation. */
export function activationDefaults(type: ActivationType): { alpha: number; beta: number } {
  switch (type) {
    case ActivationType.LEAKY_RELU:
      return { alpha: 0.01, beta: 0 };
    case ActivationType.ELU:
      return { alpha: 1, beta: 0 };
    case ActivationType.SELU:
      return { alpha: 1.67326319, beta: 1.05070102 };
    case ActivationType.HARD_SIGMOID:
      return { alpha: 0.2, beta: 0.5 };
    case ActivationType.SCALED_TANH:
      return { alpha: 1, beta: 1 };
    case ActivationType.THRESHOLDED_RELU:
      return { alpha: 1, beta: 0 };
    case ActivationType.SOFTPLUS:
      return { alpha: 1, beta: 1 };
    case ActivationType.AFFINE:
      return { alpha: 1, beta: 0 };
    default:
      return { alpha: 0, beta: 0 };
  }
}

/** Activation functions recurrent operators accept by name. */
export const NAMED_ACTIVATIONS: Record<string, ActivationType> = {
  Relu: ActivationType.RELU,
  Tanh: ActivationType.TANH,
  Sigmoid: ActivationType.SIGMOID,
  LeakyRelu: ActivationType.LEAKY_RELU,
  ThresholdedRelu: ActivationType.THRESHOLDED_RELU,
  ScaledTanh: ActivationType.SCALED_TANH,
  HardSigmoid: ActivationType.HARD_SIGMOID,
  Elu: ActivationType.ELU,
  Softsign: ActivationType.SOFTSIGN,
  Softplus: ActivationType.SOFTPLUS,
  Affine: ActivationType.AFFINE,
};

function unary(operation: UnaryOperation): Importer {
  return (ctx, _node, inputs) => {
    const tensor = requireTensor(ctx, inputs, 0);
    if (!tensor.ok) return tensor;
    return outputs(ctx.network.addUnary(tensor.value, operation));
  };
}

function activation(type: ActivationType, alphaName?: string, betaName?: string): Importer {
  return (ctx, node, inputs) => {
    const tensor = requireTensor(ctx, inputs, 0);
    if (!tensor.ok) return tensor;
    const defaults = activationDefaults(type);
    const alpha = alphaName !== undefined ? node.attributes.getFloat(alphaName, defaults.alpha) : defaults.alpha;
    const beta = betaName !== undefined ? node.attributes.getFloat(betaName, defaults.beta) : defaults.beta;
    return outputs(ctx.network.addActivation(tensor.value, type, alpha, beta));
  };
}

function clipBound(ctx: LoweringContext, node: SourceNode, inputs: (Value | undefined)[], index: number, name: string, fallback: number): Result<number> {
  if (ctx.opsetVersion < 11) return ok(node.attributes.getFloat(name, fallback));
  const bound = optionalWeights(inputs, index, `Clip ${name}`);
  if (!bound.ok) return bound;
  if (bound.value === undefined) return ok(fallback);
  if (bound.value.values.length !== 1) return unsupported(`Clip ${name} must be a scalar`);
  return ok(bound.value.values[0]);
}

const clip: Importer = (ctx, node, inputs) => {
  const tensor = requireTensor(ctx, inputs, 0);
  if (!tensor.ok) return tensor;
  const min = clipBound(ctx, node, inputs, 1, "min", -FLOAT_MAX);
  if (!min.ok) return min;
  const max = clipBound(ctx, node, inputs, 2, "max", FLOAT_MAX);
  if (!max.ok) return max;
  return outputs(ctx.network.addActivation(tensor.value, ActivationType.CLIP, min.value, max.value));
};

export const unaryImporters: ImporterTable = {
  Abs: unary(UnaryOperation.ABS),
  Acos: unary(UnaryOperation.ACOS),
  Acosh: unary(UnaryOperation.ACOSH),
  Asin: unary(UnaryOperation.ASIN),
  Asinh: unary(UnaryOperation.ASINH),
  Atan: unary(UnaryOperation.ATAN),
  Atanh: unary(UnaryOperation.ATANH),
  Ceil: unary(UnaryOperation.CEIL),
  Cos: unary(UnaryOperation.COS),
  Cosh: unary(UnaryOperation.COSH),
  Erf: unary(UnaryOperation.ERF),
  Exp: unary(UnaryOperation.EXP),
  Floor: unary(UnaryOperation.FLOOR),
  Log: unary(UnaryOperation.LOG),
  Neg: unary(UnaryOperation.NEG),
  Not: unary(UnaryOperation.NOT),
  Reciprocal: unary(UnaryOperation.RECIP),
  Sin: unary(UnaryOperation.SIN),
  Sinh: unary(UnaryOperation.SINH),
  Sqrt: unary(UnaryOperation.SQRT),
  Tan: unary(UnaryOperation.TAN),
};

export const activationImporters: ImporterTable = {
  Relu: activation(ActivationType.RELU),
  Sigmoid: activation(ActivationType.SIGMOID),
  Tanh: activation(ActivationType.TANH),
  Softsign: activation(ActivationType.SOFTSIGN),
  Softplus: activation(ActivationType.SOFTPLUS),
  ParametricSoftplus: activation(ActivationType.SOFTPLUS, "alpha", "beta"),
  Elu: activation(ActivationType.ELU, "alpha"),
  LeakyRelu: activation(ActivationType.LEAKY_RELU, "alpha"),
  Selu: activation(ActivationType.SELU, "alpha", "gamma"),
  HardSigmoid: activation(ActivationType.HARD_SIGMOID, "alpha", "beta"),
  ScaledTanh: activation(ActivationType.SCALED_TANH, "alpha", "beta"),
  ThresholdedRelu: activation(ActivationType.THRESHOLDED_RELU, "alpha"),
  Clip: clip,
};
