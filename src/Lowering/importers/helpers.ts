import TensorNode from "../../Network/TensorNode.js";
import { NetworkDataType } from "../../Network/LayerTypes.js";
import { Weights } from "../../Network/Weights.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { Result, invalid, ok, unsupported } from "../errors.js";
import { Value, convertToTensor, tensorValue, weightsValue } from "../Value.js";

export type ImporterTable = Record<string, Importer>;

export function present(inputs: (Value | undefined)[], index: number): Value | undefined {
  return index < inputs.length ? inputs[index] : undefined;
}

export function requireInput(inputs: (Value | undefined)[], index: number): Result<Value> {
  const value = present(inputs, index);
  return value !== undefined ? ok(value) : invalid(`input ${index} is required`);
}

export function requireTensor(ctx: LoweringContext, inputs: (Value | undefined)[], index: number): Result<TensorNode.Class> {
  const value = requireInput(inputs, index);
  if (!value.ok) return value;
  return ok(convertToTensor(ctx.network, value.value));
}

export function requireWeights(inputs: (Value | undefined)[], index: number, what: string): Result<Weights> {
  const value = requireInput(inputs, index);
  if (!value.ok) return value;
  if (value.value.kind !== "weights") return unsupported(`${what} must be a constant`);
  return ok(value.value.weights);
}

export function optionalWeights(inputs: (Value | undefined)[], index: number, what: string): Result<Weights | undefined> {
  const value = present(inputs, index);
  if (value === undefined) return ok(undefined);
  if (value.kind !== "weights") return unsupported(`${what} must be a constant`);
  return ok(value.weights);
}

export function rejectInt32(tensor: TensorNode.Class, what: string): Result<TensorNode.Class> {
  if (tensor.dataType === NetworkDataType.INT32) return unsupported(`${what} does not accept INT32 input`);
  return ok(tensor);
}

export function outputs(...tensors: TensorNode.Class[]): Result<Value[]> {
  return ok(tensors.map(tensorValue));
}

export function outputWeights(weights: Weights): Result<Value[]> {
  return ok([weightsValue(weights)]);
}

export function floatValues(weights: Weights): number[] {
  return Array.from(weights.values);
}
