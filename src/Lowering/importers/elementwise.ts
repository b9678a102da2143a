import { ElementWiseOperation, NetworkDataType } from "../../Network/LayerTypes.js";
import { Importer } from "../OperatorRegistry.js";
import { combineTensorsElementwise, broadcastTensors } from "../Elementwise.js";
import { invalid, unsupported } from "../errors.js";
import { Value, convertToTensor, shapeOf } from "../Value.js";
import { expandTensor, addConstantScalar } from "../TensorOps.js";
import { ImporterTable, outputs, requireInput, requireTensor } from "./helpers.js";

function definedOperands(inputs: (Value | undefined)[]): Value[] {
  return inputs.filter((v): v is Value => v !== undefined);
}

/** Binary ops that honour the pre-opset-7 broadcast attributes. */
function binary(operation: ElementWiseOperation): Importer {
  return (ctx, node, inputs) => {
    const operands = definedOperands(inputs);
    if (operands.length !== 2) return invalid(`expected 2 operands, got ${operands.length}`);
    const result = combineTensorsElementwise(ctx, operands, operation, {
      legacyBroadcast: true,
      attrs: node.attributes,
    });
    return result.ok ? outputs(result.value) : result;
  };
}

/** Variadic ops (Sum, Max, Min) and modern binary comparisons. */
function variadic(operation: ElementWiseOperation): Importer {
  return (ctx, _node, inputs) => {
    const result = combineTensorsElementwise(ctx, definedOperands(inputs), operation);
    return result.ok ? outputs(result.value) : result;
  };
}

const mean: Importer = (ctx, _node, inputs) => {
  const operands = definedOperands(inputs);
  const sum = combineTensorsElementwise(ctx, operands, ElementWiseOperation.SUM);
  if (!sum.ok) return sum;
  const scale = addConstantScalar(ctx, 1 / operands.length, NetworkDataType.FLOAT, sum.value.shape.map(() => 1));
  return outputs(ctx.network.addElementWise(sum.value, scale, ElementWiseOperation.PROD));
};

/** Slopes are broadcast to the input rank; INT32 inputs are rejected. */
const prelu: Importer = (ctx, _node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  if (input.value.dataType === NetworkDataType.INT32) return unsupported("PRelu does not accept INT32 input");
  const slopes = requireInput(inputs, 1);
  if (!slopes.ok) return slopes;
  if (shapeOf(slopes.value).length > input.value.rank) {
    return invalid("PRelu slopes have a higher rank than the input");
  }
  const expanded = expandTensor(ctx, convertToTensor(ctx.network, slopes.value), input.value.rank);
  if (!expanded.ok) return expanded;
  return outputs(ctx.network.addParametricReLU(input.value, expanded.value));
};

const where: Importer = (ctx, _node, inputs) => {
  const condition = requireInput(inputs, 0);
  const x = requireInput(inputs, 1);
  const y = requireInput(inputs, 2);
  if (!condition.ok) return condition;
  if (!x.ok) return x;
  if (!y.ok) return y;
  const rank = Math.max(...[condition.value, x.value, y.value].map((v) => shapeOf(v).length));
  const branches = broadcastTensors(ctx, x.value, y.value);
  if (!branches.ok) return branches;
  const cond = expandTensor(ctx, convertToTensor(ctx.network, condition.value), rank);
  if (!cond.ok) return cond;
  const [then, otherwise] = branches.value;
  const thenExpanded = expandTensor(ctx, then, rank);
  if (!thenExpanded.ok) return thenExpanded;
  const otherwiseExpanded = expandTensor(ctx, otherwise, rank);
  if (!otherwiseExpanded.ok) return otherwiseExpanded;
  if (cond.value.dataType !== NetworkDataType.BOOL) return invalid("Where condition must be BOOL");
  return outputs(ctx.network.addSelect(cond.value, thenExpanded.value, otherwiseExpanded.value));
};

export const elementwiseImporters: ImporterTable = {
  Add: binary(ElementWiseOperation.SUM),
  Sub: binary(ElementWiseOperation.SUB),
  Mul: binary(ElementWiseOperation.PROD),
  Div: binary(ElementWiseOperation.DIV),
  Pow: binary(ElementWiseOperation.POW),
  Equal: variadic(ElementWiseOperation.EQUAL),
  Greater: variadic(ElementWiseOperation.GREATER),
  Less: variadic(ElementWiseOperation.LESS),
  Max: variadic(ElementWiseOperation.MAX),
  Min: variadic(ElementWiseOperation.MIN),
  Sum: variadic(ElementWiseOperation.SUM),
  Mean: mean,
  PRelu: prelu,
  Where: where,
};
