import TensorNode from "../../Network/TensorNode.js";
import { Recurrence } from "../../Network/NetworkBuilder.js";
import { ElementWiseOperation, LoopOutputKind, NetworkDataType, TripLimit } from "../../Network/LayerTypes.js";
import { SourceGraph, SourceNode } from "../../Onnx/OnnxModel.js";
import { lowerGraphNodes } from "../GraphWalker.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { Result, invalid, ok, unsupported } from "../errors.js";
import { convertAxis } from "../ShapeUtils.js";
import { addConstantScalar, getAxisLength, reshapeTensor } from "../TensorOps.js";
import { Value, convertToTensor, tensorValue, weightsValue } from "../Value.js";
import { outputs, present } from "../importers/helpers.js";
import { LoopBuilder } from "./LoopBuilder.js";

function bodyGraph(node: SourceNode): Result<SourceGraph> {
  const body = node.attributes.getGraph("body");
  return body !== undefined ? ok(body) : invalid(`${node.opType} needs a body graph`);
}

/** A child context with the body's initializers bound. */
function bodyContext(ctx: LoweringContext, body: SourceGraph): LoweringContext {
  const child = ctx.childContext();
  for (const [name, weights] of body.initializers) {
    child.scope.set(name, weightsValue(weights));
  }
  return child;
}

function bind(ctx: LoweringContext, name: string | undefined, tensor: TensorNode.Class): void {
  if (name !== undefined && name !== "") ctx.scope.set(name, tensorValue(tensor));
}

function bodyOutput(ctx: LoweringContext, body: SourceGraph, index: number): Result<TensorNode.Class> {
  const name = body.outputs[index]?.name;
  const value = name !== undefined ? ctx.scope.get(name) : undefined;
  if (value === undefined) return invalid(`body output ${index} of graph '${body.name}' is never produced`);
  return ok(convertToTensor(ctx.network, value));
}

/** A scalar of the given element type, reshaped from `[1]` when needed. */
function scalar(ctx: LoweringContext, value: Value, dataType: NetworkDataType, what: string): Result<TensorNode.Class> {
  const tensor = convertToTensor(ctx.network, value);
  if (tensor.dataType !== dataType) return invalid(`${what} must be ${dataType}, got ${tensor.dataType}`);
  if (tensor.rank === 0) return ok(tensor);
  if (tensor.rank === 1 && tensor.shape[0] === 1) return reshapeTensor(ctx, tensor, []);
  return invalid(`${what} must be a scalar, got [${tensor.shape}]`);
}

/**
 * Loop with inputs (M, cond, v...) and a body taking (iteration, cond, v...)
 * and returning (cond, v..., scan...).
 *
 * The iteration number and the condition are recurrences of their own; the
 * condition feeds a WHILE trip limit. Without M the scan outputs get a
 * fixed length and must not be consumed outside the loop.
 */
export const loopImporter: Importer = (ctx, node, inputs) => {
  const body = bodyGraph(node);
  if (!body.ok) return body;
  const graph = body.value;
  const stateCount = Math.max(node.inputs.length - 2, 0);
  if (graph.inputs.length !== stateCount + 2) {
    return invalid(`Loop body takes ${graph.inputs.length} inputs, expected ${stateCount + 2}`);
  }
  const scanCount = graph.outputs.length - 1 - stateCount;
  if (scanCount < 0 || node.outputs.length !== stateCount + scanCount) {
    return invalid(`Loop body returns ${graph.outputs.length} values for ${node.outputs.length} node outputs`);
  }

  const bodyCtx = bodyContext(ctx, graph);
  const loop = new LoopBuilder(ctx.network);

  let length: TensorNode.Class;
  const tripCount = present(inputs, 0);
  if (tripCount !== undefined) {
    const count = scalar(ctx, tripCount, NetworkDataType.INT32, "Loop trip count");
    if (!count.ok) return count;
    loop.addTripLimit(count.value, TripLimit.COUNT);
    length = count.value;
  } else {
    length = addConstantScalar(ctx, ctx.maxScanOutputLength, NetworkDataType.INT32);
    if (scanCount > 0) {
      ctx.logger.warn(
        `Loop '${node.name}' has no trip count; scan outputs ${node.outputs.slice(stateCount).join(", ")}`,
        `are sized for ${ctx.maxScanOutputLength} iterations and must not be used outside the loop`,
      );
    }
  }

  const iteration = loop.addRecurrence(addConstantScalar(ctx, 0, NetworkDataType.INT32));
  bind(bodyCtx, graph.inputs[0].name, iteration.output);

  let condition: Recurrence | undefined;
  const initialCondition = present(inputs, 1);
  if (initialCondition !== undefined) {
    const cond = scalar(ctx, initialCondition, NetworkDataType.BOOL, "Loop condition");
    if (!cond.ok) return cond;
    condition = loop.addRecurrence(cond.value);
    loop.addTripLimit(condition.output, TripLimit.WHILE);
    bind(bodyCtx, graph.inputs[1].name, condition.output);
  } else {
    bind(bodyCtx, graph.inputs[1].name, ctx.network.addConstant(ctx.arena.createTemp(NetworkDataType.BOOL, [], [1])));
    if (tripCount === undefined) {
      ctx.logger.warn(`Loop '${node.name}' has neither a trip count nor a condition; it stops after ${ctx.maxScanOutputLength} iterations`);
      loop.addTripLimit(length, TripLimit.COUNT);
    }
  }

  const states: Recurrence[] = [];
  for (let i = 0; i < stateCount; i++) {
    const initial = present(inputs, i + 2);
    if (initial === undefined) return invalid(`Loop state input ${i} is missing`);
    const recurrence = loop.addRecurrence(convertToTensor(ctx.network, initial));
    states.push(recurrence);
    bind(bodyCtx, graph.inputs[i + 2].name, recurrence.output);
  }
  loop.beginBody();

  const lowered = lowerGraphNodes(bodyCtx, graph);
  if (!lowered.ok) return lowered;

  const one = addConstantScalar(ctx, 1, NetworkDataType.INT32);
  loop.setNext(iteration, ctx.network.addElementWise(iteration.output, one, ElementWiseOperation.SUM));
  if (condition !== undefined) {
    const next = bodyOutput(bodyCtx, graph, 0);
    if (!next.ok) return next;
    loop.setNext(condition, next.value);
  }

  const results: TensorNode.Class[] = [];
  for (const [i, state] of states.entries()) {
    const next = bodyOutput(bodyCtx, graph, i + 1);
    if (!next.ok) return next;
    loop.setNext(state, next.value);
    results.push(loop.addOutput(next.value, LoopOutputKind.LAST_VALUE));
  }
  for (let i = 0; i < scanCount; i++) {
    const value = bodyOutput(bodyCtx, graph, 1 + stateCount + i);
    if (!value.ok) return value;
    results.push(loop.addOutput(value.value, LoopOutputKind.CONCATENATE, 0, length));
  }
  loop.finalize();
  return outputs(...results);
};

function intsOrZeros(node: SourceNode, name: string, count: number): number[] {
  return node.attributes.getInts(name, new Array<number>(count).fill(0));
}

/**
 * Scan (opset 9 on): the first inputs are state variables, the last
 * `num_scan_inputs` are iterated along their scan axes. Every scan input has
 * the same length; the last one sets the trip count.
 */
export const scanImporter: Importer = (ctx, node, inputs) => {
  if (ctx.opsetVersion < 9) return unsupported("Scan before opset 9 (batched form)");
  const body = bodyGraph(node);
  if (!body.ok) return body;
  const graph = body.value;
  const scanInputs = node.attributes.getInt("num_scan_inputs");
  if (scanInputs === undefined || scanInputs < 1) return invalid("Scan needs num_scan_inputs >= 1");
  const stateCount = node.inputs.length - scanInputs;
  const scanOutputs = node.outputs.length - stateCount;
  if (stateCount < 0 || scanOutputs < 0) return invalid("Scan inputs and outputs do not match num_scan_inputs");
  if (graph.inputs.length !== node.inputs.length || graph.outputs.length !== node.outputs.length) {
    return invalid(`Scan body signature does not match the node`);
  }

  const inputAxes = intsOrZeros(node, "scan_input_axes", scanInputs);
  const inputDirections = intsOrZeros(node, "scan_input_directions", scanInputs);
  const outputAxes = intsOrZeros(node, "scan_output_axes", scanOutputs);
  const outputDirections = intsOrZeros(node, "scan_output_directions", scanOutputs);
  if (inputAxes.length !== scanInputs || inputDirections.length !== scanInputs) {
    return invalid(`Scan needs ${scanInputs} scan input axes and directions`);
  }
  if (outputAxes.length !== scanOutputs || outputDirections.length !== scanOutputs) {
    return invalid(`Scan needs ${scanOutputs} scan output axes and directions`);
  }

  const sequences: { tensor: TensorNode.Class; axis: number }[] = [];
  for (let i = 0; i < scanInputs; i++) {
    const value = present(inputs, stateCount + i);
    if (value === undefined) return invalid(`Scan input ${i} is missing`);
    const tensor = convertToTensor(ctx.network, value);
    const axis = convertAxis(inputAxes[i], tensor.rank);
    if (!axis.ok) return axis;
    sequences.push({ tensor, axis: axis.value });
  }

  const bodyCtx = bodyContext(ctx, graph);
  const loop = new LoopBuilder(ctx.network);
  const last = sequences[sequences.length - 1];
  const length = getAxisLength(ctx, last.tensor, last.axis);
  loop.addTripLimit(length, TripLimit.COUNT);

  const states: Recurrence[] = [];
  for (let i = 0; i < stateCount; i++) {
    const initial = present(inputs, i);
    if (initial === undefined) return invalid(`Scan state input ${i} is missing`);
    const recurrence = loop.addRecurrence(convertToTensor(ctx.network, initial));
    states.push(recurrence);
    bind(bodyCtx, graph.inputs[i].name, recurrence.output);
  }
  for (const [i, sequence] of sequences.entries()) {
    const step = loop.addIterator(sequence.tensor, sequence.axis, inputDirections[i] === 1);
    bind(bodyCtx, graph.inputs[stateCount + i].name, step);
  }
  loop.beginBody();

  const lowered = lowerGraphNodes(bodyCtx, graph);
  if (!lowered.ok) return lowered;

  const results: TensorNode.Class[] = [];
  for (const [i, state] of states.entries()) {
    const next = bodyOutput(bodyCtx, graph, i);
    if (!next.ok) return next;
    loop.setNext(state, next.value);
    results.push(loop.addOutput(next.value, LoopOutputKind.LAST_VALUE));
  }
  for (let i = 0; i < scanOutputs; i++) {
    const value = bodyOutput(bodyCtx, graph, stateCount + i);
    if (!value.ok) return value;
    // The scan axis counts in the output, which has one more dimension.
    const axis = convertAxis(outputAxes[i], value.value.rank + 1);
    if (!axis.ok) return axis;
    const kind = outputDirections[i] === 1 ? LoopOutputKind.REVERSE : LoopOutputKind.CONCATENATE;
    ctx.logger.verbose(`Scan output ${node.outputs[stateCount + i]}: ${kind} on axis ${axis.value}`);
    results.push(loop.addOutput(value.value, kind, axis.value, length));
  }
  loop.finalize();
  return outputs(...results);
};
