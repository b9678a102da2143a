import TensorNode from "../../Network/TensorNode.js";
import { ElementWiseOperation, LoopOutputKind, MatrixOperation, ReduceOperation, TripLimit } from "../../Network/LayerTypes.js";
import { Importer } from "../OperatorRegistry.js";
import { invalid, unsupported } from "../errors.js";
import { getAxisLength, reshapeTensor } from "../TensorOps.js";
import { outputs, present, requireTensor } from "../importers/helpers.js";
import { LoopBuilder } from "./LoopBuilder.js";
import {
  activate,
  checkSequence,
  initialState,
  iterationInput,
  parseRnnAttributes,
  sequenceOutput,
  sliceState,
  stateDims,
} from "./RnnCommon.js";

const NUM_GATES = 4;

export const LSTM_DEFAULT_ACTIVATIONS = ["Sigmoid", "Tanh", "Tanh"];

/**
 * LSTM with gates ordered i, o, f, c and the input and recurrence biases
 * summed once outside the loop:
 *
 *   C(t) = f(t)·C(t-1) + i(t)·c(t)
 *   H(t) = o(t)·h(C(t))
 *
 * Outputs Y, Y_h and Y_c.
 */
export const lstm: Importer = (ctx, node, inputs) => {
  const config = parseRnnAttributes(node, LSTM_DEFAULT_ACTIVATIONS);
  if (!config.ok) return config;
  if (node.attributes.getInt("input_forget", 0) !== 0) return unsupported("LSTM coupled input and forget gates");
  if (present(inputs, 7) !== undefined) return unsupported("LSTM peephole connections");
  const { numDirections: D, hiddenSize: H } = config.value;
  const [f, g, h] = config.value.activations;

  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const sequence = checkSequence(node, input.value);
  if (!sequence.ok) return sequence;
  const x = sequence.value;
  const weights = requireTensor(ctx, inputs, 1);
  if (!weights.ok) return weights;
  const recurrenceWeights = requireTensor(ctx, inputs, 2);
  if (!recurrenceWeights.ok) return recurrenceWeights;
  if (present(inputs, 4) !== undefined) ctx.logger.verbose("LSTM: sequence_lens is ignored");

  // [Wb, Rb] per direction, summed into one [D, 1, 4H] row.
  let combinedBias: TensorNode.Class | undefined;
  if (present(inputs, 3) !== undefined) {
    const raw = requireTensor(ctx, inputs, 3);
    if (!raw.ok) return raw;
    if (raw.value.rank !== 2) return invalid(`LSTM bias must be [${D}, ${2 * NUM_GATES * H}], got [${raw.value.shape}]`);
    const pairs = reshapeTensor(ctx, raw.value, [D, 2, NUM_GATES * H]);
    if (!pairs.ok) return pairs;
    combinedBias = ctx.network.addReduce(pairs.value, ReduceOperation.SUM, 0b010, true);
    ctx.logger.verbose(`LSTM: combined bias [${combinedBias.shape}]`);
  }

  const state = stateDims(ctx, x, D, H);
  const initialHidden = initialState(ctx, inputs, 5, state);
  const initialCell = initialState(ctx, inputs, 6, state);

  const loop = new LoopBuilder(ctx.network);
  loop.addTripLimit(getAxisLength(ctx, x, 0), TripLimit.COUNT);
  const xt = iterationInput(ctx, loop, x, config.value.direction);
  const hidden = loop.addRecurrence(initialHidden);
  const cell = loop.addRecurrence(initialCell);
  loop.beginBody();

  const net = ctx.network;
  const sum = (a: TensorNode.Class, b: TensorNode.Class): TensorNode.Class => net.addElementWise(a, b, ElementWiseOperation.SUM);
  const prod = (a: TensorNode.Class, b: TensorNode.Class): TensorNode.Class => net.addElementWise(a, b, ElementWiseOperation.PROD);

  let gates = sum(
    net.addMatrixMultiply(xt, MatrixOperation.NONE, weights.value, MatrixOperation.TRANSPOSE),
    net.addMatrixMultiply(hidden.output, MatrixOperation.NONE, recurrenceWeights.value, MatrixOperation.TRANSPOSE),
  );
  if (combinedBias !== undefined) gates = sum(gates, combinedBias);

  const ct = activate(ctx, sliceState(ctx, gates, [0, 0, 3 * H], state), g);
  const iofState = stateDims(ctx, x, D, 3 * H);
  const iof = activate(ctx, sliceState(ctx, gates, [0, 0, 0], iofState), f);
  const it = sliceState(ctx, iof, [0, 0, 0], state);
  const ot = sliceState(ctx, iof, [0, 0, H], state);
  const ft = sliceState(ctx, iof, [0, 0, 2 * H], state);

  const cellNext = sum(prod(ft, cell.output), prod(it, ct));
  loop.setNext(cell, cellNext);
  const hiddenNext = prod(ot, activate(ctx, cellNext, h));
  loop.setNext(hidden, hiddenNext);

  const y = sequenceOutput(ctx, loop, hiddenNext, x, config.value);
  const yh = loop.addOutput(hiddenNext, LoopOutputKind.LAST_VALUE);
  const yc = loop.addOutput(cellNext, LoopOutputKind.LAST_VALUE);
  loop.finalize();
  return outputs(y, yh, yc);
};
