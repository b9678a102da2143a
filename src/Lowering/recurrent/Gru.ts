import TensorNode from "../../Network/TensorNode.js";
import { ElementWiseOperation, LoopOutputKind, MatrixOperation, NetworkDataType, TripLimit } from "../../Network/LayerTypes.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { addConstantScalar, getAxisLength } from "../TensorOps.js";
import { outputs, present, requireTensor } from "../importers/helpers.js";
import { LoopBuilder } from "./LoopBuilder.js";
import {
  activate,
  biasRows,
  checkSequence,
  initialState,
  iterationInput,
  parseRnnAttributes,
  sequenceOutput,
  sliceState,
  stateDims,
} from "./RnnCommon.js";

const NUM_GATES = 3;

export const GRU_DEFAULT_ACTIVATIONS = ["Sigmoid", "Tanh"];

function slice3(ctx: LoweringContext, tensor: TensorNode.Class, start: number[], size: number[]): TensorNode.Class {
  return ctx.network.addSlice(tensor, start, size, [1, 1, 1]);
}

function timesTransposed(ctx: LoweringContext, a: TensorNode.Class, b: TensorNode.Class): TensorNode.Class {
  return ctx.network.addMatrixMultiply(a, MatrixOperation.NONE, b, MatrixOperation.TRANSPOSE);
}

/**
 * GRU over a `[seq, batch, input]` sequence, gates ordered z, r, h:
 *
 *   zr(t) = f(X(t)·W[zr]^T + H(t-1)·R[zr]^T + Wb[zr] + Rb[zr])
 *   h(t)  = g(X(t)·W[h]^T + (r(t)·H(t-1))·R[h]^T + Rb[h] + Wb[h])
 *   h(t)  = g(X(t)·W[h]^T + r(t)·(H(t-1)·R[h]^T + Rb[h]) + Wb[h])   with linear_before_reset
 *   H(t)  = (1 - z(t))·h(t) + z(t)·H(t-1)
 *
 * Outputs Y `[seq, D, batch, hidden]` and Y_h `[D, batch, hidden]`.
 */
export const gru: Importer = (ctx, node, inputs) => {
  const config = parseRnnAttributes(node, GRU_DEFAULT_ACTIVATIONS);
  if (!config.ok) return config;
  const { numDirections: D, hiddenSize: H } = config.value;
  const [f, g] = config.value.activations;
  const linearBeforeReset = node.attributes.getInt("linear_before_reset", 0) !== 0;

  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const sequence = checkSequence(node, input.value);
  if (!sequence.ok) return sequence;
  const x = sequence.value;
  const weights = requireTensor(ctx, inputs, 1);
  if (!weights.ok) return weights;
  const recurrenceWeights = requireTensor(ctx, inputs, 2);
  if (!recurrenceWeights.ok) return recurrenceWeights;
  if (present(inputs, 4) !== undefined) ctx.logger.verbose("GRU: sequence_lens is ignored");

  const E = x.shape[2];
  // z and r are computed together; h depends on r.
  const wZR = slice3(ctx, weights.value, [0, 0, 0], [D, 2 * H, E]);
  const wH = slice3(ctx, weights.value, [0, 2 * H, 0], [D, H, E]);
  const rZR = slice3(ctx, recurrenceWeights.value, [0, 0, 0], [D, 2 * H, H]);
  const rH = slice3(ctx, recurrenceWeights.value, [0, 2 * H, 0], [D, H, H]);

  let bias: { zr: TensorNode.Class; h: TensorNode.Class; rzr: TensorNode.Class; rh: TensorNode.Class } | undefined;
  if (present(inputs, 3) !== undefined) {
    const raw = requireTensor(ctx, inputs, 3);
    if (!raw.ok) return raw;
    const rows = biasRows(ctx, raw.value, D, 2 * NUM_GATES * H);
    if (!rows.ok) return rows;
    bias = {
      zr: slice3(ctx, rows.value, [0, 0, 0], [D, 1, 2 * H]),
      h: slice3(ctx, rows.value, [0, 0, 2 * H], [D, 1, H]),
      rzr: slice3(ctx, rows.value, [0, 0, NUM_GATES * H], [D, 1, 2 * H]),
      rh: slice3(ctx, rows.value, [0, 0, (NUM_GATES + 2) * H], [D, 1, H]),
    };
    ctx.logger.verbose(`GRU: bias split into [${bias.zr.shape}] and [${bias.h.shape}] per source`);
  }

  const state = stateDims(ctx, x, D, H);
  const initialHidden = initialState(ctx, inputs, 5, state);

  const loop = new LoopBuilder(ctx.network);
  loop.addTripLimit(getAxisLength(ctx, x, 0), TripLimit.COUNT);
  const xt = iterationInput(ctx, loop, x, config.value.direction);
  const hidden = loop.addRecurrence(initialHidden);
  loop.beginBody();

  const net = ctx.network;
  const sum = (a: TensorNode.Class, b: TensorNode.Class): TensorNode.Class => net.addElementWise(a, b, ElementWiseOperation.SUM);
  const prod = (a: TensorNode.Class, b: TensorNode.Class): TensorNode.Class => net.addElementWise(a, b, ElementWiseOperation.PROD);
  const ht1 = hidden.output;

  let zrIn = sum(timesTransposed(ctx, xt, wZR), timesTransposed(ctx, ht1, rZR));
  if (bias !== undefined) zrIn = sum(sum(zrIn, bias.zr), bias.rzr);
  const zr = activate(ctx, zrIn, f);
  const zt = sliceState(ctx, zr, [0, 0, 0], state);
  const rt = sliceState(ctx, zr, [0, 0, H], state);

  const xh = timesTransposed(ctx, xt, wH);
  let hIn: TensorNode.Class;
  if (!linearBeforeReset) {
    hIn = sum(xh, timesTransposed(ctx, prod(rt, ht1), rH));
    if (bias !== undefined) hIn = sum(hIn, sum(bias.rh, bias.h));
  } else {
    let projected = timesTransposed(ctx, ht1, rH);
    if (bias !== undefined) projected = sum(projected, bias.rh);
    let gated = prod(rt, projected);
    if (bias !== undefined) gated = sum(gated, bias.h);
    hIn = sum(xh, gated);
  }
  const candidate = activate(ctx, hIn, g);

  const one = addConstantScalar(ctx, 1, NetworkDataType.FLOAT, [1, 1, 1]);
  const ht = sum(prod(net.addElementWise(one, zt, ElementWiseOperation.SUB), candidate), prod(zt, ht1));
  loop.setNext(hidden, ht);

  const y = sequenceOutput(ctx, loop, ht, x, config.value);
  const yh = loop.addOutput(ht, LoopOutputKind.LAST_VALUE);
  loop.finalize();
  return outputs(y, yh);
};
