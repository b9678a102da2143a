import TensorNode from "../../Network/TensorNode.js";
import { ActivationType, LoopOutputKind, NetworkDataType, SliceMode } from "../../Network/LayerTypes.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Result, invalid, ok, unsupported } from "../errors.js";
import { addConstantScalar, addConstantVector, getAxisLength, reshapeTensor } from "../TensorOps.js";
import { Value } from "../Value.js";
import { NAMED_ACTIVATIONS, activationDefaults } from "../importers/unary.js";
import { present } from "../importers/helpers.js";
import { LoopBuilder } from "./LoopBuilder.js";

export type Direction = "forward" | "reverse" | "bidirectional";

export interface ActivationSpec {
  type: ActivationType;
  alpha: number;
  beta: number;
}

export interface RnnConfig {
  direction: Direction;
  numDirections: number;
  hiddenSize: number;
  /** One entry per gate function, shared by both directions. */
  activations: ActivationSpec[];
}

function isDirection(value: string): value is Direction {
  return value === "forward" || value === "reverse" || value === "bidirectional";
}

function sameSpec(a: ActivationSpec, b: ActivationSpec): boolean {
  return a.type === b.type && a.alpha === b.alpha && a.beta === b.beta;
}

/**
 * Reads the attributes GRU and LSTM share. Clipping, the batch-major layout
 * and reverse-direction activations that differ from the forward ones are
 * rejected.
 */
export function parseRnnAttributes(node: SourceNode, defaults: string[]): Result<RnnConfig> {
  const attrs = node.attributes;
  const direction = attrs.getString("direction", "forward");
  if (!isDirection(direction)) return invalid(`unknown direction '${direction}'`);
  const numDirections = direction === "bidirectional" ? 2 : 1;
  const hiddenSize = attrs.getInt("hidden_size");
  if (hiddenSize === undefined || hiddenSize <= 0) return invalid(`${node.opType} needs a positive hidden_size`);
  // Any clip attribute, zero included, asks for clipping.
  if (attrs.has("clip")) return unsupported(`${node.opType} clipping`);
  if (attrs.getInt("layout", 0) !== 0) return unsupported(`${node.opType} batch-major layout`);

  const names = attrs.getStrings("activations", Array.from({ length: numDirections }, () => defaults).flat());
  if (names.length !== defaults.length * numDirections) {
    return invalid(`${node.opType} needs ${defaults.length * numDirections} activations, got ${names.length}`);
  }
  const alphas = attrs.getFloats("activation_alpha", []);
  const betas = attrs.getFloats("activation_beta", []);
  const specs: ActivationSpec[] = [];
  for (const [i, name] of names.entries()) {
    const type = NAMED_ACTIVATIONS[name];
    if (type === undefined) return unsupported(`${node.opType} activation '${name}'`);
    const fallback = activationDefaults(type);
    specs.push({ type, alpha: alphas[i] ?? fallback.alpha, beta: betas[i] ?? fallback.beta });
  }
  const forward = specs.slice(0, defaults.length);
  if (numDirections === 2 && !forward.every((spec, i) => sameSpec(spec, specs[defaults.length + i]))) {
    return unsupported(`${node.opType} reverse activations must match the forward ones`);
  }
  return ok({ direction, numDirections, hiddenSize, activations: forward });
}

/**
 * Dimensions `[leading, batch, trailing]` of a per-step state. When the batch
 * size of the `[seq, batch, input]` sequence is dynamic, `tensor` holds them
 * at run time.
 */
export interface StateDims {
  dims: number[];
  tensor?: TensorNode.Class;
}

export function stateDims(ctx: LoweringContext, sequence: TensorNode.Class, leading: number, trailing: number): StateDims {
  const batch = sequence.shape[1];
  const dims = [leading, batch, trailing];
  if (batch !== -1) return { dims };
  const batchLength = ctx.network.addShuffle(getAxisLength(ctx, sequence, 1), { reshape: [1] });
  const tensor = ctx.network.addConcatenation(
    [addConstantVector(ctx, [leading]), batchLength, addConstantVector(ctx, [trailing])],
    0,
  );
  return { dims, tensor };
}

/** Slice of `state.dims` starting at `start`. */
export function sliceState(ctx: LoweringContext, tensor: TensorNode.Class, start: number[], state: StateDims): TensorNode.Class {
  return ctx.network.addSlice(tensor, start, state.dims, [1, 1, 1], SliceMode.DEFAULT, state.tensor !== undefined ? { size: state.tensor } : {});
}

export function activate(ctx: LoweringContext, tensor: TensorNode.Class, spec: ActivationSpec): TensorNode.Class {
  return ctx.network.addActivation(tensor, spec.type, spec.alpha, spec.beta);
}

/** The given initial state, or zeros of the state shape. */
export function initialState(ctx: LoweringContext, inputs: (Value | undefined)[], index: number, state: StateDims): TensorNode.Class {
  const given = present(inputs, index);
  if (given !== undefined) {
    return given.kind === "tensor" ? given.tensor : ctx.network.addConstant(given.weights);
  }
  if (state.tensor === undefined) return addConstantScalar(ctx, 0, NetworkDataType.FLOAT, state.dims);
  // A stride-0 slice repeats the single zero over the run-time shape.
  const zero = addConstantScalar(ctx, 0, NetworkDataType.FLOAT, [1, 1, 1]);
  return ctx.network.addSlice(zero, [0, 0, 0], state.dims, [0, 0, 0], SliceMode.DEFAULT, { size: state.tensor });
}

/** Turns the `[batch, input]` step of an iterator into `[1, batch, input]`. */
function unsqueezeStep(ctx: LoweringContext, step: TensorNode.Class): TensorNode.Class {
  return ctx.network.addShuffle(step, { reshape: [0, 0, 1], secondTranspose: [2, 0, 1] });
}

/**
 * Input of one time step as `[numDirections, batch, input]`. Bidirectional
 * units stack a forward and a reverse iterator over the same sequence.
 */
export function iterationInput(
  ctx: LoweringContext,
  loop: LoopBuilder,
  sequence: TensorNode.Class,
  direction: Direction,
): TensorNode.Class {
  if (direction !== "bidirectional") {
    return unsqueezeStep(ctx, loop.addIterator(sequence, 0, direction === "reverse"));
  }
  const forward = unsqueezeStep(ctx, loop.addIterator(sequence, 0, false));
  const reverse = unsqueezeStep(ctx, loop.addIterator(sequence, 0, true));
  return ctx.network.addConcatenation([forward, reverse], 0);
}

/**
 * The full `[seq, numDirections, batch, hidden]` output. Reverse passes are
 * written back in time order.
 */
export function sequenceOutput(
  ctx: LoweringContext,
  loop: LoopBuilder,
  hidden: TensorNode.Class,
  sequence: TensorNode.Class,
  config: RnnConfig,
): TensorNode.Class {
  const length = getAxisLength(ctx, sequence, 0);
  if (config.direction !== "bidirectional") {
    const kind = config.direction === "reverse" ? LoopOutputKind.REVERSE : LoopOutputKind.CONCATENATE;
    return loop.addOutput(hidden, kind, 0, length);
  }
  const single = stateDims(ctx, sequence, 1, config.hiddenSize);
  const forward = loop.addOutput(sliceState(ctx, hidden, [0, 0, 0], single), LoopOutputKind.CONCATENATE, 0, length);
  const reverse = loop.addOutput(sliceState(ctx, hidden, [1, 0, 0], single), LoopOutputKind.REVERSE, 0, length);
  return ctx.network.addConcatenation([forward, reverse], 1);
}

export function checkSequence(node: SourceNode, sequence: TensorNode.Class): Result<TensorNode.Class> {
  if (sequence.rank !== 3) return invalid(`${node.opType} input must be [seq, batch, input], got [${sequence.shape}]`);
  return ok(sequence);
}

/** Reshapes an optional bias input `[D, n]` into `[D, 1, n]`. */
export function biasRows(ctx: LoweringContext, bias: TensorNode.Class, numDirections: number, width: number): Result<TensorNode.Class> {
  if (bias.rank !== 2 || (bias.shape[1] !== -1 && bias.shape[1] !== width)) {
    return invalid(`bias must be [${numDirections}, ${width}], got [${bias.shape}]`);
  }
  return reshapeTensor(ctx, bias, [numDirections, 1, width]);
}
