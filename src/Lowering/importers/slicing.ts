import TensorNode from "../../Network/TensorNode.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "../errors.js";
import { convertAxis, makeDims } from "../ShapeUtils.js";
import { Value, convertToTensor, shapeOf } from "../Value.js";
import { ImporterTable, optionalWeights, outputs, requireInput, requireTensor } from "./helpers.js";

interface SliceOperands {
  starts: number[];
  ends: number[];
  axes: number[] | undefined;
  steps: number[] | undefined;
}

/** Starts, ends, axes and steps: attributes before opset 10, constant inputs from then on. */
function sliceOperands(ctx: LoweringContext, node: SourceNode, inputs: (Value | undefined)[]): Result<SliceOperands> {
  if (ctx.opsetVersion < 10) {
    const starts = node.attributes.getInts("starts");
    const ends = node.attributes.getInts("ends");
    if (starts === undefined || ends === undefined) return invalid("Slice needs starts and ends");
    return ok({ starts, ends, axes: node.attributes.getInts("axes"), steps: undefined });
  }
  const operands: (number[] | undefined)[] = [];
  for (const [index, what] of [
    [1, "starts"],
    [2, "ends"],
    [3, "axes"],
    [4, "steps"],
  ] as const) {
    const weights = optionalWeights(inputs, index, `Slice ${what}`);
    if (!weights.ok) return weights;
    operands.push(weights.value !== undefined ? Array.from(weights.value.values) : undefined);
  }
  const [starts, ends, axes, steps] = operands;
  if (starts === undefined || ends === undefined) return invalid("Slice needs starts and ends");
  return ok({ starts, ends, axes, steps });
}

const clamp = (value: number, low: number, high: number): number => Math.min(Math.max(value, low), high);

/**
 * Axes whose slice covers the whole dimension with step 1 are left alone;
 * when every axis is such a pass-through the input comes back unchanged.
 */
const slice: Importer = (ctx, node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  const shape = shapeOf(data.value);
  const rank = shape.length;
  const operands = sliceOperands(ctx, node, inputs);
  if (!operands.ok) return operands;
  const { starts, ends } = operands.value;
  const axes = operands.value.axes ?? starts.map((_, i) => i);
  const steps = operands.value.steps ?? makeDims(starts.length, 1);
  if (ends.length !== starts.length || axes.length !== starts.length || steps.length !== starts.length) {
    return invalid("Slice starts, ends, axes and steps differ in length");
  }

  const start = makeDims(rank, 0);
  const size = [...shape];
  const stride = makeDims(rank, 1);
  const seen = new Set<number>();
  let sliced = false;
  for (let i = 0; i < axes.length; i++) {
    const axis = convertAxis(axes[i], rank);
    if (!axis.ok) return axis;
    if (seen.has(axis.value)) return invalid(`Slice axis ${axes[i]} is repeated`);
    seen.add(axis.value);
    const step = steps[i];
    if (step === 0) return fail(ErrorKind.InvalidValue, `Slice step on axis ${axes[i]} is 0`);
    const dim = shape[axis.value];
    const whole = dim === -1 ? ends[i] >= 0x7fffffff : ends[i] >= dim;
    if (starts[i] === 0 && step === 1 && whole) continue;
    if (dim === -1) return unsupported(`Slice on the dynamic axis ${axis.value}`);

    let first = starts[i] < 0 ? starts[i] + dim : starts[i];
    let last = ends[i] < 0 ? ends[i] + dim : ends[i];
    if (step > 0) {
      first = clamp(first, 0, dim);
      last = clamp(last, 0, dim);
    } else {
      first = clamp(first, 0, dim - 1);
      last = clamp(last, -1, dim - 1);
    }
    start[axis.value] = first;
    size[axis.value] = Math.max(Math.ceil((last - first) / step), 0);
    stride[axis.value] = step;
    sliced = true;
  }
  if (!sliced) {
    ctx.logger.verbose("Slice: every axis passes through");
    return ok([data.value]);
  }
  return outputs(ctx.network.addSlice(convertToTensor(ctx.network, data.value), start, size, stride));
};

/** One Slice layer per output along `axis`. */
const split: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = input.value;
  const axis = convertAxis(node.attributes.getInt("axis", 0), tensor.rank);
  if (!axis.ok) return axis;
  const dim = tensor.shape[axis.value];
  if (dim === -1) return unsupported(`Split on the dynamic axis ${axis.value}`);
  const count = node.outputs.length;

  let parts = node.attributes.getInts("split");
  if (parts === undefined) {
    const fromInput = optionalWeights(inputs, 1, "Split split");
    if (!fromInput.ok) return fromInput;
    parts = fromInput.value !== undefined ? Array.from(fromInput.value.values) : undefined;
  }
  if (parts === undefined) {
    if (dim % count !== 0) return invalid(`cannot split ${dim} evenly into ${count} outputs`);
    parts = makeDims(count, dim / count);
  }
  if (parts.length !== count) return invalid(`Split has ${count} outputs but ${parts.length} sizes`);
  if (parts.reduce((a, b) => a + b, 0) !== dim) {
    return invalid(`split sizes [${parts}] do not add up to ${dim}`);
  }

  let offset = 0;
  return outputs(
    ...parts.map((part) => {
      const start = makeDims(tensor.rank, 0);
      const size = [...tensor.shape];
      start[axis.value] = offset;
      size[axis.value] = part;
      offset += part;
      return ctx.network.addSlice(tensor, start, size, makeDims(tensor.rank, 1));
    }),
  );
};

const gather: Importer = (ctx, node, inputs) => {
  const data = requireTensor(ctx, inputs, 0);
  if (!data.ok) return data;
  const indices = requireTensor(ctx, inputs, 1);
  if (!indices.ok) return indices;
  const axis = convertAxis(node.attributes.getInt("axis", 0), data.value.rank);
  if (!axis.ok) return axis;
  return outputs(ctx.network.addGather(data.value, indices.value, axis.value));
};

const concat: Importer = (ctx, node, inputs) => {
  const tensors: TensorNode.Class[] = [];
  for (let i = 0; i < inputs.length; i++) {
    const tensor = requireTensor(ctx, inputs, i);
    if (!tensor.ok) return tensor;
    tensors.push(tensor.value);
  }
  if (tensors.length === 0) return invalid("Concat needs at least one input");
  const rank = tensors[0].rank;
  if (tensors.some((t) => t.rank !== rank)) {
    return invalid(`Concat inputs differ in rank: ${tensors.map((t) => `[${t.shape}]`).join(" ")}`);
  }
  const axis = convertAxis(node.attributes.getInt("axis", ctx.opsetVersion < 4 ? 1 : 0), rank);
  if (!axis.ok) return axis;
  return outputs(ctx.network.addConcatenation(tensors, axis.value));
};

function padOperands(ctx: LoweringContext, node: SourceNode, inputs: (Value | undefined)[]): Result<{ pads: number[]; value: number }> {
  if (ctx.opsetVersion < 11) {
    const pads = node.attributes.getInts(ctx.opsetVersion < 2 ? "paddings" : "pads");
    if (pads === undefined) return invalid("Pad needs pads");
    return ok({ pads, value: node.attributes.getFloat("value", 0) });
  }
  const pads = optionalWeights(inputs, 1, "Pad pads");
  if (!pads.ok) return pads;
  if (pads.value === undefined) return invalid("Pad needs pads");
  const value = optionalWeights(inputs, 2, "Pad constant_value");
  if (!value.ok) return value;
  return ok({
    pads: Array.from(pads.value.values),
    value: value.value !== undefined && value.value.values.length > 0 ? value.value.values[0] : 0,
  });
}

/** Zero constant padding on the two innermost axes. */
const pad: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = input.value;
  const mode = node.attributes.getString("mode", "constant");
  if (mode !== "constant") return unsupported(`Pad mode '${mode}'`);
  const operands = padOperands(ctx, node, inputs);
  if (!operands.ok) return operands;
  const { pads, value } = operands.value;
  if (value !== 0) return unsupported(`Pad value ${value}; only zero padding is supported`);
  const rank = tensor.rank;
  if (pads.length !== 2 * rank) return invalid(`Pad needs ${2 * rank} pads, got ${pads.length}`);
  if (rank < 2) return unsupported(`Pad needs rank >= 2, got [${tensor.shape}]`);
  for (let i = 0; i < rank - 2; i++) {
    if (pads[i] !== 0 || pads[rank + i] !== 0) {
      return unsupported(`Pad only pads the two innermost axes, got [${pads}]`);
    }
  }
  const pre = [pads[rank - 2], pads[rank - 1]];
  const post = [pads[2 * rank - 2], pads[2 * rank - 1]];
  if ([...pre, ...post].every((p) => p === 0)) return outputs(tensor);
  return outputs(ctx.network.addPadding(tensor, pre, post));
};

export const slicingImporters: ImporterTable = {
  Slice: slice,
  Split: split,
  Gather: gather,
  Concat: concat,
  Pad: pad,
};
