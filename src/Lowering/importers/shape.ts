import TensorNode from "../../Network/TensorNode.js";
import { NetworkDataType, ReduceOperation, SliceMode } from "../../Network/LayerTypes.js";
import { Weights, int32Weights } from "../../Network/Weights.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "../errors.js";
import {
  convertAxis,
  defaultPermutation,
  expandDims,
  isDynamic,
  isPermutation,
  makeDims,
  reshapeWeights,
  resolveReshape,
  transposeWeights,
  volume,
} from "../ShapeUtils.js";
import { flattenTensor, reshapeTensor, transposeTensor } from "../TensorOps.js";
import { Value, convertToTensor, shapeOf, weightsValue } from "../Value.js";
import { ImporterTable, optionalWeights, outputWeights, outputs, requireInput, requireTensor } from "./helpers.js";

/**
 * Reshapes a value. Weights stay weights, with the same buffer; tensors get
 * a Shuffle layer unless the shape already matches.
 */
function reshapeValue(ctx: LoweringContext, value: Value, shape: number[]): Result<Value[]> {
  if (value.kind === "weights") {
    return outputWeights(reshapeWeights(value.weights, shape));
  }
  const reshaped = reshapeTensor(ctx, value.tensor, shape);
  return reshaped.ok ? outputs(reshaped.value) : reshaped;
}

function axesOperand(node: SourceNode, inputs: (Value | undefined)[], index: number): Result<number[] | undefined> {
  const attr = node.attributes.getInts("axes");
  if (attr !== undefined) return ok(attr);
  const weights = optionalWeights(inputs, index, `${node.opType} axes`);
  if (!weights.ok) return weights;
  return ok(weights.value !== undefined ? Array.from(weights.value.values) : undefined);
}

function convertAxes(axes: number[], rank: number): Result<number[]> {
  const converted: number[] = [];
  for (const axis of axes) {
    const c = convertAxis(axis, rank);
    if (!c.ok) return c;
    if (converted.includes(c.value)) return invalid(`axis ${axis} is repeated`);
    converted.push(c.value);
  }
  return ok(converted);
}

const reshape: Importer = (ctx, node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  let target: Weights | undefined;
  if (ctx.opsetVersion < 5) {
    const shape = node.attributes.getInts("shape");
    if (shape === undefined) return invalid("Reshape needs a shape attribute");
    target = int32Weights([shape.length], shape);
  } else {
    const shapeInput = requireInput(inputs, 1);
    if (!shapeInput.ok) return shapeInput;
    if (shapeInput.value.kind === "tensor") {
      const shapeTensor = shapeInput.value.tensor;
      if (shapeTensor.rank !== 1 || shapeTensor.shape[0] < 0) {
        return unsupported(`Reshape shape tensor must be 1-D with a static length, got [${shapeTensor.shape}]`);
      }
      ctx.logger.verbose("Reshape: shape given by a tensor");
      const tensor = convertToTensor(ctx.network, data.value);
      return outputs(ctx.network.addShuffle(tensor, {}, shapeTensor));
    }
    target = shapeInput.value.weights;
  }

  const requested = Array.from(target.values);
  const inputShape = shapeOf(data.value);
  if (!isDynamic(inputShape)) {
    const resolved = resolveReshape(inputShape, requested);
    if (!resolved.ok) return resolved;
    return reshapeValue(ctx, data.value, resolved.value);
  }
  if (data.value.kind === "weights") return reshapeValue(ctx, data.value, requested);
  return outputs(ctx.network.addShuffle(data.value.tensor, { reshape: requested }));
};

const flatten: Importer = (ctx, node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  const shape = shapeOf(data.value);
  // The axis may equal the rank: everything goes to the outer dimension.
  const axis = convertAxis(node.attributes.getInt("axis", 1), shape.length + 1);
  if (!axis.ok) return axis;
  if (data.value.kind === "weights") {
    return outputWeights(
      reshapeWeights(data.value.weights, [volume(shape.slice(0, axis.value)), volume(shape.slice(axis.value))]),
    );
  }
  const flattened = flattenTensor(ctx, data.value.tensor, axis.value);
  return flattened.ok ? outputs(flattened.value) : flattened;
};

const squeeze: Importer = (ctx, node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  const shape = shapeOf(data.value);
  const requested = axesOperand(node, inputs, 1);
  if (!requested.ok) return requested;
  let axes: number[];
  if (requested.value === undefined) {
    if (isDynamic(shape)) return unsupported(`Squeeze without axes needs a static shape, got [${shape}]`);
    axes = shape.flatMap((d, i) => (d === 1 ? [i] : []));
  } else {
    const converted = convertAxes(requested.value, shape.length);
    if (!converted.ok) return converted;
    axes = converted.value;
  }
  for (const axis of axes) {
    if (shape[axis] !== 1 && shape[axis] !== -1) {
      return invalid(`cannot squeeze axis ${axis} of size ${shape[axis]}`);
    }
  }
  return reshapeValue(
    ctx,
    data.value,
    shape.filter((_, i) => !axes.includes(i)),
  );
};

const unsqueeze: Importer = (ctx, node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  const shape = shapeOf(data.value);
  const requested = axesOperand(node, inputs, 1);
  if (!requested.ok) return requested;
  if (requested.value === undefined) return invalid("Unsqueeze needs axes");
  const rank = shape.length + requested.value.length;
  const axes = convertAxes(requested.value, rank);
  if (!axes.ok) return axes;
  const out: number[] = [];
  let source = 0;
  for (let i = 0; i < rank; i++) {
    out.push(axes.value.includes(i) ? 1 : shape[source++]);
  }
  return reshapeValue(ctx, data.value, out);
};

const transpose: Importer = (ctx, node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  const rank = shapeOf(data.value).length;
  const perm = node.attributes.getInts("perm", defaultPermutation(rank));
  if (!isPermutation(perm, rank)) return invalid(`perm [${perm}] is not a permutation of rank ${rank}`);
  if (data.value.kind === "weights") {
    return outputWeights(ctx.arena.adopt(transposeWeights(data.value.weights, perm)));
  }
  const transposed = transposeTensor(ctx, data.value.tensor, perm);
  return transposed.ok ? outputs(transposed.value) : transposed;
};

function spatialBlocks(tensor: TensorNode.Class, what: string): Result<[number, number, number, number]> {
  if (tensor.rank !== 4) return unsupported(`${what} needs a rank-4 input, got [${tensor.shape}]`);
  if (isDynamic(tensor.shape.slice(1))) {
    return unsupported(`${what} needs static channel and spatial dimensions, got [${tensor.shape}]`);
  }
  const [n, c, h, w] = tensor.shape;
  return ok([n, c, h, w]);
}

function blockSize(node: SourceNode): Result<number> {
  const size = node.attributes.getInt("blocksize");
  if (size === undefined) return invalid(`${node.opType} needs a blocksize`);
  if (size <= 0) return fail(ErrorKind.InvalidValue, `blocksize must be positive, got ${size}`);
  return ok(size);
}

/** Reshape, transpose, reshape. */
function shuffleBlocks(
  ctx: LoweringContext,
  tensor: TensorNode.Class,
  split: number[],
  perm: number[],
  merged: number[],
): Result<Value[]> {
  const expanded = reshapeTensor(ctx, tensor, split);
  if (!expanded.ok) return expanded;
  const moved = transposeTensor(ctx, expanded.value, perm);
  if (!moved.ok) return moved;
  const result = reshapeTensor(ctx, moved.value, merged);
  return result.ok ? outputs(result.value) : result;
}

const depthToSpace: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const dims = spatialBlocks(input.value, "DepthToSpace");
  if (!dims.ok) return dims;
  const b = blockSize(node);
  if (!b.ok) return b;
  const [n, c, h, w] = dims.value;
  const block = b.value;
  if (c % (block * block) !== 0) {
    return invalid(`DepthToSpace: ${c} channels are not divisible by blocksize ${block} squared`);
  }
  const depth = c / (block * block);
  const merged = [n, depth, h * block, w * block];
  if (node.attributes.getString("mode", "DCR") === "CRD") {
    return shuffleBlocks(ctx, input.value, [n, depth, block, block, h, w], [0, 1, 4, 2, 5, 3], merged);
  }
  return shuffleBlocks(ctx, input.value, [n, block, block, depth, h, w], [0, 3, 4, 1, 5, 2], merged);
};

const spaceToDepth: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const dims = spatialBlocks(input.value, "SpaceToDepth");
  if (!dims.ok) return dims;
  const b = blockSize(node);
  if (!b.ok) return b;
  const [n, c, h, w] = dims.value;
  const block = b.value;
  if (h % block !== 0 || w % block !== 0) {
    return invalid(`SpaceToDepth: spatial size ${h}x${w} is not divisible by blocksize ${block}`);
  }
  return shuffleBlocks(
    ctx,
    input.value,
    [n, c, h / block, block, w / block, block],
    [0, 3, 5, 1, 2, 4],
    [n, c * block * block, h / block, w / block],
  );
};

/**
 * Expand broadcasts with a strided slice: a size-1 dimension is read with
 * stride 0 until it reaches the target size.
 */
const expand: Importer = (ctx, _node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const shapeWeights = optionalWeights(inputs, 1, "Expand shape");
  if (!shapeWeights.ok) return shapeWeights;
  if (shapeWeights.value === undefined) return invalid("Expand needs a shape");
  const requested = Array.from(shapeWeights.value.values);
  const rank = Math.max(input.value.rank, requested.length);
  const reshaped = reshapeTensor(ctx, input.value, expandDims(input.value.shape, rank));
  if (!reshaped.ok) return reshaped;
  const tensor = reshaped.value;
  if (isDynamic(tensor.shape)) return unsupported(`Expand needs a static input shape, got [${tensor.shape}]`);
  const target = expandDims(requested, rank);
  const sizes: number[] = [];
  for (let i = 0; i < rank; i++) {
    const from = tensor.shape[i];
    const to = target[i];
    if (from !== to && from !== 1 && to !== 1) {
      return invalid(`cannot expand [${tensor.shape}] to [${requested}]`);
    }
    sizes.push(Math.max(from, to));
  }
  if (sizes.every((d, i) => d === tensor.shape[i])) return outputs(tensor);
  const strides = tensor.shape.map((d) => (d === 1 ? 0 : 1));
  return outputs(ctx.network.addSlice(tensor, makeDims(rank, 0), sizes, strides));
};

const tile: Importer = (ctx, _node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const repeatWeights = optionalWeights(inputs, 1, "Tile repeats");
  if (!repeatWeights.ok) return repeatWeights;
  if (repeatWeights.value === undefined) return unsupported("Tile needs a repeats input");
  const repeats = Array.from(repeatWeights.value.values);
  const tensor = input.value;
  if (repeats.length !== tensor.rank) {
    return invalid(`Tile needs ${tensor.rank} repeats, got ${repeats.length}`);
  }
  if (isDynamic(tensor.shape)) return unsupported(`Tile needs a static input shape, got [${tensor.shape}]`);
  if (repeats.some((r) => r < 1)) return fail(ErrorKind.InvalidValue, `Tile repeats must be positive, got [${repeats}]`);
  const sizes = tensor.shape.map((d, i) => d * repeats[i]);
  return outputs(ctx.network.addSlice(tensor, makeDims(tensor.rank, 0), sizes, makeDims(tensor.rank, 1), SliceMode.WRAP));
};

const shape: Importer = (ctx, _node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  if (data.value.kind === "weights") {
    const dims = data.value.weights.shape;
    return outputWeights(ctx.arena.createTemp(NetworkDataType.INT32, [dims.length], dims));
  }
  return outputs(ctx.network.addShape(data.value.tensor));
};

/** Element count as a scalar; a dynamic shape multiplies the Shape output at run time. */
const size: Importer = (ctx, _node, inputs) => {
  const data = requireInput(inputs, 0);
  if (!data.ok) return data;
  const dims = shapeOf(data.value);
  if (!isDynamic(dims)) {
    return ok([weightsValue(ctx.arena.createTemp(NetworkDataType.INT32, [], [volume(dims)]))]);
  }
  const shapeTensor = ctx.network.addShape(convertToTensor(ctx.network, data.value));
  return outputs(ctx.network.addReduce(shapeTensor, ReduceOperation.PROD, 1, false));
};

export const shapeImporters: ImporterTable = {
  Reshape: reshape,
  Flatten: flatten,
  Squeeze: squeeze,
  Unsqueeze: unsqueeze,
  Transpose: transpose,
  DepthToSpace: depthToSpace,
  SpaceToDepth: spaceToDepth,
  Expand: expand,
  Tile: tile,
  Shape: shape,
  Size: size,
};
