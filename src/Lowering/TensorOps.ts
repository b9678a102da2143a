import TensorNode from "../Network/TensorNode.js";
import { NetworkDataType } from "../Network/LayerTypes.js";
import { LoweringContext } from "./LoweringContext.js";
import { Result, ok, unsupported } from "./errors.js";
import { expandDims, isTransposeRequired, permuteShape, volume } from "./ShapeUtils.js";

// Tensor-level helpers shared by importers. They emit layers through the
// context's network builder.

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

/**
 * Reshape into `shape`. A dynamic target dimension becomes an inferred -1,
 * or a copy of the input dimension at the same index when more than one
 * target dimension is dynamic.
 */
export function reshapeTensor(ctx: LoweringContext, tensor: TensorNode.Class, shape: number[]): Result<TensorNode.Class> {
  if (sameShape(tensor.shape, shape)) return ok(tensor);
  const dynamic = shape.filter((d) => d < 0).length;
  let reshape = shape;
  if (dynamic > 1) {
    reshape = shape.map((d, i) => (d < 0 && tensor.shape[i] === -1 ? 0 : d));
    if (reshape.filter((d) => d < 0).length > 1) {
      return unsupported(`cannot reshape [${tensor.shape}] into [${shape}] with several dynamic dimensions`);
    }
  }
  return ok(ctx.network.addShuffle(tensor, { reshape }));
}

/** Transposes, emitting a plain reshape when the permutation moves no data. */
export function transposeTensor(ctx: LoweringContext, tensor: TensorNode.Class, perm: number[]): Result<TensorNode.Class> {
  if (!isTransposeRequired(tensor.shape, perm)) {
    return reshapeTensor(ctx, tensor, permuteShape(tensor.shape, perm));
  }
  return ok(ctx.network.addShuffle(tensor, { firstTranspose: perm }));
}

/** Prepends size-1 dimensions until the tensor has `rank` dimensions. */
export function expandTensor(ctx: LoweringContext, tensor: TensorNode.Class, rank: number): Result<TensorNode.Class> {
  if (tensor.rank >= rank) return ok(tensor);
  return reshapeTensor(ctx, tensor, expandDims(tensor.shape, rank));
}

/** Inserts size-1 dimensions at `axes`, given as positions in the output. */
export function unsqueezeTensor(ctx: LoweringContext, tensor: TensorNode.Class, axes: number[]): Result<TensorNode.Class> {
  const rank = tensor.rank + axes.length;
  const shape: number[] = [];
  let source = 0;
  for (let i = 0; i < rank; i++) {
    shape.push(axes.includes(i) ? 1 : tensor.shape[source++]);
  }
  return reshapeTensor(ctx, tensor, shape);
}

export function squeezeTensor(ctx: LoweringContext, tensor: TensorNode.Class, axes: number[]): Result<TensorNode.Class> {
  for (const axis of axes) {
    if (tensor.shape[axis] !== 1 && tensor.shape[axis] !== -1) {
      return unsupported(`cannot squeeze axis ${axis} of size ${tensor.shape[axis]}`);
    }
  }
  return reshapeTensor(
    ctx,
    tensor,
    tensor.shape.filter((_, i) => !axes.includes(i)),
  );
}

/** Collapses the tensor into 2-D: `[prod(dims[:axis]), prod(dims[axis:])]`. */
export function flattenTensor(ctx: LoweringContext, tensor: TensorNode.Class, axis: number): Result<TensorNode.Class> {
  const part = (dims: number[]): number => (dims.includes(-1) ? -1 : volume(dims));
  return reshapeTensor(ctx, tensor, [part(tensor.shape.slice(0, axis)), part(tensor.shape.slice(axis))]);
}

export function addConstantScalar(
  ctx: LoweringContext,
  value: number,
  dataType: NetworkDataType = NetworkDataType.FLOAT,
  shape: number[] = [],
): TensorNode.Class {
  return ctx.network.addConstant(ctx.arena.createTemp(dataType, shape, new Array<number>(volume(shape)).fill(value)));
}

export function addConstantVector(ctx: LoweringContext, values: number[], dataType: NetworkDataType = NetworkDataType.INT32): TensorNode.Class {
  return ctx.network.addConstant(ctx.arena.createTemp(dataType, [values.length], values));
}

/** Scalar INT32 tensor holding the size of `axis`. */
export function getAxisLength(ctx: LoweringContext, tensor: TensorNode.Class, axis: number): TensorNode.Class {
  const size = tensor.shape[axis];
  if (size >= 0) return addConstantScalar(ctx, size, NetworkDataType.INT32);
  const shape = ctx.network.addShape(tensor);
  return ctx.network.addGather(shape, addConstantScalar(ctx, axis, NetworkDataType.INT32), 0);
}
