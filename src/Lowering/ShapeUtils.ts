import { MAX_DIMS } from "../Network/LayerTypes.js";
import { Weights, volume, weightsLike } from "../Network/Weights.js";
import { ErrorKind, Result, fail, ok } from "./errors.js";

export { volume };

/** Wraps a negative ONNX axis into `[0, rank)`. */
export function convertAxis(axis: number, rank: number): Result<number> {
  const converted = axis < 0 ? axis + rank : axis;
  if (converted < 0 || converted >= rank) {
    return fail(ErrorKind.InvalidNode, `axis ${axis} is out of range for rank ${rank}`);
  }
  return ok(converted);
}

export function makeDims(rank: number, value: number): number[] {
  return new Array<number>(rank).fill(value);
}

/** Prepends size-1 dimensions until `shape` has `targetRank` dimensions. */
export function expandDims(shape: readonly number[], targetRank: number): number[] {
  const missing = Math.max(targetRank - shape.length, 0);
  return [...makeDims(missing, 1), ...shape];
}

export function squeezeTrailingDims(shape: readonly number[]): number[] {
  let end = shape.length;
  while (end > 0 && shape[end - 1] === 1) {
    end--;
  }
  return shape.slice(0, end);
}

export function squeezeLeadingDims(shape: readonly number[]): number[] {
  let start = 0;
  while (start < shape.length && shape[start] === 1) {
    start++;
  }
  return shape.slice(start);
}

/**
 * A permutation only needs a data-moving transpose when it reorders two
 * non-unit dimensions, or when a non-unit dimension is dynamic. Otherwise a
 * reshape yields the same element order.
 */
export function isTransposeRequired(shape: readonly number[], perm: readonly number[]): boolean {
  let previous = 0;
  for (let dst = 0; dst < shape.length; dst++) {
    const src = perm[dst];
    const dim = shape[src];
    if (dim === 1) continue;
    if (dim === -1) return true;
    if (src < previous) return true;
    previous = src;
  }
  return false;
}

export function isPermutation(perm: readonly number[], rank: number): boolean {
  if (perm.length !== rank) return false;
  const seen = new Set(perm);
  return seen.size === rank && perm.every((p) => Number.isInteger(p) && p >= 0 && p < rank);
}

export function permuteShape(shape: readonly number[], perm: readonly number[]): number[] {
  return perm.map((p) => shape[p]);
}

export function defaultPermutation(rank: number): number[] {
  return Array.from({ length: rank }, (_, i) => rank - 1 - i);
}

export function isDynamic(shape: readonly number[]): boolean {
  return shape.some((d) => d < 0);
}

export function checkRank(rank: number): Result<number> {
  if (rank > MAX_DIMS) {
    return fail(ErrorKind.UnsupportedNodeForm, `rank ${rank} exceeds the network limit of ${MAX_DIMS}`);
  }
  return ok(rank);
}

export function stridesOf(shape: readonly number[]): number[] {
  const strides = makeDims(shape.length, 1);
  for (let i = shape.length - 2; i >= 0; i--) {
    strides[i] = strides[i + 1] * shape[i + 1];
  }
  return strides;
}

/** Copies a constant buffer into the element order of `permuteShape(shape, perm)`. */
export function transposeWeights(weights: Weights, perm: readonly number[]): Weights {
  const { shape } = weights;
  const outShape = permuteShape(shape, perm);
  const inStrides = stridesOf(shape);
  const count = volume(shape);
  const out = new Array<number>(count);
  const index = makeDims(outShape.length, 0);
  for (let flat = 0; flat < count; flat++) {
    let src = 0;
    for (let d = 0; d < outShape.length; d++) {
      src += index[d] * inStrides[perm[d]];
    }
    out[flat] = weights.values[src];
    for (let d = outShape.length - 1; d >= 0; d--) {
      index[d]++;
      if (index[d] < outShape[d]) break;
      index[d] = 0;
    }
  }
  return weightsLike(weights.dataType, outShape, out);
}

export function reshapeWeights(weights: Weights, shape: number[]): Weights {
  return { ...weights, shape };
}

export function axesToMask(axes: readonly number[]): number {
  return axes.reduce((mask, axis) => mask | (1 << axis), 0);
}

export function maskToAxes(mask: number, rank: number): number[] {
  const axes: number[] = [];
  for (let i = 0; i < rank; i++) {
    if (mask & (1 << i)) axes.push(i);
  }
  return axes;
}

/**
 * Static ONNX reshape: 0 copies the input dimension at that index and a single
 * -1 takes the remaining volume.
 */
export function resolveReshape(input: readonly number[], reshape: readonly number[]): Result<number[]> {
  const shape = reshape.map((d, i) => (d === 0 && i < input.length ? input[i] : d));
  const inferred = shape.flatMap((d, i) => (d === -1 ? [i] : []));
  if (inferred.length > 1) return fail(ErrorKind.InvalidNode, `reshape [${reshape}] infers more than one dimension`);
  const total = volume(input);
  const known = volume(shape.filter((d) => d !== -1));
  if (inferred.length === 1) {
    if (known === 0 || total % known !== 0) {
      return fail(ErrorKind.InvalidNode, `cannot reshape [${input}] into [${reshape}]`);
    }
    shape[inferred[0]] = total / known;
  } else if (known !== total) {
    return fail(ErrorKind.InvalidNode, `cannot reshape [${input}] into [${reshape}]`);
  }
  return ok(shape);
}
