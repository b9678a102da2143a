import { AttributeBag } from "../Onnx/AttributeBag.js";
import { PaddingMode } from "../Network/LayerTypes.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "./errors.js";
import { makeDims } from "./ShapeUtils.js";

export interface KernelParams {
  kernel: number[];
  strides: number[];
  dilations: number[];
  begin: number[];
  end: number[];
  mode: PaddingMode;
  /** Average pooling divides by the count of non-padding elements. */
  excludePadding: boolean;
  outputPadding: number[];
  outputShape?: number[];
}

export interface PaddingPair {
  begin: number;
  end: number;
}

/**
 * Reads the windowed-op attributes of a node: kernel_shape, strides,
 * dilations, pads (laid out as all begins then all ends), auto_pad,
 * count_include_pad, output_padding and output_shape.
 */
export function getKernelParams(attrs: AttributeBag, spatialRank: number, kernelFallback?: number[]): Result<KernelParams> {
  const kernel = attrs.getInts("kernel_shape") ?? kernelFallback;
  if (kernel === undefined) return invalid("kernel_shape is required");
  const strides = attrs.getInts("strides", makeDims(spatialRank, 1));
  const dilations = attrs.getInts("dilations", makeDims(spatialRank, 1));
  const pads = attrs.getInts("pads", makeDims(2 * spatialRank, 0));
  const outputPadding = attrs.getInts("output_padding", makeDims(spatialRank, 0));
  for (const [what, list, expected] of [
    ["kernel_shape", kernel, spatialRank],
    ["strides", strides, spatialRank],
    ["dilations", dilations, spatialRank],
    ["pads", pads, 2 * spatialRank],
    ["output_padding", outputPadding, spatialRank],
  ] as const) {
    if (list.length !== expected) {
      return invalid(`${what} has ${list.length} entries, expected ${expected}`);
    }
  }
  if (strides.some((s) => s <= 0)) return fail(ErrorKind.InvalidValue, `strides must be positive, got [${strides}]`);
  if (dilations.some((d) => d <= 0)) {
    return fail(ErrorKind.InvalidValue, `dilations must be positive, got [${dilations}]`);
  }
  if (kernel.some((k) => k <= 0)) return fail(ErrorKind.InvalidValue, `kernel_shape must be positive, got [${kernel}]`);

  let begin = pads.slice(0, spatialRank);
  let end = pads.slice(spatialRank);
  let mode = PaddingMode.EXPLICIT;
  const autoPad = attrs.getString("auto_pad", "NOTSET");
  switch (autoPad) {
    case "NOTSET":
      break;
    case "VALID":
      begin = makeDims(spatialRank, 0);
      end = makeDims(spatialRank, 0);
      break;
    case "SAME_UPPER":
      mode = PaddingMode.SAME_UPPER;
      break;
    case "SAME_LOWER":
      mode = PaddingMode.SAME_LOWER;
      break;
    default:
      return unsupported(`auto_pad '${autoPad}' is not supported`);
  }
  return ok({
    kernel,
    strides,
    dilations,
    begin,
    end,
    mode,
    excludePadding: attrs.getInt("count_include_pad", 0) === 0,
    outputPadding,
    outputShape: attrs.getInts("output_shape"),
  });
}

/** Splits a total padding; same-upper puts the odd unit at the end. */
export function splitPadding(total: number, mode: PaddingMode): PaddingPair {
  const small = Math.floor(total / 2);
  const large = total - small;
  return mode === PaddingMode.SAME_LOWER ? { begin: large, end: small } : { begin: small, end: large };
}

/** Same-mode padding of a forward windowed op: the output is `ceil(in / stride)`. */
export function sameForwardPadding(
  input: number,
  kernel: number,
  stride: number,
  dilation: number,
  mode: PaddingMode,
): PaddingPair {
  const output = Math.ceil(input / stride);
  const total = Math.max(0, (output - 1) * stride + (kernel - 1) * dilation + 1 - input);
  return splitPadding(total, mode);
}

/**
 * Same-mode padding of a transposed windowed op producing `outputSize`.
 * Same-upper sets `end = floor(total / 2)` and gives the remainder to `begin`.
 */
export function sameTransposedPadding(
  input: number,
  kernel: number,
  stride: number,
  dilation: number,
  outputPadding: number,
  outputSize: number,
  mode: PaddingMode,
): PaddingPair & { total: number } {
  const total = (input - 1) * stride + (kernel - 1) * dilation + 1 + outputPadding - outputSize;
  const half = Math.floor(total / 2);
  return mode === PaddingMode.SAME_LOWER
    ? { begin: half, end: total - half, total }
    : { begin: total - half, end: half, total };
}

/** Extra padding appended after a transposed op so it reaches `requested`. */
export function explicitOutputPadding(
  input: number,
  kernel: number,
  stride: number,
  dilation: number,
  begin: number,
  end: number,
  requested: number,
): number {
  const expected = (input - 1) * stride + (kernel - 1) * dilation + 1 - begin - end;
  return requested - expected;
}

export function convOutputSize(input: number, kernel: number, stride: number, dilation: number, begin: number, end: number): number {
  return Math.floor((input + begin + end - ((kernel - 1) * dilation + 1)) / stride) + 1;
}

export function poolOutputSize(
  input: number,
  kernel: number,
  stride: number,
  begin: number,
  end: number,
  roundUp: boolean,
): number {
  const extent = (input + begin + end - kernel) / stride;
  return (roundUp ? Math.ceil(extent) : Math.floor(extent)) + 1;
}

export function deconvOutputSize(
  input: number,
  kernel: number,
  stride: number,
  dilation: number,
  begin: number,
  end: number,
  outputPadding: number,
): number {
  return (input - 1) * stride + (kernel - 1) * dilation + 1 - begin - end + outputPadding;
}

/**
 * Resolves forward padding for every spatial axis. Dynamic input sizes in
 * same mode cannot be resolved.
 */
export function resolveForwardPadding(spatial: number[], params: KernelParams): Result<{ begin: number[]; end: number[] }> {
  if (params.mode === PaddingMode.EXPLICIT) return ok({ begin: params.begin, end: params.end });
  const begin: number[] = [];
  const end: number[] = [];
  for (let i = 0; i < spatial.length; i++) {
    if (spatial[i] < 0) return unsupported(`${params.mode} padding needs static spatial dimensions`);
    const pair = sameForwardPadding(spatial[i], params.kernel[i], params.strides[i], params.dilations[i], params.mode);
    begin.push(pair.begin);
    end.push(pair.end);
  }
  return ok({ begin, end });
}

/**
 * Resolves transposed-op padding. With an explicit `output_shape` the padding
 * (same mode) or the extra output padding (explicit mode) is derived from it.
 */
export function resolveTransposedPadding(
  spatial: number[],
  params: KernelParams,
): Result<{ begin: number[]; end: number[]; outputPadding: number[] }> {
  const begin = [...params.begin];
  const end = [...params.end];
  const outputPadding = [...params.outputPadding];
  const requested = params.outputShape;
  if (requested !== undefined && requested.length !== spatial.length) {
    return invalid(`output_shape has ${requested.length} entries, expected ${spatial.length}`);
  }
  for (let i = 0; i < spatial.length; i++) {
    const wanted = requested?.[i];
    if (params.mode === PaddingMode.EXPLICIT) {
      if (wanted === undefined) continue;
      if (spatial[i] < 0) return unsupported("output_shape needs static spatial dimensions");
      const extra = explicitOutputPadding(
        spatial[i],
        params.kernel[i],
        params.strides[i],
        params.dilations[i],
        begin[i],
        end[i],
        wanted,
      );
      if (extra < 0) return unsupported(`output_shape ${wanted} is smaller than the natural output on axis ${i}`);
      outputPadding[i] = extra;
    } else {
      if (spatial[i] < 0) return unsupported(`${params.mode} padding needs static spatial dimensions`);
      const pair = sameTransposedPadding(
        spatial[i],
        params.kernel[i],
        params.strides[i],
        params.dilations[i],
        outputPadding[i],
        wanted ?? spatial[i] * params.strides[i],
        params.mode,
      );
      if (pair.total < 0) return unsupported(`output size on axis ${i} needs negative padding`);
      begin[i] = pair.begin;
      end[i] = pair.end;
    }
  }
  return ok({ begin, end, outputPadding });
}

/**
 * Average pooling that excludes padding supports symmetric padding and
 * `end == begin + 1`; the latter pads one extra stride at the beginning and
 * marks the axis for cropping the first output element.
 */
export function averagePoolPadding(
  begin: number[],
  end: number[],
  strides: number[],
): Result<{ begin: number[]; end: number[]; crop: boolean[] }> {
  const newBegin = [...begin];
  const crop = begin.map(() => false);
  for (let i = 0; i < begin.length; i++) {
    if (end[i] === begin[i]) continue;
    if (end[i] === begin[i] + 1) {
      newBegin[i] += strides[i];
      crop[i] = true;
      continue;
    }
    return unsupported(`asymmetric average-pool padding (${begin[i]}, ${end[i]}) is not supported`);
  }
  return ok({ begin: newBegin, end: [...end], crop });
}
