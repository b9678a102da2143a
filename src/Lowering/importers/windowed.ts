import TensorNode from "../../Network/TensorNode.js";
import { PaddingMode, PoolingType, ReduceOperation } from "../../Network/LayerTypes.js";
import { SourceNode } from "../../Onnx/OnnxModel.js";
import { LoweringContext } from "../LoweringContext.js";
import { Importer } from "../OperatorRegistry.js";
import { ErrorKind, Result, fail, invalid, ok, unsupported } from "../errors.js";
import { KernelParams, averagePoolPadding, getKernelParams, resolveForwardPadding, resolveTransposedPadding } from "../Padding.js";
import { axesToMask, reshapeWeights } from "../ShapeUtils.js";
import { reshapeTensor } from "../TensorOps.js";
import { Value } from "../Value.js";
import { ImporterTable, optionalWeights, outputs, requireTensor, requireWeights } from "./helpers.js";

interface SpatialInput {
  tensor: TensorNode.Class;
  /** Shape to restore after the layer when a 1-D input was widened to 2-D. */
  restore?: (shape: number[]) => number[];
}

/** Widens `[N, C, L]` to `[N, C, L, 1]` so 1-D windows run as 2-D ones. */
function toSpatial(ctx: LoweringContext, inputs: (Value | undefined)[]): Result<SpatialInput> {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = input.value;
  if (tensor.rank !== 3) {
    if (tensor.rank !== 4 && tensor.rank !== 5) {
      return unsupported(`windowed operators take 2 or 3 spatial dimensions, got input [${tensor.shape}]`);
    }
    return ok({ tensor });
  }
  const widened = reshapeTensor(ctx, tensor, [...tensor.shape, 1]);
  if (!widened.ok) return widened;
  return ok({ tensor: widened.value, restore: (shape) => shape.slice(0, 3) });
}

function fromSpatial(ctx: LoweringContext, input: SpatialInput, output: TensorNode.Class): Result<Value[]> {
  if (input.restore === undefined) return outputs(output);
  const restored = reshapeTensor(ctx, output, input.restore(output.shape));
  return restored.ok ? outputs(restored.value) : restored;
}

/** Kernel params read for a 1-D node gain a trailing unit axis. */
function widenParams(params: KernelParams): KernelParams {
  return {
    ...params,
    kernel: [...params.kernel, 1],
    strides: [...params.strides, 1],
    dilations: [...params.dilations, 1],
    begin: [...params.begin, 0],
    end: [...params.end, 0],
    outputPadding: [...params.outputPadding, 0],
    outputShape: params.outputShape !== undefined ? [...params.outputShape, 1] : undefined,
  };
}

function kernelParams(node: SourceNode, input: SpatialInput, kernelFallback?: number[]): Result<KernelParams> {
  const spatialRank = input.tensor.rank - 2;
  const readRank = input.restore !== undefined ? 1 : spatialRank;
  const params = getKernelParams(node.attributes, readRank, kernelFallback?.slice(0, readRank));
  if (!params.ok) return params;
  return ok(input.restore !== undefined ? widenParams(params.value) : params.value);
}

const conv: Importer = (ctx, node, inputs) => {
  const input = toSpatial(ctx, inputs);
  if (!input.ok) return input;
  const kernelWeights = requireWeights(inputs, 1, "Conv kernel");
  if (!kernelWeights.ok) return kernelWeights;
  let kernel = kernelWeights.value;
  if (kernel.shape.length === 3) kernel = reshapeWeights(kernel, [...kernel.shape, 1]);
  const tensor = input.value.tensor;
  const spatialRank = tensor.rank - 2;
  if (kernel.shape.length - 2 !== spatialRank) {
    return unsupported(`kernel [${kernel.shape}] does not match input [${tensor.shape}]`);
  }
  const outputMaps = kernel.shape[0];
  const bias = optionalWeights(inputs, 2, "Conv bias");
  if (!bias.ok) return bias;
  if (bias.value !== undefined && (bias.value.shape.length !== 1 || bias.value.shape[0] !== outputMaps)) {
    return invalid(`Conv bias [${bias.value.shape}] does not match ${outputMaps} output maps`);
  }

  const params = kernelParams(node, input.value, kernel.shape.slice(2));
  if (!params.ok) return params;
  const kernelSize = kernel.shape.slice(2);
  if (params.value.kernel.some((k, i) => k !== kernelSize[i])) {
    return unsupported(`kernel_shape [${params.value.kernel}] differs from the kernel weights [${kernelSize}]`);
  }
  const groups = node.attributes.getInt("group", 1);
  const channels = tensor.shape[1];
  if (channels !== -1 && kernel.shape[1] * groups !== channels) {
    return invalid(`Conv kernel expects ${kernel.shape[1] * groups} input channels, got ${channels}`);
  }
  const padding = resolveForwardPadding(tensor.shape.slice(2), params.value);
  if (!padding.ok) return padding;

  ctx.logger.verbose(
    `Conv: kernel [${kernelSize}], strides [${params.value.strides}], padding [${padding.value.begin}]/[${padding.value.end}], dilations [${params.value.dilations}], outputs ${outputMaps}`,
  );
  const output = ctx.network.addConvolution(tensor, {
    outputMaps,
    kernel,
    bias: bias.value,
    dilations: params.value.dilations,
    groups,
    kernelSize,
    strides: params.value.strides,
    prePadding: padding.value.begin,
    postPadding: padding.value.end,
    paddingMode: params.value.mode,
  });
  return fromSpatial(ctx, input.value, output);
};

const convTranspose: Importer = (ctx, node, inputs) => {
  const input = toSpatial(ctx, inputs);
  if (!input.ok) return input;
  const kernelWeights = requireWeights(inputs, 1, "ConvTranspose kernel");
  if (!kernelWeights.ok) return kernelWeights;
  let kernel = kernelWeights.value;
  if (kernel.shape.length === 3) kernel = reshapeWeights(kernel, [...kernel.shape, 1]);
  const tensor = input.value.tensor;
  const spatialRank = tensor.rank - 2;
  if (kernel.shape.length - 2 !== spatialRank) {
    return unsupported(`kernel [${kernel.shape}] does not match input [${tensor.shape}]`);
  }
  // Kernel layout is [C, M / group, k...].
  const channels = tensor.shape[1];
  if (channels !== -1 && kernel.shape[0] !== channels) {
    return invalid(`ConvTranspose kernel has ${kernel.shape[0]} input channels, input has ${channels}`);
  }
  const groups = node.attributes.getInt("group", 1);
  const outputMaps = kernel.shape[1] * groups;
  const bias = optionalWeights(inputs, 2, "ConvTranspose bias");
  if (!bias.ok) return bias;
  if (bias.value !== undefined && (bias.value.shape.length !== 1 || bias.value.shape[0] !== outputMaps)) {
    return invalid(`ConvTranspose bias [${bias.value.shape}] does not match ${outputMaps} output maps`);
  }

  const kernelSize = kernel.shape.slice(2);
  const params = kernelParams(node, input.value, kernelSize);
  if (!params.ok) return params;
  if (params.value.kernel.some((k, i) => k !== kernelSize[i])) {
    return unsupported(`kernel_shape [${params.value.kernel}] differs from the kernel weights [${kernelSize}]`);
  }
  if (params.value.dilations.some((d) => d !== 1)) {
    return unsupported("dilated ConvTranspose is not supported");
  }
  const padding = resolveTransposedPadding(tensor.shape.slice(2), params.value);
  if (!padding.ok) return padding;
  // Output padding is applied by a padding layer over the two innermost axes.
  const extra = padding.value.outputPadding;
  if (extra.length === 3 && extra[0] !== 0) {
    return unsupported("output padding on the depth axis is not supported");
  }

  let output = ctx.network.addDeconvolution(tensor, {
    outputMaps,
    kernel,
    bias: bias.value,
    dilations: params.value.dilations,
    groups,
    kernelSize,
    strides: params.value.strides,
    prePadding: padding.value.begin,
    postPadding: padding.value.end,
    paddingMode: params.value.mode,
  });
  const innermost = extra.slice(-2);
  if (innermost.some((p) => p !== 0)) {
    output = ctx.network.addPadding(output, [0, 0], innermost);
  }
  return fromSpatial(ctx, input.value, output);
};

/** Ceil mode and dilations exist from opset 10; pooling dilations must be 1. */
function poolingRoundUp(ctx: LoweringContext, node: SourceNode): Result<boolean> {
  if (ctx.opsetVersion < 10) return ok(false);
  const dilations = node.attributes.getInts("dilations", []);
  if (dilations.some((d) => d !== 1)) return unsupported("pooling dilations are not supported");
  return ok(node.attributes.getInt("ceil_mode", 0) !== 0);
}

function pool(type: PoolingType): Importer {
  return (ctx, node, inputs) => {
    const input = toSpatial(ctx, inputs);
    if (!input.ok) return input;
    const roundUp = poolingRoundUp(ctx, node);
    if (!roundUp.ok) return roundUp;
    const params = kernelParams(node, input.value);
    if (!params.ok) return params;
    const tensor = input.value.tensor;
    const spatial = tensor.shape.slice(2);
    const padding = resolveForwardPadding(spatial, params.value);
    if (!padding.ok) return padding;
    let begin = padding.value.begin;
    let end = padding.value.end;
    let crop = begin.map(() => false);
    const excludePadding = type === PoolingType.AVERAGE && params.value.excludePadding;
    if (excludePadding) {
      const adjusted = averagePoolPadding(begin, end, params.value.strides);
      if (!adjusted.ok) return adjusted;
      ({ begin, end, crop } = adjusted.value);
    }

    ctx.logger.verbose(`${node.opType}: kernel [${params.value.kernel}], padding [${begin}]/[${end}]`);
    let output = ctx.network.addPooling(tensor, {
      type,
      averageCountExcludesPadding: excludePadding,
      roundUp: roundUp.value,
      kernelSize: params.value.kernel,
      strides: params.value.strides,
      prePadding: begin,
      postPadding: end,
      paddingMode: params.value.mode,
    });
    if (crop.some((c) => c)) {
      const shape = output.shape;
      if (crop.some((c, i) => c && shape[i + 2] === -1)) {
        return unsupported("cropping asymmetric average-pool padding needs static spatial dimensions");
      }
      const start = shape.map((_, i) => (i >= 2 && crop[i - 2] ? 1 : 0));
      const size = shape.map((d, i) => d - start[i]);
      output = ctx.network.addSlice(output, start, size, shape.map(() => 1));
    }
    return fromSpatial(ctx, input.value, output);
  };
}

/** Static spatial sizes pool over the whole window; dynamic ones reduce. */
function globalPool(type: PoolingType): Importer {
  return (ctx, _node, inputs) => {
    const input = requireTensor(ctx, inputs, 0);
    if (!input.ok) return input;
    const tensor = input.value;
    if (tensor.rank < 3) return invalid(`global pooling needs a spatial input, got [${tensor.shape}]`);
    const spatial = tensor.shape.slice(2);
    if (spatial.includes(-1) || (spatial.length !== 2 && spatial.length !== 3)) {
      const axes = spatial.map((_, i) => i + 2);
      const operation = type === PoolingType.MAX ? ReduceOperation.MAX : ReduceOperation.AVG;
      return outputs(ctx.network.addReduce(tensor, operation, axesToMask(axes), true));
    }
    return outputs(
      ctx.network.addPooling(tensor, {
        type,
        averageCountExcludesPadding: true,
        roundUp: false,
        kernelSize: spatial,
        strides: spatial.map(() => 1),
        prePadding: spatial.map(() => 0),
        postPadding: spatial.map(() => 0),
        paddingMode: PaddingMode.EXPLICIT,
      }),
    );
  };
}

const lrn: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const size = node.attributes.getInt("size");
  if (size === undefined) return invalid("LRN needs a size");
  if (size <= 0) return fail(ErrorKind.InvalidValue, `LRN size must be positive, got ${size}`);
  const alpha = node.attributes.getFloat("alpha", 0.0001);
  const beta = node.attributes.getFloat("beta", 0.75);
  const bias = node.attributes.getFloat("bias", 1);
  return outputs(ctx.network.addLRN(input.value, size, alpha, beta, bias));
};

export const windowedImporters: ImporterTable = {
  Conv: conv,
  ConvTranspose: convTranspose,
  AveragePool: pool(PoolingType.AVERAGE),
  MaxPool: pool(PoolingType.MAX),
  GlobalAveragePool: globalPool(PoolingType.AVERAGE),
  GlobalMaxPool: globalPool(PoolingType.MAX),
  LRN: lrn,
};
