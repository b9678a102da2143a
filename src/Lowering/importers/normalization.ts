import { NetworkDataType, ScaleMode } from "../../Network/LayerTypes.js";
import { Weights } from "../../Network/Weights.js";
import { Importer } from "../OperatorRegistry.js";
import { INSTANCE_NORMALIZATION_PLUGIN, INSTANCE_NORMALIZATION_VERSION } from "../PluginResolver.js";
import { Result, invalid, unsupported } from "../errors.js";
import { Value } from "../Value.js";
import { ImporterTable, outputs, requireTensor, requireWeights } from "./helpers.js";

function floatOperand(inputs: (Value | undefined)[], index: number, what: string, channels: number): Result<Weights> {
  const weights = requireWeights(inputs, index, what);
  if (!weights.ok) return weights;
  if (weights.value.dataType !== NetworkDataType.FLOAT) return unsupported(`${what} must be FLOAT`);
  const { shape } = weights.value;
  if (shape.length !== 1 || (channels !== -1 && shape[0] !== channels)) {
    return invalid(`${what} has shape [${shape}], expected [${channels}]`);
  }
  return weights;
}

/** Folds scale, bias, mean and variance into one per-channel scale and shift. */
const batchNormalization: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const tensor = input.value;
  if (tensor.rank < 2) return invalid(`BatchNormalization needs a channel axis, got [${tensor.shape}]`);
  const channels = tensor.shape[1];
  const operands: Weights[] = [];
  for (const [index, what] of [
    [1, "scale"],
    [2, "bias"],
    [3, "mean"],
    [4, "variance"],
  ] as const) {
    const weights = floatOperand(inputs, index, `BatchNormalization ${what}`, channels);
    if (!weights.ok) return weights;
    operands.push(weights.value);
  }
  const [scale, bias, mean, variance] = operands;
  const epsilon = node.attributes.getFloat("epsilon", 1e-5);
  const count = scale.values.length;
  const combinedScale = ctx.arena.createTemp(NetworkDataType.FLOAT, [count]);
  const combinedShift = ctx.arena.createTemp(NetworkDataType.FLOAT, [count]);
  for (let i = 0; i < count; i++) {
    combinedScale.values[i] = scale.values[i] / Math.sqrt(variance.values[i] + epsilon);
    combinedShift.values[i] = bias.values[i] - mean.values[i] * combinedScale.values[i];
  }
  return outputs(
    ctx.network.addScale(tensor, { mode: ScaleMode.CHANNEL, shift: combinedShift, scale: combinedScale }),
  );
};

const imageScaler: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const bias = node.attributes.getFloats("bias");
  if (bias === undefined) return invalid("ImageScaler needs a bias");
  const scale = node.attributes.getFloat("scale", 1);
  // The scale applies to every element; it is repeated per channel.
  return outputs(
    ctx.network.addScale(input.value, {
      mode: ScaleMode.CHANNEL,
      shift: ctx.arena.createTemp(NetworkDataType.FLOAT, [bias.length], bias),
      scale: ctx.arena.createTemp(NetworkDataType.FLOAT, [bias.length], new Array<number>(bias.length).fill(scale)),
    }),
  );
};

const MIN_INSTANCE_NORM_EPSILON = 1e-4;

const instanceNormalization: Importer = (ctx, node, inputs) => {
  const input = requireTensor(ctx, inputs, 0);
  if (!input.ok) return input;
  const scales = requireWeights(inputs, 1, "InstanceNormalization scale");
  if (!scales.ok) return scales;
  const bias = requireWeights(inputs, 2, "InstanceNormalization bias");
  if (!bias.ok) return bias;
  const epsilon = Math.max(node.attributes.getFloat("epsilon", 1e-5), MIN_INSTANCE_NORM_EPSILON);

  const creator = ctx.plugins.find(INSTANCE_NORMALIZATION_PLUGIN, INSTANCE_NORMALIZATION_VERSION);
  if (creator === undefined) {
    return unsupported(`plugin ${INSTANCE_NORMALIZATION_PLUGIN} ${INSTANCE_NORMALIZATION_VERSION} is not registered`);
  }
  const fields = { epsilon, scales: scales.value, bias: bias.value };
  const descs = creator.inferOutputs([{ dataType: input.value.dataType, shape: input.value.shape }], fields);
  if (typeof descs === "string") return unsupported(descs);
  return outputs(...ctx.network.addPlugin([input.value], creator.name, creator.version, fields, descs));
};

export const normalizationImporters: ImporterTable = {
  BatchNormalization: batchNormalization,
  SpatialBN: batchNormalization,
  ImageScaler: imageScaler,
  InstanceNormalization: instanceNormalization,
};
