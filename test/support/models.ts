import { AttributeBag, AttributeValue } from "../../src/Onnx/AttributeBag.js";
import { SourceGraph, SourceModel, SourceNode, ValueInfo } from "../../src/Onnx/OnnxModel.js";
import { NetworkDataType } from "../../src/Network/LayerTypes.js";
import TensorNode from "../../src/Network/TensorNode.js";
import { LayerKind, ParamsOf } from "../../src/Network/LayerParams.js";
import { Weights } from "../../src/Network/Weights.js";
import { LoweringContext } from "../../src/Lowering/LoweringContext.js";
import { WeightArena } from "../../src/Lowering/Value.js";
import { NetworkBuilder } from "../../src/Network/NetworkBuilder.js";
import { createDefaultRegistry } from "../../src/Lowering/importers/index.js";
import { formatLoweringError } from "../../src/Lowering/errors.js";
import { createDefaultPluginResolver } from "../../src/Lowering/PluginResolver.js";
import { Logger } from "../../src/Logger.js";
import { LoweringOptions, defaultLoweringOptions } from "../../src/LoweringOptions.js";
import { LoweredNetwork, lowerModel } from "../../src/lowering.js";

export const quietOptions: LoweringOptions = { ...defaultLoweringOptions, verbosity: 0 };

export const attr = {
  int: (value: number): AttributeValue => ({ type: "int", value }),
  float: (value: number): AttributeValue => ({ type: "float", value }),
  string: (value: string): AttributeValue => ({ type: "string", value }),
  ints: (value: number[]): AttributeValue => ({ type: "ints", value }),
  floats: (value: number[]): AttributeValue => ({ type: "floats", value }),
  strings: (value: string[]): AttributeValue => ({ type: "strings", value }),
  tensor: (value: Weights): AttributeValue => ({ type: "tensor", value }),
  graph: (value: SourceGraph): AttributeValue => ({ type: "graph", value }),
};

export function node(
  opType: string,
  inputs: (string | undefined)[],
  outputs: string[],
  attributes: Record<string, AttributeValue> = {},
  name: string = `${opType.toLowerCase()}_node`,
): SourceNode {
  return { name, opType, domain: "", inputs, outputs, attributes: new AttributeBag(Object.entries(attributes)) };
}

export function info(name: string, shape?: number[], dataType: NetworkDataType = NetworkDataType.FLOAT): ValueInfo {
  return { name, dataType, shape };
}

export function graph(
  nodes: SourceNode[],
  inputs: ValueInfo[],
  outputs: string[],
  initializers: Record<string, Weights> = {},
  name: string = "test_graph",
): SourceGraph {
  return {
    name,
    nodes,
    initializers: new Map(Object.entries(initializers)),
    inputs,
    outputs: outputs.map((o) => info(o)),
  };
}

export function model(g: SourceGraph, opsetVersion: number = 13): SourceModel {
  return { irVersion: 7, opsetVersion, producerName: "test", graph: g };
}

/** Lowers a model with the default registry, failing the test on a lowering error. */
export function lower(m: SourceModel, options: LoweringOptions = quietOptions): LoweredNetwork {
  const result = lowerModel(m, options);
  if (!result.ok) throw new Error(formatLoweringError(result.error));
  return result.value;
}

export function outputOf(lowered: LoweredNetwork, name: string): TensorNode.Class {
  const tensor = lowered.outputs.get(name);
  if (tensor === undefined) throw new Error(`no output '${name}'`);
  return tensor;
}

export function layerKinds(lowered: LoweredNetwork): LayerKind[] {
  return lowered.network
    .getLayers()
    .toArray()
    .map((layer) => layer.kind);
}

/** Parameters of every emitted layer of one kind, in emission order. */
export function layerParams<K extends LayerKind>(lowered: LoweredNetwork, kind: K): ParamsOf<K>[] {
  return lowered.network
    .getLayers()
    .toArray()
    .map((layer) => layer.params)
    .filter((params): params is ParamsOf<K> => params.kind === kind);
}

/** A bare session for calling importers directly. */
export function testContext(opsetVersion: number = 13): LoweringContext {
  return new LoweringContext({
    network: new NetworkBuilder("test"),
    arena: new WeightArena(),
    opsetVersion,
    logger: new Logger(0),
    plugins: createDefaultPluginResolver(),
    registry: createDefaultRegistry(),
    maxScanOutputLength: defaultLoweringOptions.maxScanOutputLength,
  });
}

/** Deterministic values in [-0.5, 0.5], exact in float32. */
export function sampleValues(count: number, seed: number = 1): number[] {
  return Array.from({ length: count }, (_, i) => (((i * 7 + seed * 5) % 17) - 8) / 16);
}
