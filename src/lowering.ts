import fs from "fs";
import path from "path";
import NetworkGraph from "./Network/NetworkGraph.js";
import NetworkDotFormatter from "./Network/NetworkDotFormatter.js";
import TensorNode from "./Network/TensorNode.js";
import { NetworkBuilder } from "./Network/NetworkBuilder.js";
import { SourceModel } from "./Onnx/OnnxModel.js";
import { createModel } from "./initGraph.js";
import { onnx2json } from "./onnx2json.js";
import { lowerGraphNodes } from "./Lowering/GraphWalker.js";
import { LoweringContext } from "./Lowering/LoweringContext.js";
import { OperatorRegistry } from "./Lowering/OperatorRegistry.js";
import { checkRank } from "./Lowering/ShapeUtils.js";
import { Result, invalid, ok, unsupported } from "./Lowering/errors.js";
import { WeightArena, convertToTensor, tensorValue, weightsValue } from "./Lowering/Value.js";
import { createDefaultRegistry } from "./Lowering/importers/index.js";
import { Logger } from "./Logger.js";
import { LoweringOptions, defaultLoweringOptions } from "./LoweringOptions.js";

export interface LoweredNetwork {
  network: NetworkGraph.Class;
  /** Network tensor of every graph output, by graph output name. */
  outputs: Map<string, TensorNode.Class>;
  arena: WeightArena;
  layerCount: number;
}

/**
 * Lowers the main graph of `model`. Graph inputs become network inputs,
 * initializers become weights, and every graph output is marked. The first
 * failing node aborts the session.
 */
export function lowerModel(
  model: SourceModel,
  options: LoweringOptions = defaultLoweringOptions,
  registry: OperatorRegistry = createDefaultRegistry(),
): Result<LoweredNetwork> {
  const logger = new Logger(options.verbosity);
  const graph = model.graph;
  const network = new NetworkBuilder(graph.name !== "" ? graph.name : "network");
  const ctx = new LoweringContext({
    network,
    arena: new WeightArena(),
    opsetVersion: model.opsetVersion,
    logger,
    plugins: options.plugins,
    registry,
    maxScanOutputLength: options.maxScanOutputLength,
  });
  logger.verbose(`Lowering graph '${graph.name}' at opset ${model.opsetVersion} (${graph.nodes.length} nodes)`);

  for (const input of graph.inputs) {
    if (input.shape === undefined) return invalid(`graph input '${input.name}' has no declared shape`);
    const rank = checkRank(input.shape.length);
    if (!rank.ok) return rank;
    ctx.scope.set(input.name, tensorValue(network.addInput(input.name, input.dataType, input.shape)));
  }
  for (const [name, weights] of graph.initializers) {
    ctx.scope.set(name, weightsValue(weights));
  }

  const lowered = lowerGraphNodes(ctx, graph);
  if (!lowered.ok) return lowered;

  const outputs = new Map<string, TensorNode.Class>();
  for (const output of graph.outputs) {
    const value = ctx.scope.get(output.name);
    if (value === undefined) return invalid(`graph output '${output.name}' is never produced`);
    if (outputs.has(output.name)) return unsupported(`graph output '${output.name}' is listed twice`);
    outputs.set(output.name, network.markOutput(convertToTensor(network, value)));
  }

  logger.verbose(
    `Emitted ${network.layerCount()} layers; ${ctx.arena.count} scratch buffers hold ${ctx.arena.bytes} bytes`,
  );
  return ok({ network: network.graph, outputs, arena: ctx.arena, layerCount: network.layerCount() });
}

/** Reads a `.onnx` file, or the same document decoded to `.json`. */
export async function loadModel(
  filePath: string,
  options: LoweringOptions = defaultLoweringOptions,
): Promise<Result<SourceModel>> {
  const logger = new Logger(options.verbosity);
  const extension = path.extname(filePath);
  let document: unknown;
  if (extension === ".json") {
    document = JSON.parse(await fs.promises.readFile(filePath, "utf8"));
  } else if (extension === ".onnx") {
    document = await onnx2json(filePath);
  } else {
    return invalid(`'${filePath}' is neither an .onnx nor a .json model`);
  }
  return createModel(document, { narrowInt64: options.narrowInt64, logger });
}

export type OutputFormat = "json" | "dot";

function plainArrays(_key: string, value: unknown): unknown {
  if (value instanceof Float32Array || value instanceof Int32Array || value instanceof Uint8Array) {
    return Array.from(value);
  }
  return value;
}

/** The network as cytoscape JSON or as DOT. */
export function formatNetwork(network: NetworkGraph.Class, format: OutputFormat): string {
  if (format === "dot") return network.toString(new NetworkDotFormatter());
  return JSON.stringify(network.toCy().json(), plainArrays, 2);
}
