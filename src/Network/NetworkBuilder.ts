import Graph from "@specs-feup/flow/graph/Graph";
import NetworkGraph from "./NetworkGraph.js";
import TensorNode from "./TensorNode.js";
import LayerNode from "./LayerNode.js";
import NetworkEdge from "./NetworkEdge.js";
import { LayerParams, ParamsOf, PluginField } from "./LayerParams.js";
import {
  ActivationType,
  ElementWiseOperation,
  LoopOutputKind,
  MAX_DIMS,
  MatrixOperation,
  NetworkDataType,
  ReduceOperation,
  ResizeMode,
  ScaleMode,
  SliceMode,
  TopKOperation,
  TripLimit,
  UnaryOperation,
} from "./LayerTypes.js";
import { Weights, volume } from "./Weights.js";
import { NetworkConstructionError } from "../Lowering/errors.js";

export interface TensorDesc {
  dataType: NetworkDataType;
  shape: number[];
}

export interface Recurrence {
  layer: LayerNode.Class;
  output: TensorNode.Class;
}

export interface DynamicSliceInputs {
  start?: TensorNode.Class;
  size?: TensorNode.Class;
  stride?: TensorNode.Class;
}

type Without<K extends LayerParams["kind"]> = Omit<ParamsOf<K>, "kind">;

const COMPARISONS = new Set([ElementWiseOperation.EQUAL, ElementWiseOperation.GREATER, ElementWiseOperation.LESS]);

function fmt(shape: readonly number[]): string {
  return `[${shape.join(",")}]`;
}

function broadcastDim(a: number, b: number): number {
  if (a === b) return a;
  if (a === 1) return b;
  if (b === 1) return a;
  if (a === -1) return b;
  if (b === -1) return a;
  throw new NetworkConstructionError(`dimensions ${a} and ${b} cannot be broadcast`);
}

function broadcastShapes(shapes: number[][]): number[] {
  const rank = shapes[0].length;
  for (const shape of shapes) {
    if (shape.length !== rank) {
      throw new NetworkConstructionError(
        `operands must have equal rank, got ${shapes.map(fmt).join(" and ")}`,
      );
    }
  }
  return shapes.reduce((acc, shape) => acc.map((d, i) => broadcastDim(d, shape[i])));
}

function windowOutput(extent: number, stride: number, roundUp: boolean): number {
  return (roundUp ? Math.ceil(extent / stride) : Math.floor(extent / stride)) + 1;
}

/**
 * Builds the target network. Every `add*` method infers the output shape from
 * its inputs (a dynamic size propagates as -1) and throws a
 * `NetworkConstructionError` when the inputs break the layer's contract.
 */
export class NetworkBuilder {
  readonly graph: NetworkGraph.Class;

  private nextLayer = 0;
  private nextTensor = 0;
  private nextLoop = 0;
  private prefix = "";
  // Values of tensors that are known while building: constants and static shapes.
  private readonly known = new Map<string, Weights>();

  constructor(name: string = "network") {
    this.graph = Graph.create().init(new NetworkGraph.Builder(name)).as(NetworkGraph);
  }

  setNamePrefix(prefix: string): void {
    this.prefix = prefix;
  }

  layerCount(): number {
    return this.nextLayer;
  }

  knownValue(tensor: TensorNode.Class): Weights | undefined {
    return this.known.get(tensor.id);
  }

  addInput(name: string, dataType: NetworkDataType, shape: number[]): TensorNode.Class {
    this.checkRank(shape);
    return this.graph
      .addNode(`T${this.nextTensor++}`)
      .init(new TensorNode.Builder(name, dataType, shape, "input"))
      .as(TensorNode);
  }

  markOutput(tensor: TensorNode.Class): TensorNode.Class {
    // A network input cannot double as an output tensor.
    const marked = tensor.role === "input" ? this.addIdentity(tensor) : tensor;
    marked.role = "output";
    return marked;
  }

  addConstant(weights: Weights): TensorNode.Class {
    if (volume(weights.shape) !== weights.values.length) {
      throw new NetworkConstructionError(
        `constant of shape ${fmt(weights.shape)} holds ${weights.values.length} values`,
      );
    }
    const [out] = this.addLayer({ kind: "Constant", weights }, [], [
      { dataType: weights.dataType, shape: [...weights.shape] },
    ]);
    this.known.set(out.id, weights);
    return out;
  }

  addIdentity(input: TensorNode.Class, outputType?: NetworkDataType): TensorNode.Class {
    const [out] = this.addLayer({ kind: "Identity", outputType }, [input], [
      { dataType: outputType ?? input.dataType, shape: [...input.shape] },
    ]);
    return out;
  }

  addElementWise(a: TensorNode.Class, b: TensorNode.Class, operation: ElementWiseOperation): TensorNode.Class {
    const shape = broadcastShapes([a.shape, b.shape]);
    const dataType = COMPARISONS.has(operation) ? NetworkDataType.BOOL : a.dataType;
    const [out] = this.addLayer({ kind: "ElementWise", operation }, [a, b], [{ dataType, shape }]);
    return out;
  }

  addUnary(input: TensorNode.Class, operation: UnaryOperation): TensorNode.Class {
    const dataType = operation === UnaryOperation.NOT ? NetworkDataType.BOOL : input.dataType;
    const [out] = this.addLayer({ kind: "Unary", operation }, [input], [{ dataType, shape: [...input.shape] }]);
    return out;
  }

  addActivation(input: TensorNode.Class, activation: ActivationType, alpha = 0, beta = 0): TensorNode.Class {
    const [out] = this.addLayer({ kind: "Activation", activation, alpha, beta }, [input], [
      { dataType: input.dataType, shape: [...input.shape] },
    ]);
    return out;
  }

  /**
   * Transpose, reshape, transpose. A reshape entry of 0 copies the input
   * dimension at that index and a single -1 is inferred. When `shapeTensor` is
   * given it replaces the static reshape dimensions.
   */
  addShuffle(input: TensorNode.Class, params: Without<"Shuffle">, shapeTensor?: TensorNode.Class): TensorNode.Class {
    let shape = [...input.shape];
    if (params.firstTranspose !== undefined) {
      shape = this.permute(shape, params.firstTranspose);
    }
    let reshape = params.reshape;
    if (shapeTensor !== undefined) {
      if (shapeTensor.rank !== 1 || shapeTensor.shape[0] < 0) {
        throw new NetworkConstructionError(`shape tensor must be 1-D and static, got ${fmt(shapeTensor.shape)}`);
      }
      const value = this.knownValue(shapeTensor);
      reshape = value !== undefined ? Array.from(value.values) : undefined;
      if (reshape === undefined) {
        shape = new Array<number>(shapeTensor.shape[0]).fill(-1);
      }
    }
    if (reshape !== undefined) {
      shape = this.resolveReshape(shape, reshape);
    }
    if (params.secondTranspose !== undefined) {
      shape = this.permute(shape, params.secondTranspose);
    }
    const inputs = shapeTensor !== undefined ? [input, shapeTensor] : [input];
    const [out] = this.addLayer({ kind: "Shuffle", ...params }, inputs, [{ dataType: input.dataType, shape }]);
    return out;
  }

  addMatrixMultiply(
    a: TensorNode.Class,
    op0: MatrixOperation,
    b: TensorNode.Class,
    op1: MatrixOperation,
  ): TensorNode.Class {
    const split = (shape: number[], op: MatrixOperation): { batch: number[]; rows: number; cols: number } => {
      if (op === MatrixOperation.VECTOR) {
        if (shape.length < 1) throw new NetworkConstructionError("a vector operand needs rank >= 1");
        return { batch: shape.slice(0, -1), rows: 1, cols: shape[shape.length - 1] };
      }
      if (shape.length < 2) throw new NetworkConstructionError(`a matrix operand needs rank >= 2, got ${fmt(shape)}`);
      const r = shape[shape.length - 2];
      const c = shape[shape.length - 1];
      return op === MatrixOperation.TRANSPOSE
        ? { batch: shape.slice(0, -2), rows: c, cols: r }
        : { batch: shape.slice(0, -2), rows: r, cols: c };
    };
    const lhs = split(a.shape, op0);
    const rhs = split(b.shape, op1);
    // A vector on the right is a column: its length is the contracted size.
    const rhsRows = op1 === MatrixOperation.VECTOR ? rhs.cols : rhs.rows;
    const rhsCols = op1 === MatrixOperation.VECTOR ? 1 : rhs.cols;
    if (lhs.cols !== -1 && rhsRows !== -1 && lhs.cols !== rhsRows) {
      throw new NetworkConstructionError(
        `matrix multiply of ${fmt(a.shape)} and ${fmt(b.shape)} contracts ${lhs.cols} against ${rhsRows}`,
      );
    }
    const batch = broadcastShapes([lhs.batch, rhs.batch]);
    const shape = [...batch];
    if (op0 !== MatrixOperation.VECTOR) shape.push(lhs.rows);
    if (op1 !== MatrixOperation.VECTOR) shape.push(rhsCols);
    const [out] = this.addLayer({ kind: "MatrixMultiply", op0, op1 }, [a, b], [{ dataType: a.dataType, shape }]);
    return out;
  }

  /** Contracts the last axis of `input` against a `[outputs, K]` kernel. */
  addFullyConnected(input: TensorNode.Class, outputs: number, kernel: Weights, bias?: Weights): TensorNode.Class {
    const k = input.shape[input.rank - 1];
    if (kernel.shape.length !== 2 || kernel.shape[0] !== outputs || (k !== -1 && kernel.shape[1] !== k)) {
      throw new NetworkConstructionError(
        `fully connected kernel ${fmt(kernel.shape)} does not match input ${fmt(input.shape)} and ${outputs} outputs`,
      );
    }
    if (bias !== undefined && bias.values.length !== outputs) {
      throw new NetworkConstructionError(`fully connected bias holds ${bias.values.length} values, expected ${outputs}`);
    }
    const shape = [...input.shape.slice(0, -1), outputs];
    const [out] = this.addLayer({ kind: "FullyConnected", outputs, kernel, bias }, [input], [
      { dataType: input.dataType, shape },
    ]);
    return out;
  }

  addConvolution(input: TensorNode.Class, params: Without<"Convolution">): TensorNode.Class {
    const spatial = this.spatialInput(input, params.kernelSize.length);
    const channels = input.shape[1];
    const expected = params.kernel.shape[1] * params.groups;
    if (channels !== -1 && channels !== expected) {
      throw new NetworkConstructionError(`convolution expects ${expected} input channels, got ${channels}`);
    }
    const out = spatial.map((d, i) => {
      if (d === -1) return -1;
      const window = (params.kernelSize[i] - 1) * params.dilations[i] + 1;
      return this.positive(
        windowOutput(d + params.prePadding[i] + params.postPadding[i] - window, params.strides[i], false),
      );
    });
    const [tensor] = this.addLayer({ kind: "Convolution", ...params }, [input], [
      { dataType: input.dataType, shape: [input.shape[0], params.outputMaps, ...out] },
    ]);
    return tensor;
  }

  addDeconvolution(input: TensorNode.Class, params: Without<"Deconvolution">): TensorNode.Class {
    const spatial = this.spatialInput(input, params.kernelSize.length);
    const out = spatial.map((d, i) => {
      if (d === -1) return -1;
      const window = (params.kernelSize[i] - 1) * params.dilations[i] + 1;
      return this.positive((d - 1) * params.strides[i] + window - params.prePadding[i] - params.postPadding[i]);
    });
    const [tensor] = this.addLayer({ kind: "Deconvolution", ...params }, [input], [
      { dataType: input.dataType, shape: [input.shape[0], params.outputMaps, ...out] },
    ]);
    return tensor;
  }

  addPooling(input: TensorNode.Class, params: Without<"Pooling">): TensorNode.Class {
    const spatial = this.spatialInput(input, params.kernelSize.length);
    const out = spatial.map((d, i) => {
      if (d === -1) return -1;
      const extent = d + params.prePadding[i] + params.postPadding[i] - params.kernelSize[i];
      return this.positive(windowOutput(extent, params.strides[i], params.roundUp));
    });
    const [tensor] = this.addLayer({ kind: "Pooling", ...params }, [input], [
      { dataType: input.dataType, shape: [...input.shape.slice(0, 2), ...out] },
    ]);
    return tensor;
  }

  addScale(input: TensorNode.Class, params: Without<"Scale">): TensorNode.Class {
    const channels = input.shape[1];
    if (params.mode === ScaleMode.CHANNEL && channels !== -1) {
      for (const w of [params.shift, params.scale, params.power]) {
        if (w !== undefined && w.values.length !== channels) {
          throw new NetworkConstructionError(`per-channel scale holds ${w.values.length} values for ${channels} channels`);
        }
      }
    }
    const [out] = this.addLayer({ kind: "Scale", ...params }, [input], [
      { dataType: input.dataType, shape: [...input.shape] },
    ]);
    return out;
  }

  addConcatenation(inputs: TensorNode.Class[], axis: number): TensorNode.Class {
    if (inputs.length === 0) throw new NetworkConstructionError("concatenation needs at least one input");
    const rank = inputs[0].rank;
    if (axis < 0 || axis >= rank) throw new NetworkConstructionError(`concatenation axis ${axis} out of range`);
    const shape = [...inputs[0].shape];
    for (const t of inputs.slice(1)) {
      if (t.rank !== rank) throw new NetworkConstructionError("concatenated tensors must have equal rank");
      t.shape.forEach((d, i) => {
        if (i === axis) {
          shape[i] = shape[i] === -1 || d === -1 ? -1 : shape[i] + d;
        } else if (d !== shape[i] && d !== -1 && shape[i] !== -1) {
          throw new NetworkConstructionError(
            `concatenation on axis ${axis} of ${fmt(inputs[0].shape)} and ${fmt(t.shape)}`,
          );
        }
      });
    }
    const [out] = this.addLayer({ kind: "Concatenation", axis }, inputs, [{ dataType: inputs[0].dataType, shape }]);
    return out;
  }

  /**
   * Slice with per-axis start, size and stride. A stride of 0 repeats the
   * start element; WRAP mode reads indices modulo the input size. Dynamic
   * inputs occupy slots 1 to 3 and override the static values.
   */
  addSlice(
    input: TensorNode.Class,
    start: number[],
    size: number[],
    stride: number[],
    mode: SliceMode = SliceMode.DEFAULT,
    dynamic: DynamicSliceInputs = {},
  ): TensorNode.Class {
    let shape = [...size];
    if (dynamic.size !== undefined) {
      const known = this.knownValue(dynamic.size);
      shape = known !== undefined ? Array.from(known.values) : new Array<number>(dynamic.size.shape[0]).fill(-1);
    }
    if (shape.length !== input.rank || start.length !== input.rank || stride.length !== input.rank) {
      throw new NetworkConstructionError(`slice parameters do not match input rank ${input.rank}`);
    }
    const inputs = [input, dynamic.start, dynamic.size, dynamic.stride];
    while (inputs.length > 1 && inputs[inputs.length - 1] === undefined) inputs.pop();
    const [out] = this.addLayer({ kind: "Slice", start, size, stride, mode }, inputs, [
      { dataType: input.dataType, shape },
    ]);
    return out;
  }

  addGather(data: TensorNode.Class, indices: TensorNode.Class, axis: number): TensorNode.Class {
    if (axis < 0 || axis >= data.rank) throw new NetworkConstructionError(`gather axis ${axis} out of range`);
    const shape = [...data.shape.slice(0, axis), ...indices.shape, ...data.shape.slice(axis + 1)];
    this.checkRank(shape);
    const [out] = this.addLayer({ kind: "Gather", axis }, [data, indices], [{ dataType: data.dataType, shape }]);
    return out;
  }

  addReduce(input: TensorNode.Class, operation: ReduceOperation, axes: number, keepDims: boolean): TensorNode.Class {
    const shape = this.reduceShape(input.shape, axes, keepDims);
    const [out] = this.addLayer({ kind: "Reduce", operation, axes, keepDims }, [input], [
      { dataType: input.dataType, shape },
    ]);
    return out;
  }

  addTopK(
    input: TensorNode.Class,
    operation: TopKOperation,
    k: number,
    axes: number,
  ): { values: TensorNode.Class; indices: TensorNode.Class } {
    const shape = [...input.shape];
    const axis = shape.findIndex((_, i) => (axes & (1 << i)) !== 0);
    if (axis < 0 || axes !== 1 << axis) throw new NetworkConstructionError("top-k reduces exactly one axis");
    if (shape[axis] !== -1 && k > shape[axis]) {
      throw new NetworkConstructionError(`top-k of ${k} over an axis of size ${shape[axis]}`);
    }
    shape[axis] = k;
    const [values, indices] = this.addLayer({ kind: "TopK", operation, k, axes }, [input], [
      { dataType: input.dataType, shape },
      { dataType: NetworkDataType.INT32, shape: [...shape] },
    ]);
    return { values, indices };
  }

  addSoftMax(input: TensorNode.Class, axes: number): TensorNode.Class {
    if (axes >= 1 << input.rank) throw new NetworkConstructionError("softmax axis out of range");
    const [out] = this.addLayer({ kind: "SoftMax", axes }, [input], [
      { dataType: input.dataType, shape: [...input.shape] },
    ]);
    return out;
  }

  /** Pads (or, with negative values, crops) the two innermost dimensions. */
  addPadding(input: TensorNode.Class, prePadding: number[], postPadding: number[]): TensorNode.Class {
    if (input.rank < 2 || prePadding.length !== 2 || postPadding.length !== 2) {
      throw new NetworkConstructionError("padding applies to the two innermost dimensions");
    }
    const shape = [...input.shape];
    for (let i = 0; i < 2; i++) {
      const axis = input.rank - 2 + i;
      if (shape[axis] !== -1) shape[axis] = this.positive(shape[axis] + prePadding[i] + postPadding[i]);
    }
    const [out] = this.addLayer({ kind: "Padding", prePadding, postPadding }, [input], [
      { dataType: input.dataType, shape },
    ]);
    return out;
  }

  addLRN(input: TensorNode.Class, window: number, alpha: number, beta: number, k: number): TensorNode.Class {
    const [out] = this.addLayer({ kind: "LRN", window, alpha, beta, k }, [input], [
      { dataType: input.dataType, shape: [...input.shape] },
    ]);
    return out;
  }

  addResize(input: TensorNode.Class, mode: ResizeMode, scales: number[]): TensorNode.Class {
    if (scales.length !== input.rank) {
      throw new NetworkConstructionError(`resize needs ${input.rank} scales, got ${scales.length}`);
    }
    const shape = input.shape.map((d, i) => (d === -1 ? -1 : Math.floor(d * scales[i])));
    const [out] = this.addLayer({ kind: "Resize", mode, scales }, [input], [{ dataType: input.dataType, shape }]);
    return out;
  }

  addShape(input: TensorNode.Class): TensorNode.Class {
    const [out] = this.addLayer({ kind: "Shape" }, [input], [
      { dataType: NetworkDataType.INT32, shape: [input.rank] },
    ]);
    if (!input.shape.includes(-1)) {
      this.known.set(out.id, {
        dataType: NetworkDataType.INT32,
        shape: [input.rank],
        values: Int32Array.from(input.shape),
      });
    }
    return out;
  }

  addSelect(condition: TensorNode.Class, then: TensorNode.Class, otherwise: TensorNode.Class): TensorNode.Class {
    const shape = broadcastShapes([condition.shape, then.shape, otherwise.shape]);
    const [out] = this.addLayer({ kind: "Select" }, [condition, then, otherwise], [
      { dataType: then.dataType, shape },
    ]);
    return out;
  }

  addParametricReLU(input: TensorNode.Class, slopes: TensorNode.Class): TensorNode.Class {
    broadcastShapes([input.shape, slopes.shape]);
    const [out] = this.addLayer({ kind: "ParametricReLU" }, [input, slopes], [
      { dataType: input.dataType, shape: [...input.shape] },
    ]);
    return out;
  }

  addPlugin(
    inputs: TensorNode.Class[],
    pluginName: string,
    pluginVersion: string,
    fields: Record<string, PluginField>,
    outputs: TensorDesc[],
  ): TensorNode.Class[] {
    outputs.forEach((o) => this.checkRank(o.shape));
    return this.addLayer({ kind: "Plugin", pluginName, pluginVersion, fields }, inputs, outputs);
  }

  // Loop constructs. Layers of one loop share the identifier returned by addLoop().

  addLoop(): string {
    return `loop${this.nextLoop++}`;
  }

  addTripLimit(loop: string, tensor: TensorNode.Class, limit: TripLimit): LayerNode.Class {
    const expected = limit === TripLimit.COUNT ? NetworkDataType.INT32 : NetworkDataType.BOOL;
    if (tensor.rank !== 0 || tensor.dataType !== expected) {
      throw new NetworkConstructionError(`a ${limit} trip limit takes a ${expected} scalar, got ${fmt(tensor.shape)}`);
    }
    return this.addLayerNode({ kind: "TripLimit", loop, limit }, [tensor], []).layer;
  }

  addRecurrence(loop: string, initial: TensorNode.Class): Recurrence {
    const { layer, outputs } = this.addLayerNode({ kind: "Recurrence", loop }, [initial], [
      { dataType: initial.dataType, shape: [...initial.shape] },
    ]);
    return { layer, output: outputs[0] };
  }

  setRecurrenceNext(recurrence: Recurrence, next: TensorNode.Class): void {
    const current = recurrence.output.shape;
    const compatible =
      current.length === next.rank && current.every((d, i) => d === next.shape[i] || d === -1 || next.shape[i] === -1);
    if (!compatible) {
      throw new NetworkConstructionError(`recurrence of shape ${fmt(current)} cannot take ${fmt(next.shape)}`);
    }
    this.graph.addEdge(next, recurrence.layer).init(new NetworkEdge.Builder(1)).as(NetworkEdge);
  }

  addIterator(loop: string, tensor: TensorNode.Class, axis: number, reverse: boolean): TensorNode.Class {
    if (axis < 0 || axis >= tensor.rank) throw new NetworkConstructionError(`iterator axis ${axis} out of range`);
    const shape = tensor.shape.filter((_, i) => i !== axis);
    const [out] = this.addLayer({ kind: "Iterator", loop, axis, reverse }, [tensor], [
      { dataType: tensor.dataType, shape },
    ]);
    return out;
  }

  /**
   * Concatenating outputs insert the loop length at `axis`; `length` is the
   * scalar INT32 tensor holding it.
   */
  addLoopOutput(
    loop: string,
    tensor: TensorNode.Class,
    outputKind: LoopOutputKind,
    axis: number = 0,
    length?: TensorNode.Class,
  ): TensorNode.Class {
    let shape = [...tensor.shape];
    const inputs = [tensor];
    if (outputKind !== LoopOutputKind.LAST_VALUE) {
      if (length === undefined) throw new NetworkConstructionError("a concatenating loop output needs its length");
      if (axis < 0 || axis > tensor.rank) throw new NetworkConstructionError(`loop output axis ${axis} out of range`);
      const known = this.knownValue(length);
      const size = known !== undefined && known.values.length === 1 ? known.values[0] : -1;
      shape = [...shape.slice(0, axis), size, ...shape.slice(axis)];
      inputs.push(length);
    }
    const [out] = this.addLayer({ kind: "LoopOutput", loop, outputKind, axis }, inputs, [
      { dataType: tensor.dataType, shape },
    ]);
    return out;
  }

  private addLayer(
    params: LayerParams,
    inputs: (TensorNode.Class | undefined)[],
    outputs: TensorDesc[],
  ): TensorNode.Class[] {
    return this.addLayerNode(params, inputs, outputs).outputs;
  }

  private addLayerNode(
    params: LayerParams,
    inputs: (TensorNode.Class | undefined)[],
    outputs: TensorDesc[],
  ): { layer: LayerNode.Class; outputs: TensorNode.Class[] } {
    const index = this.nextLayer++;
    const name = this.prefix !== "" ? `${this.prefix}/${params.kind}_${index}` : `${params.kind}_${index}`;
    const layer = this.graph.addNode(`L${index}`).init(new LayerNode.Builder(name, params)).as(LayerNode);
    inputs.forEach((tensor, slot) => {
      if (tensor !== undefined) {
        this.graph.addEdge(tensor, layer).init(new NetworkEdge.Builder(slot)).as(NetworkEdge);
      }
    });
    const tensors = outputs.map((desc, slot) => {
      this.checkRank(desc.shape);
      const tensor = this.graph
        .addNode(`T${this.nextTensor++}`)
        .init(new TensorNode.Builder(`${name}:${slot}`, desc.dataType, desc.shape))
        .as(TensorNode);
      this.graph.addEdge(layer, tensor).init(new NetworkEdge.Builder(slot)).as(NetworkEdge);
      return tensor;
    });
    return { layer, outputs: tensors };
  }

  private checkRank(shape: number[]): void {
    if (shape.length > MAX_DIMS) {
      throw new NetworkConstructionError(`rank ${shape.length} exceeds ${MAX_DIMS}`);
    }
  }

  private positive(size: number): number {
    if (size < 1) throw new NetworkConstructionError(`computed output size ${size} is not positive`);
    return size;
  }

  private spatialInput(input: TensorNode.Class, spatialRank: number): number[] {
    if (input.rank !== spatialRank + 2) {
      throw new NetworkConstructionError(
        `windowed layer with ${spatialRank} spatial dims cannot take ${fmt(input.shape)}`,
      );
    }
    return input.shape.slice(2);
  }

  private permute(shape: number[], perm: number[]): number[] {
    const valid =
      perm.length === shape.length &&
      new Set(perm).size === perm.length &&
      perm.every((p) => p >= 0 && p < shape.length);
    if (!valid) throw new NetworkConstructionError(`${fmt(perm)} is not a permutation of ${fmt(shape)}`);
    return perm.map((p) => shape[p]);
  }

  private resolveReshape(input: number[], reshape: number[]): number[] {
    const shape = reshape.map((d, i) => {
      if (d !== 0) return d;
      if (i >= input.length) throw new NetworkConstructionError(`reshape copies missing dimension ${i}`);
      return input[i];
    });
    const inferred = reshape.reduce<number[]>((acc, d, i) => (d === -1 ? [...acc, i] : acc), []);
    if (inferred.length > 1) throw new NetworkConstructionError("reshape infers more than one dimension");
    const inputKnown = !input.includes(-1);
    const others = shape.filter((_, i) => !inferred.includes(i));
    const othersKnown = !others.includes(-1);
    if (inferred.length === 1) {
      const known = volume(others);
      if (inputKnown && othersKnown && known !== 0) {
        const total = volume(input);
        if (total % known !== 0) {
          throw new NetworkConstructionError(`cannot reshape ${fmt(input)} into ${fmt(reshape)}`);
        }
        shape[inferred[0]] = total / known;
      }
    } else if (inputKnown && othersKnown && volume(input) !== volume(shape)) {
      throw new NetworkConstructionError(`cannot reshape ${fmt(input)} into ${fmt(shape)}`);
    }
    this.checkRank(shape);
    return shape;
  }

  private reduceShape(shape: number[], axes: number, keepDims: boolean): number[] {
    if (axes >= 1 << shape.length) throw new NetworkConstructionError("reduce axes out of range");
    const out: number[] = [];
    shape.forEach((d, i) => {
      if ((axes & (1 << i)) === 0) out.push(d);
      else if (keepDims) out.push(1);
    });
    return out;
  }
}
