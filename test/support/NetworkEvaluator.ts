import NetworkGraph from "../../src/Network/NetworkGraph.js";
import LayerNode from "../../src/Network/LayerNode.js";
import TensorNode from "../../src/Network/TensorNode.js";
import { LayerParams } from "../../src/Network/LayerParams.js";
import {
  ActivationType,
  ElementWiseOperation,
  LoopOutputKind,
  MatrixOperation,
  ReduceOperation,
  SliceMode,
  TripLimit,
  UnaryOperation,
} from "../../src/Network/LayerTypes.js";

// Reference interpreter for lowered networks. It runs the layers the
// recurrent and control-flow lowerings emit, one loop level deep, in float64.

export interface HostTensor {
  shape: number[];
  data: number[];
}

const MAX_ITERATIONS = 100_000;

export function hostTensor(shape: number[], data: number[]): HostTensor {
  if (volume(shape) !== data.length) throw new Error(`[${shape}] cannot hold ${data.length} values`);
  return { shape, data };
}

function volume(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

function unravel(index: number, shape: readonly number[]): number[] {
  const coords = new Array<number>(shape.length).fill(0);
  for (let i = shape.length - 1; i >= 0; i--) {
    coords[i] = index % shape[i];
    index = Math.floor(index / shape[i]);
  }
  return coords;
}

/** Element at `coords`, reading size-1 dimensions as broadcast. */
function at(t: HostTensor, coords: readonly number[]): number {
  let offset = 0;
  for (let i = 0; i < t.shape.length; i++) {
    offset = offset * t.shape[i] + (t.shape[i] === 1 ? 0 : coords[i]);
  }
  return t.data[offset];
}

function generate(shape: number[], fn: (coords: number[]) => number): HostTensor {
  const data = new Array<number>(volume(shape));
  for (let i = 0; i < data.length; i++) data[i] = fn(unravel(i, shape));
  return { shape, data };
}

function broadcastShape(shapes: number[][]): number[] {
  return shapes[0].map((_, i) => Math.max(...shapes.map((s) => s[i])));
}

function transpose(t: HostTensor, perm: readonly number[]): HostTensor {
  const shape = perm.map((p) => t.shape[p]);
  return generate(shape, (coords) => {
    const source = new Array<number>(perm.length);
    perm.forEach((p, i) => (source[p] = coords[i]));
    return at(t, source);
  });
}

function reshape(t: HostTensor, dims: readonly number[]): HostTensor {
  const shape = dims.map((d, i) => (d === 0 ? t.shape[i] : d));
  const inferred = shape.indexOf(-1);
  if (inferred >= 0) {
    shape[inferred] = volume(t.shape) / volume(shape.filter((_, i) => i !== inferred));
  }
  return hostTensor(shape, [...t.data]);
}

function take(t: HostTensor, axis: number, index: number): HostTensor {
  const shape = t.shape.filter((_, i) => i !== axis);
  return generate(shape, (coords) => at(t, [...coords.slice(0, axis), index, ...coords.slice(axis)]));
}

function stack(parts: HostTensor[], axis: number): HostTensor {
  const inner = parts[0].shape;
  const shape = [...inner.slice(0, axis), parts.length, ...inner.slice(axis)];
  return generate(shape, (coords) => at(parts[coords[axis]], [...coords.slice(0, axis), ...coords.slice(axis + 1)]));
}

function concat(parts: HostTensor[], axis: number): HostTensor {
  const shape = [...parts[0].shape];
  shape[axis] = parts.reduce((total, p) => total + p.shape[axis], 0);
  return generate(shape, (coords) => {
    let index = coords[axis];
    for (const part of parts) {
      if (index < part.shape[axis]) {
        const local = [...coords];
        local[axis] = index;
        return at(part, local);
      }
      index -= part.shape[axis];
    }
    throw new Error("concatenation index out of range");
  });
}

const BINARY: Record<ElementWiseOperation, (a: number, b: number) => number> = {
  [ElementWiseOperation.SUM]: (a, b) => a + b,
  [ElementWiseOperation.PROD]: (a, b) => a * b,
  [ElementWiseOperation.MAX]: Math.max,
  [ElementWiseOperation.MIN]: Math.min,
  [ElementWiseOperation.SUB]: (a, b) => a - b,
  [ElementWiseOperation.DIV]: (a, b) => a / b,
  [ElementWiseOperation.POW]: Math.pow,
  [ElementWiseOperation.EQUAL]: (a, b) => (a === b ? 1 : 0),
  [ElementWiseOperation.GREATER]: (a, b) => (a > b ? 1 : 0),
  [ElementWiseOperation.LESS]: (a, b) => (a < b ? 1 : 0),
};

const UNARY: Partial<Record<UnaryOperation, (x: number) => number>> = {
  [UnaryOperation.EXP]: Math.exp,
  [UnaryOperation.LOG]: Math.log,
  [UnaryOperation.SQRT]: Math.sqrt,
  [UnaryOperation.RECIP]: (x) => 1 / x,
  [UnaryOperation.ABS]: Math.abs,
  [UnaryOperation.NEG]: (x) => -x,
  [UnaryOperation.SIN]: Math.sin,
  [UnaryOperation.COS]: Math.cos,
  [UnaryOperation.TAN]: Math.tan,
  [UnaryOperation.CEIL]: Math.ceil,
  [UnaryOperation.FLOOR]: Math.floor,
  [UnaryOperation.NOT]: (x) => (x === 0 ? 1 : 0),
};

function activation(type: ActivationType, alpha: number, beta: number): (x: number) => number {
  switch (type) {
    case ActivationType.RELU:
      return (x) => Math.max(0, x);
    case ActivationType.SIGMOID:
      return (x) => 1 / (1 + Math.exp(-x));
    case ActivationType.TANH:
      return Math.tanh;
    case ActivationType.LEAKY_RELU:
      return (x) => (x >= 0 ? x : alpha * x);
    case ActivationType.ELU:
      return (x) => (x >= 0 ? x : alpha * (Math.exp(x) - 1));
    case ActivationType.SELU:
      return (x) => (x > 0 ? beta * x : beta * alpha * (Math.exp(x) - 1));
    case ActivationType.SOFTSIGN:
      return (x) => x / (1 + Math.abs(x));
    case ActivationType.SOFTPLUS:
      return (x) => alpha * Math.log(Math.exp(beta * x) + 1);
    case ActivationType.CLIP:
      return (x) => Math.max(alpha, Math.min(beta, x));
    case ActivationType.HARD_SIGMOID:
      return (x) => Math.max(0, Math.min(1, alpha * x + beta));
    case ActivationType.SCALED_TANH:
      return (x) => alpha * Math.tanh(beta * x);
    case ActivationType.THRESHOLDED_RELU:
      return (x) => (x > alpha ? x : 0);
    case ActivationType.AFFINE:
      return (x) => alpha * x + beta;
  }
}

function matrixMultiply(a: HostTensor, op0: MatrixOperation, b: HostTensor, op1: MatrixOperation): HostTensor {
  const batchOf = (t: HostTensor, op: MatrixOperation): number[] =>
    t.shape.slice(0, op === MatrixOperation.VECTOR ? -1 : -2);
  const last = (t: HostTensor, back: number): number => t.shape[t.shape.length - back];
  const rows = op0 === MatrixOperation.TRANSPOSE ? last(a, 1) : op0 === MatrixOperation.NONE ? last(a, 2) : 1;
  const depth = op0 === MatrixOperation.TRANSPOSE ? last(a, 2) : last(a, 1);
  const cols = op1 === MatrixOperation.TRANSPOSE ? last(b, 2) : op1 === MatrixOperation.NONE ? last(b, 1) : 1;
  const batch = broadcastShape([batchOf(a, op0), batchOf(b, op1)]);
  const shape = [...batch];
  if (op0 !== MatrixOperation.VECTOR) shape.push(rows);
  if (op1 !== MatrixOperation.VECTOR) shape.push(cols);

  const lhs = (prefix: number[], i: number, k: number): number =>
    at(a, op0 === MatrixOperation.VECTOR ? [...prefix, k] : op0 === MatrixOperation.TRANSPOSE ? [...prefix, k, i] : [...prefix, i, k]);
  const rhs = (prefix: number[], k: number, j: number): number =>
    at(b, op1 === MatrixOperation.VECTOR ? [...prefix, k] : op1 === MatrixOperation.TRANSPOSE ? [...prefix, j, k] : [...prefix, k, j]);

  return generate(shape, (coords) => {
    const prefix = coords.slice(0, batch.length);
    const i = op0 !== MatrixOperation.VECTOR ? coords[batch.length] : 0;
    const j = op1 !== MatrixOperation.VECTOR ? coords[coords.length - 1] : 0;
    let total = 0;
    for (let k = 0; k < depth; k++) total += lhs(prefix, i, k) * rhs(prefix, k, j);
    return total;
  });
}

function reduce(t: HostTensor, operation: ReduceOperation, axes: number, keepDims: boolean): HostTensor {
  const reduced = (i: number): boolean => (axes & (1 << i)) !== 0;
  const kept = t.shape.map((d, i) => (reduced(i) ? 1 : d));
  const sums = new Array<number[]>(volume(kept)).fill([]).map((): number[] => []);
  t.data.forEach((value, index) => {
    const coords = unravel(index, t.shape).map((c, i) => (reduced(i) ? 0 : c));
    let offset = 0;
    coords.forEach((c, i) => (offset = offset * kept[i] + c));
    sums[offset].push(value);
  });
  const combine: Record<ReduceOperation, (values: number[]) => number> = {
    [ReduceOperation.SUM]: (v) => v.reduce((x, y) => x + y, 0),
    [ReduceOperation.PROD]: (v) => v.reduce((x, y) => x * y, 1),
    [ReduceOperation.MAX]: (v) => Math.max(...v),
    [ReduceOperation.MIN]: (v) => Math.min(...v),
    [ReduceOperation.AVG]: (v) => v.reduce((x, y) => x + y, 0) / v.length,
  };
  const shape = keepDims ? kept : t.shape.filter((_, i) => !reduced(i));
  return hostTensor(shape, sums.map(combine[operation]));
}

function slice(
  t: HostTensor,
  start: readonly number[],
  size: readonly number[],
  stride: readonly number[],
  mode: SliceMode,
): HostTensor {
  return generate([...size], (coords) =>
    at(
      t,
      coords.map((c, i) => {
        const index = start[i] + c * stride[i];
        return mode === SliceMode.WRAP ? ((index % t.shape[i]) + t.shape[i]) % t.shape[i] : index;
      }),
    ),
  );
}

interface Frame {
  body: Set<string>;
  values: Map<string, HostTensor>;
}

export class NetworkEvaluator {
  private readonly memo = new Map<string, HostTensor>();

  constructor(
    private readonly network: NetworkGraph.Class,
    private readonly inputs: Record<string, HostTensor>,
  ) {}

  value(tensor: TensorNode.Class): HostTensor {
    return this.valueIn(tensor, undefined);
  }

  private valueIn(tensor: TensorNode.Class, frame: Frame | undefined): HostTensor {
    const local = frame !== undefined && frame.body.has(tensor.id);
    const cache = local ? frame.values : this.memo;
    const cached = cache.get(tensor.id);
    if (cached !== undefined) return cached;

    const edge = tensor.producerEdges.toArray()[0];
    if (edge === undefined) {
      const given = this.inputs[tensor.name];
      if (given === undefined) throw new Error(`no value for network input '${tensor.name}'`);
      this.memo.set(tensor.id, given);
      return given;
    }
    const layer = edge.source.as(LayerNode);
    if (layer.loop !== undefined && !local) {
      this.runLoop(layer.loop);
    } else {
      const results = this.compute(layer, local ? frame : undefined);
      layer.outputs.forEach((out, slot) => cache.set(out.id, results[slot]));
    }
    const result = cache.get(tensor.id);
    if (result === undefined) throw new Error(`layer ${layer.name} did not produce ${tensor.name}`);
    return result;
  }

  private compute(layer: LayerNode.Class, frame: Frame | undefined): HostTensor[] {
    const inputs = layer.inputs.map((t) => (t !== undefined ? this.valueIn(t, frame) : undefined));
    const input = (slot: number): HostTensor => {
      const value = inputs[slot];
      if (value === undefined) throw new Error(`${layer.name} has no input ${slot}`);
      return value;
    };
    return this.apply(layer.params, inputs, input);
  }

  private apply(
    params: LayerParams,
    inputs: (HostTensor | undefined)[],
    input: (slot: number) => HostTensor,
  ): HostTensor[] {
    switch (params.kind) {
      case "Constant":
        return [hostTensor([...params.weights.shape], Array.from(params.weights.values))];
      case "Identity": {
        const x = input(0);
        return [{ shape: [...x.shape], data: [...x.data] }];
      }
      case "ElementWise": {
        const [a, b] = [input(0), input(1)];
        const fn = BINARY[params.operation];
        return [generate(broadcastShape([a.shape, b.shape]), (c) => fn(at(a, c), at(b, c)))];
      }
      case "Unary": {
        const fn = UNARY[params.operation];
        if (fn === undefined) throw new Error(`unary ${params.operation} is not evaluated`);
        const x = input(0);
        return [hostTensor([...x.shape], x.data.map(fn))];
      }
      case "Activation": {
        const x = input(0);
        return [hostTensor([...x.shape], x.data.map(activation(params.activation, params.alpha, params.beta)))];
      }
      case "Shuffle": {
        let x = input(0);
        if (params.firstTranspose !== undefined) x = transpose(x, params.firstTranspose);
        const shapeTensor = inputs[1];
        const dims = shapeTensor !== undefined ? shapeTensor.data : params.reshape;
        if (dims !== undefined) x = reshape(x, dims);
        if (params.secondTranspose !== undefined) x = transpose(x, params.secondTranspose);
        return [x];
      }
      case "MatrixMultiply":
        return [matrixMultiply(input(0), params.op0, input(1), params.op1)];
      case "Concatenation":
        return [concat(inputs.map((_, i) => input(i)), params.axis)];
      case "Slice": {
        const start = inputs[1]?.data ?? params.start;
        const size = inputs[2]?.data ?? params.size;
        const stride = inputs[3]?.data ?? params.stride;
        return [slice(input(0), start, size, stride, params.mode)];
      }
      case "Gather": {
        const [data, indices] = [input(0), input(1)];
        const axis = params.axis;
        const shape = [...data.shape.slice(0, axis), ...indices.shape, ...data.shape.slice(axis + 1)];
        return [
          generate(shape, (coords) => {
            const raw = at(indices, coords.slice(axis, axis + indices.shape.length));
            const index = raw < 0 ? raw + data.shape[axis] : raw;
            return at(data, [...coords.slice(0, axis), index, ...coords.slice(axis + indices.shape.length)]);
          }),
        ];
      }
      case "Reduce":
        return [reduce(input(0), params.operation, params.axes, params.keepDims)];
      case "Shape": {
        const x = input(0);
        return [hostTensor([x.shape.length], [...x.shape])];
      }
      case "Select": {
        const [cond, a, b] = [input(0), input(1), input(2)];
        return [generate(broadcastShape([cond.shape, a.shape, b.shape]), (c) => (at(cond, c) !== 0 ? at(a, c) : at(b, c)))];
      }
      case "Padding": {
        const x = input(0);
        const rank = x.shape.length;
        const shape = x.shape.map((d, i) => (i < rank - 2 ? d : d + params.prePadding[i - rank + 2] + params.postPadding[i - rank + 2]));
        return [
          generate(shape, (coords) => {
            const source = coords.map((c, i) => (i < rank - 2 ? c : c - params.prePadding[i - rank + 2]));
            return source.every((c, i) => c >= 0 && c < x.shape[i]) ? at(x, source) : 0;
          }),
        ];
      }
      default:
        throw new Error(`${params.kind} layers are not evaluated`);
    }
  }

  /** Tensors computed once per iteration: everything downstream of the loop's recurrences and iterators. */
  private bodyOf(loop: string): Set<string> {
    const body = new Set<string>();
    const pending: TensorNode.Class[] = [];
    for (const node of this.network.nodes) {
      const layer = node.tryAs(LayerNode);
      if (layer === undefined || layer.loop !== loop) continue;
      if (layer.kind !== "Recurrence" && layer.kind !== "Iterator") continue;
      for (const out of layer.outputs) {
        body.add(out.id);
        pending.push(out);
      }
    }
    while (pending.length > 0) {
      const tensor = pending.pop();
      if (tensor === undefined) break;
      for (const edge of tensor.consumerEdges.toArray()) {
        const consumer = edge.target.as(LayerNode);
        if (consumer.loop === loop) continue;
        if (consumer.loop !== undefined) throw new Error("nested loops are not evaluated");
        for (const out of consumer.outputs) {
          if (!body.has(out.id)) {
            body.add(out.id);
            pending.push(out);
          }
        }
      }
    }
    return body;
  }

  private runLoop(loop: string): void {
    const layers: LayerNode.Class[] = [];
    for (const node of this.network.nodes) {
      const layer = node.tryAs(LayerNode);
      if (layer !== undefined && layer.loop === loop) layers.push(layer);
    }
    const frame: Frame = { body: this.bodyOf(loop), values: new Map() };
    const first = (layer: LayerNode.Class, slot: number): TensorNode.Class => {
      const t = layer.inputs[slot];
      if (t === undefined) throw new Error(`${layer.name} has no input ${slot}`);
      return t;
    };

    let count: number | undefined;
    let condition: TensorNode.Class | undefined;
    const recurrences: { layer: LayerNode.Class; state: HostTensor }[] = [];
    const iterators: { layer: LayerNode.Class; source: HostTensor; axis: number; reverse: boolean }[] = [];
    const outputs: { layer: LayerNode.Class; kind: LoopOutputKind; axis: number; values: HostTensor[] }[] = [];
    for (const layer of layers) {
      const params = layer.params;
      if (params.kind === "TripLimit") {
        if (params.limit === TripLimit.COUNT) count = this.value(first(layer, 0)).data[0];
        else condition = first(layer, 0);
      } else if (params.kind === "Recurrence") {
        recurrences.push({ layer, state: this.value(first(layer, 0)) });
      } else if (params.kind === "Iterator") {
        iterators.push({ layer, source: this.value(first(layer, 0)), axis: params.axis, reverse: params.reverse });
      } else if (params.kind === "LoopOutput") {
        outputs.push({ layer, kind: params.outputKind, axis: params.axis, values: [] });
      }
    }

    for (let i = 0; ; i++) {
      if (count !== undefined && i >= count) break;
      if (i >= MAX_ITERATIONS) throw new Error(`${loop} did not stop`);
      frame.values = new Map();
      for (const r of recurrences) frame.values.set(r.layer.outputs[0].id, r.state);
      for (const it of iterators) {
        const length = it.source.shape[it.axis];
        frame.values.set(it.layer.outputs[0].id, take(it.source, it.axis, it.reverse ? length - 1 - i : i));
      }
      if (condition !== undefined && this.valueIn(condition, frame).data[0] === 0) break;
      for (const out of outputs) out.values.push(this.valueIn(first(out.layer, 0), frame));
      const next = recurrences.map((r) => this.valueIn(first(r.layer, 1), frame));
      recurrences.forEach((r, k) => (r.state = next[k]));
    }

    for (const out of outputs) {
      let result: HostTensor;
      if (out.kind === LoopOutputKind.LAST_VALUE) {
        const last = out.values[out.values.length - 1];
        if (last === undefined) throw new Error(`${loop} ran no iteration`);
        result = last;
      } else {
        const ordered = out.kind === LoopOutputKind.REVERSE ? [...out.values].reverse() : out.values;
        result = stack(ordered, out.axis);
      }
      this.memo.set(out.layer.outputs[0].id, result);
    }
  }
}
