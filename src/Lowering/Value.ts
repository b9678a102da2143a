import TensorNode from "../Network/TensorNode.js";
import { NetworkBuilder } from "../Network/NetworkBuilder.js";
import { NetworkDataType } from "../Network/LayerTypes.js";
import { Weights, byteSize, volume, weightsLike } from "../Network/Weights.js";

/**
 * What a node input or output resolves to: a tensor of the network under
 * construction, or a constant known at lowering time. Weights are staged into
 * the network on demand; a tensor never turns back into weights.
 */
export type Value =
  | { kind: "tensor"; tensor: TensorNode.Class }
  | { kind: "weights"; weights: Weights };

export function tensorValue(tensor: TensorNode.Class): Value {
  return { kind: "tensor", tensor };
}

export function weightsValue(weights: Weights): Value {
  return { kind: "weights", weights };
}

export function shapeOf(value: Value): number[] {
  return value.kind === "tensor" ? value.tensor.shape : value.weights.shape;
}

export function dataTypeOf(value: Value): NetworkDataType {
  return value.kind === "tensor" ? value.tensor.dataType : value.weights.dataType;
}

export function convertToTensor(network: NetworkBuilder, value: Value): TensorNode.Class {
  return value.kind === "tensor" ? value.tensor : network.addConstant(value.weights);
}

/**
 * Owns the scratch constants created while lowering. Nothing is released
 * before the session ends since emitted layers keep referencing the buffers.
 */
export class WeightArena {
  private readonly buffers: Weights[] = [];

  createTemp(dataType: NetworkDataType, shape: number[], values?: ArrayLike<number>): Weights {
    const weights = weightsLike(dataType, shape, values ?? new Array<number>(volume(shape)).fill(0));
    this.buffers.push(weights);
    return weights;
  }

  adopt(weights: Weights): Weights {
    this.buffers.push(weights);
    return weights;
  }

  get count(): number {
    return this.buffers.length;
  }

  get bytes(): number {
    return this.buffers.reduce((total, w) => total + byteSize(w), 0);
  }
}
