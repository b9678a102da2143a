import { NetworkDataType } from "./LayerTypes.js";

export type WeightValues = Float32Array | Int32Array | Uint8Array;

/** A constant buffer known while the network is being built. */
export interface Weights {
  dataType: NetworkDataType;
  shape: number[];
  values: WeightValues;
}

export function volume(shape: readonly number[]): number {
  return shape.reduce((acc, d) => acc * d, 1);
}

export function floatWeights(shape: number[], values: ArrayLike<number>): Weights {
  return { dataType: NetworkDataType.FLOAT, shape, values: Float32Array.from(values) };
}

export function int32Weights(shape: number[], values: ArrayLike<number>): Weights {
  return { dataType: NetworkDataType.INT32, shape, values: Int32Array.from(values) };
}

export function boolWeights(shape: number[], values: ArrayLike<number>): Weights {
  return { dataType: NetworkDataType.BOOL, shape, values: Uint8Array.from(values) };
}

export function weightsLike(dataType: NetworkDataType, shape: number[], values: ArrayLike<number>): Weights {
  switch (dataType) {
    case NetworkDataType.INT32:
      return int32Weights(shape, values);
    case NetworkDataType.BOOL:
    case NetworkDataType.UINT8:
      return { dataType, shape, values: Uint8Array.from(values) };
    default:
      return { dataType, shape, values: Float32Array.from(values) };
  }
}

export function byteSize(weights: Weights): number {
  return weights.values.byteLength;
}
