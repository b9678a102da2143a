import {
  ActivationType,
  ElementWiseOperation,
  LoopOutputKind,
  MatrixOperation,
  NetworkDataType,
  PaddingMode,
  PoolingType,
  ReduceOperation,
  ResizeMode,
  ScaleMode,
  SliceMode,
  TopKOperation,
  TripLimit,
  UnaryOperation,
} from "./LayerTypes.js";
import { Weights } from "./Weights.js";

export interface WindowParams {
  kernelSize: number[];
  strides: number[];
  prePadding: number[];
  postPadding: number[];
  paddingMode: PaddingMode;
}

export type PluginField = number | number[] | string | Weights;

// Layer parameters, discriminated by `kind`. Axes of Reduce, TopK and SoftMax
// are bit masks over the input dimensions.
export type LayerParams =
  | { kind: "Constant"; weights: Weights }
  | { kind: "Identity"; outputType?: NetworkDataType }
  | { kind: "ElementWise"; operation: ElementWiseOperation }
  | { kind: "Unary"; operation: UnaryOperation }
  | { kind: "Activation"; activation: ActivationType; alpha: number; beta: number }
  | {
      kind: "Shuffle";
      firstTranspose?: number[];
      reshape?: number[];
      secondTranspose?: number[];
    }
  | { kind: "MatrixMultiply"; op0: MatrixOperation; op1: MatrixOperation }
  | { kind: "FullyConnected"; outputs: number; kernel: Weights; bias?: Weights }
  | ({
      kind: "Convolution";
      outputMaps: number;
      kernel: Weights;
      bias?: Weights;
      dilations: number[];
      groups: number;
    } & WindowParams)
  | ({
      kind: "Deconvolution";
      outputMaps: number;
      kernel: Weights;
      bias?: Weights;
      dilations: number[];
      groups: number;
    } & WindowParams)
  | ({
      kind: "Pooling";
      type: PoolingType;
      averageCountExcludesPadding: boolean;
      roundUp: boolean;
    } & WindowParams)
  | { kind: "Scale"; mode: ScaleMode; shift?: Weights; scale?: Weights; power?: Weights }
  | { kind: "Concatenation"; axis: number }
  | { kind: "Slice"; start: number[]; size: number[]; stride: number[]; mode: SliceMode }
  | { kind: "Gather"; axis: number }
  | { kind: "Reduce"; operation: ReduceOperation; axes: number; keepDims: boolean }
  | { kind: "TopK"; operation: TopKOperation; k: number; axes: number }
  | { kind: "SoftMax"; axes: number }
  | { kind: "Padding"; prePadding: number[]; postPadding: number[] }
  | { kind: "LRN"; window: number; alpha: number; beta: number; k: number }
  | { kind: "Resize"; mode: ResizeMode; scales: number[] }
  | { kind: "Shape" }
  | { kind: "Select" }
  | { kind: "ParametricReLU" }
  | { kind: "Plugin"; pluginName: string; pluginVersion: string; fields: Record<string, PluginField> }
  | { kind: "TripLimit"; loop: string; limit: TripLimit }
  | { kind: "Recurrence"; loop: string }
  | { kind: "Iterator"; loop: string; axis: number; reverse: boolean }
  | { kind: "LoopOutput"; loop: string; outputKind: LoopOutputKind; axis: number };

export type LayerKind = LayerParams["kind"];

export type ParamsOf<K extends LayerKind> = Extract<LayerParams, { kind: K }>;

export function loopOf(params: LayerParams): string | undefined {
  switch (params.kind) {
    case "TripLimit":
    case "Recurrence":
    case "Iterator":
    case "LoopOutput":
      return params.loop;
    default:
      return undefined;
  }
}
