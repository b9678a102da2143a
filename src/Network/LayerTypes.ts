// enums for network layers and tensor element types

export enum NetworkDataType {
  FLOAT = "FLOAT",
  HALF = "HALF",
  INT8 = "INT8",
  INT32 = "INT32",
  BOOL = "BOOL",
  UINT8 = "UINT8",
}

export enum ElementWiseOperation {
  SUM = "SUM",
  PROD = "PROD",
  MAX = "MAX",
  MIN = "MIN",
  SUB = "SUB",
  DIV = "DIV",
  POW = "POW",
  EQUAL = "EQUAL",
  GREATER = "GREATER",
  LESS = "LESS",
}

export enum UnaryOperation {
  EXP = "EXP",
  LOG = "LOG",
  SQRT = "SQRT",
  RECIP = "RECIP",
  ABS = "ABS",
  NEG = "NEG",
  SIN = "SIN",
  COS = "COS",
  TAN = "TAN",
  SINH = "SINH",
  COSH = "COSH",
  ASIN = "ASIN",
  ACOS = "ACOS",
  ATAN = "ATAN",
  ASINH = "ASINH",
  ACOSH = "ACOSH",
  ATANH = "ATANH",
  CEIL = "CEIL",
  FLOOR = "FLOOR",
  ERF = "ERF",
  NOT = "NOT",
}

export enum ActivationType {
  RELU = "RELU",
  SIGMOID = "SIGMOID",
  TANH = "TANH",
  LEAKY_RELU = "LEAKY_RELU",
  ELU = "ELU",
  SELU = "SELU",
  SOFTSIGN = "SOFTSIGN",
  SOFTPLUS = "SOFTPLUS",
  CLIP = "CLIP",
  HARD_SIGMOID = "HARD_SIGMOID",
  SCALED_TANH = "SCALED_TANH",
  THRESHOLDED_RELU = "THRESHOLDED_RELU",
  AFFINE = "AFFINE",
}

export enum MatrixOperation {
  NONE = "NONE",
  TRANSPOSE = "TRANSPOSE",
  VECTOR = "VECTOR",
}

export enum ReduceOperation {
  SUM = "SUM",
  PROD = "PROD",
  MAX = "MAX",
  MIN = "MIN",
  AVG = "AVG",
}

export enum PoolingType {
  MAX = "MAX",
  AVERAGE = "AVERAGE",
}

export enum PaddingMode {
  EXPLICIT = "explicit",
  SAME_UPPER = "same-upper",
  SAME_LOWER = "same-lower",
}

export enum ScaleMode {
  UNIFORM = "UNIFORM",
  CHANNEL = "CHANNEL",
  ELEMENTWISE = "ELEMENTWISE",
}

export enum TopKOperation {
  MAX = "MAX",
  MIN = "MIN",
}

export enum ResizeMode {
  NEAREST = "NEAREST",
  LINEAR = "LINEAR",
}

export enum SliceMode {
  DEFAULT = "DEFAULT",
  WRAP = "WRAP",
}

export enum TripLimit {
  COUNT = "COUNT",
  WHILE = "WHILE",
}

export enum LoopOutputKind {
  LAST_VALUE = "LAST_VALUE",
  CONCATENATE = "CONCATENATE",
  REVERSE = "REVERSE",
}

export const MAX_DIMS = 8;
