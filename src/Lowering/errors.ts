export enum ErrorKind {
  UnsupportedOperator = "UnsupportedOperator",
  UnsupportedNodeForm = "UnsupportedNodeForm",
  InvalidNode = "InvalidNode",
  InvalidValue = "InvalidValue",
  InternalError = "InternalError",
}

export interface LoweringError {
  kind: ErrorKind;
  message: string;
  opType?: string;
  nodeName?: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: LoweringError };

export type Failure = { ok: false; error: LoweringError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(kind: ErrorKind, message: string): Failure {
  return { ok: false, error: { kind, message } };
}

/**
 * Returns a failure when `condition` does not hold, `undefined` otherwise.
 * Importers use it as `const bad = check(...); if (bad) return bad;`.
 */
export function check(condition: boolean, kind: ErrorKind, message: string): Failure | undefined {
  return condition ? undefined : fail(kind, message);
}

export function unsupported(message: string): Failure {
  return fail(ErrorKind.UnsupportedNodeForm, message);
}

export function invalid(message: string): Failure {
  return fail(ErrorKind.InvalidNode, message);
}

export function formatLoweringError(error: LoweringError): string {
  const where = error.opType !== undefined ? ` ${error.opType} node '${error.nodeName ?? ""}'` : "";
  return `[${error.kind}]${where}: ${error.message}`;
}

/** Duplicate importer registration. Raised while the registry is built. */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/** A loop was closed or extended in a state that does not allow it. */
export class LoopConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LoopConstructionError";
  }
}

/** The network builder was asked for a layer whose shapes it cannot accept. */
export class NetworkConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NetworkConstructionError";
  }
}
