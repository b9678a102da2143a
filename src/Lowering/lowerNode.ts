import { SourceNode } from "../Onnx/OnnxModel.js";
import { ErrorKind, NetworkConstructionError, Result, fail } from "./errors.js";
import { LoweringContext } from "./LoweringContext.js";
import { Value } from "./Value.js";

/**
 * Lowers one node through the registry. Failures leave with the node's
 * operator type and name attached; a builder contract violation surfaces as
 * an InternalError.
 */
export function lowerNode(ctx: LoweringContext, node: SourceNode, inputs: (Value | undefined)[]): Result<Value[]> {
  const importer = ctx.registry.lookup(node.opType);
  let result: Result<Value[]>;
  if (importer === undefined) {
    result = fail(ErrorKind.UnsupportedOperator, `no importer is registered for '${node.opType}'`);
  } else {
    ctx.network.setNamePrefix(node.name);
    try {
      result = importer(ctx, node, inputs);
    } catch (error) {
      if (!(error instanceof NetworkConstructionError)) throw error;
      result = fail(ErrorKind.InternalError, error.message);
    } finally {
      ctx.network.setNamePrefix("");
    }
  }
  if (!result.ok) {
    return { ok: false, error: { ...result.error, opType: node.opType, nodeName: node.name } };
  }
  return result;
}
