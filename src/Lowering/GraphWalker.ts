import { SourceGraph, SourceNode, describeNode } from "../Onnx/OnnxModel.js";
import { ErrorKind, Result, fail, invalid, ok } from "./errors.js";
import { LoweringContext } from "./LoweringContext.js";
import { lowerNode } from "./lowerNode.js";
import { Value, shapeOf } from "./Value.js";

/**
 * Orders the nodes so that every node follows the producers of its inputs.
 * Ties keep document order. Inputs produced outside the graph must satisfy
 * `isDefined`.
 */
export function topologicalOrder(graph: SourceGraph, isDefined: (name: string) => boolean): Result<SourceNode[]> {
  const producer = new Map<string, number>();
  for (const [index, node] of graph.nodes.entries()) {
    for (const output of node.outputs) {
      if (output !== "") producer.set(output, index);
    }
  }

  const pending = graph.nodes.map(() => 0);
  const consumers = graph.nodes.map((): number[] => []);
  for (const [index, node] of graph.nodes.entries()) {
    for (const input of node.inputs) {
      if (input === undefined) continue;
      const source = producer.get(input);
      if (source !== undefined && source !== index) {
        pending[index]++;
        consumers[source].push(index);
      } else if (source === undefined && !isDefined(input)) {
        return invalid(`input '${input}' of ${describeNode(node)} is never defined`);
      }
    }
  }

  const ready = pending.flatMap((count, index) => (count === 0 ? [index] : []));
  const order: SourceNode[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const index = ready.shift() ?? 0;
    order.push(graph.nodes[index]);
    for (const consumer of consumers[index]) {
      if (--pending[consumer] === 0) ready.push(consumer);
    }
  }
  if (order.length !== graph.nodes.length) {
    return invalid(`graph '${graph.name}' contains a cycle`);
  }
  return ok(order);
}

/** Lowers every node of `graph` into the context's scope, in topological order. */
export function lowerGraphNodes(ctx: LoweringContext, graph: SourceGraph): Result<void> {
  const order = topologicalOrder(graph, (name) => ctx.scope.has(name));
  if (!order.ok) return order;
  for (const node of order.value) {
    const inputs: (Value | undefined)[] = [];
    for (const name of node.inputs) {
      if (name === undefined) {
        inputs.push(undefined);
        continue;
      }
      const value = ctx.scope.get(name);
      if (value === undefined) {
        return {
          ok: false,
          error: {
            kind: ErrorKind.InvalidNode,
            message: `input '${name}' is not available`,
            opType: node.opType,
            nodeName: node.name,
          },
        };
      }
      inputs.push(value);
    }
    const result = lowerNode(ctx, node, inputs);
    if (!result.ok) return result;
    if (result.value.length > node.outputs.length) {
      return fail(ErrorKind.InternalError, `${describeNode(node)} produced more outputs than it declares`);
    }
    result.value.forEach((value, i) => {
      if (node.outputs[i] !== "") ctx.scope.set(node.outputs[i], value);
    });
    ctx.logger.verbose(
      `Lowered ${describeNode(node)}:`,
      result.value.map((v) => `[${shapeOf(v).join(",")}]`).join(" "),
    );
  }
  return ok(undefined);
}
