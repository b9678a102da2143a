import DefaultDotFormatter from "@specs-feup/flow/graph/dot/DefaultDotFormatter";
import BaseEdge from "@specs-feup/flow/graph/BaseEdge";
import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Dot, { DotGraph, DotNode, DotStatement, DotSubgraph } from "@specs-feup/flow/graph/dot/dot";
import Edge from "@specs-feup/flow/graph/Edge";
import Node from "@specs-feup/flow/graph/Node";
import NetworkGraph from "./NetworkGraph.js";
import TensorNode from "./TensorNode.js";
import LayerNode from "./LayerNode.js";
import NetworkEdge from "./NetworkEdge.js";
import { LayerParams } from "./LayerParams.js";

function layerDetail(params: LayerParams): string | undefined {
  switch (params.kind) {
    case "ElementWise":
    case "Unary":
      return params.operation;
    case "Reduce":
      return params.operation;
    case "Activation":
      return params.activation;
    case "Pooling":
      return params.type;
    case "Resize":
      return params.mode;
    case "Plugin":
      return `${params.pluginName} v${params.pluginVersion}`;
    case "TripLimit":
      return params.limit;
    case "LoopOutput":
      return params.outputKind;
    case "Iterator":
      return params.reverse ? "reverse" : undefined;
    default:
      return undefined;
  }
}

/**
 * DOT rendering of a network. Tensors are ellipses labelled with their shape,
 * layers are boxes, and the boundary layers of each loop are grouped in a
 * dashed cluster.
 */
export default class NetworkDotFormatter extends DefaultDotFormatter<NetworkGraph.Class> {
  static defaultGetNodeAttrs(node: BaseNode.Class): Record<string, string> {
    const result: Record<string, string> = { label: node.id, shape: "box" };
    node.switch(
      Node.Case(TensorNode, (n) => {
        result.label = `${n.name}\n[${n.shape.join(",")}] ${n.dataType}`;
        result.shape = "ellipse";
        if (n.role === "input") {
          result.color = "#00FF00";
        } else if (n.role === "output") {
          result.color = "#FF0000";
        }
      }),
      Node.Case(LayerNode, (n) => {
        const detail = layerDetail(n.params);
        result.label = detail !== undefined ? `${n.kind}\n${detail}` : n.kind;
        result.color = n.loop !== undefined ? "#A52A2A" : "#0000FF";
      }),
    );
    return result;
  }

  static defaultGetEdgeAttrs(edge: BaseEdge.Class): Record<string, string> {
    const result: Record<string, string> = {};
    edge.switch(
      Edge.Case(NetworkEdge, (e) => {
        if (e.slot > 0) result.label = `${e.slot}`;
      }),
    );
    return result;
  }

  static defaultGetGraphAttrs(): Record<string, string> {
    return {
      rankdir: "LR",
      ...DefaultDotFormatter.defaultGetGraphAttrs(),
    };
  }

  constructor() {
    super(
      NetworkDotFormatter.defaultGetNodeAttrs,
      NetworkDotFormatter.defaultGetEdgeAttrs,
      DefaultDotFormatter.defaultGetContainer,
      NetworkDotFormatter.defaultGetGraphAttrs,
    );
  }

  override nodeToDot(node: BaseNode.Class): DotNode {
    return Dot.node(node.id, this.getNodeAttrs(node));
  }

  override toDot(graph: NetworkGraph.Class): DotGraph {
    const dot = Dot.graph().graphAttrs(this.getGraphAttrs());
    const clusters = new Map<string, DotStatement[]>();

    for (const node of graph.nodes) {
      const loop = node.tryAs(LayerNode)?.loop;
      if (loop === undefined) {
        dot.statements(this.nodeToDot(node));
        continue;
      }
      const members = clusters.get(loop) ?? [];
      members.push(this.nodeToDot(node));
      clusters.set(loop, members);
    }

    for (const [loop, members] of clusters) {
      dot.statements(
        new DotSubgraph(`cluster_${loop}`, members)
          .graphAttr("label", loop)
          .graphAttr("style", "dashed")
          .graphAttr("color", "gray"),
      );
    }

    for (const edge of graph.edges) {
      dot.statements(this.edgeToDot(edge));
    }
    return dot;
  }
}
