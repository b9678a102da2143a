import { AttributeBag } from "./AttributeBag.js";
import { Weights } from "../Network/Weights.js";
import { NetworkDataType } from "../Network/LayerTypes.js";

export interface ValueInfo {
  name: string;
  dataType: NetworkDataType;
  // -1 for symbolic dimensions, undefined when no shape is declared
  shape: number[] | undefined;
}

export interface SourceNode {
  name: string;
  opType: string;
  domain: string;
  /** `undefined` marks an omitted optional input. */
  inputs: (string | undefined)[];
  outputs: string[];
  attributes: AttributeBag;
}

export interface SourceGraph {
  name: string;
  nodes: SourceNode[];
  initializers: Map<string, Weights>;
  inputs: ValueInfo[];
  outputs: ValueInfo[];
}

export interface SourceModel {
  irVersion: number;
  opsetVersion: number;
  producerName: string;
  graph: SourceGraph;
}

export function describeNode(node: SourceNode): string {
  return `${node.opType} node '${node.name}'`;
}
