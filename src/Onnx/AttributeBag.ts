import type { SourceGraph } from "./OnnxModel.js";
import { Weights } from "../Network/Weights.js";

export type AttributeValue =
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "string"; value: string }
  | { type: "ints"; value: number[] }
  | { type: "floats"; value: number[] }
  | { type: "strings"; value: string[] }
  | { type: "tensor"; value: Weights }
  | { type: "graph"; value: SourceGraph };

/**
 * Read-only typed view over a node's attributes. A getter returns the
 * fallback when the attribute is absent or holds a value of another type;
 * float getters also accept integer attributes.
 */
export class AttributeBag {
  private readonly attributes: ReadonlyMap<string, AttributeValue>;

  constructor(attributes: Iterable<[string, AttributeValue]> = []) {
    this.attributes = new Map(attributes);
  }

  has(name: string): boolean {
    return this.attributes.has(name);
  }

  names(): string[] {
    return [...this.attributes.keys()];
  }

  get(name: string): AttributeValue | undefined {
    return this.attributes.get(name);
  }

  getInt(name: string): number | undefined;
  getInt(name: string, fallback: number): number;
  getInt(name: string, fallback?: number): number | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "int" ? attr.value : fallback;
  }

  getFloat(name: string): number | undefined;
  getFloat(name: string, fallback: number): number;
  getFloat(name: string, fallback?: number): number | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "float" || attr?.type === "int" ? attr.value : fallback;
  }

  getString(name: string): string | undefined;
  getString(name: string, fallback: string): string;
  getString(name: string, fallback?: string): string | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "string" ? attr.value : fallback;
  }

  getInts(name: string): number[] | undefined;
  getInts(name: string, fallback: number[]): number[];
  getInts(name: string, fallback?: number[]): number[] | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "ints" ? [...attr.value] : fallback;
  }

  getFloats(name: string): number[] | undefined;
  getFloats(name: string, fallback: number[]): number[];
  getFloats(name: string, fallback?: number[]): number[] | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "floats" || attr?.type === "ints" ? [...attr.value] : fallback;
  }

  getStrings(name: string): string[] | undefined;
  getStrings(name: string, fallback: string[]): string[];
  getStrings(name: string, fallback?: string[]): string[] | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "strings" ? [...attr.value] : fallback;
  }

  getTensor(name: string): Weights | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "tensor" ? attr.value : undefined;
  }

  getGraph(name: string): SourceGraph | undefined {
    const attr = this.attributes.get(name);
    return attr?.type === "graph" ? attr.value : undefined;
  }
}
