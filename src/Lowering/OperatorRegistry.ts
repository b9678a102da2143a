import { SourceNode } from "../Onnx/OnnxModel.js";
import { RegistryError, Result } from "./errors.js";
import type { LoweringContext } from "./LoweringContext.js";
import { Value } from "./Value.js";

export type Importer = (ctx: LoweringContext, node: SourceNode, inputs: (Value | undefined)[]) => Result<Value[]>;

/** Operator name to importer table. Filled once at start-up, read-only afterwards. */
export class OperatorRegistry {
  private readonly importers = new Map<string, Importer>();
  private sealed = false;

  register(name: string, importer: Importer): boolean {
    if (this.sealed) {
      throw new RegistryError(`cannot register '${name}': the registry is sealed`);
    }
    if (this.importers.has(name)) {
      throw new RegistryError(`an importer for '${name}' is already registered`);
    }
    this.importers.set(name, importer);
    return true;
  }

  lookup(name: string): Importer | undefined {
    return this.importers.get(name);
  }

  names(): string[] {
    return [...this.importers.keys()].sort();
  }

  seal(): this {
    this.sealed = true;
    return this;
  }
}
