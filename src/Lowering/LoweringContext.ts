import { NetworkBuilder } from "../Network/NetworkBuilder.js";
import { Logger } from "../Logger.js";
import type { OperatorRegistry } from "./OperatorRegistry.js";
import { PluginResolver } from "./PluginResolver.js";
import { Value, WeightArena } from "./Value.js";

/**
 * Name table of one graph level. Reads fall back to the parent scope; writes
 * stay local so a loop body's temporaries never reach the enclosing graph.
 */
export class NameScope {
  private readonly values = new Map<string, Value>();

  constructor(private readonly parent?: NameScope) {}

  get(name: string): Value | undefined {
    return this.values.get(name) ?? this.parent?.get(name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  hasLocal(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: Value): void {
    this.values.set(name, value);
  }

  localNames(): string[] {
    return [...this.values.keys()];
  }

  child(): NameScope {
    return new NameScope(this);
  }
}

export interface LoweringContextInit {
  network: NetworkBuilder;
  arena: WeightArena;
  opsetVersion: number;
  logger: Logger;
  plugins: PluginResolver;
  registry: OperatorRegistry;
  maxScanOutputLength: number;
  scope?: NameScope;
}

/**
 * Everything an importer may touch. The network builder is reachable only
 * through the context handed to the importer.
 */
export class LoweringContext {
  readonly network: NetworkBuilder;
  readonly arena: WeightArena;
  readonly opsetVersion: number;
  readonly logger: Logger;
  readonly plugins: PluginResolver;
  readonly registry: OperatorRegistry;
  readonly maxScanOutputLength: number;
  readonly scope: NameScope;

  constructor(init: LoweringContextInit) {
    this.network = init.network;
    this.arena = init.arena;
    this.opsetVersion = init.opsetVersion;
    this.logger = init.logger;
    this.plugins = init.plugins;
    this.registry = init.registry;
    this.maxScanOutputLength = init.maxScanOutputLength;
    this.scope = init.scope ?? new NameScope();
  }

  /** A context sharing this one's session but writing to a child scope. */
  childContext(): LoweringContext {
    return new LoweringContext({
      network: this.network,
      arena: this.arena,
      opsetVersion: this.opsetVersion,
      logger: this.logger,
      plugins: this.plugins,
      registry: this.registry,
      maxScanOutputLength: this.maxScanOutputLength,
      scope: this.scope.child(),
    });
  }
}
