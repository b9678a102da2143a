import { PluginField } from "../Network/LayerParams.js";
import { TensorDesc } from "../Network/NetworkBuilder.js";

/**
 * An externally provided layer implementation, looked up by importers for
 * operators without a native lowering.
 */
export interface PluginCreator {
  name: string;
  version: string;
  /** Output descriptions for the given inputs, or a reason the plugin cannot take them. */
  inferOutputs(inputs: TensorDesc[], fields: Record<string, PluginField>): TensorDesc[] | string;
}

export class PluginResolver {
  private readonly creators = new Map<string, PluginCreator>();

  private static key(name: string, version: string): string {
    return `${name}@${version}`;
  }

  register(creator: PluginCreator): void {
    this.creators.set(PluginResolver.key(creator.name, creator.version), creator);
  }

  find(name: string, version: string): PluginCreator | undefined {
    return this.creators.get(PluginResolver.key(name, version));
  }

  list(): PluginCreator[] {
    return [...this.creators.values()];
  }
}

export const INSTANCE_NORMALIZATION_PLUGIN = "InstanceNormalization";
export const INSTANCE_NORMALIZATION_VERSION = "1";

/** Resolver holding the plugins shipped with the project. */
export function createDefaultPluginResolver(): PluginResolver {
  const resolver = new PluginResolver();
  resolver.register({
    name: INSTANCE_NORMALIZATION_PLUGIN,
    version: INSTANCE_NORMALIZATION_VERSION,
    inferOutputs(inputs) {
      if (inputs.length !== 1 || inputs[0].shape.length < 3) {
        return "instance normalization takes one tensor of rank 3 or more";
      }
      return [{ dataType: inputs[0].dataType, shape: [...inputs[0].shape] }];
    },
  });
  return resolver;
}
