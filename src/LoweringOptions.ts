import { PluginResolver, createDefaultPluginResolver } from "./Lowering/PluginResolver.js";

export interface LoweringOptions {
  /** 0 = silent, 1 = normal, 2 = verbose */
  verbosity: number;

  /** Iteration bound substituted for loops without a trip count */
  maxScanOutputLength: number;

  /** Narrow INT64 constants to INT32 instead of rejecting them */
  narrowInt64: boolean;

  plugins: PluginResolver;
}

/**
 * Defaults used by the CLI:
 *  - verbosity: 1
 *  - maxScanOutputLength: 1024
 *  - narrowInt64: true
 */
export const defaultLoweringOptions: LoweringOptions = {
  verbosity: 1,
  maxScanOutputLength: 1024,
  narrowInt64: true,
  plugins: createDefaultPluginResolver(),
};
