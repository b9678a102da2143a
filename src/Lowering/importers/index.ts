import { OperatorRegistry } from "../OperatorRegistry.js";
import { gru } from "../recurrent/Gru.js";
import { lstm } from "../recurrent/Lstm.js";
import { loopImporter, scanImporter } from "../recurrent/ControlFlow.js";
import { elementwiseImporters } from "./elementwise.js";
import { ImporterTable } from "./helpers.js";
import { matrixImporters } from "./matrix.js";
import { miscImporters } from "./misc.js";
import { normalizationImporters } from "./normalization.js";
import { reductionImporters } from "./reduction.js";
import { shapeImporters } from "./shape.js";
import { slicingImporters } from "./slicing.js";
import { activationImporters, unaryImporters } from "./unary.js";
import { windowedImporters } from "./windowed.js";

const recurrentImporters: ImporterTable = {
  GRU: gru,
  LSTM: lstm,
  Loop: loopImporter,
  Scan: scanImporter,
};

const TABLES: ImporterTable[] = [
  unaryImporters,
  activationImporters,
  elementwiseImporters,
  matrixImporters,
  windowedImporters,
  normalizationImporters,
  reductionImporters,
  shapeImporters,
  slicingImporters,
  miscImporters,
  recurrentImporters,
];

/**
 * Registry holding every built-in importer, sealed. Extra tables are
 * registered after the built-in ones; a name clash throws `RegistryError`.
 */
export function createDefaultRegistry(...extra: ImporterTable[]): OperatorRegistry {
  const registry = new OperatorRegistry();
  for (const table of [...TABLES, ...extra]) {
    for (const [name, importer] of Object.entries(table)) {
      registry.register(name, importer);
    }
  }
  return registry.seal();
}
