#!/usr/bin/env node

import fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { createDefaultRegistry } from './Lowering/importers/index.js';
import { formatLoweringError } from './Lowering/errors.js';
import { Logger } from './Logger.js';
import { LoweringOptions, defaultLoweringOptions } from './LoweringOptions.js';
import { OutputFormat, formatNetwork, loadModel, lowerModel } from './lowering.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  // Sources run from src/, the build from dist/src/.
  for (const candidate of [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]) {
    if (!fs.existsSync(candidate)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  }
  return 'unknown';
}

const argv = await yargs(hideBin(process.argv))
  .usage('Usage: onnx-lower <model> [options]')
  .version(readVersion())
  .parserConfiguration({
    'short-option-groups': false,
    'camel-case-expansion': true,
    'duplicate-arguments-array': false,
  })
  .strictOptions()
  .option('output', {
    alias: 'o',
    describe: 'Write the lowered network to a file',
    type: 'string',
  })
  .option('format', {
    describe: 'Output format (json or dot)',
    type: 'string',
    choices: ['json', 'dot'],
    default: 'json',
  })
  .option('verbosity', {
    alias: 'v',
    describe: 'Control verbosity (0 = silent, 1 = normal/outputs, 2 = verbose)',
    type: 'number',
    default: defaultLoweringOptions.verbosity,
  })
  .option('listOps', {
    describe: 'List the supported operators and exit',
    type: 'boolean',
    default: false,
  })
  .option('maxScanLength', {
    describe: 'Iteration bound for Loop nodes without a trip count',
    type: 'number',
    default: defaultLoweringOptions.maxScanOutputLength,
  })
  .option('narrowInt64', {
    describe: 'Narrow INT64 constants to INT32; use --no-narrow-int64 to reject them',
    type: 'boolean',
    default: defaultLoweringOptions.narrowInt64,
  })
  .check((args) => {
    if (!args.listOps && args._.length === 0) {
      throw new Error('You need to provide a model file (ONNX or JSON)');
    }
    if (!Number.isInteger(args.maxScanLength) || args.maxScanLength < 1) {
      throw new Error('--max-scan-length must be a positive integer');
    }
    return true;
  })
  .help()
  .parseAsync();

const logger = new Logger(argv.verbosity);
const registry = createDefaultRegistry();

async function main(): Promise<number> {
  if (argv.listOps) {
    for (const name of registry.names()) console.log(name);
    return 0;
  }

  const inputFilePath = argv._[0];
  if (typeof inputFilePath !== 'string') {
    logger.error('The model path must be a string.');
    return 1;
  }
  const options: LoweringOptions = {
    ...defaultLoweringOptions,
    verbosity: argv.verbosity,
    maxScanOutputLength: argv.maxScanLength,
    narrowInt64: argv.narrowInt64,
  };
  const format: OutputFormat = argv.format === 'dot' ? 'dot' : 'json';

  const model = await loadModel(inputFilePath, options);
  if (!model.ok) {
    logger.error(formatLoweringError(model.error));
    return 1;
  }
  logger.verbose(`Loaded '${inputFilePath}' (producer '${model.value.producerName}', opset ${model.value.opsetVersion})`);

  const lowered = lowerModel(model.value, options, registry);
  if (!lowered.ok) {
    logger.error(formatLoweringError(lowered.error));
    return 1;
  }

  const text = formatNetwork(lowered.value.network, format);
  if (argv.output !== undefined) {
    await fs.promises.writeFile(argv.output, text);
    logger.info(`Network written to ${argv.output} in ${format} format`);
  } else if (argv.verbosity > 0) {
    console.log(text);
  }
  logger.info(`Lowered ${model.value.graph.nodes.length} nodes into ${lowered.value.layerCount} layers`);
  return 0;
}

try {
  process.exitCode = await main();
} catch (error) {
  logger.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
