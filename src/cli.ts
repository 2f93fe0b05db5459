#!/usr/bin/env node

import fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'url';
import { dirname, extname, join } from 'path';
import { createGraph } from './initGraph.js';
import { loadModel } from './onnx2json.js';
import { GraphLowering } from './Lowering/GraphLowering.js';
import { loadCapabilities } from './Lowering/OpCapabilities.js';
import { OrtHostEngine } from './Lowering/OrtHostEngine.js';
import { dumpTransferParams, nodeIdsOf, verificationString } from './Lowering/Dump.js';
import { LoweringError } from './Lowering/Errors.js';
import { defaultLoweringOptions } from './LoweringOptions.js';
import OnnxDotFormatter from './Onnx/dot/OnnxDotFormatter.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  for (const candidate of [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]) {
    if (!fs.existsSync(candidate)) continue;
    const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  }
  console.warn('Warning: Unable to read package.json for version info.');
  return 'unknown';
}

const splitNames = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(name => name.trim()).filter(name => name !== '');

const argv = await yargs(hideBin(process.argv))
  .usage('Usage: graph-lower <model> [--inputs <names>] [--outputs <names>] [options]')
  .version(readVersion())
  .parserConfiguration({
    'short-option-groups': false,
    'camel-case-expansion': true,
    'boolean-negation': true,
    'duplicate-arguments-array': false,
  })
  .strictOptions()
  .demandCommand(1, 'You need to provide a model file (.onnx or .json)')
  .option('inputs', {
    alias: 'i',
    describe: 'Comma-separated names of the input boundary tensors (defaults to the graph inputs)',
    type: 'string',
  })
  .option('outputs', {
    alias: 'u',
    describe: 'Comma-separated names of the output boundary tensors (defaults to the graph outputs)',
    type: 'string',
  })
  .option('strict', {
    describe: 'Fail when static and dry-run shapes disagree; use --no-strict to keep the static shape',
    type: 'boolean',
    default: defaultLoweringOptions.strictCheck,
  })
  .option('dryRun', {
    alias: 'd',
    describe: 'Run the model once with onnxruntime to resolve unknown shapes',
    type: 'boolean',
    default: false,
  })
  .option('ops', {
    describe: 'JSON op table of the target (defaults to the bundled one)',
    type: 'string',
  })
  .option('format', {
    alias: 'fm',
    describe: 'Output format',
    type: 'string',
    choices: ['json', 'text', 'verify', 'dot'],
    default: 'text',
  })
  .option('output', {
    alias: 'o',
    describe: 'Write the result to a file instead of stdout',
    type: 'string',
  })
  .option('verbosity', {
    alias: 'v',
    describe: 'Control verbosity (0 = silent, 1 = normal/outputs, 2 = verbose)',
    type: 'number',
    default: 1,
  })
  .help()
  .argv;

const inputFilePath = argv._[0];

if (typeof inputFilePath !== 'string') {
  throw new Error('The model file path must be a string.');
}

const verbosity = argv.verbosity;

try {
  const model = await loadModel(inputFilePath, extname(inputFilePath) === '.json');
  const graph = createGraph(model);
  const lowering = new GraphLowering(loadCapabilities(argv.ops), {
    strictCheck: argv.strict,
    dryRunForUnknownShape: argv.dryRun,
    engine: argv.dryRun ? new OrtHostEngine() : undefined,
    verbosity,
  });

  const inputNames = argv.inputs !== undefined
    ? splitNames(argv.inputs)
    : graph.getInputTensorNodes().toArray().map(tensor => tensor.id);
  const outputNames = argv.outputs !== undefined
    ? splitNames(argv.outputs)
    : graph.getOutputTensorNodes().toArray().map(tensor => tensor.id);

  const lowered = await lowering.loadGraph(model, inputNames.map(name => ({ name })), outputNames);

  let rendered: string;
  switch (argv.format) {
    case 'json':
      rendered = JSON.stringify(lowered.tables, null, 2);
      break;
    case 'verify':
      rendered = verificationString(lowered.tables);
      break;
    case 'dot':
      rendered = graph.toString(new OnnxDotFormatter(nodeIdsOf(lowered.tables)));
      break;
    default:
      rendered = dumpTransferParams(lowered.tables);
  }

  if (argv.output) {
    fs.writeFileSync(argv.output, rendered);
    if (verbosity > 0) console.log(`Transfer tables written to ${argv.output} in ${argv.format} format`);
  } else {
    console.log(rendered);
  }
} catch (error) {
  if (error instanceof LoweringError) {
    console.error(`${error.name}: ${error.message}`);
    process.exitCode = 1;
  } else {
    throw error;
  }
}
