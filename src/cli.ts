#!/usr/bin/env node
import fs from 'fs-extra';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { runBatch, summarizeRun } from './batch.js';
import { AppConfig, loadConfig } from './config.js';
import { ConfigError, MetadataError } from './errors.js';
import { loadContent } from './loader.js';
import { loadMetadataIndex } from './metadata.js';
import { AnnotationMode } from './types.js';

const USAGE = 'Usage: doc2help <outdir> [names] [--content=DIR] [--metadata=FILE] [--help-dir=DIR] [--annotations=keep|delete] [--sxml] [--models] [--skip-synonyms] [--debug]';

/**
 * Parsed command line
 */
export interface CliArgs {
  outdir: string;
  /** Comma separated names, or @file with one name per line */
  names?: string;
  contentDir?: string;
  metadataFile?: string;
  helpDir?: string;
  annotations: AnnotationMode;
  sxml: boolean;
  modelsOnly: boolean;
  skipSynonyms: boolean;
  debug: boolean;
}

/**
 * Parse the arguments after the program name. Returns an error message for bad input.
 */
export function parseArgs(argv: string[]): CliArgs | string {
  const positional: string[] = [];
  const args: CliArgs = { outdir: '', annotations: 'keep', sxml: false, modelsOnly: false, skipSynonyms: false, debug: false };

  const valueOf = (arg: string): string => arg.slice(arg.indexOf('=') + 1);

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      positional.push(arg);
    } else if (arg.startsWith('--content=')) {
      args.contentDir = valueOf(arg);
    } else if (arg.startsWith('--metadata=')) {
      args.metadataFile = valueOf(arg);
    } else if (arg.startsWith('--help-dir=')) {
      args.helpDir = valueOf(arg);
    } else if (arg.startsWith('--annotations=')) {
      const mode = valueOf(arg);
      if (mode !== 'keep' && mode !== 'delete') {
        return `Invalid value for --annotations: ${mode}`;
      }
      args.annotations = mode;
    } else if (arg === '--sxml') {
      args.sxml = true;
    } else if (arg === '--models') {
      args.modelsOnly = true;
    } else if (arg === '--skip-synonyms') {
      args.skipSynonyms = true;
    } else if (arg === '--debug') {
      args.debug = true;
    } else {
      return `Unknown option: ${arg}`;
    }
  }

  if (positional.length === 0 || positional.length > 2) {
    return USAGE;
  }

  args.outdir = positional[0];
  if (positional.length === 2) {
    args.names = positional[1];
  }
  return args;
}

/**
 * Expand the names argument into a list of entity names
 */
export async function readNames(names: string): Promise<string[]> {
  const raw = names.startsWith('@')
    ? (await fs.readFile(names.slice(1), 'utf-8')).split('\n')
    : names.split(',');
  return raw.map(name => name.trim()).filter(name => name !== '');
}

function applyArgs(config: AppConfig, args: CliArgs): AppConfig {
  return {
    ...config,
    contentDir: args.contentDir ? path.resolve(args.contentDir) : config.contentDir,
    metadataFile: args.metadataFile ? path.resolve(args.metadataFile) : config.metadataFile,
    helpDir: args.helpDir ? path.resolve(args.helpDir) : config.helpDir,
    dtd: args.sxml ? 'sxml' : config.dtd,
    debug: args.debug || config.debug
  };
}

/**
 * Run the converter. Resolves to the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (typeof args === 'string') {
    console.error(args);
    return 1;
  }

  try {
    const config = applyArgs(await loadConfig(), args);

    const data = loadContent({ contentDir: config.contentDir });
    for (const error of data.errors) {
      console.warn(`Warning: ${error}`);
    }

    const metadata = await loadMetadataIndex(config.metadataFile, {
      helpDir: config.helpDir,
      knownKeys: data.entities.map(entry => entry.descriptor.name)
    });

    const result = await runBatch(data.entities, metadata, {
      outdir: args.outdir,
      flavour: config.dtd,
      annotations: args.annotations,
      restrict: args.names ? await readNames(args.names) : undefined,
      modelsOnly: args.modelsOnly,
      skipSynonyms: args.skipSynonyms,
      debug: config.debug
    });

    console.log('');
    for (const line of summarizeRun(result)) {
      console.log(line);
    }
    return 0;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof MetadataError) {
      console.error(`ERROR: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
