import fs from 'fs-extra';
import { annotationLevel, convertEntity } from './converter.js';
import { ConfigError } from './errors.js';
import { buildFunctionsPage, buildModelsPage, IndexRow, indexRowFor } from './index-pages.js';
import { CatalogEntry } from './loader.js';
import { LineWriter, reportDiagnostics } from './log.js';
import { MetadataIndex } from './metadata.js';
import { HelpFlavour, serializeIndexPage, writeHelpFile } from './serializer.js';
import { AnnotationLevel, AnnotationMode } from './types.js';

/**
 * Options for a batch run
 */
export interface BatchOptions {
  /** Output directory, which must already exist */
  outdir: string;
  flavour?: HelpFlavour;
  /** Keep or drop signature annotations in SYNTAX (default: keep) */
  annotations?: AnnotationMode;
  /** Only consider these entity names */
  restrict?: string[];
  /** Only convert parameterized models */
  modelsOnly?: boolean;
  /** Leave out entities that are another name for a documented entity */
  skipSynonyms?: boolean;
  /** Show DBG diagnostics */
  debug?: boolean;
  /** Progress output (default: console.log) */
  log?: LineWriter;
  /** Diagnostics output (default: console.error) */
  logDiagnostic?: LineWriter;
}

export interface SkippedEntity {
  name: string;
  reason: string;
}

export interface BatchError {
  name: string;
  message: string;
}

/**
 * Summary of a batch run
 */
export interface BatchResult {
  processed: number;
  skipped: SkippedEntity[];
  /** Entities whose conversion failed, in processing order */
  errors: BatchError[];
  written: string[];
  indexFiles: string[];
  /** Converted entities by how much of their signature is annotated */
  annotations: Record<AnnotationLevel, number>;
}

const ANNOTATION_LABELS: [AnnotationLevel, string][] = [
  ['none', 'unannotated'],
  ['return-only', 'return only'],
  ['argument-only', 'argument only'],
  ['both', 'both']
];

/**
 * Decide whether an entity takes part in the run
 */
function skipReason(entry: CatalogEntry, metadata: MetadataIndex, options: BatchOptions): string | undefined {
  const { name, kind } = entry.descriptor;

  if (options.modelsOnly && kind !== 'parameterized-model') {
    return 'skipping as not a model';
  }

  const rule = metadata.isSkipped(name);
  if (rule) {
    return rule.reason;
  }

  const canonical = metadata.canonicalName(name);
  if (options.skipSynonyms && canonical !== undefined) {
    return `skipping as a synonym for ${canonical}`;
  }

  return undefined;
}

/**
 * Convert every entity of the catalog, one at a time. A failing entity is
 * recorded and the run carries on with the next one.
 */
export async function runBatch(catalog: CatalogEntry[], metadata: MetadataIndex, options: BatchOptions): Promise<BatchResult> {
  const { outdir, flavour = 'ahelp', annotations = 'keep', debug = false } = options;
  const log = options.log ?? ((line: string) => console.log(line));
  const logDiagnostic = options.logDiagnostic ?? ((line: string) => console.error(line));

  if (!(await fs.pathExists(outdir))) {
    throw new ConfigError(`outdir=${outdir} does not exist`);
  }

  const result: BatchResult = {
    processed: 0,
    skipped: [],
    errors: [],
    written: [],
    indexFiles: [],
    annotations: { 'none': 0, 'return-only': 0, 'argument-only': 0, 'both': 0 }
  };
  const rows: IndexRow[] = [];

  const restrict = options.restrict ? new Set(options.restrict) : undefined;
  const entries = catalog
    .filter(entry => !restrict || restrict.has(entry.descriptor.name))
    .sort((a, b) => (a.descriptor.name < b.descriptor.name ? -1 : a.descriptor.name > b.descriptor.name ? 1 : 0));

  const skip = (name: string, reason: string): void => {
    log(`# ${name}\n - ${reason}`);
    result.skipped.push({ name, reason });
  };

  for (const entry of entries) {
    const { name } = entry.descriptor;
    const { docstring } = entry;

    const reason = skipReason(entry, metadata, options);
    if (reason !== undefined) {
      skip(name, reason);
      continue;
    }
    if (docstring === undefined) {
      skip(name, 'has no documentation');
      continue;
    }

    log(`## ${name}`);

    try {
      const { document, xml } = convertEntity(entry.descriptor, docstring, metadata, { flavour, annotations });
      reportDiagnostics(name, document.diagnostics, debug, logDiagnostic);

      const outfile = await writeHelpFile(outdir, metadata.outputName(name), xml, flavour);
      log(`Created: ${outfile}`);

      result.written.push(outfile);
      result.processed += 1;
      result.annotations[annotationLevel(entry.descriptor)] += 1;
      rows.push(indexRowFor(entry.descriptor, document));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log(` - ERROR PROCESSING: ${message}`);
      result.errors.push({ name, message });
    }
  }

  for (const page of [buildModelsPage(rows, metadata), buildFunctionsPage(rows, metadata)]) {
    const xml = serializeIndexPage(page, { flavour });
    result.indexFiles.push(await writeHelpFile(outdir, page.attributes.key, xml, flavour));
  }

  return result;
}

/**
 * Lines summarizing a finished run
 */
export function summarizeRun(result: BatchResult): string[] {
  const lines = [`Processed ${result.processed} files, skipped ${result.skipped.length}.`];
  if (result.errors.length > 0) {
    lines.push(`Errored out: [${result.errors.map(error => `'${error.name}'`).join(', ')}]`);
  }
  if (result.indexFiles.length > 0) {
    lines.push('', 'Also:', ...result.indexFiles.map(file => `  ${file}`));
  }

  const checked = ANNOTATION_LABELS.reduce((sum, [level]) => sum + result.annotations[level], 0);
  if (checked > 0) {
    lines.push('', `Signatures checked: ${checked}`);
    for (const [level, label] of ANNOTATION_LABELS) {
      const count = result.annotations[level];
      const percent = ((100 * count) / checked).toFixed(1);
      lines.push(`  ${label.padEnd(14)}: ${String(count).padStart(3)}  ${percent.padStart(5)}%`);
    }
  }
  return lines;
}
