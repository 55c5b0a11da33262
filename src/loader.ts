import * as fs from 'node:fs';
import * as path from 'node:path';
import { EntityDescriptor, EntityKind, ParameterKind, SignatureParameter } from './types.js';

/**
 * Name of the catalog file inside a content directory
 */
export const CATALOG_FILE = '_entities.json';

/**
 * Options for loading content files
 */
export interface LoadOptions {
  /** Directory holding the catalog and one .md docstring per entity */
  contentDir: string;
}

/**
 * One entity of the catalog with its docstring, if it has one
 */
export interface CatalogEntry {
  descriptor: EntityDescriptor;
  docstring?: string;
}

/**
 * Result of loading a content directory
 */
export interface LoadResult {
  /** Catalog entries in catalog order */
  entities: CatalogEntry[];
  /** Quick lookup of entries by entity name */
  entityMap: Map<string, CatalogEntry>;
  /** Raw docstrings keyed by entity name */
  corpus: Map<string, string>;
  /** Any errors encountered during loading */
  errors: string[];
}

const ENTITY_KINDS: EntityKind[] = ['callable', 'parameterized-model'];
const PARAMETER_KINDS: ParameterKind[] = ['positional', 'keyword', 'var-positional', 'var-keyword'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEntityKind(value: unknown): value is EntityKind {
  return ENTITY_KINDS.some(kind => kind === value);
}

function isParameterKind(value: unknown): value is ParameterKind {
  return PARAMETER_KINDS.some(kind => kind === value);
}

function parseParameter(raw: unknown): SignatureParameter | string {
  if (typeof raw === 'string') {
    return { name: raw };
  }
  if (!isRecord(raw) || typeof raw.name !== 'string') {
    return 'signature parameters need a name';
  }
  const param: SignatureParameter = { name: raw.name };
  if (raw.default !== undefined) {
    param.default = String(raw.default);
  }
  if (raw.kind !== undefined) {
    if (!isParameterKind(raw.kind)) {
      return `unknown parameter kind "${String(raw.kind)}"`;
    }
    param.kind = raw.kind;
  }
  if (raw.annotation !== undefined) {
    if (typeof raw.annotation !== 'string') {
      return `annotation of ${raw.name} must be a string`;
    }
    param.annotation = raw.annotation;
  }
  return param;
}

/**
 * Validate one catalog record, returning a descriptor or an error message
 */
export function parseDescriptor(raw: unknown): EntityDescriptor | string {
  if (!isRecord(raw) || typeof raw.name !== 'string' || raw.name === '') {
    return 'catalog entries need a name';
  }
  const { name } = raw;

  if (!isEntityKind(raw.kind)) {
    return `${name}: unknown kind "${String(raw.kind)}"`;
  }

  let signature: SignatureParameter[] | null = null;
  if (raw.signature !== undefined && raw.signature !== null) {
    if (!Array.isArray(raw.signature)) {
      return `${name}: signature must be a list`;
    }
    signature = [];
    for (const item of raw.signature) {
      const param = parseParameter(item);
      if (typeof param === 'string') {
        return `${name}: ${param}`;
      }
      signature.push(param);
    }
  }

  const descriptor: EntityDescriptor = { name, kind: raw.kind, signature };
  if (raw.returns !== undefined) {
    if (typeof raw.returns !== 'string') {
      return `${name}: return annotation must be a string`;
    }
    descriptor.returnAnnotation = raw.returns;
  }
  if (typeof raw.family === 'string') descriptor.family = raw.family;
  if (typeof raw.group === 'string') descriptor.group = raw.group;
  return descriptor;
}

/**
 * Check if a filename is a metadata file (starts with _)
 */
function isMetadataFile(filename: string): boolean {
  return path.basename(filename).startsWith('_');
}

/**
 * Find all docstring files in a directory (non-recursive)
 */
function findMarkdownFiles(dir: string): string[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.endsWith('.md') && !isMetadataFile(entry.name))
    .map(entry => path.join(dir, entry.name))
    .sort();
}

function readCatalog(contentDir: string, errors: string[]): EntityDescriptor[] {
  const catalogPath = path.join(contentDir, CATALOG_FILE);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  } catch (err) {
    errors.push(`Failed to read ${CATALOG_FILE}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }

  if (!Array.isArray(raw)) {
    errors.push(`${CATALOG_FILE}: expected a list of entities`);
    return [];
  }

  const descriptors: EntityDescriptor[] = [];
  const seen = new Set<string>();
  for (const item of raw) {
    const descriptor = parseDescriptor(item);
    if (typeof descriptor === 'string') {
      errors.push(`${CATALOG_FILE}: ${descriptor}`);
    } else if (seen.has(descriptor.name)) {
      errors.push(`${CATALOG_FILE}: duplicate entity ${descriptor.name}`);
    } else {
      seen.add(descriptor.name);
      descriptors.push(descriptor);
    }
  }
  return descriptors;
}

/**
 * Load the entity catalog and docstrings from a content directory
 */
export function loadContent(options: LoadOptions): LoadResult {
  const { contentDir } = options;

  const errors: string[] = [];
  const corpus = new Map<string, string>();
  const entityMap = new Map<string, CatalogEntry>();

  if (!fs.existsSync(contentDir)) {
    errors.push(`Content directory not found: ${contentDir}`);
    return { entities: [], entityMap, corpus, errors };
  }

  const entities: CatalogEntry[] = readCatalog(contentDir, errors).map(descriptor => ({ descriptor }));
  for (const entry of entities) {
    entityMap.set(entry.descriptor.name, entry);
  }

  for (const filePath of findMarkdownFiles(contentDir)) {
    const name = path.basename(filePath, '.md');

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      corpus.set(name, content);

      const entry = entityMap.get(name);
      if (entry) {
        entry.docstring = content;
      } else {
        errors.push(`${name}.md: no catalog entry for ${name}`);
      }
    } catch (err) {
      errors.push(`Failed to read ${name}.md: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { entities, entityMap, corpus, errors };
}
