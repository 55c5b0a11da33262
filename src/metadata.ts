import fs from 'fs-extra';
import * as path from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { MetadataError } from './errors.js';
import {
  BugsLink,
  EntryAttributes,
  HelpEntry,
  MetadataSource,
  ResolvedKey,
  SkipDecision,
  SkipRules
} from './types.js';

/**
 * Values used when the metadata file leaves a field out
 */
export const DEFAULT_METADATA: MetadataSource = {
  pkg: 'sherpa',
  product: 'CIAO',
  helpUrl: 'https://cxc.harvard.edu/sherpa/ahelp/{key}.html',
  fallbackContext: 'sherpaish',
  modulePrefixes: [],
  releases: {},
  skip: { exact: [], prefixes: [], exclusions: {} },
  synonyms: {},
  renames: {},
  entries: {}
};

/**
 * Options for building an index
 */
export interface MetadataIndexOptions {
  /** Names that resolve as cross references even without a published entry */
  knownKeys?: Iterable<string>;
}

/**
 * An entry found for an entity, possibly borrowed from a sibling
 */
export interface EntryLookup {
  entry: HelpEntry;
  /** Key of the entry the metadata was taken from, when not the entity's own */
  inheritedFrom?: string;
}

function splitWords(value: string | undefined): string[] {
  return value ? value.split(/\s+/).filter(word => word !== '') : [];
}

/**
 * Combine generated ENTRY attributes with a published entry.
 * Keyword style attributes are unioned and sorted, the rest are replaced.
 */
export function mergeAttributes(base: EntryAttributes, entry?: HelpEntry): EntryAttributes {
  if (!entry) {
    return { ...base };
  }

  const union = (a: string, b: string | undefined): string =>
    Array.from(new Set([...splitWords(a), ...splitWords(b)])).sort().join(' ');

  const merged: EntryAttributes = {
    ...base,
    key: entry.key,
    refkeywords: union(base.refkeywords, entry.refkeywords),
    seealsogroups: union(base.seealsogroups, entry.seealsogroups),
    displayseealsogroups: union(base.displayseealsogroups, entry.displayseealsogroups)
  };
  if (entry.context !== undefined) {
    merged.context = entry.context;
  }

  return merged;
}

/**
 * Read-only lookups over the metadata for one batch run.
 */
export class MetadataIndex {
  private readonly entries: Map<string, HelpEntry>;
  private readonly releases: Map<string, string>;
  private readonly exclusions: Map<string, string>;
  private readonly synonyms: Map<string, string>;
  private readonly renames: Map<string, string>;
  private readonly knownKeys: Set<string>;
  private readonly lowerKeys = new Map<string, string>();
  private readonly aliases = new Map<string, string[]>();

  constructor(private readonly source: MetadataSource, options: MetadataIndexOptions = {}) {
    this.entries = new Map(Object.entries(source.entries));
    this.releases = new Map(Object.entries(source.releases));
    this.exclusions = new Map(Object.entries(source.skip.exclusions));
    this.synonyms = new Map(Object.entries(source.synonyms));
    this.renames = new Map(Object.entries(source.renames));
    this.knownKeys = new Set([...this.entries.keys(), ...(options.knownKeys ?? [])]);

    for (const key of this.knownKeys) {
      this.lowerKeys.set(key.toLowerCase(), key);
    }
    for (const [alias, canonical] of this.synonyms) {
      const list = this.aliases.get(canonical) ?? [];
      list.push(alias);
      this.aliases.set(canonical, list.sort());
    }
  }

  get pkg(): string {
    return this.source.pkg;
  }

  get product(): string {
    return this.source.product;
  }

  get lastModified(): string | undefined {
    return this.source.lastModified;
  }

  get fallbackContext(): string {
    return this.source.fallbackContext;
  }

  get modulePrefixes(): string[] {
    return this.source.modulePrefixes;
  }

  get bugs(): BugsLink | undefined {
    return this.source.bugs;
  }

  /**
   * URL of the help page for a key
   */
  helpUrl(key: string): string {
    return this.source.helpUrl.replace('{key}', encodeURIComponent(key));
  }

  /**
   * Find the help key a name refers to: exact, then ignoring case, then through a synonym.
   */
  resolveCrossReference(name: string): ResolvedKey | undefined {
    const key = this.knownKeys.has(name)
      ? name
      : this.lowerKeys.get(name.toLowerCase())
        ?? this.canonicalKey(name);

    return key === undefined ? undefined : { key, url: this.helpUrl(key) };
  }

  private canonicalKey(name: string): string | undefined {
    const canonical = this.canonicalName(name);
    return canonical !== undefined && this.knownKeys.has(canonical) ? canonical : undefined;
  }

  /**
   * Map a package version to the release it shipped in
   */
  releaseLabel(version: string): string {
    const exact = this.releases.get(version);
    if (exact !== undefined) {
      return exact;
    }

    const generic = version.match(/^(\d+)\.(\d+)\.0$/);
    if (generic) {
      return `${generic[1]}.${generic[2]}`;
    }

    for (const [pattern, label] of this.releases) {
      if (pattern.endsWith('.') && version.startsWith(pattern)) {
        return label;
      }
    }

    return version;
  }

  /**
   * Release label for the version an entity first appeared in
   */
  versionLabel(name: string): string | undefined {
    const since = this.entries.get(name)?.since;
    return since ? this.releaseLabel(since) : undefined;
  }

  /**
   * Decide whether an entity is left out of the run
   */
  isSkipped(name: string): SkipDecision | undefined {
    const { exact, prefixes } = this.source.skip;

    const curated = this.exclusions.get(name);
    if (curated !== undefined) {
      return { reason: curated };
    }

    if (exact.includes(name)) {
      return { reason: 'skipping as unwanted' };
    }

    const prefix = prefixes.find(p => name.startsWith(p));
    if (prefix !== undefined) {
      return { reason: `skipping as it starts with "${prefix}"` };
    }

    return undefined;
  }

  /**
   * The published entry for an entity. Entities without one borrow the entry
   * of the only other entry listing them in its refkeywords.
   */
  entryFor(name: string): EntryLookup | undefined {
    const own = this.entries.get(name);
    if (own) {
      return { entry: own };
    }

    const lower = name.toLowerCase();
    const owners = Array.from(this.entries.values())
      .filter(entry => entry.key !== name)
      .filter(entry => splitWords(entry.refkeywords).some(word => word.toLowerCase() === lower));

    if (owners.length !== 1) {
      return undefined;
    }

    return { entry: { ...owners[0], key: name }, inheritedFrom: owners[0].key };
  }

  /**
   * Other names of an entity: the canonical name for an alias, else its aliases
   */
  synonymsOf(name: string): string[] {
    const canonical = this.canonicalName(name);
    if (canonical !== undefined) {
      return [canonical];
    }
    return this.aliases.get(name) ?? [];
  }

  canonicalName(alias: string): string | undefined {
    return this.synonyms.get(alias);
  }

  /**
   * File name stem for an entity
   */
  outputName(name: string): string {
    return this.renames.get(name) ?? name;
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, field: string, source: string): string | undefined {
  const value = raw[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new MetadataError(`"${field}" must be a string`, source);
  }
  return value;
}

function stringArray(raw: Record<string, unknown>, field: string, source: string): string[] {
  const value = raw[field];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every(v => typeof v === 'string')) {
    throw new MetadataError(`"${field}" must be a list of strings`, source);
  }
  return value.filter((v): v is string => typeof v === 'string');
}

function stringRecord(raw: Record<string, unknown>, field: string, source: string): Record<string, string> {
  const value = raw[field];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new MetadataError(`"${field}" must be an object`, source);
  }
  const pairs: [string, string][] = [];
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') {
      throw new MetadataError(`"${field}.${key}" must be a string`, source);
    }
    pairs.push([key, v]);
  }
  return Object.fromEntries(pairs);
}

function parseEntry(key: string, raw: unknown, source: string): HelpEntry {
  if (!isRecord(raw)) {
    throw new MetadataError(`entry "${key}" must be an object`, source);
  }
  const entry: HelpEntry = { key: optionalString(raw, 'key', source) ?? key };
  for (const field of ['context', 'refkeywords', 'seealsogroups', 'displayseealsogroups', 'since'] as const) {
    const value = optionalString(raw, field, source);
    if (value !== undefined) entry[field] = value;
  }
  return entry;
}

function parseBugs(raw: unknown, source: string): BugsLink | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    throw new MetadataError('"bugs" must be an object', source);
  }
  return {
    text: optionalString(raw, 'text', source) ?? '',
    linkText: optionalString(raw, 'linkText', source) ?? '',
    url: optionalString(raw, 'url', source) ?? '',
    tail: optionalString(raw, 'tail', source) ?? ''
  };
}

/**
 * Validate the contents of a metadata file
 */
export function parseMetadataSource(raw: unknown, source = 'metadata'): MetadataSource {
  if (!isRecord(raw)) {
    throw new MetadataError('metadata must be a JSON object', source);
  }

  const skipRaw = raw.skip ?? {};
  if (!isRecord(skipRaw)) {
    throw new MetadataError('"skip" must be an object', source);
  }
  const skip: SkipRules = {
    exact: stringArray(skipRaw, 'exact', source),
    prefixes: stringArray(skipRaw, 'prefixes', source),
    exclusions: stringRecord(skipRaw, 'exclusions', source)
  };

  const entriesRaw = raw.entries ?? {};
  if (!isRecord(entriesRaw)) {
    throw new MetadataError('"entries" must be an object', source);
  }
  const entries = Object.fromEntries(
    Object.entries(entriesRaw).map(([key, value]): [string, HelpEntry] => [key, parseEntry(key, value, source)])
  );

  const metadata: MetadataSource = {
    pkg: optionalString(raw, 'pkg', source) ?? DEFAULT_METADATA.pkg,
    product: optionalString(raw, 'product', source) ?? DEFAULT_METADATA.product,
    helpUrl: optionalString(raw, 'helpUrl', source) ?? DEFAULT_METADATA.helpUrl,
    fallbackContext: optionalString(raw, 'fallbackContext', source) ?? DEFAULT_METADATA.fallbackContext,
    modulePrefixes: stringArray(raw, 'modulePrefixes', source),
    releases: stringRecord(raw, 'releases', source),
    skip,
    synonyms: stringRecord(raw, 'synonyms', source),
    renames: stringRecord(raw, 'renames', source),
    entries
  };

  const lastModified = optionalString(raw, 'lastModified', source);
  if (lastModified !== undefined) metadata.lastModified = lastModified;
  const bugs = parseBugs(raw.bugs, source);
  if (bugs) metadata.bugs = bugs;

  return metadata;
}

const HELP_ROOTS = ['cxchelptopics', 'cxcdocumentationpage'];

/**
 * Extract the ENTRY attributes of a published help file
 */
export function parseHelpFile(xml: string, source = 'help file'): HelpEntry[] {
  const parser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: '@_' });
  let doc: unknown;
  try {
    doc = parser.parse(xml);
  } catch (err) {
    throw new MetadataError(`unable to parse: ${err instanceof Error ? err.message : String(err)}`, source);
  }
  if (!isRecord(doc)) {
    return [];
  }

  const entries: HelpEntry[] = [];
  for (const rootName of HELP_ROOTS) {
    const root = doc[rootName];
    if (!isRecord(root)) continue;

    const found: unknown[] = Array.isArray(root.ENTRY) ? root.ENTRY : [root.ENTRY];
    for (const element of found) {
      if (!isRecord(element)) continue;
      const key = element['@_key'];
      if (typeof key !== 'string' || key === '') continue;

      const entry: HelpEntry = { key };
      for (const field of ['context', 'refkeywords', 'seealsogroups', 'displayseealsogroups'] as const) {
        const value = element[`@_${field}`];
        if (typeof value === 'string') entry[field] = value;
      }
      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Read every .xml and .sxml help file in a directory
 */
export async function loadHelpDirectory(helpDir: string): Promise<HelpEntry[]> {
  const names = (await fs.readdir(helpDir)).filter(name => /\.s?xml$/.test(name)).sort();
  const entries: HelpEntry[] = [];
  for (const name of names) {
    const xml = await fs.readFile(path.join(helpDir, name), 'utf-8');
    entries.push(...parseHelpFile(xml, name));
  }
  return entries;
}

/**
 * Options for loading the metadata index
 */
export interface LoadMetadataOptions extends MetadataIndexOptions {
  /** Directory of previously published help files */
  helpDir?: string;
}

/**
 * Load the metadata file and any published help files, once per run.
 * Entries in the metadata file take precedence over published files.
 */
export async function loadMetadataIndex(metadataFile: string, options: LoadMetadataOptions = {}): Promise<MetadataIndex> {
  let raw: unknown;
  try {
    raw = await fs.readJson(metadataFile);
  } catch (err) {
    throw new MetadataError(`unable to read: ${err instanceof Error ? err.message : String(err)}`, metadataFile);
  }
  const source = parseMetadataSource(raw, metadataFile);

  if (options.helpDir) {
    const published = await loadHelpDirectory(options.helpDir);
    source.entries = {
      ...Object.fromEntries(published.map((entry): [string, HelpEntry] => [entry.key, entry])),
      ...source.entries
    };
  }

  return new MetadataIndex(source, options);
}
