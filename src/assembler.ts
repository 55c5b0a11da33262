import { mergeAttributes, MetadataIndex } from './metadata.js';
import { runsText } from './normalizer.js';
import {
  Admonition,
  ChangeNote,
  ContentBlock,
  Diagnostic,
  EntityDescriptor,
  EntryAttributes,
  HelpDocument,
  ParameterEntry,
  Sections,
  TextRun
} from './types.js';

type RunMapper = (runs: TextRun[]) => TextRun[];

/**
 * Apply a mapping to every run sequence inside a block tree
 */
function mapBlocks(blocks: ContentBlock[], map: RunMapper): ContentBlock[] {
  return blocks.map((block): ContentBlock => {
    switch (block.kind) {
      case 'paragraph':
        return { ...block, runs: map(block.runs) };
      case 'list':
        return { ...block, items: block.items.map(item => mapBlocks(item, map)) };
      case 'definition_list':
        return {
          ...block,
          items: block.items.map(item => ({ term: map(item.term), definition: mapBlocks(item.definition, map) }))
        };
      case 'field_list':
        return { ...block, fields: block.fields.map(field => ({ ...field, blocks: mapBlocks(field.blocks, map) })) };
      case 'table':
        return { ...block, rows: block.rows.map(row => row.map(cell => mapBlocks(cell, map))) };
      case 'admonition':
        return { ...block, blocks: mapBlocks(block.blocks, map) };
      case 'literal':
      case 'math':
        return block;
      default: {
        const unreachable: never = block;
        throw new Error(`Unhandled block ${JSON.stringify(unreachable)}`);
      }
    }
  });
}

function mapOptional(blocks: ContentBlock[] | undefined, map: RunMapper): ContentBlock[] | undefined {
  return blocks === undefined ? undefined : mapBlocks(blocks, map);
}

/**
 * Resolve inline cross references against the index
 */
function resolveSections(sections: Sections, metadata: MetadataIndex, diagnostics: Diagnostic[]): Sections {
  const resolveRuns: RunMapper = runs => runs.map(run => {
    if (run.kind !== 'xref') {
      return run;
    }
    const resolved = metadata.resolveCrossReference(run.target);
    if (!resolved) {
      diagnostics.push({
        severity: 'INFO',
        code: 'unresolved-cross-reference',
        message: `unable to find ahelp for ${run.target}`
      });
      return { kind: 'xref', target: run.target, text: run.text };
    }
    return { ...run, resolved };
  });

  const resolved: Sections = {
    ...sections,
    desc: mapBlocks(sections.desc, resolveRuns),
    returns: mapOptional(sections.returns, resolveRuns),
    bugs: mapOptional(sections.bugs, resolveRuns),
    notes: mapOptional(sections.notes, resolveRuns),
    references: mapOptional(sections.references, resolveRuns),
    warnings: mapOptional(sections.warnings, resolveRuns)
  };

  if (sections.synopsis) {
    resolved.synopsis = { ...sections.synopsis, runs: resolveRuns(sections.synopsis.runs) };
  }
  if (sections.examples) {
    resolved.examples = sections.examples.map(example => ({ blocks: mapBlocks(example.blocks, resolveRuns) }));
  }
  if (sections.parameters) {
    const entries = new Map<string, ParameterEntry>();
    for (const [name, entry] of sections.parameters.entries) {
      entries.set(name, { ...entry, blocks: mapBlocks(entry.blocks, resolveRuns) });
    }
    resolved.parameters = { tag: sections.parameters.tag, entries };
  }

  return resolved;
}

/**
 * Pull version notes out of a block sequence
 */
function liftVersionNotes(blocks: ContentBlock[], found: Admonition[]): ContentBlock[] {
  return blocks.filter(block => {
    if (block.kind === 'admonition' && (block.admonition === 'version-added' || block.admonition === 'version-changed')) {
      found.push(block);
      return false;
    }
    return true;
  });
}

/**
 * Build the change notes: changed ones first, then added ones.
 * A title is only attached the first time it is used.
 */
function buildChanges(
  notes: Admonition[],
  metadata: MetadataIndex,
  versionLabel: string | undefined
): ChangeNote[] {
  const titles = new Set<string>();
  const changed: ChangeNote[] = [];
  const added: ChangeNote[] = [];

  const makeNote = (admonition: ChangeNote['admonition'], release: string, runs: TextRun[]): ChangeNote => {
    const label = admonition === 'version-added' ? 'Added' : 'Changed';
    const title = `${label} in ${metadata.product} ${release}`;
    const note: ChangeNote = { admonition, release, runs };
    if (!titles.has(title)) {
      titles.add(title);
      note.title = title;
    }
    return note;
  };

  for (const block of notes) {
    if (block.admonition !== 'version-added' && block.admonition !== 'version-changed') continue;
    const first = block.blocks[0];
    const runs = first?.kind === 'paragraph' ? first.runs : [];
    const note = makeNote(block.admonition, metadata.releaseLabel(block.version ?? ''), runs);
    (block.admonition === 'version-added' ? added : changed).push(note);
  }

  if (versionLabel !== undefined && !added.some(note => note.release === versionLabel)) {
    added.push(makeNote('version-added', versionLabel, []));
  }

  return [...changed, ...added];
}

function cleanKeyword(word: string): string {
  let out = word;
  for (const c of [',', '.', ':', '"', "'"]) {
    if (out.endsWith(c)) out = out.slice(0, -1);
    if (out.startsWith(c)) out = out.slice(1);
  }
  return out;
}

/**
 * Keywords from the synopsis and the parts of the name
 */
function synopsisKeywords(name: string, synopsis: string): string[] {
  const words = synopsis.toLowerCase().split(/\s+/).map(cleanKeyword).filter(word => word !== '');
  const keywords = Array.from(new Set(words)).sort();
  if (name.includes('_')) {
    keywords.push(...name.split('_'));
  }
  return keywords;
}

/**
 * Pair tokens matching two help pages: the lower-cased names in sorted order
 */
function seeAlsoGroups(name: string, keys: string[]): string {
  const lower = name.toLowerCase();
  return keys
    .map(key => {
      const other = key.toLowerCase();
      return lower < other ? `${lower}${other}` : `${other}${lower}`;
    })
    .sort()
    .join(' ');
}

/**
 * Resolve SEE ALSO tokens, dropping the ones with no help page
 */
function resolveSeeAlso(tokens: string[] | undefined, metadata: MetadataIndex, diagnostics: Diagnostic[]): string[] {
  if (tokens === undefined) {
    diagnostics.push({ severity: 'INFO', code: 'missing-see-also', message: 'no see-also given' });
    return [];
  }

  const keys: string[] = [];
  for (const token of tokens) {
    const resolved = metadata.resolveCrossReference(token);
    if (!resolved) {
      diagnostics.push({ severity: 'INFO', code: 'unresolved-cross-reference', message: `unable to find ahelp for ${token}` });
    } else if (!keys.includes(resolved.key)) {
      keys.push(resolved.key);
    }
  }

  if (tokens.length > 0 && keys.length === 0) {
    diagnostics.push({ severity: 'INFO', code: 'see-also-unresolved', message: 'see-also present but no entries resolved' });
  }

  return keys;
}

/**
 * The standard BUGS text pointing at the bug listing
 */
export function defaultBugs(metadata: MetadataIndex): ContentBlock[] | undefined {
  const { bugs } = metadata;
  if (!bugs) {
    return undefined;
  }
  const runs: TextRun[] = [];
  if (bugs.text) runs.push({ kind: 'text', text: bugs.text });
  runs.push({ kind: 'link', text: bugs.linkText || bugs.url, uri: bugs.url });
  if (bugs.tail) runs.push({ kind: 'text', text: bugs.tail });
  return [{ kind: 'paragraph', runs }];
}

/**
 * Combine an entity, its classified sections and the metadata into a help document.
 */
export function assembleDocument(
  descriptor: EntityDescriptor,
  sections: Sections,
  metadata: MetadataIndex,
  diagnostics: Diagnostic[]
): HelpDocument {
  const { name, kind } = descriptor;
  const isModel = kind === 'parameterized-model';
  const resolved = resolveSections(sections, metadata, diagnostics);

  // Version notes move out of the text into their own block
  const versionNotes: Admonition[] = [];
  resolved.desc = liftVersionNotes(resolved.desc, versionNotes);
  if (resolved.notes) {
    resolved.notes = liftVersionNotes(resolved.notes, versionNotes);
    if (resolved.notes.length === 0) delete resolved.notes;
  }

  if (resolved.desc.length === 0) {
    diagnostics.push({ severity: 'NOTE', code: 'empty-description', message: 'no text in DESC block' });
  }

  const synonyms = metadata.synonymsOf(name);
  if (synonyms.length > 0) {
    const names = synonyms.map(alias => `${alias}()`).join(' and ');
    resolved.desc = [{ kind: 'paragraph', runs: [{ kind: 'text', text: `The function is also called ${names}.` }] }, ...resolved.desc];
  }

  if (!resolved.bugs) {
    const bugs = defaultBugs(metadata);
    if (bugs) resolved.bugs = bugs;
  }

  const seeAlso = resolveSeeAlso(sections.seeAlso, metadata, diagnostics);

  const lookup = metadata.entryFor(name);
  if (lookup?.inheritedFrom) {
    diagnostics.push({ severity: 'INFO', code: 'inherited-metadata', message: `using metadata from ${lookup.inheritedFrom}` });
  }

  const base: EntryAttributes = {
    pkg: metadata.pkg,
    key: name,
    refkeywords: synopsisKeywords(name, resolved.synopsis ? runsText(resolved.synopsis.runs) : '').join(' '),
    seealsogroups: seeAlsoGroups(name, seeAlso),
    displayseealsogroups: isModel && descriptor.family ? `${descriptor.family}models` : '',
    context: ''
  };
  const attributes = mergeAttributes(base, lookup?.entry);

  if (!attributes.context) {
    if (isModel) {
      attributes.context = 'models';
    } else {
      attributes.context = metadata.fallbackContext;
      diagnostics.push({ severity: 'DBG', code: 'fallback-context', message: `fall back context=${attributes.context} for ${name}` });
    }
  }

  if (synonyms.length > 0) {
    attributes.refkeywords = `${synonyms.join(' ')} ${attributes.refkeywords}`.trim();
  }

  const versionLabel = metadata.versionLabel(name);
  const changes = buildChanges(versionNotes, metadata, versionLabel);

  const doc: HelpDocument = {
    name,
    kind,
    signature: descriptor.signature,
    attributes,
    sections: resolved,
    seeAlso,
    changes,
    changesTitle: `Changes in ${metadata.product}`,
    diagnostics
  };

  if (descriptor.returnAnnotation !== undefined) doc.returnAnnotation = descriptor.returnAnnotation;
  if (metadata.lastModified !== undefined) doc.lastModified = metadata.lastModified;

  return doc;
}
