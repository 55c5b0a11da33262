import { defaultBugs } from './assembler.js';
import { mergeAttributes, MetadataIndex } from './metadata.js';
import { runsText } from './normalizer.js';
import { IndexPage, IndexTable } from './serializer.js';
import { EntityDescriptor, EntryAttributes, HelpDocument } from './types.js';

/**
 * What an index page needs to know about one converted entity
 */
export interface IndexRow {
  name: string;
  key: string;
  kind: EntityDescriptor['kind'];
  group?: string;
  context: string;
  synopsis: string;
}

const DEFAULT_MODEL_GROUP = 'Models';

/**
 * Summarize a converted document for the index pages
 */
export function indexRowFor(descriptor: EntityDescriptor, doc: HelpDocument): IndexRow {
  const row: IndexRow = {
    name: descriptor.name,
    key: doc.attributes.key,
    kind: descriptor.kind,
    context: doc.attributes.context,
    synopsis: doc.sections.synopsis ? runsText(doc.sections.synopsis.runs) : ''
  };
  if (descriptor.group) {
    row.group = descriptor.group;
  }
  return row;
}

/**
 * Group rows by a label, keeping the first-seen order of labels
 * and sorting the rows of each group by name
 */
function groupTables(rows: IndexRow[], label: (row: IndexRow) => string, header: string[]): IndexTable[] {
  const groups = new Map<string, IndexRow[]>();
  for (const row of rows) {
    const caption = label(row);
    const group = groups.get(caption) ?? [];
    group.push(row);
    groups.set(caption, group);
  }

  return Array.from(groups.entries()).map(([caption, group]) => ({
    caption,
    header,
    rows: group
      .slice()
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(row => [row.name, row.synopsis])
  }));
}

function pageAttributes(key: string, metadata: MetadataIndex, defaultContext: string): EntryAttributes {
  const lookup = metadata.entryFor(key);
  return mergeAttributes({
    pkg: metadata.pkg,
    key,
    refkeywords: `${metadata.pkg} ${key}`,
    seealsogroups: `${metadata.pkg}.${key}`,
    displayseealsogroups: '',
    context: defaultContext
  }, lookup?.entry);
}

/**
 * The models page: one table per model group
 */
export function buildModelsPage(rows: IndexRow[], metadata: MetadataIndex): IndexPage {
  const models = rows.filter(row => row.kind === 'parameterized-model');
  const page: IndexPage = {
    attributes: pageAttributes('models', metadata, 'models'),
    synopsis: `Summary of ${metadata.pkg} models.`,
    intro: [{
      kind: 'paragraph',
      runs: [{ kind: 'text', text: `The following tables list the models available within ${metadata.product}.` }]
    }],
    tables: groupTables(models, row => row.group ?? DEFAULT_MODEL_GROUP, ['Model name', 'Description'])
  };
  return finishPage(page, metadata);
}

/**
 * The functions page: one table per help context
 */
export function buildFunctionsPage(rows: IndexRow[], metadata: MetadataIndex): IndexPage {
  const functions = rows.filter(row => row.kind === 'callable');
  const page: IndexPage = {
    attributes: pageAttributes('functions', metadata, metadata.pkg),
    synopsis: `Summary of ${metadata.pkg} functions.`,
    intro: [{
      kind: 'paragraph',
      runs: [{ kind: 'text', text: `The following tables list the functions available within ${metadata.product}, grouped by context.` }]
    }],
    tables: groupTables(functions, row => row.context, ['Function', 'Description'])
  };
  return finishPage(page, metadata);
}

function finishPage(page: IndexPage, metadata: MetadataIndex): IndexPage {
  const bugs = defaultBugs(metadata);
  if (bugs) {
    page.bugs = bugs;
  }
  if (metadata.lastModified) {
    page.lastModified = metadata.lastModified;
  }
  return page;
}
