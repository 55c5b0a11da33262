import { inlineText, nodeText } from './markup.js';
import { normalizeInline, normalizeNodes, NormalizeContext } from './normalizer.js';
import {
  ContentBlock,
  DefinitionItemNode,
  Diagnostic,
  EntityDescriptor,
  Example,
  FieldNode,
  InlineNode,
  MarkupNode,
  ParameterEntry,
  ParameterSection,
  Sections,
  TextRun
} from './types.js';

/**
 * Regions a heading can open
 */
type Region =
  | 'desc'
  | 'parameters'
  | 'attributes'
  | 'returns'
  | 'ignored'
  | 'examples'
  | 'seealso'
  | 'notes'
  | 'references'
  | 'warnings'
  | 'bugs';

const HEADINGS = new Map<string, Region>([
  ['parameters', 'parameters'],
  ['params', 'parameters'],
  ['arguments', 'parameters'],
  ['args', 'parameters'],
  ['other parameters', 'parameters'],
  ['keyword arguments', 'parameters'],
  ['attributes', 'attributes'],
  ['returns', 'returns'],
  ['return', 'returns'],
  ['yields', 'returns'],
  ['raises', 'ignored'],
  ['examples', 'examples'],
  ['example', 'examples'],
  ['see also', 'seealso'],
  ['notes', 'notes'],
  ['note', 'notes'],
  ['references', 'references'],
  ['warning', 'warnings'],
  ['warnings', 'warnings'],
  ['bugs', 'bugs'],
  ['known bugs', 'bugs']
]);

const PARAM_FIELDS = new Set(['param', 'parameter', 'arg', 'argument', 'key', 'keyword']);
const ATTRIBUTE_FIELDS = new Set(['ivar', 'var', 'cvar']);
const TYPE_FIELDS = new Set(['type', 'vartype']);
const RETURN_FIELDS = new Set(['returns', 'return']);
const IGNORED_FIELDS = new Set(['rtype', 'raises', 'raise', 'except', 'exception']);

/**
 * Options for classifying one docstring
 */
export interface ClassifyOptions {
  diagnostics: Diagnostic[];
  /** Dotted see-also names under these modules are reduced to their last part */
  modulePrefixes?: string[];
}

/**
 * Mutable state while walking the top-level nodes
 */
interface ClassifyState {
  region: Region;
  /** Title of an unrecognized heading, waiting for a paragraph */
  pendingTitle?: string;
  seen: Set<Region>;
  attributes: boolean;
  entries: Map<string, ParameterEntry>;
  /** Names from grouped fields such as ":ivar a,:" awaiting the next field */
  group: string[];
  exampleNodes: MarkupNode[];
  sections: Sections;
}

function bareName(name: string): string {
  return name.replace(/^\*+/, '').trim();
}

function entryFor(state: ClassifyState, name: string): ParameterEntry {
  const existing = state.entries.get(name);
  if (existing) {
    return existing;
  }
  const entry: ParameterEntry = { name, blocks: [], inSignature: true };
  state.entries.set(name, entry);
  return entry;
}

function textRuns(text: string): TextRun[] {
  return text ? [{ kind: 'text', text }] : [];
}

function pushDesc(state: ClassifyState, blocks: ContentBlock[]): void {
  for (const block of blocks) {
    if (state.pendingTitle !== undefined && block.kind === 'paragraph') {
      state.sections.desc.push({ ...block, title: state.pendingTitle });
      state.pendingTitle = undefined;
    } else {
      state.sections.desc.push(block);
    }
  }
}

/**
 * Sphinx style fields: ":param x:", ":type x:", ":ivar x:", ":returns:"
 */
function classifyFields(fields: FieldNode[], state: ClassifyState, context: NormalizeContext): void {
  const leftover: FieldNode[] = [];

  for (const field of fields) {
    const [tag = '', ...rest] = field.name.split(/\s+/);
    const kind = tag.toLowerCase();
    let argument = rest.join(' ');

    if (PARAM_FIELDS.has(kind) || ATTRIBUTE_FIELDS.has(kind)) {
      if (ATTRIBUTE_FIELDS.has(kind)) {
        state.attributes = true;
      }

      // ":param str x:" carries its type inline
      let inlineType: string | undefined;
      if (rest.length === 2 && !argument.includes(',')) {
        [inlineType, argument] = rest;
      }

      if (argument.endsWith(',') && field.body.length === 0) {
        state.group.push(argument.slice(0, -1).trim());
        continue;
      }

      const name = [...state.group, argument].join(', ');
      state.group = [];
      const entry = entryFor(state, name);
      entry.blocks.push(...normalizeNodes(field.body, context));
      if (inlineType) {
        entry.type = textRuns(inlineType);
      }
    } else if (TYPE_FIELDS.has(kind)) {
      const entry = entryFor(state, argument);
      entry.type = textRuns(field.body.map(nodeText).join(' ').trim());
    } else if (RETURN_FIELDS.has(kind)) {
      state.sections.returns = [...(state.sections.returns ?? []), ...normalizeNodes(field.body, context)];
    } else if (IGNORED_FIELDS.has(kind)) {
      context.diagnostics.push({ severity: 'DBG', code: 'ignored-section', message: `ignoring field :${field.name}:` });
    } else {
      leftover.push(field);
    }
  }

  if (leftover.length > 0) {
    pushDesc(state, normalizeNodes([{ type: 'field_list', fields: leftover }], context));
  }
}

/**
 * Numpy style parameter lists: "name : type" terms
 */
function classifyDefinitions(items: DefinitionItemNode[], state: ClassifyState, context: NormalizeContext): void {
  for (const item of items) {
    const term = inlineText(item.term).trim();
    const split = term.indexOf(' : ');
    const name = split === -1 ? term.replace(/\s*:$/, '') : term.slice(0, split).trim();
    const type = split === -1 ? '' : term.slice(split + 3).trim();

    const entry = entryFor(state, name);
    entry.blocks.push(...normalizeNodes(item.definitions, context));
    if (type) {
      entry.type = textRuns(type);
    }
  }
}

/**
 * Text of inline markup with cross references replaced by their targets
 */
function targetText(nodes: InlineNode[]): string {
  return inlineText(nodes.map((node): InlineNode => node.type === 'cross_reference' ? { type: 'text', text: node.target } : node));
}

/**
 * Raw see-also names from a node
 */
function seeAlsoTokens(node: MarkupNode, context: NormalizeContext): string[] {
  switch (node.type) {
    case 'definition_list':
      return node.items.map(item => targetText(item.term));
    case 'paragraph':
      return targetText(node.children).split(/[,\s]+/);
    case 'bullet_list':
    case 'enumerated_list':
      return node.items.map(item => {
        const first = item[0];
        const text = first?.type === 'paragraph' ? targetText(first.children) : first ? nodeText(first) : '';
        return text.trim().split(/[\s,:]+/)[0];
      });
    case 'comment':
      return [];
    default:
      context.diagnostics.push({
        severity: 'DBG',
        code: 'ignored-section',
        message: `ignoring ${node.type} in See Also`
      });
      return [];
  }
}

function cleanToken(token: string, modulePrefixes: string[]): string {
  const name = token.trim().replace(/^`+|`+$/g, '').replace(/\(\)$/, '').replace(/[.;:]+$/, '');
  const dot = name.lastIndexOf('.');
  if (dot !== -1 && modulePrefixes.includes(name.slice(0, dot))) {
    return name.slice(dot + 1);
  }
  return name;
}

/**
 * Split example content: a paragraph starts a new example unless it starts
 * in lower case right after code; anything but text closes the example.
 */
function splitExamples(nodes: MarkupNode[], context: NormalizeContext): Example[] {
  const examples: Example[] = [];
  let current: ContentBlock[] | null = null;

  for (const node of nodes) {
    if (node.type === 'comment') continue;

    if (current === null) {
      const previous = examples[examples.length - 1];
      const continuation = node.type === 'paragraph' && previous !== undefined && /^[a-z]/.test(nodeText(node).trimStart());
      if (continuation) {
        current = previous.blocks;
      } else {
        const example: Example = { blocks: [] };
        examples.push(example);
        current = example.blocks;
      }
    }

    current.push(...normalizeNodes([node], context));

    if (node.type !== 'paragraph' && node.type !== 'bullet_list' && node.type !== 'enumerated_list') {
      current = null;
    }
  }

  return examples.filter(example => example.blocks.length > 0);
}

function openRegion(title: string, state: ClassifyState, diagnostics: Diagnostic[]): void {
  const key = title.trim().toLowerCase();
  const region = HEADINGS.get(key);

  if (region === undefined) {
    state.region = 'desc';
    state.pendingTitle = title.trim();
    return;
  }

  if (key === 'example') {
    diagnostics.push({ severity: 'DBG', code: 'singular-heading', message: 'has an Example, not Examples, block' });
  }
  if (region === 'ignored') {
    diagnostics.push({ severity: 'DBG', code: 'ignored-section', message: `ignoring section ${title.trim()}` });
  }
  if (region === 'notes' && state.seen.has('notes')) {
    diagnostics.push({ severity: 'ERROR', code: 'duplicate-section', message: 'multiple NOTES sections' });
  }
  if (region === 'attributes') {
    state.attributes = true;
  }

  state.seen.add(region);
  state.region = region;
  state.pendingTitle = undefined;
}

function classifyNode(node: MarkupNode, state: ClassifyState, options: ClassifyOptions): void {
  const { diagnostics } = options;
  const context: NormalizeContext = { diagnostics };
  const { sections } = state;

  if (node.type === 'rubric') {
    openRegion(node.title, state, diagnostics);
    return;
  }

  switch (state.region) {
    case 'desc':
      if (node.type === 'field_list') {
        classifyFields(node.fields, state, context);
      } else {
        pushDesc(state, normalizeNodes([node], { diagnostics, allowVersionNotes: true }));
      }
      break;

    case 'parameters':
    case 'attributes':
      if (node.type === 'definition_list') {
        classifyDefinitions(node.items, state, context);
      } else if (node.type === 'field_list') {
        classifyFields(node.fields, state, context);
      } else {
        pushDesc(state, normalizeNodes([node], context));
      }
      break;

    case 'returns':
      if (node.type === 'definition_list') {
        // "name : type" terms are dropped, only the description is kept
        const blocks = node.items.flatMap(item => normalizeNodes(item.definitions, context));
        sections.returns = [...(sections.returns ?? []), ...blocks];
      } else if (node.type === 'field_list') {
        classifyFields(node.fields, state, context);
      } else {
        sections.returns = [...(sections.returns ?? []), ...normalizeNodes([node], context)];
      }
      break;

    case 'ignored':
      break;

    case 'examples':
      state.exampleNodes.push(node);
      break;

    case 'seealso': {
      const tokens = seeAlsoTokens(node, context)
        .map(token => cleanToken(token, options.modulePrefixes ?? []))
        .filter(token => token !== '');
      const seeAlso = sections.seeAlso ?? [];
      for (const token of tokens) {
        if (seeAlso.includes(token)) {
          diagnostics.push({ severity: 'DBG', code: 'duplicate-see-also', message: `repeated see also ${token}` });
        } else {
          seeAlso.push(token);
        }
      }
      sections.seeAlso = seeAlso;
      break;
    }

    case 'notes':
      sections.notes = [...(sections.notes ?? []), ...normalizeNodes([node], { diagnostics, allowVersionNotes: true })];
      break;

    case 'references':
      sections.references = [...(sections.references ?? []), ...normalizeNodes([node], context)];
      break;

    case 'warnings':
      sections.warnings = [...(sections.warnings ?? []), ...normalizeNodes([node], context)];
      break;

    case 'bugs':
      sections.bugs = [...(sections.bugs ?? []), ...normalizeNodes([node], context)];
      break;

    default: {
      const unreachable: never = state.region;
      throw new Error(`Unhandled region ${String(unreachable)}`);
    }
  }
}

/**
 * Check documented parameters against the signature
 */
function buildParameters(state: ClassifyState, descriptor: EntityDescriptor, diagnostics: Diagnostic[]): ParameterSection | undefined {
  const signatureNames = (descriptor.signature ?? []).map(p => bareName(p.name));
  const documented = new Set<string>();

  for (const entry of state.entries.values()) {
    const names = entry.name.split(/,\s*/).map(bareName).filter(name => name !== '');
    names.forEach(name => documented.add(name));

    if (descriptor.signature !== null) {
      entry.inSignature = names.length > 0 && names.every(name => signatureNames.includes(name));
      if (!entry.inSignature) {
        diagnostics.push({
          severity: 'NOTE',
          code: 'unknown-parameter',
          message: `documented parameter ${entry.name} is not in the signature`
        });
      }
    }
  }

  for (const name of signatureNames) {
    if (!documented.has(name)) {
      diagnostics.push({ severity: 'INFO', code: 'undocumented-parameter', message: `undocumented parameter ${name}` });
    }
  }

  if (state.entries.size === 0) {
    return undefined;
  }
  return { tag: state.attributes ? 'ATTRIBUTES' : 'PARAMETERS', entries: state.entries };
}

/**
 * Split the top-level nodes of a docstring into its sections.
 */
export function classifySections(nodes: MarkupNode[], descriptor: EntityDescriptor, options: ClassifyOptions): Sections {
  const { diagnostics } = options;
  const state: ClassifyState = {
    region: 'desc',
    seen: new Set(),
    attributes: false,
    entries: new Map(),
    group: [],
    exampleNodes: [],
    sections: { desc: [] }
  };

  let rest = nodes;
  const first = nodes[0];
  if (first?.type === 'paragraph') {
    const runs = normalizeInline(first.children);
    if (runs.length > 0) {
      state.sections.synopsis = { kind: 'paragraph', runs };
    }
    rest = nodes.slice(1);
  }
  if (!state.sections.synopsis) {
    diagnostics.push({ severity: 'INFO', code: 'missing-synopsis', message: 'no synopsis' });
  }

  for (const node of rest) {
    classifyNode(node, state, options);
  }

  if (state.group.length > 0) {
    entryFor(state, state.group.join(', '));
  }

  const { sections } = state;
  const parameters = buildParameters(state, descriptor, diagnostics);
  if (parameters) {
    sections.parameters = parameters;
  }

  if (state.exampleNodes.length > 0) {
    sections.examples = splitExamples(state.exampleNodes, { diagnostics });
  }

  const hasSignature = (descriptor.signature ?? []).length > 0;
  if (hasSignature && !sections.parameters && !sections.returns) {
    diagnostics.push({ severity: 'INFO', code: 'missing-parameters', message: 'no parameters or return value' });
  }

  return sections;
}
