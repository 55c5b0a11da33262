import { MalformedBlockError } from './errors.js';
import { inlineText, nodeText } from './markup.js';
import {
  Admonition,
  ContentBlock,
  DefinitionEntry,
  Diagnostic,
  InlineNode,
  MarkupNode,
  Paragraph,
  TextRun
} from './types.js';

/**
 * Per-call state for normalizing one region of a docstring
 */
export interface NormalizeContext {
  /** Sink for non-fatal findings */
  diagnostics: Diagnostic[];
  /** Version notes are only meaningful in the description and notes */
  allowVersionNotes?: boolean;
}

type RunStyle = 'text' | 'strong' | 'emphasis';

function malformed(message: string, node: MarkupNode): MalformedBlockError {
  return new MalformedBlockError(message, nodeText(node));
}

/**
 * Append a run, merging it into the previous one when both are plain text
 */
function pushRun(runs: TextRun[], run: TextRun): void {
  const last = runs[runs.length - 1];
  if (run.kind === 'text' && last?.kind === 'text') {
    runs[runs.length - 1] = { kind: 'text', text: last.text + run.text };
  } else if (run.kind !== 'text' || run.text !== '') {
    runs.push(run);
  }
}

function collectRuns(nodes: InlineNode[], style: RunStyle, runs: TextRun[]): void {
  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        pushRun(runs, { kind: style, text: node.text });
        break;
      // The help schema has a single level of emphasis; the outer one wins
      case 'strong':
        collectRuns(node.children, style === 'text' ? 'strong' : style, runs);
        break;
      case 'emphasis':
        collectRuns(node.children, style === 'text' ? 'emphasis' : style, runs);
        break;
      case 'literal':
        pushRun(runs, { kind: 'literal', text: node.text });
        break;
      case 'reference':
        pushRun(runs, { kind: 'link', text: node.text || node.uri, uri: node.uri });
        break;
      case 'cross_reference':
        pushRun(runs, { kind: 'xref', target: node.target, text: inlineText(node.children) || node.target });
        break;
      case 'image':
        throw new MalformedBlockError('Images have no help equivalent', `![${node.alt}](${node.uri})`);
      default: {
        const unreachable: never = node;
        throw new Error(`Unhandled inline node ${JSON.stringify(unreachable)}`);
      }
    }
  }
}

/**
 * Convert inline markup to text runs
 */
export function normalizeInline(nodes: InlineNode[]): TextRun[] {
  const runs: TextRun[] = [];
  collectRuns(nodes, 'text', runs);
  return runs;
}

/**
 * Plain text of a run sequence
 */
export function runsText(runs: TextRun[]): string {
  return runs.map(run => run.text).join('');
}

function isParagraph(block: ContentBlock): block is Paragraph {
  return block.kind === 'paragraph';
}

/**
 * Normalize a list item. Nested lists come back as extra sibling items.
 */
function normalizeListItem(item: MarkupNode[], context: NormalizeContext, parent: MarkupNode): ContentBlock[][] {
  const own: ContentBlock[] = [];
  const siblings: ContentBlock[][] = [];

  for (const child of item) {
    switch (child.type) {
      case 'paragraph':
        own.push(...normalizeNode(child, context));
        break;
      case 'bullet_list':
      case 'enumerated_list': {
        context.diagnostics.push({
          severity: 'NOTE',
          code: 'flattened-list',
          message: `flattened nested list: ${nodeText(child).split('\n')[0]}`
        });
        for (const block of normalizeNode(child, context)) {
          if (block.kind === 'list') {
            siblings.push(...block.items);
          }
        }
        break;
      }
      case 'comment':
        break;
      default:
        throw malformed(`List items may only hold text and lists, found ${child.type}`, parent);
    }
  }

  return own.length > 0 ? [own, ...siblings] : siblings;
}

function normalizeList(node: Extract<MarkupNode, { type: 'bullet_list' | 'enumerated_list' }>, context: NormalizeContext): ContentBlock[] {
  const items = node.items.flatMap(item => normalizeListItem(item, context, node));
  if (items.length === 0) {
    return [];
  }
  return [{ kind: 'list', ordered: node.type === 'enumerated_list', items }];
}

/**
 * Normalize nodes that must come out as at most one paragraph
 */
function singleParagraph(nodes: MarkupNode[], context: NormalizeContext, parent: MarkupNode, where: string): Paragraph[] {
  const blocks = normalizeNodes(nodes, context);
  if (blocks.length > 1 || !blocks.every(isParagraph)) {
    throw malformed(`${where} must be a single paragraph`, parent);
  }
  return blocks.filter(isParagraph);
}

function normalizeAdmonition(node: Extract<MarkupNode, { type: 'admonition' }>, context: NormalizeContext): Admonition[] {
  switch (node.name) {
    case 'versionadded':
    case 'versionchanged': {
      if (!context.allowVersionNotes) {
        throw malformed('Version notes are only allowed in the description and notes', node);
      }
      if (!node.argument) {
        throw malformed('Version note has no version', node);
      }
      const blocks = normalizeNodes(node.children, { ...context, allowVersionNotes: false });
      if (blocks.length > 1 || !blocks.every(isParagraph)) {
        throw malformed('Version note must hold exactly one paragraph', node);
      }
      return [{
        kind: 'admonition',
        admonition: node.name === 'versionadded' ? 'version-added' : 'version-changed',
        version: node.argument,
        blocks
      }];
    }

    case 'note':
    case 'warning': {
      const blocks = normalizeNodes(node.children, { ...context, allowVersionNotes: false });
      if (!blocks.every(isParagraph)) {
        throw malformed(`A ${node.name} may only hold paragraphs`, node);
      }
      const kind = node.name === 'note' ? 'note' : 'warning';
      const fallbackTitle = kind === 'note' ? 'Note' : 'Warning';

      if (node.argument && blocks.length === 1) {
        return [{ kind: 'admonition', admonition: kind, title: node.argument, blocks }];
      }
      if (!node.argument && blocks.length === 1) {
        return [{ kind: 'admonition', admonition: kind, title: fallbackTitle, blocks }];
      }
      if (!node.argument && blocks.length === 2) {
        const [title, body] = blocks;
        return [{ kind: 'admonition', admonition: kind, title: runsText(title.runs), blocks: [body] }];
      }
      throw malformed(`Unable to convert ${node.name} with ${blocks.length} paragraphs`, node);
    }

    default:
      throw malformed(`Unsupported admonition "${node.name}"`, node);
  }
}

function normalizeBlockQuote(node: Extract<MarkupNode, { type: 'block_quote' }>, context: NormalizeContext): ContentBlock[] {
  const { children } = node;
  const only = children.length === 1 ? children[0] : undefined;

  if (only?.type === 'bullet_list' || only?.type === 'enumerated_list') {
    return normalizeNode(only, context);
  }

  const doctests: string[] = [];
  for (const child of children) {
    if (child.type === 'doctest_block') doctests.push(child.text);
  }
  if (children.length > 0 && doctests.length === children.length) {
    return [{ kind: 'literal', text: doctests.join('\n\n'), language: 'doctest' }];
  }

  if (only?.type === 'paragraph') {
    return [{ kind: 'literal', text: inlineText(only.children) }];
  }

  throw malformed('Unable to convert block quote', node);
}

/**
 * Normalize one markup node into zero or more content blocks.
 */
export function normalizeNode(node: MarkupNode, context: NormalizeContext): ContentBlock[] {
  switch (node.type) {
    case 'paragraph': {
      const runs = normalizeInline(node.children);
      return runs.length > 0 ? [{ kind: 'paragraph', runs }] : [];
    }

    case 'rubric':
      throw malformed('Unexpected heading', node);

    case 'bullet_list':
    case 'enumerated_list':
      return normalizeList(node, context);

    case 'definition_list': {
      const items: DefinitionEntry[] = node.items.map(item => ({
        term: normalizeInline(item.term),
        definition: singleParagraph(item.definitions, context, node, 'A definition')
      }));
      return [{ kind: 'definition_list', items }];
    }

    case 'field_list':
      return [{
        kind: 'field_list',
        fields: node.fields.map(field => ({ name: field.name, blocks: normalizeNodes(field.body, context) }))
      }];

    case 'literal_block':
      return [node.language ? { kind: 'literal', text: node.text, language: node.language } : { kind: 'literal', text: node.text }];

    case 'doctest_block':
      return [{ kind: 'literal', text: node.text, language: 'doctest' }];

    case 'math_block':
      return [{ kind: 'math', text: node.text }];

    case 'block_quote':
      return normalizeBlockQuote(node, context);

    case 'admonition':
      return normalizeAdmonition(node, context);

    case 'table': {
      const toCell = (cell: InlineNode[]): ContentBlock[] => {
        const runs = normalizeInline(cell);
        return runs.length > 0 ? [{ kind: 'paragraph', runs }] : [];
      };
      const header = node.header.some(cell => inlineText(cell).trim() !== '');
      const rows = header ? [node.header, ...node.rows] : node.rows;
      return [{ kind: 'table', header, rows: rows.map(row => row.map(toCell)) }];
    }

    case 'comment':
      return [];

    case 'html':
      throw malformed('Raw HTML has no help equivalent', node);

    default: {
      const unreachable: never = node;
      throw new Error(`Unhandled markup node ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Normalize a node sequence in order
 */
export function normalizeNodes(nodes: MarkupNode[], context: NormalizeContext): ContentBlock[] {
  return nodes.flatMap(node => normalizeNode(node, context));
}
