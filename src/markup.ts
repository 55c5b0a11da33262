import { marked, Lexer, type MarkedToken, type Token } from 'marked';
import { MalformedBlockError } from './errors.js';
import { DefinitionItemNode, FieldNode, InlineNode, MarkupNode } from './types.js';

/**
 * Regex patterns for the docstring conventions layered on top of markdown
 */

// Field list line: ":param x: The x value." or ":returns:"
// Group 1: field name with its argument ("param x")
// Group 2: start of the body, if any
const FIELD_PATTERN = /^:([^:\s][^:]*):(?:\s+(.*))?$/;

// Definition line following a term: ": The definition"
const DEFINITION_PATTERN = /^:\s+(.*)$/;

// Admonition marker on the first line of a block quote: "[!VERSIONCHANGED] 4.16.0"
// Group 1: admonition name
// Group 2: the rest of the line
const ADMONITION_PATTERN = /^\[!([A-Za-z]+)\][ \t]*(.*)$/;

// Link targets that point at another help entry: "ahelp:fit" or "#fit"
const CROSS_REFERENCE_PATTERN = /^(?:ahelp:|#)(.+)$/;

const COMMENT_PATTERN = /^<!--([\s\S]*)-->$/;

const DOCTEST_LANGUAGES = new Set(['pycon', 'doctest']);

const VERSION_ADMONITIONS = new Set(['versionadded', 'versionchanged']);

const MARKED_TOKEN_TYPES = new Set<string>([
  'blockquote', 'br', 'code', 'codespan', 'def', 'del', 'em', 'escape',
  'heading', 'hr', 'html', 'image', 'link', 'list', 'list_item',
  'paragraph', 'space', 'strong', 'table', 'text'
]);

function isMarkedToken(token: Token): token is MarkedToken {
  return MARKED_TOKEN_TYPES.has(token.type);
}

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'"
};

/**
 * Undo the html escaping some marked releases apply to token text
 */
function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, entity => ENTITY_MAP[entity] ?? entity);
}

/**
 * Percent-decode a link target, keeping it as written when it is not valid escaping
 */
function decodeTarget(target: string): string {
  try {
    return decodeURIComponent(target);
  } catch (err) {
    if (err instanceof URIError) {
      return target;
    }
    throw err;
  }
}

/**
 * Remove the common indentation of a docstring, ignoring the first line,
 * and trim leading and trailing blank lines.
 */
export function cleanDocstring(text: string): string {
  const lines = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');

  let indent = Infinity;
  for (const line of lines.slice(1)) {
    if (line.trim() === '') continue;
    indent = Math.min(indent, line.length - line.trimStart().length);
  }

  const cleaned = lines.map((line, i) => {
    if (i === 0) return line.trimStart();
    return indent === Infinity ? line.trim() : line.slice(indent).trimEnd();
  });

  while (cleaned.length > 0 && cleaned[0].trim() === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1].trim() === '') cleaned.pop();

  return cleaned.join('\n');
}

/**
 * Plain text of a run of inline nodes
 */
export function inlineText(nodes: InlineNode[]): string {
  return nodes.map(node => {
    switch (node.type) {
      case 'text':
      case 'literal':
        return node.text;
      case 'reference':
        return node.text;
      case 'image':
        return node.alt;
      case 'strong':
      case 'emphasis':
      case 'cross_reference':
        return inlineText(node.children);
    }
  }).join('');
}

/**
 * Plain text of a markup node, used when reporting a node
 */
export function nodeText(node: MarkupNode): string {
  switch (node.type) {
    case 'paragraph':
      return inlineText(node.children);
    case 'rubric':
      return node.title;
    case 'bullet_list':
    case 'enumerated_list':
      return node.items.map(item => item.map(nodeText).join('\n')).join('\n');
    case 'definition_list':
      return node.items
        .map(item => [inlineText(item.term), ...item.definitions.map(nodeText)].join('\n'))
        .join('\n');
    case 'field_list':
      return node.fields.map(field => `:${field.name}: ${field.body.map(nodeText).join('\n')}`).join('\n');
    case 'literal_block':
    case 'doctest_block':
    case 'math_block':
    case 'comment':
    case 'html':
      return node.text;
    case 'block_quote':
      return node.children.map(nodeText).join('\n\n');
    case 'admonition':
      return [`[!${node.name.toUpperCase()}] ${node.argument}`.trimEnd(), ...node.children.map(nodeText)].join('\n');
    case 'table':
      return [node.header, ...node.rows].map(row => row.map(inlineText).join(' | ')).join('\n');
  }
}

function lexInline(text: string): Token[] {
  return Lexer.lexInline(text, { gfm: true });
}

function inlineParagraph(text: string): MarkupNode {
  return { type: 'paragraph', children: convertInline(lexInline(text)) };
}

/**
 * Convert marked inline tokens
 */
function convertInline(tokens: Token[]): InlineNode[] {
  const out: InlineNode[] = [];

  for (const token of tokens) {
    if (!isMarkedToken(token)) {
      throw new MalformedBlockError(`Unsupported inline markup "${token.type}"`, token.raw);
    }

    switch (token.type) {
      case 'text':
      case 'escape':
        out.push({ type: 'text', text: decodeEntities(token.text) });
        break;
      case 'html':
        out.push({ type: 'text', text: token.raw });
        break;
      case 'br':
        out.push({ type: 'text', text: '\n' });
        break;
      case 'strong':
        out.push({ type: 'strong', children: convertInline(token.tokens) });
        break;
      case 'em':
        out.push({ type: 'emphasis', children: convertInline(token.tokens) });
        break;
      case 'del':
        out.push(...convertInline(token.tokens));
        break;
      case 'codespan':
        out.push({ type: 'literal', text: decodeEntities(token.text) });
        break;
      case 'link': {
        const children = convertInline(token.tokens);
        const xref = token.href.match(CROSS_REFERENCE_PATTERN);
        if (xref) {
          out.push({ type: 'cross_reference', target: decodeTarget(xref[1]), children });
        } else {
          out.push({ type: 'reference', text: inlineText(children), uri: token.href });
        }
        break;
      }
      case 'image':
        out.push({ type: 'image', alt: token.text, uri: token.href });
        break;
      default:
        throw new MalformedBlockError(`Unexpected block markup "${token.type}" in text`, token.raw);
    }
  }

  return out;
}

/**
 * Parse a paragraph made of ":name: body" lines, or return null
 */
function parseFieldList(lines: string[]): MarkupNode | null {
  if (!FIELD_PATTERN.test(lines[0])) {
    return null;
  }

  const fields: { name: string; text: string[] }[] = [];
  for (const line of lines) {
    const match = line.match(FIELD_PATTERN);
    if (match) {
      fields.push({ name: match[1].trim(), text: match[2] ? [match[2].trim()] : [] });
      continue;
    }
    // Continuation lines must be indented
    if (!/^\s/.test(line)) {
      return null;
    }
    fields[fields.length - 1].text.push(line.trim());
  }

  const nodes: FieldNode[] = fields.map(field => {
    const body = field.text.join(' ').trim();
    return { name: field.name, body: body ? [inlineParagraph(body)] : [] };
  });

  return { type: 'field_list', fields: nodes };
}

/**
 * Parse "term" / ": definition" paragraphs, or return null
 */
function parseDefinitionList(lines: string[]): MarkupNode | null {
  if (lines.length < 2 || !DEFINITION_PATTERN.test(lines[1]) || /^[\s:]/.test(lines[0])) {
    return null;
  }

  const items: { term: string; definitions: string[][] }[] = [];
  for (const line of lines) {
    const definition = line.match(DEFINITION_PATTERN);
    const current = items[items.length - 1];
    if (definition) {
      current.definitions.push([definition[1].trim()]);
    } else if (/^\s/.test(line)) {
      if (current.definitions.length === 0) return null;
      current.definitions[current.definitions.length - 1].push(line.trim());
    } else {
      if (current && current.definitions.length === 0) return null;
      items.push({ term: line.trim(), definitions: [] });
    }
  }

  if (items[items.length - 1].definitions.length === 0) {
    return null;
  }

  const nodes: DefinitionItemNode[] = items.map(item => ({
    term: convertInline(lexInline(item.term)),
    definitions: item.definitions.map(text => inlineParagraph(text.join(' ')))
  }));

  return { type: 'definition_list', items: nodes };
}

function convertParagraph(text: string, tokens: Token[]): MarkupNode {
  const lines = text.split('\n');
  return parseFieldList(lines)
    ?? parseDefinitionList(lines)
    ?? { type: 'paragraph', children: convertInline(tokens) };
}

/**
 * A block quote is an admonition when its first line carries a [!KIND] marker
 */
function convertBlockquote(tokens: Token[]): MarkupNode {
  const [first, ...rest] = tokens;
  if (!first || !isMarkedToken(first) || first.type !== 'paragraph') {
    return { type: 'block_quote', children: convertBlocks(tokens) };
  }

  const [firstLine, ...otherLines] = first.text.split('\n');
  const marker = firstLine.match(ADMONITION_PATTERN);
  if (!marker) {
    return { type: 'block_quote', children: convertBlocks(tokens) };
  }

  const name = marker[1].toLowerCase();
  let argument = marker[2].trim();
  const bodyLines = [...otherLines];

  // Version notes take the version as argument; the rest of the line is text
  if (VERSION_ADMONITIONS.has(name)) {
    const [version = '', ...words] = argument.split(/\s+/);
    argument = version;
    if (words.length > 0) {
      bodyLines.unshift(words.join(' '));
    }
  }

  const children: MarkupNode[] = [];
  const body = bodyLines.join('\n').trim();
  if (body) {
    children.push(inlineParagraph(body));
  }
  children.push(...convertBlocks(rest));

  return { type: 'admonition', name, argument, children };
}

function convertCode(text: string, lang: string | undefined): MarkupNode {
  const language = lang?.trim().toLowerCase() ?? '';
  if (language === 'math') {
    return { type: 'math_block', text };
  }
  if (DOCTEST_LANGUAGES.has(language) || text.trimStart().startsWith('>>>')) {
    return { type: 'doctest_block', text };
  }
  return language ? { type: 'literal_block', text, language } : { type: 'literal_block', text };
}

/**
 * Adjacent definition paragraphs form one list
 */
function mergeDefinitionLists(nodes: MarkupNode[]): MarkupNode[] {
  const out: MarkupNode[] = [];
  for (const node of nodes) {
    const previous = out[out.length - 1];
    if (node.type === 'definition_list' && previous?.type === 'definition_list') {
      out[out.length - 1] = { type: 'definition_list', items: [...previous.items, ...node.items] };
    } else {
      out.push(node);
    }
  }
  return out;
}

/**
 * Convert marked block tokens
 */
function convertBlocks(tokens: Token[]): MarkupNode[] {
  const out: MarkupNode[] = [];

  for (const token of tokens) {
    if (!isMarkedToken(token)) {
      throw new MalformedBlockError(`Unsupported markup "${token.type}"`, token.raw);
    }

    switch (token.type) {
      case 'space':
      case 'hr':
      case 'def':
        break;
      case 'heading':
        out.push({ type: 'rubric', title: inlineText(convertInline(token.tokens)).trim(), depth: token.depth });
        break;
      case 'paragraph':
        out.push(convertParagraph(token.text, token.tokens));
        break;
      case 'text':
        // Bare text inside list items
        out.push({ type: 'paragraph', children: convertInline(token.tokens ?? lexInline(token.text)) });
        break;
      case 'list': {
        const items = token.items.map(item => convertBlocks(item.tokens));
        if (token.ordered) {
          out.push({ type: 'enumerated_list', start: typeof token.start === 'number' ? token.start : 1, items });
        } else {
          out.push({ type: 'bullet_list', items });
        }
        break;
      }
      case 'code':
        out.push(convertCode(token.text, token.lang));
        break;
      case 'blockquote':
        out.push(convertBlockquote(token.tokens));
        break;
      case 'table':
        out.push({
          type: 'table',
          header: token.header.map(cell => convertInline(cell.tokens)),
          rows: token.rows.map(row => row.map(cell => convertInline(cell.tokens)))
        });
        break;
      case 'html': {
        const text = token.text.trim();
        const comment = text.match(COMMENT_PATTERN);
        out.push(comment ? { type: 'comment', text: comment[1].trim() } : { type: 'html', text });
        break;
      }
      default:
        throw new MalformedBlockError(`Unexpected inline markup "${token.type}" at block level`, token.raw);
    }
  }

  return mergeDefinitionLists(out);
}

/**
 * Parse a docstring into its top-level markup nodes.
 */
export function parseDocstring(text: string): MarkupNode[] {
  const tokens = marked.lexer(cleanDocstring(text), { gfm: true });
  return convertBlocks(tokens);
}
