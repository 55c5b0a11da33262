import fs from 'fs-extra';
import * as path from 'node:path';
import { XMLBuilder } from 'fast-xml-parser';
import { runsText } from './normalizer.js';
import {
  ContentBlock,
  EntryAttributes,
  HelpDocument,
  ParameterSection,
  SignatureParameter,
  TextRun
} from './types.js';

/**
 * Output schema flavour: the help viewer DTD or the documentation page DTD
 */
export type HelpFlavour = 'ahelp' | 'sxml';

export interface SerializeOptions {
  flavour?: HelpFlavour;
}

/**
 * A table on an index page
 */
export interface IndexTable {
  caption: string;
  header: string[];
  rows: string[][];
}

/**
 * An aggregate page listing many entities
 */
export interface IndexPage {
  attributes: EntryAttributes;
  synopsis: string;
  intro: ContentBlock[];
  tables: IndexTable[];
  bugs?: ContentBlock[];
  lastModified?: string;
}

const ROOTS: Record<HelpFlavour, { root: string; dtd: string }> = {
  ahelp: { root: 'cxchelptopics', dtd: 'CXCHelp.dtd' },
  sxml: { root: 'cxcdocumentationpage', dtd: '/data/da/Docs/sxml_manuals/dtds/CXCDocPage.dtd' }
};

// Ordered-mode node as consumed by XMLBuilder
type XmlAttributes = { [name: string]: string };
type XmlNode = { [key: string]: XmlNode[] | XmlAttributes | string };

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressEmptyNode: false,
  format: false
});

function text(value: string): XmlNode {
  return { '#text': value };
}

function element(name: string, children: XmlNode[], attributes?: Record<string, string>): XmlNode {
  const node: XmlNode = { [name]: children };
  if (attributes) {
    const prefixed: XmlAttributes = {};
    for (const [key, value] of Object.entries(attributes)) {
      prefixed[`@_${key}`] = value;
    }
    node[':@'] = prefixed;
  }
  return node;
}

function textElement(name: string, value: string, attributes?: Record<string, string>): XmlNode {
  return element(name, value ? [text(value)] : [], attributes);
}

/**
 * Text runs as mixed content: links become HREF, styling is dropped
 */
function runNodes(runs: TextRun[]): XmlNode[] {
  const out: XmlNode[] = [];
  let pending = '';

  const flush = (): void => {
    if (pending) out.push(text(pending));
    pending = '';
  };

  for (const run of runs) {
    switch (run.kind) {
      case 'text':
      case 'strong':
      case 'emphasis':
      case 'literal':
        pending += run.text;
        break;
      case 'link':
        flush();
        out.push(textElement('HREF', run.text, { link: run.uri }));
        break;
      case 'xref':
        if (run.resolved) {
          flush();
          out.push(textElement('HREF', run.text, { link: run.resolved.url }));
        } else {
          pending += run.text;
        }
        break;
      default: {
        const unreachable: never = run;
        throw new Error(`Unhandled run ${JSON.stringify(unreachable)}`);
      }
    }
  }

  flush();
  return out;
}

/**
 * Plain text of runs; links keep their target in brackets
 */
function runsPlain(runs: TextRun[]): string {
  return runs.map(run => (run.kind === 'link' ? `${run.text} [${run.uri}]` : run.text)).join('');
}

/**
 * Plain text of blocks, for cells and list items which take no markup
 */
function blocksPlain(blocks: ContentBlock[]): string {
  return blocks.map(block => {
    switch (block.kind) {
      case 'paragraph':
        return runsPlain(block.runs);
      case 'literal':
      case 'math':
        return block.text;
      case 'list':
        return block.items.map(blocksPlain).join('\n');
      case 'definition_list':
        return block.items.map(item => `${runsPlain(item.term)}: ${blocksPlain(item.definition)}`).join('\n');
      case 'field_list':
        return block.fields.map(field => `${field.name}: ${blocksPlain(field.blocks)}`).join('\n');
      case 'table':
        return block.rows.map(row => row.map(blocksPlain).join(' ')).join('\n');
      case 'admonition':
        return blocksPlain(block.blocks);
    }
  }).join('\n');
}

function tableNode(rows: string[][], caption?: string): XmlNode {
  const children: XmlNode[] = caption ? [textElement('CAPTION', caption)] : [];
  for (const row of rows) {
    children.push(element('ROW', row.map(cell => textElement('DATA', cell))));
  }
  return element('TABLE', children);
}

/**
 * Render content blocks with the fixed block-to-element table
 */
function blockNodes(blocks: ContentBlock[]): XmlNode[] {
  return blocks.map(block => {
    switch (block.kind) {
      case 'paragraph':
        return element('PARA', runNodes(block.runs), block.title ? { title: block.title } : undefined);
      case 'list':
        return element('LIST', block.items.map(item => textElement('ITEM', blocksPlain(item))));
      case 'definition_list':
        return tableNode([
          ['Item', 'Definition'],
          ...block.items.map(item => [runsPlain(item.term), blocksPlain(item.definition)])
        ]);
      case 'field_list':
        return tableNode([
          ['Item', 'Definition'],
          ...block.fields.map(field => [field.name, blocksPlain(field.blocks)])
        ]);
      case 'literal':
      case 'math':
        return textElement('VERBATIM', block.text);
      case 'table':
        return tableNode(block.rows.map(row => row.map(blocksPlain)));
      case 'admonition': {
        const runs = block.blocks.flatMap(inner => (inner.kind === 'paragraph' ? inner.runs : []));
        const title = block.title ?? (block.version ? `${block.admonition === 'version-added' ? 'Added' : 'Changed'} in ${block.version}` : undefined);
        return element('PARA', runNodes(runs), title ? { title } : undefined);
      }
    }
  });
}

function formatParameter(param: SignatureParameter): string {
  const bare = param.name.replace(/^\*+/, '');
  switch (param.kind) {
    case 'var-positional':
      return param.annotation ? `*${bare}: ${param.annotation}` : `*${bare}`;
    case 'var-keyword':
      return param.annotation ? `**${bare}: ${param.annotation}` : `**${bare}`;
    default:
      break;
  }

  if (param.annotation) {
    const annotated = `${param.name}: ${param.annotation}`;
    return param.default !== undefined ? `${annotated} = ${param.default}` : annotated;
  }
  return param.default !== undefined ? `${param.name}=${param.default}` : param.name;
}

/**
 * Signature as written in the SYNTAX block, with any annotations
 */
export function formatSyntax(name: string, signature: SignatureParameter[] | null, returnAnnotation?: string): string {
  if (signature === null) {
    return name;
  }
  const call = `${name}(${signature.map(formatParameter).join(', ')})`;
  return returnAnnotation ? `${call} -> ${returnAnnotation}` : call;
}

function parametersNode(parameters: ParameterSection | undefined, returns: ContentBlock[] | undefined): XmlNode | undefined {
  if (!parameters && !returns) {
    return undefined;
  }

  const isAttributes = parameters?.tag === 'ATTRIBUTES';
  const value = isAttributes ? 'attribute' : 'parameter';
  const owner = isAttributes ? 'object' : 'function';
  const entries = parameters ? Array.from(parameters.entries.values()) : [];

  let intro: string;
  if (entries.length === 0) {
    intro = `This ${owner} has no ${value}s`;
  } else if (entries.length === 1) {
    intro = `The ${value} for this ${owner} is:`;
  } else {
    intro = `The ${value}s for this ${owner} are:`;
  }

  const children: XmlNode[] = [textElement('PARA', intro)];

  if (entries.length > 0) {
    const hasType = entries.some(entry => entry.type !== undefined && entry.type.length > 0);
    const header = [isAttributes ? 'Attribute' : 'Parameter', ...(hasType ? ['Type information'] : []), 'Definition'];
    const rows = entries.map(entry => [
      entry.name,
      ...(hasType ? [entry.type ? runsText(entry.type) : ''] : []),
      blocksPlain(entry.blocks)
    ]);
    children.push(tableNode([header, ...rows]));
  }

  if (returns && returns.length > 0) {
    children.push(textElement('PARA', 'The return value from this function is:', { title: 'Return value' }));
    children.push(...blockNodes(returns));
  }

  return element('ADESC', children, { title: isAttributes ? 'ATTRIBUTES' : 'PARAMETERS' });
}

function titledSection(title: string, blocks: ContentBlock[] | undefined): XmlNode[] {
  return blocks && blocks.length > 0 ? [element('ADESC', blockNodes(blocks), { title })] : [];
}

function wrapDocument(entry: XmlNode, flavour: HelpFlavour): string {
  const { root, dtd } = ROOTS[flavour];
  const body = builder.build([element(root, [entry])]);
  return `<?xml version="1.0" encoding="UTF-8" ?>\n<!DOCTYPE ${root} SYSTEM "${dtd}">\n${body}\n`;
}

function attributeRecord(attributes: EntryAttributes): Record<string, string> {
  const { pkg, key, refkeywords, seealsogroups, displayseealsogroups, context } = attributes;
  return { pkg, key, refkeywords, seealsogroups, displayseealsogroups, context };
}

/**
 * Render a help document. The same document always gives the same bytes.
 */
export function serializeHelpDocument(doc: HelpDocument, options: SerializeOptions = {}): string {
  const { sections } = doc;
  const children: XmlNode[] = [
    textElement('SYNOPSIS', sections.synopsis ? runsText(sections.synopsis.runs) : '')
  ];

  if (doc.kind === 'parameterized-model') {
    children.push(element('SYNTAX', [textElement('LINE', doc.name)]));
  } else if (doc.signature !== null) {
    children.push(element('SYNTAX', [textElement('LINE', formatSyntax(doc.name, doc.signature, doc.returnAnnotation))]));
  }

  children.push(element('DESC', blockNodes(sections.desc)));

  if (sections.examples && sections.examples.length > 0) {
    children.push(element('QEXAMPLELIST', sections.examples.map(example =>
      element('QEXAMPLE', [element('DESC', blockNodes(example.blocks))])
    )));
  }

  const parameters = parametersNode(sections.parameters, sections.returns);
  if (parameters) {
    children.push(parameters);
  }

  children.push(...titledSection('Warning', sections.warnings));
  children.push(...titledSection('Notes', sections.notes));
  children.push(...titledSection('References', sections.references));

  if (doc.changes.length > 0) {
    children.push(element('ADESC', doc.changes.map(note =>
      element('PARA', runNodes(note.runs), note.title ? { title: note.title } : undefined)
    ), { title: doc.changesTitle }));
  }

  if (sections.bugs && sections.bugs.length > 0) {
    children.push(element('BUGS', blockNodes(sections.bugs)));
  }

  if (doc.lastModified) {
    children.push(textElement('LASTMODIFIED', doc.lastModified));
  }

  return wrapDocument(element('ENTRY', children, attributeRecord(doc.attributes)), options.flavour ?? 'ahelp');
}

/**
 * Render an index page: an introduction followed by one table per group
 */
export function serializeIndexPage(page: IndexPage, options: SerializeOptions = {}): string {
  const desc = [
    ...blockNodes(page.intro),
    ...page.tables.map(table => tableNode([table.header, ...table.rows], table.caption))
  ];

  const children: XmlNode[] = [
    textElement('SYNOPSIS', page.synopsis),
    element('DESC', desc)
  ];
  if (page.bugs && page.bugs.length > 0) {
    children.push(element('BUGS', blockNodes(page.bugs)));
  }
  if (page.lastModified) {
    children.push(textElement('LASTMODIFIED', page.lastModified));
  }

  return wrapDocument(element('ENTRY', children, attributeRecord(page.attributes)), options.flavour ?? 'ahelp');
}

/**
 * File name for an output stem
 */
export function outputFileName(stem: string, flavour: HelpFlavour = 'ahelp'): string {
  return `${stem}.${flavour === 'sxml' ? 'sxml' : 'xml'}`;
}

/**
 * Write a rendered file into the output directory, replacing any existing one
 */
export async function writeHelpFile(outdir: string, stem: string, xml: string, flavour: HelpFlavour = 'ahelp'): Promise<string> {
  const outfile = path.join(outdir, outputFileName(stem, flavour));
  await fs.writeFile(outfile, xml, 'utf-8');
  return outfile;
}
