/**
 * The two kinds of documented entity.
 */
export type EntityKind = 'callable' | 'parameterized-model';

/**
 * How a signature parameter binds its argument.
 */
export type ParameterKind = 'positional' | 'keyword' | 'var-positional' | 'var-keyword';

/**
 * One entry of an entity signature.
 */
export interface SignatureParameter {
  name: string;
  /** Default value as source text, if there is one */
  default?: string;
  kind?: ParameterKind;
  /** Type annotation as source text, e.g. "int | None" */
  annotation?: string;
}

/**
 * What to do with signature annotations when writing SYNTAX.
 */
export type AnnotationMode = 'keep' | 'delete';

/**
 * How much of a signature carries annotations.
 */
export type AnnotationLevel = 'none' | 'return-only' | 'argument-only' | 'both';

/**
 * Describes one entity to convert.
 */
export interface EntityDescriptor {
  /** Unique key of the entity */
  name: string;

  kind: EntityKind;

  /** Ordered parameters, or null when the entity has no signature */
  signature: SignatureParameter[] | null;

  /** Return type annotation as source text */
  returnAnnotation?: string;

  /** Model family (e.g. "xs"), used for see-also grouping of models */
  family?: string;

  /** Table caption the model is listed under in the models index */
  group?: string;
}

// ---------------------------------------------------------------------------
// Markup tree, as produced by the docstring front end
// ---------------------------------------------------------------------------

export type InlineNode =
  | { type: 'text'; text: string }
  | { type: 'strong'; children: InlineNode[] }
  | { type: 'emphasis'; children: InlineNode[] }
  | { type: 'literal'; text: string }
  | { type: 'reference'; text: string; uri: string }
  | { type: 'cross_reference'; target: string; children: InlineNode[] }
  | { type: 'image'; alt: string; uri: string };

export interface FieldNode {
  /** Field name including its argument, e.g. "param x" */
  name: string;
  body: MarkupNode[];
}

export interface DefinitionItemNode {
  term: InlineNode[];
  definitions: MarkupNode[];
}

export type MarkupNode =
  | { type: 'paragraph'; children: InlineNode[] }
  | { type: 'rubric'; title: string; depth: number }
  | { type: 'bullet_list'; items: MarkupNode[][] }
  | { type: 'enumerated_list'; start: number; items: MarkupNode[][] }
  | { type: 'definition_list'; items: DefinitionItemNode[] }
  | { type: 'field_list'; fields: FieldNode[] }
  | { type: 'literal_block'; text: string; language?: string }
  | { type: 'doctest_block'; text: string }
  | { type: 'math_block'; text: string }
  | { type: 'block_quote'; children: MarkupNode[] }
  | { type: 'admonition'; name: string; argument: string; children: MarkupNode[] }
  | { type: 'table'; header: InlineNode[][]; rows: InlineNode[][][] }
  | { type: 'comment'; text: string }
  | { type: 'html'; text: string };

// ---------------------------------------------------------------------------
// Normalized content blocks
// ---------------------------------------------------------------------------

/**
 * Resolution of a cross reference against the metadata index.
 */
export interface ResolvedKey {
  key: string;
  url: string;
}

export type TextRun =
  | { kind: 'text'; text: string }
  | { kind: 'strong'; text: string }
  | { kind: 'emphasis'; text: string }
  | { kind: 'literal'; text: string }
  | { kind: 'link'; text: string; uri: string }
  | { kind: 'xref'; target: string; text: string; resolved?: ResolvedKey };

export type AdmonitionKind = 'note' | 'warning' | 'version-added' | 'version-changed';

export interface DefinitionEntry {
  term: TextRun[];
  definition: ContentBlock[];
}

export interface FieldEntry {
  name: string;
  blocks: ContentBlock[];
}

export type ContentBlock =
  | { kind: 'paragraph'; runs: TextRun[]; title?: string }
  | { kind: 'list'; ordered: boolean; items: ContentBlock[][] }
  | { kind: 'definition_list'; items: DefinitionEntry[] }
  | { kind: 'field_list'; fields: FieldEntry[] }
  | { kind: 'literal'; text: string; language?: string }
  | { kind: 'table'; header: boolean; rows: ContentBlock[][][] }
  | { kind: 'math'; text: string }
  | { kind: 'admonition'; admonition: AdmonitionKind; version?: string; title?: string; blocks: ContentBlock[] };

export type Paragraph = Extract<ContentBlock, { kind: 'paragraph' }>;

export type Admonition = Extract<ContentBlock, { kind: 'admonition' }>;

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type Severity = 'DBG' | 'NOTE' | 'INFO' | 'ERROR';

export type DiagnosticCode =
  | 'empty-description'
  | 'missing-synopsis'
  | 'undocumented-parameter'
  | 'unknown-parameter'
  | 'missing-parameters'
  | 'missing-see-also'
  | 'see-also-unresolved'
  | 'unresolved-cross-reference'
  | 'duplicate-see-also'
  | 'flattened-list'
  | 'ignored-section'
  | 'duplicate-section'
  | 'singular-heading'
  | 'inherited-metadata'
  | 'fallback-context';

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
}

// ---------------------------------------------------------------------------
// Sections and the help document
// ---------------------------------------------------------------------------

/**
 * Documentation of one parameter or attribute.
 */
export interface ParameterEntry {
  /** Name as written, possibly a grouped "a, b" */
  name: string;
  type?: TextRun[];
  blocks: ContentBlock[];
  /** False when no signature parameter carries this name */
  inSignature: boolean;
}

export interface ParameterSection {
  tag: 'PARAMETERS' | 'ATTRIBUTES';
  /** Insertion ordered, keyed by the documented name */
  entries: Map<string, ParameterEntry>;
}

export interface Example {
  blocks: ContentBlock[];
}

/**
 * The classified view of one docstring.
 */
export interface Sections {
  synopsis?: Paragraph;
  desc: ContentBlock[];
  parameters?: ParameterSection;
  returns?: ContentBlock[];
  examples?: Example[];
  bugs?: ContentBlock[];
  /** Raw SEE ALSO tokens, deduplicated; undefined when no section was given */
  seeAlso?: string[];
  notes?: ContentBlock[];
  references?: ContentBlock[];
  warnings?: ContentBlock[];
}

/**
 * A "Changed in" / "Added in" note lifted out of the description.
 */
export interface ChangeNote {
  admonition: 'version-added' | 'version-changed';
  release: string;
  /** Set only on the first note carrying a given title */
  title?: string;
  runs: TextRun[];
}

/**
 * The attributes written on the ENTRY element, in output order.
 */
export interface EntryAttributes {
  pkg: string;
  key: string;
  refkeywords: string;
  seealsogroups: string;
  displayseealsogroups: string;
  context: string;
}

export interface HelpDocument {
  name: string;
  kind: EntityKind;
  signature: SignatureParameter[] | null;
  returnAnnotation?: string;
  attributes: EntryAttributes;
  /** Classified content with cross references resolved and version notes lifted out */
  sections: Sections;
  /** Resolved SEE ALSO keys, in source order */
  seeAlso: string[];
  changes: ChangeNote[];
  /** Heading used for the changes block, e.g. "Changes in CIAO" */
  changesTitle: string;
  lastModified?: string;
  diagnostics: Diagnostic[];
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/**
 * Facts from an already published help entry.
 */
export interface HelpEntry {
  key: string;
  context?: string;
  refkeywords?: string;
  seealsogroups?: string;
  displayseealsogroups?: string;
  /** Release the entity first appeared in */
  since?: string;
}

export interface SkipRules {
  exact: string[];
  prefixes: string[];
  /** Curated exclusions: name to reason */
  exclusions: Record<string, string>;
}

export interface BugsLink {
  text: string;
  linkText: string;
  url: string;
  tail: string;
}

/**
 * Shape of the metadata file.
 */
export interface MetadataSource {
  pkg: string;
  product: string;
  lastModified?: string;
  /** URL template for help pages, "{key}" is replaced */
  helpUrl: string;
  fallbackContext: string;
  modulePrefixes: string[];
  releases: Record<string, string>;
  skip: SkipRules;
  /** Alias to canonical name */
  synonyms: Record<string, string>;
  renames: Record<string, string>;
  bugs?: BugsLink;
  entries: Record<string, HelpEntry>;
}

export interface SkipDecision {
  reason: string;
}
