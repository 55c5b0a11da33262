import { assembleDocument } from './assembler.js';
import { classifySections } from './classifier.js';
import { parseDocstring } from './markup.js';
import { MetadataIndex } from './metadata.js';
import { HelpFlavour, serializeHelpDocument } from './serializer.js';
import { AnnotationLevel, AnnotationMode, Diagnostic, EntityDescriptor, HelpDocument, MarkupNode } from './types.js';

export interface ConvertOptions {
  flavour?: HelpFlavour;
  /** Keep or drop signature annotations (default: keep) */
  annotations?: AnnotationMode;
}

/**
 * The outcome of converting one entity
 */
export interface Conversion {
  document: HelpDocument;
  xml: string;
}

/**
 * The descriptor with every type annotation removed
 */
export function stripAnnotations(descriptor: EntityDescriptor): EntityDescriptor {
  const { returnAnnotation: _returns, ...rest } = descriptor;
  return {
    ...rest,
    signature: descriptor.signature?.map(({ annotation: _annotation, ...param }) => param) ?? null
  };
}

/**
 * Classify how much of an entity's signature is annotated
 */
export function annotationLevel(descriptor: EntityDescriptor): AnnotationLevel {
  const hasReturn = descriptor.returnAnnotation !== undefined;
  const hasArguments = (descriptor.signature ?? []).some(param => param.annotation !== undefined);
  if (hasReturn && hasArguments) return 'both';
  if (hasReturn) return 'return-only';
  if (hasArguments) return 'argument-only';
  return 'none';
}

/**
 * Run one entity through the whole pipeline: parse, classify, assemble, serialize.
 * Throws MalformedBlockError when a node has no help rendering.
 */
export function convertEntity(
  descriptor: EntityDescriptor,
  source: string | MarkupNode[],
  metadata: MetadataIndex,
  options: ConvertOptions = {}
): Conversion {
  const diagnostics: Diagnostic[] = [];
  const nodes = typeof source === 'string' ? parseDocstring(source) : source;

  const entity = options.annotations === 'delete' ? stripAnnotations(descriptor) : descriptor;

  const sections = classifySections(nodes, entity, {
    diagnostics,
    modulePrefixes: metadata.modulePrefixes
  });
  const document = assembleDocument(entity, sections, metadata, diagnostics);

  return { document, xml: serializeHelpDocument(document, options) };
}
