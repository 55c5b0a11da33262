import * as test from 'node:test';
import * as assert from 'node:assert';
import { assembleDocument } from '../assembler.js';
import { MetadataIndex, parseMetadataSource } from '../metadata.js';
import { ContentBlock, Diagnostic, EntityDescriptor, Sections } from '../types.js';

const { describe, it, beforeEach } = test;

function paragraph(text: string): ContentBlock {
  return { kind: 'paragraph', runs: [{ kind: 'text', text }] };
}

function sectionsWith(extra: Partial<Sections> = {}, synopsis = 'Compute foo.'): Sections {
  return {
    synopsis: { kind: 'paragraph', runs: [{ kind: 'text', text: synopsis }] },
    desc: [paragraph('Longer description.')],
    ...extra
  };
}

function index(raw: object = {}, knownKeys: string[] = []): MetadataIndex {
  return new MetadataIndex(parseMetadataSource(raw), { knownKeys });
}

const foo: EntityDescriptor = { name: 'foo', kind: 'callable', signature: null };

describe('assembleDocument', () => {
  let diagnostics: Diagnostic[];

  beforeEach(() => {
    diagnostics = [];
  });

  it('should keep resolved see also keys once', () => {
    const doc = assembleDocument(foo, sectionsWith({ seeAlso: ['a', 'b', 'a'] }), index({}, ['a']), diagnostics);

    assert.deepStrictEqual(doc.seeAlso, ['a']);
    assert.deepStrictEqual(diagnostics.filter(d => d.code === 'unresolved-cross-reference'), [
      { severity: 'INFO', code: 'unresolved-cross-reference', message: 'unable to find ahelp for b' }
    ]);
    assert.strictEqual(doc.attributes.seealsogroups, 'afoo');
  });

  it('should report a missing see also section', () => {
    assembleDocument(foo, sectionsWith(), index(), diagnostics);
    assert.ok(diagnostics.some(d => d.code === 'missing-see-also' && d.message === 'no see-also given'));
  });

  it('should report see also names that all fail to resolve', () => {
    assembleDocument(foo, sectionsWith({ seeAlso: ['x'] }), index(), diagnostics);
    assert.ok(diagnostics.some(d => d.code === 'see-also-unresolved'));
  });

  it('should lift version notes into the changes block', () => {
    const desc: ContentBlock[] = [
      { kind: 'admonition', admonition: 'version-changed', version: '4.16.0', blocks: [paragraph('Default changed.')] },
      { kind: 'admonition', admonition: 'version-added', version: '4.15.2', blocks: [paragraph('First added.')] },
      { kind: 'admonition', admonition: 'version-changed', version: '4.16.0', blocks: [paragraph('Also changed.')] }
    ];

    const doc = assembleDocument(foo, sectionsWith({ desc }), index({ releases: { '4.15.': '4.15' } }), diagnostics);

    assert.deepStrictEqual(doc.changes, [
      {
        admonition: 'version-changed',
        release: '4.16',
        title: 'Changed in CIAO 4.16',
        runs: [{ kind: 'text', text: 'Default changed.' }]
      },
      {
        admonition: 'version-changed',
        release: '4.16',
        runs: [{ kind: 'text', text: 'Also changed.' }]
      },
      {
        admonition: 'version-added',
        release: '4.15',
        title: 'Added in CIAO 4.15',
        runs: [{ kind: 'text', text: 'First added.' }]
      }
    ]);
    assert.deepStrictEqual(doc.sections.desc, []);
    assert.strictEqual(doc.changesTitle, 'Changes in CIAO');
    assert.ok(diagnostics.some(d => d.code === 'empty-description' && d.message === 'no text in DESC block'));
  });

  it('should add an empty added note for the release an entity appeared in', () => {
    const doc = assembleDocument(foo, sectionsWith(), index({ entries: { foo: { since: '4.14.0' } } }), diagnostics);

    assert.deepStrictEqual(doc.changes, [
      { admonition: 'version-added', release: '4.14', title: 'Added in CIAO 4.14', runs: [] }
    ]);
  });

  it('should mention synonyms in the description and keywords', () => {
    const doc = assembleDocument(foo, sectionsWith(), index({ synonyms: { bar: 'foo' } }), diagnostics);

    assert.deepStrictEqual(doc.sections.desc[0], paragraph('The function is also called bar().'));
    assert.strictEqual(doc.attributes.refkeywords, 'bar compute foo');
  });

  it('should build keywords from the synopsis and the name', () => {
    const descriptor: EntityDescriptor = { name: 'fit_model', kind: 'callable', signature: null };
    const doc = assembleDocument(descriptor, sectionsWith({}, 'Fit the model, quickly.'), index(), diagnostics);

    assert.strictEqual(doc.attributes.refkeywords, 'fit model quickly the fit model');
  });

  it('should give models their own context and display group', () => {
    const descriptor: EntityDescriptor = { name: 'xsapec', kind: 'parameterized-model', signature: null, family: 'xs' };
    const doc = assembleDocument(descriptor, sectionsWith(), index(), diagnostics);

    assert.strictEqual(doc.attributes.context, 'models');
    assert.strictEqual(doc.attributes.displayseealsogroups, 'xsmodels');
    assert.ok(!diagnostics.some(d => d.code === 'fallback-context'));
  });

  it('should fall back to the default context', () => {
    const doc = assembleDocument(foo, sectionsWith(), index(), diagnostics);

    assert.strictEqual(doc.attributes.context, 'sherpaish');
    assert.ok(diagnostics.some(d => d.severity === 'DBG' && d.message === 'fall back context=sherpaish for foo'));
  });

  it('should report metadata borrowed from another entry', () => {
    const descriptor: EntityDescriptor = { name: 'load_arrays', kind: 'callable', signature: null };
    const metadata = index({ entries: { load_data: { refkeywords: 'load_arrays', context: 'data' } } });

    const doc = assembleDocument(descriptor, sectionsWith({}, 'Load arrays.'), metadata, diagnostics);

    assert.strictEqual(doc.attributes.key, 'load_arrays');
    assert.strictEqual(doc.attributes.context, 'data');
    assert.ok(diagnostics.some(d => d.code === 'inherited-metadata' && d.message === 'using metadata from load_data'));
  });

  it('should resolve cross references in the text', () => {
    const desc: ContentBlock[] = [{
      kind: 'paragraph',
      runs: [
        { kind: 'text', text: 'See ' },
        { kind: 'xref', target: 'fit', text: 'fit' },
        { kind: 'text', text: ' and ' },
        { kind: 'xref', target: 'nope', text: 'nope' }
      ]
    }];

    const doc = assembleDocument(foo, sectionsWith({ desc }), index({}, ['fit']), diagnostics);

    assert.deepStrictEqual(doc.sections.desc, [{
      kind: 'paragraph',
      runs: [
        { kind: 'text', text: 'See ' },
        { kind: 'xref', target: 'fit', text: 'fit', resolved: { key: 'fit', url: 'https://cxc.harvard.edu/sherpa/ahelp/fit.html' } },
        { kind: 'text', text: ' and ' },
        { kind: 'xref', target: 'nope', text: 'nope' }
      ]
    }]);
    assert.ok(diagnostics.some(d => d.message === 'unable to find ahelp for nope'));
  });

  it('should add the standard bugs text', () => {
    const metadata = index({
      bugs: { text: 'See the ', linkText: 'bugs page', url: 'https://example.org/bugs', tail: ' for known problems.' }
    });

    const doc = assembleDocument(foo, sectionsWith(), metadata, diagnostics);

    assert.deepStrictEqual(doc.sections.bugs, [{
      kind: 'paragraph',
      runs: [
        { kind: 'text', text: 'See the ' },
        { kind: 'link', text: 'bugs page', uri: 'https://example.org/bugs' },
        { kind: 'text', text: ' for known problems.' }
      ]
    }]);
  });
});
