import * as test from 'node:test';
import * as assert from 'node:assert';
import { classifySections } from '../classifier.js';
import { MalformedBlockError } from '../errors.js';
import { Diagnostic, EntityDescriptor, MarkupNode } from '../types.js';

const { describe, it, beforeEach } = test;

function para(text: string): MarkupNode {
  return { type: 'paragraph', children: [{ type: 'text', text }] };
}

function heading(title: string): MarkupNode {
  return { type: 'rubric', title, depth: 2 };
}

function fields(...entries: [string, string][]): MarkupNode {
  return {
    type: 'field_list',
    fields: entries.map(([name, body]) => ({ name, body: body ? [para(body)] : [] }))
  };
}

const foo: EntityDescriptor = {
  name: 'foo',
  kind: 'callable',
  signature: [{ name: 'x' }, { name: 'y' }]
};

describe('classifySections', () => {
  let diagnostics: Diagnostic[];

  beforeEach(() => {
    diagnostics = [];
  });

  it('should split synopsis, description and parameters', () => {
    const nodes = [
      para('Compute foo.'),
      para('Longer description.'),
      heading('Parameters'),
      fields(['param x', 'The x value.'])
    ];

    const sections = classifySections(nodes, foo, { diagnostics });

    assert.deepStrictEqual(sections.synopsis, { kind: 'paragraph', runs: [{ kind: 'text', text: 'Compute foo.' }] });
    assert.deepStrictEqual(sections.desc, [{ kind: 'paragraph', runs: [{ kind: 'text', text: 'Longer description.' }] }]);
    const parameters = sections.parameters;
    assert.ok(parameters);
    assert.strictEqual(parameters.tag, 'PARAMETERS');
    assert.deepStrictEqual(Array.from(parameters.entries.values()), [{
      name: 'x',
      blocks: [{ kind: 'paragraph', runs: [{ kind: 'text', text: 'The x value.' }] }],
      inSignature: true
    }]);
    assert.deepStrictEqual(diagnostics, [
      { severity: 'INFO', code: 'undocumented-parameter', message: 'undocumented parameter y' }
    ]);
  });

  it('should report a missing synopsis', () => {
    classifySections([heading('Notes'), para('Text.')], { name: 'bar', kind: 'callable', signature: null }, { diagnostics });
    assert.deepStrictEqual(diagnostics, [{ severity: 'INFO', code: 'missing-synopsis', message: 'no synopsis' }]);
  });

  it('should read types from numpy style terms', () => {
    const nodes: MarkupNode[] = [
      para('Compute foo.'),
      heading('Parameters'),
      {
        type: 'definition_list',
        items: [
          { term: [{ type: 'text', text: 'x : int' }], definitions: [para('The x value.')] },
          { term: [{ type: 'text', text: 'y' }], definitions: [para('The y value.')] }
        ]
      }
    ];

    const sections = classifySections(nodes, foo, { diagnostics });
    const entries = sections.parameters?.entries;

    assert.deepStrictEqual(entries?.get('x')?.type, [{ kind: 'text', text: 'int' }]);
    assert.strictEqual(entries?.get('y')?.type, undefined);
    assert.deepStrictEqual(diagnostics, []);
  });

  it('should read inline and separate field types', () => {
    const nodes = [
      para('Compute foo.'),
      fields(['param str x', 'The x value.'], ['param y', 'The y value.'], ['type y', 'float'])
    ];

    const sections = classifySections(nodes, foo, { diagnostics });
    const entries = sections.parameters?.entries;

    assert.deepStrictEqual(entries?.get('x')?.type, [{ kind: 'text', text: 'str' }]);
    assert.deepStrictEqual(entries?.get('y')?.type, [{ kind: 'text', text: 'float' }]);
  });

  it('should merge grouped attributes into one entry', () => {
    const nodes = [
      para('A data object.'),
      fields(['ivar lo,', ''], ['ivar hi', 'The bin edges.'])
    ];

    const sections = classifySections(nodes, { name: 'Data', kind: 'callable', signature: null }, { diagnostics });

    const parameters = sections.parameters;
    assert.ok(parameters);
    assert.strictEqual(parameters.tag, 'ATTRIBUTES');
    assert.deepStrictEqual(Array.from(parameters.entries.keys()), ['lo, hi']);
  });

  it('should flag documented parameters missing from the signature', () => {
    const nodes = [para('Compute foo.'), fields(['param x', 'X.'], ['param y', 'Y.'], ['param z', 'Z.'])];

    const sections = classifySections(nodes, foo, { diagnostics });

    assert.strictEqual(sections.parameters?.entries.get('z')?.inSignature, false);
    assert.deepStrictEqual(diagnostics, [
      { severity: 'NOTE', code: 'unknown-parameter', message: 'documented parameter z is not in the signature' }
    ]);
  });

  it('should match star parameters by their bare name', () => {
    const descriptor: EntityDescriptor = { name: 'call', kind: 'callable', signature: [{ name: 'args', kind: 'var-positional' }] };
    const nodes = [para('Call it.'), fields(['param *args', 'Extra values.'])];

    classifySections(nodes, descriptor, { diagnostics });

    assert.deepStrictEqual(diagnostics, []);
  });

  it('should report a signature with no parameters or return value', () => {
    classifySections([para('Compute foo.')], foo, { diagnostics });

    assert.deepStrictEqual(diagnostics.map(d => d.code), [
      'undocumented-parameter',
      'undocumented-parameter',
      'missing-parameters'
    ]);
    assert.strictEqual(diagnostics[2].message, 'no parameters or return value');
  });

  it('should collect return values', () => {
    const nodes = [para('Compute foo.'), heading('Returns'), para('The sum.')];
    const sections = classifySections(nodes, { name: 'sum', kind: 'callable', signature: [] }, { diagnostics });
    assert.deepStrictEqual(sections.returns, [{ kind: 'paragraph', runs: [{ kind: 'text', text: 'The sum.' }] }]);
  });

  it('should title the paragraph after an unknown heading', () => {
    const nodes = [para('Compute foo.'), heading('Algorithm'), para('Details.')];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });
    assert.deepStrictEqual(sections.desc, [
      { kind: 'paragraph', runs: [{ kind: 'text', text: 'Details.' }], title: 'Algorithm' }
    ]);
  });

  it('should treat headings named like object members as unknown', () => {
    const nodes = [para('A model.'), heading('Constructor'), para('Create the model.'), heading('toString'), para('Text form.')];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });
    assert.deepStrictEqual(sections.desc, [
      { kind: 'paragraph', runs: [{ kind: 'text', text: 'Create the model.' }], title: 'Constructor' },
      { kind: 'paragraph', runs: [{ kind: 'text', text: 'Text form.' }], title: 'toString' }
    ]);
  });

  it('should ignore raises sections', () => {
    const nodes = [para('Compute foo.'), heading('Raises'), para('ValueError when empty.')];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });

    assert.deepStrictEqual(sections.desc, []);
    assert.deepStrictEqual(diagnostics, [
      { severity: 'DBG', code: 'ignored-section', message: 'ignoring section Raises' }
    ]);
  });

  it('should report a second notes section', () => {
    const nodes = [para('Compute foo.'), heading('Notes'), para('One.'), heading('Notes'), para('Two.')];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });

    assert.strictEqual(sections.notes?.length, 2);
    assert.deepStrictEqual(diagnostics, [
      { severity: 'ERROR', code: 'duplicate-section', message: 'multiple NOTES sections' }
    ]);
  });

  it('should clean and deduplicate see also names', () => {
    const nodes = [para('Compute foo.'), heading('See Also'), para('`fit`, plot(), sherpa.astro.ui.fit, conf.')];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, {
      diagnostics,
      modulePrefixes: ['sherpa.astro.ui']
    });

    assert.deepStrictEqual(sections.seeAlso, ['fit', 'plot', 'conf']);
    assert.deepStrictEqual(diagnostics, [
      { severity: 'DBG', code: 'duplicate-see-also', message: 'repeated see also fit' }
    ]);
  });

  it('should take see also names from cross reference targets', () => {
    const nodes: MarkupNode[] = [
      para('Compute foo.'),
      heading('See Also'),
      {
        type: 'paragraph',
        children: [
          { type: 'cross_reference', target: 'plot_data', children: [{ type: 'text', text: 'plot' }] },
          { type: 'text', text: ', ' },
          { type: 'cross_reference', target: 'fit', children: [{ type: 'text', text: 'the fit' }] }
        ]
      },
      {
        type: 'bullet_list',
        items: [[{
          type: 'paragraph',
          children: [{ type: 'cross_reference', target: 'conf', children: [{ type: 'text', text: 'errors' }] }]
        }]]
      }
    ];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });
    assert.deepStrictEqual(sections.seeAlso, ['plot_data', 'fit', 'conf']);
  });

  it('should take see also names from definition terms', () => {
    const nodes: MarkupNode[] = [
      para('Compute foo.'),
      heading('See Also'),
      {
        type: 'definition_list',
        items: [{ term: [{ type: 'text', text: 'fit' }], definitions: [para('Fit a model.')] }]
      }
    ];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });
    assert.deepStrictEqual(sections.seeAlso, ['fit']);
  });

  it('should split examples at code blocks', () => {
    const nodes: MarkupNode[] = [
      para('Compute foo.'),
      heading('Examples'),
      para('First example.'),
      { type: 'doctest_block', text: '>>> foo(1, 2)' },
      para('which prints the result.'),
      para('Second example.'),
      { type: 'literal_block', text: 'foo(3, 4)' },
      para('Third example.'),
      { type: 'literal_block', text: 'foo(5, 6)' }
    ];

    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });

    assert.deepStrictEqual(sections.examples?.map(example => example.blocks.map(block => block.kind)), [
      ['paragraph', 'literal', 'paragraph', 'paragraph', 'literal'],
      ['paragraph', 'literal']
    ]);
  });

  it('should note the singular examples heading', () => {
    const nodes: MarkupNode[] = [para('Compute foo.'), heading('Example'), { type: 'literal_block', text: 'foo()' }];
    const sections = classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics });

    assert.strictEqual(sections.examples?.length, 1);
    assert.deepStrictEqual(diagnostics, [
      { severity: 'DBG', code: 'singular-heading', message: 'has an Example, not Examples, block' }
    ]);
  });

  it('should raise on a version note with two paragraphs', () => {
    const nodes: MarkupNode[] = [
      para('Compute foo.'),
      { type: 'admonition', name: 'versionadded', argument: '4.16.0', children: [para('One.'), para('Two.')] }
    ];
    assert.throws(
      () => classifySections(nodes, { name: 'foo', kind: 'callable', signature: null }, { diagnostics }),
      MalformedBlockError
    );
  });
});
