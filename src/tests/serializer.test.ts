import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { convertEntity } from '../converter.js';
import { MetadataIndex, parseMetadataSource } from '../metadata.js';
import { formatSyntax, outputFileName, serializeHelpDocument, writeHelpFile } from '../serializer.js';
import { EntityDescriptor } from '../types.js';

const { describe, it } = test;

const HEADER = '<?xml version="1.0" encoding="UTF-8" ?>\n<!DOCTYPE cxchelptopics SYSTEM "CXCHelp.dtd">\n';

const foo: EntityDescriptor = {
  name: 'foo',
  kind: 'callable',
  signature: [{ name: 'x' }, { name: 'y' }]
};

const bare: EntityDescriptor = { name: 'good', kind: 'callable', signature: null };

function metadata(): MetadataIndex {
  return new MetadataIndex(parseMetadataSource({}));
}

describe('serializeHelpDocument', () => {
  it('should write the whole entry', () => {
    const docstring = 'Compute foo.\n\nLonger description.\n\n## Parameters\n\n:param x: The x value.';
    const { document, xml } = convertEntity(foo, docstring, metadata());

    assert.strictEqual(xml, HEADER +
      '<cxchelptopics>' +
      '<ENTRY pkg="sherpa" key="foo" refkeywords="compute foo" seealsogroups="" displayseealsogroups="" context="sherpaish">' +
      '<SYNOPSIS>Compute foo.</SYNOPSIS>' +
      '<SYNTAX><LINE>foo(x, y)</LINE></SYNTAX>' +
      '<DESC><PARA>Longer description.</PARA></DESC>' +
      '<ADESC title="PARAMETERS">' +
      '<PARA>The parameter for this function is:</PARA>' +
      '<TABLE><ROW><DATA>Parameter</DATA><DATA>Definition</DATA></ROW><ROW><DATA>x</DATA><DATA>The x value.</DATA></ROW></TABLE>' +
      '</ADESC>' +
      '</ENTRY>' +
      '</cxchelptopics>\n');

    assert.deepStrictEqual(document.diagnostics, [
      { severity: 'INFO', code: 'undocumented-parameter', message: 'undocumented parameter y' },
      { severity: 'INFO', code: 'missing-see-also', message: 'no see-also given' },
      { severity: 'DBG', code: 'fallback-context', message: 'fall back context=sherpaish for foo' }
    ]);
  });

  it('should give the same bytes for the same document', () => {
    const docstring = 'Compute foo.\n\n## Parameters\n\n:param x: The x value.\n:param y: The y value.';
    const { document, xml } = convertEntity(foo, docstring, metadata());

    assert.strictEqual(serializeHelpDocument(document), xml);
    assert.strictEqual(convertEntity(foo, docstring, metadata()).xml, xml);
  });

  it('should escape text and write links', () => {
    const { xml } = convertEntity(bare, 'Good entity.\n\nUse a & b with [the guide](https://example.org/guide).', metadata());

    assert.ok(xml.includes('<DESC><PARA>Use a &amp; b with <HREF link="https://example.org/guide">the guide</HREF>.</PARA></DESC>'));
  });

  it('should keep link targets in list items', () => {
    const { xml } = convertEntity(bare, 'Good entity.\n\n- Read [the guide](https://example.org/guide) first.', metadata());

    assert.ok(xml.includes('<LIST><ITEM>Read the guide [https://example.org/guide] first.</ITEM></LIST>'));
  });

  it('should write version notes in the changes block', () => {
    const { xml } = convertEntity(bare, 'Good entity.\n\n> [!VERSIONCHANGED] 4.16.0\n> The default changed.', metadata());

    assert.ok(xml.includes(
      '<SYNOPSIS>Good entity.</SYNOPSIS><DESC></DESC>' +
      '<ADESC title="Changes in CIAO"><PARA title="Changed in CIAO 4.16">The default changed.</PARA></ADESC>'
    ));
  });

  it('should write examples', () => {
    const { xml } = convertEntity(bare, 'Good entity.\n\n## Examples\n\nFit the data.\n\n```\n>>> fit()\n```', metadata());

    assert.ok(xml.includes(
      '<QEXAMPLELIST><QEXAMPLE><DESC><PARA>Fit the data.</PARA><VERBATIM>&gt;&gt;&gt; fit()</VERBATIM></DESC></QEXAMPLE></QEXAMPLELIST>'
    ));
  });

  it('should add a type column when any parameter has a type', () => {
    const { xml } = convertEntity(foo, 'Compute foo.\n\n:param int x: The x value.\n:param y: The y value.', metadata());

    assert.ok(xml.includes(
      '<PARA>The parameters for this function are:</PARA>' +
      '<TABLE><ROW><DATA>Parameter</DATA><DATA>Type information</DATA><DATA>Definition</DATA></ROW>' +
      '<ROW><DATA>x</DATA><DATA>int</DATA><DATA>The x value.</DATA></ROW>' +
      '<ROW><DATA>y</DATA><DATA></DATA><DATA>The y value.</DATA></ROW></TABLE>'
    ));
  });

  it('should describe the return value', () => {
    const descriptor: EntityDescriptor = { name: 'total', kind: 'callable', signature: [] };
    const { xml } = convertEntity(descriptor, 'Sum it.\n\n:returns: The sum.', metadata());

    assert.ok(xml.includes(
      '<ADESC title="PARAMETERS"><PARA>This function has no parameters</PARA>' +
      '<PARA title="Return value">The return value from this function is:</PARA><PARA>The sum.</PARA></ADESC>'
    ));
  });

  it('should write only the name as syntax of a model', () => {
    const model: EntityDescriptor = { name: 'xsapec', kind: 'parameterized-model', signature: null };
    const { xml } = convertEntity(model, 'The APEC model.', metadata());

    assert.ok(xml.includes('<SYNTAX><LINE>xsapec</LINE></SYNTAX>'));
    assert.ok(xml.includes('context="models"'));
  });

  it('should use the documentation page root for sxml', () => {
    const { xml } = convertEntity(bare, 'Good entity.', metadata(), { flavour: 'sxml' });

    assert.ok(xml.startsWith(
      '<?xml version="1.0" encoding="UTF-8" ?>\n' +
      '<!DOCTYPE cxcdocumentationpage SYSTEM "/data/da/Docs/sxml_manuals/dtds/CXCDocPage.dtd">\n' +
      '<cxcdocumentationpage><ENTRY '
    ));
  });

  it('should write annotated syntax unless annotations are dropped', () => {
    const calc: EntityDescriptor = {
      name: 'calc',
      kind: 'callable',
      signature: [{ name: 'x', annotation: 'float', default: '1.0' }],
      returnAnnotation: 'float'
    };

    const kept = convertEntity(calc, 'Calculate it.', metadata());
    assert.ok(kept.xml.includes('<SYNTAX><LINE>calc(x: float = 1.0) -&gt; float</LINE></SYNTAX>'));

    const dropped = convertEntity(calc, 'Calculate it.', metadata(), { annotations: 'delete' });
    assert.ok(dropped.xml.includes('<SYNTAX><LINE>calc(x=1.0)</LINE></SYNTAX>'));
    assert.strictEqual(dropped.document.returnAnnotation, undefined);
  });

  it('should write the release an entity appeared in', () => {
    const index = new MetadataIndex(parseMetadataSource({ entries: { good: { since: '4.14.0' } } }));
    const { xml } = convertEntity(bare, 'Good entity.', index);

    assert.ok(xml.includes('<ADESC title="Changes in CIAO"><PARA title="Added in CIAO 4.14"></PARA></ADESC>'));
  });

  it('should write the last modified date', () => {
    const index = new MetadataIndex(parseMetadataSource({ lastModified: 'December 2024' }));
    const { xml } = convertEntity(bare, 'Good entity.', index);

    assert.ok(xml.endsWith('<LASTMODIFIED>December 2024</LASTMODIFIED></ENTRY></cxchelptopics>\n'));
  });
});

describe('formatSyntax', () => {
  it('should write defaults and star parameters', () => {
    const syntax = formatSyntax('fit', [
      { name: 'id', default: 'None' },
      { name: 'args', kind: 'var-positional' },
      { name: 'kwargs', kind: 'var-keyword' }
    ]);
    assert.strictEqual(syntax, 'fit(id=None, *args, **kwargs)');
  });

  it('should write an empty parameter list', () => {
    assert.strictEqual(formatSyntax('show', []), 'show()');
  });

  it('should write annotations and the return type', () => {
    const syntax = formatSyntax('calc', [
      { name: 'id', annotation: 'int | None', default: 'None' },
      { name: 'data', annotation: 'Data' },
      { name: 'args', kind: 'var-positional', annotation: 'str' },
      { name: 'kwargs', kind: 'var-keyword' }
    ], 'float');
    assert.strictEqual(syntax, 'calc(id: int | None = None, data: Data, *args: str, **kwargs) -> float');
    assert.strictEqual(formatSyntax('now', [], 'str'), 'now() -> str');
  });
});

describe('writeHelpFile', () => {
  it('should name files by flavour', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'doc2help-serializer-'));
    try {
      const outfile = await writeHelpFile(tempDir, 'fit', '<x/>\n', 'sxml');

      assert.strictEqual(outfile, path.join(tempDir, 'fit.sxml'));
      assert.strictEqual(fs.readFileSync(outfile, 'utf-8'), '<x/>\n');
      assert.strictEqual(outputFileName('fit'), 'fit.xml');
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});
