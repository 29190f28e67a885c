import * as test from 'node:test';
import * as assert from 'node:assert';
import * as path from 'node:path';
import { parseConcordance } from '../concordance.js';
import { convertDocument, convertedPath } from '../convert.js';

const { describe, it } = test;

describe('convertDocument', () => {
  it('should index LaTeX index commands', () => {
    const result = convertDocument('Apples\\index{fruit!apple} are red.\n{index}\n', { latex: true });
    assert.strictEqual(result.latexConverted, 1);
    assert.deepStrictEqual(result.indexHtml.split('\n'), [
      '<dl class="indexmark index">',
      '  <dt id="entry0">fruit</dt>',
      '  <dd><dl>',
      '    <dt id="entry1">apple, <a class="locator" href="#idx1">1</a></dt>',
      '  </dl></dd>',
      '</dl>'
    ]);
    assert.strictEqual(result.document.split('\n')[0], '<span id="idx1" class="indexmark">Apples</span> are red.');
  });

  it('should leave LaTeX commands alone unless asked', () => {
    const result = convertDocument('Apples\\index{fruit} are red.\n');
    assert.strictEqual(result.latexConverted, 0);
    assert.strictEqual(result.document, 'Apples\\index{fruit} are red.\n');
  });

  it('should mark concordance terms before indexing', () => {
    const concordance = parseConcordance('pear\tfruit>pear');
    const result = convertDocument('A pear, then another pear.\n{index}\n', { concordance });
    assert.strictEqual(result.concordanceMarked, 2);
    assert.strictEqual(result.concordanceSkipped, 0);
    assert.strictEqual(
      result.indexHtml.split('\n')[3],
      '    <dt id="entry1">pear, <a class="locator" href="#idx1">1</a>–<a class="locator" href="#idx2">2</a></dt>'
    );
  });
});

describe('convertedPath', () => {
  it('should name the output beside the input', () => {
    assert.strictEqual(convertedPath(path.join('notes', 'book.md')), path.join('notes', 'book-converted.md'));
    assert.strictEqual(convertedPath('book.md'), 'book-converted.md');
  });
});
