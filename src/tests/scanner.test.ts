import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseTokenBody, scanDocument } from '../scanner.js';
import { MalformedTokenError } from '../errors.js';

const { describe, it } = test;

describe('scanDocument', () => {
  it('should attach a token to the preceding word', () => {
    const { tokens } = scanDocument('Some foo{^bar} text');
    assert.strictEqual(tokens.length, 1);
    assert.strictEqual(tokens[0].visible, 'foo');
    assert.strictEqual(tokens[0].start, 5);
    assert.strictEqual(tokens[0].end, 14);
    assert.deepStrictEqual(tokens[0].directives, [{ kind: 'heading', segment: { kind: 'text', text: 'bar' } }]);
  });

  it('should take bracketed visible text and unescape brackets', () => {
    const { tokens } = scanDocument('[a \\[b\\]]{^}');
    assert.strictEqual(tokens[0].visible, 'a [b]');
    assert.strictEqual(tokens[0].plainText, 'a [b]');
    assert.deepStrictEqual(tokens[0].directives, []);
  });

  it('should strip emphasis markers from the plain text', () => {
    const { tokens } = scanDocument('read _Ulysses_{^} today');
    assert.strictEqual(tokens[0].visible, '_Ulysses_');
    assert.strictEqual(tokens[0].plainText, 'Ulysses');
  });

  it('should report line and column of each token', () => {
    const { tokens } = scanDocument('line one\nsecond foo{^bar}');
    assert.deepStrictEqual(tokens[0].location, { offset: 16, line: 2, column: 8 });
  });

  it('should number tokens in source order', () => {
    const { tokens } = scanDocument('a{^x} b{^y} c{^z}');
    assert.deepStrictEqual(tokens.map(t => t.index), [0, 1, 2]);
  });

  it('should skip tokens inside a disabled region and remove the toggles', () => {
    const { tokens, removals } = scanDocument('x{^-} a{^b} {^+}y{^z}');
    assert.strictEqual(tokens.length, 1);
    assert.strictEqual(tokens[0].visible, 'y');
    assert.deepStrictEqual(removals, [
      { start: 1, end: 5 },
      { start: 12, end: 16 }
    ]);
  });

  it('should find the index placeholder and its options', () => {
    const { placeholders } = scanDocument('Text\n{index see=compare}\n');
    assert.strictEqual(placeholders.length, 1);
    assert.strictEqual(placeholders[0].options, 'see=compare');
    assert.strictEqual(placeholders[0].location.line, 2);
  });

  it('should ignore a placeholder that is not alone on its line', () => {
    const { placeholders } = scanDocument('See {index} here\n');
    assert.strictEqual(placeholders.length, 0);
  });

  it('should reject an unclosed token', () => {
    assert.throws(
      () => scanDocument('ok{^fine}\nfoo{^bar'),
      (err: unknown) => err instanceof MalformedTokenError && err.location?.line === 2
    );
  });

  it('should reject a standalone token without a heading', () => {
    assert.throws(() => scanDocument('before {^} after'), MalformedTokenError);
  });
});

describe('parseTokenBody', () => {
  it('should split a path into parent and heading', () => {
    assert.deepStrictEqual(parseTokenBody('animals>cats!', 'big cat'), [
      { kind: 'subentry-of', parent: { segments: [{ kind: 'text', text: 'animals' }] } },
      { kind: 'heading', segment: { kind: 'text', text: 'cats' } },
      { kind: 'definition' }
    ]);
  });

  it('should keep ">" inside quotes as heading text', () => {
    assert.deepStrictEqual(parseTokenBody('"a > b"', 'x'), [
      { kind: 'heading', segment: { kind: 'text', text: 'a > b' } }
    ]);
  });

  it('should read anchor definitions and references', () => {
    assert.deepStrictEqual(parseTokenBody('##intro', 'x'), [{ kind: 'define-anchor', name: 'intro' }]);
    assert.deepStrictEqual(parseTokenBody('#intro', 'x'), [{ kind: 'ref-anchor', name: 'intro' }]);
  });

  it('should nest a heading under an anchor', () => {
    assert.deepStrictEqual(parseTokenBody('#f>apple', 'x'), [
      { kind: 'subentry-of', parent: { segments: [], anchor: 'f' } },
      { kind: 'heading', segment: { kind: 'text', text: 'apple' } }
    ]);
  });

  it('should read see and see-also targets', () => {
    assert.deepStrictEqual(parseTokenBody('a|+b; c', 'x'), [
      { kind: 'heading', segment: { kind: 'text', text: 'a' } },
      { kind: 'cross-ref', type: 'see-also', target: { segments: [{ kind: 'text', text: 'b' }] } },
      { kind: 'cross-ref', type: 'see', target: { segments: [{ kind: 'text', text: 'c' }] } }
    ]);
  });

  it('should read aliases', () => {
    assert.deepStrictEqual(parseTokenBody('@USA @"U.S."', 'United States'), [
      { kind: 'alias-heading', path: { segments: [{ kind: 'text', text: 'USA' }] } },
      { kind: 'alias-heading', path: { segments: [{ kind: 'text', text: 'U.S.' }] } }
    ]);
  });

  it('should read sort keys, passim and suffixes', () => {
    const directives = parseTokenBody('Smith ~"smith john" [passim] [n]', 'x');
    assert.deepStrictEqual(directives.find(d => d.kind === 'sort-key'), { kind: 'sort-key', text: 'smith john' });
    assert.deepStrictEqual(directives.find(d => d.kind === 'range-mode'), { kind: 'range-mode', mode: 'passim' });
    assert.deepStrictEqual(directives.find(d => d.kind === 'suffix'), { kind: 'suffix', text: 'n' });
    assert.deepStrictEqual(directives.find(d => d.kind === 'heading'), {
      kind: 'heading',
      segment: { kind: 'text', text: 'Smith' }
    });
  });

  it('should read a bare sort key', () => {
    assert.deepStrictEqual(parseTokenBody('~zz', 'x'), [{ kind: 'sort-key', text: 'zz' }]);
  });

  it('should treat a trailing slash as a span marker', () => {
    assert.deepStrictEqual(parseTokenBody('war /', 'x'), [
      { kind: 'heading', segment: { kind: 'text', text: 'war' } },
      { kind: 'range-mode', mode: 'span' }
    ]);
  });

  it('should keep "!" that is not trailing as heading text', () => {
    assert.deepStrictEqual(parseTokenBody('Yahoo! Inc', 'x'), [
      { kind: 'heading', segment: { kind: 'text', text: 'Yahoo! Inc' } }
    ]);
  });

  it('should expand wildcards from the attached text', () => {
    assert.deepStrictEqual(parseTokenBody('animals>**', 'Cats'), [
      { kind: 'subentry-of', parent: { segments: [{ kind: 'text', text: 'animals' }] } },
      { kind: 'heading', segment: { kind: 'text', text: 'cats' } }
    ]);
    assert.deepStrictEqual(parseTokenBody('* family', 'Cat'), [
      { kind: 'heading', segment: { kind: 'text', text: 'Cat family' } }
    ]);
  });

  it('should produce a prefix segment for *^ and *^-', () => {
    assert.deepStrictEqual(parseTokenBody('*^', 'App'), [
      { kind: 'heading', segment: { kind: 'prefix', text: 'App', labelOnly: false } }
    ]);
    assert.deepStrictEqual(parseTokenBody('*^-', 'App'), [
      { kind: 'heading', segment: { kind: 'prefix', text: 'App', labelOnly: true } }
    ]);
  });

  it('should read "=" as repeat-previous', () => {
    assert.deepStrictEqual(parseTokenBody('=', 'x'), [{ kind: 'repeat-previous' }]);
  });

  it('should reject malformed bodies', () => {
    for (const body of ['"abc', 'a>', 'a #b', '[x', 'x]', '##', '~', 'a|', '@', '*', 'a{b']) {
      assert.throws(() => parseTokenBody(body, body === '*' ? '' : 'x'), MalformedTokenError, body);
    }
  });
});
