import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadContent } from '../loader.js';
import { UnknownAnchorError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

describe('loadContent', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'indexmark-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should index every markdown file, in name order', () => {
    fs.writeFileSync(path.join(tempDir, 'b.md'), 'foo{^bar}\n{index}\n');
    fs.writeFileSync(path.join(tempDir, 'a.md'), 'x{^y}\n');
    fs.writeFileSync(path.join(tempDir, 'notes.txt'), 'x{^y}\n');

    const result = loadContent({ contentDir: tempDir });

    assert.deepStrictEqual([...result.documents.keys()], ['a.md', 'b.md']);
    assert.strictEqual(result.documents.get('b.md')?.result?.stats.entries, 1);
    assert.deepStrictEqual(result.errors, []);
    assert.deepStrictEqual(result.warnings, [
      'a.md: Document has no {index} placeholder; the index is not included in the output'
    ]);
  });

  it('should exclude _*.md metadata files by default', () => {
    fs.writeFileSync(path.join(tempDir, 'content.md'), 'a{^b}\n');
    fs.writeFileSync(path.join(tempDir, '_draft.md'), 'c{^d}\n');

    assert.deepStrictEqual([...loadContent({ contentDir: tempDir }).documents.keys()], ['content.md']);
    assert.deepStrictEqual(
      [...loadContent({ contentDir: tempDir, includeMetadata: true }).documents.keys()],
      ['_draft.md', 'content.md']
    );
  });

  it('should keep a document with a fatal error and report it', () => {
    fs.writeFileSync(path.join(tempDir, 'bad.md'), 'x{^#nope}\n');

    const result = loadContent({ contentDir: tempDir });

    const doc = result.documents.get('bad.md');
    assert.ok(doc?.error instanceof UnknownAnchorError);
    assert.strictEqual(doc?.result, undefined);
    assert.deepStrictEqual(result.errors, ['bad.md: Anchor #nope is never defined (line 1, column 1)']);
  });

  it('should apply shared settings to every document', () => {
    fs.writeFileSync(path.join(tempDir, 'doc.md'), 'foo{^bar}\n{index}\n');

    const result = loadContent({ contentDir: tempDir, config: { idPrefix: 'ref' } });

    assert.strictEqual(
      result.documents.get('doc.md')?.result?.document.split('\n')[0],
      '<span id="ref1" class="indexmark">foo</span>'
    );
  });

  it('should return nothing for a missing directory', () => {
    const result = loadContent({ contentDir: path.join(tempDir, 'missing') });
    assert.strictEqual(result.documents.size, 0);
    assert.deepStrictEqual(result.errors, []);
  });
});
