import * as test from 'node:test';
import * as assert from 'node:assert';
import { AnchorBinding, AnchorResolver } from '../anchors.js';
import { CyclicReferenceError, DuplicateAnchorError, UnknownAnchorError } from '../errors.js';
import { EntryPath, SourceLocation } from '../types.js';

const { describe, it } = test;

const at = (line: number): SourceLocation => ({ offset: 0, line, column: 1 });

describe('AnchorResolver', () => {
  it('should reject a second definition of the same name', () => {
    const anchors = new AnchorResolver();
    anchors.define('intro', 0, at(1));
    assert.throws(
      () => anchors.define('intro', 3, at(4)),
      (err: unknown) => err instanceof DuplicateAnchorError && err.anchor === 'intro' && err.location?.line === 4
    );
  });

  it('should accept a reference that comes before its definition', () => {
    const anchors = new AnchorResolver();
    anchors.refer('later', 0, at(1));
    anchors.define('later', 1, at(2));
    anchors.bind('later', ['Later topic']);
    anchors.finishCollection();
    assert.deepStrictEqual(
      anchors.resolve('later', at(1), () => assert.fail('definition should already be bound')),
      ['Later topic']
    );
  });

  it('should report a reference to an undefined anchor when scanning ends', () => {
    const anchors = new AnchorResolver();
    anchors.define('x', 0, at(1));
    anchors.refer('y', 1, at(7));
    assert.throws(
      () => anchors.finishCollection(),
      (err: unknown) => err instanceof UnknownAnchorError && err.anchor === 'y' && err.location?.line === 7
    );
  });

  it('should resolve an unbound definition once and remember it', () => {
    const anchors = new AnchorResolver();
    anchors.define('a', 4, at(1));
    anchors.finishCollection();
    let calls = 0;
    const resolveDefinition = (binding: AnchorBinding): EntryPath => {
      calls++;
      assert.strictEqual(binding.tokenIndex, 4);
      return ['topic'];
    };
    assert.deepStrictEqual(anchors.resolve('a', at(2), resolveDefinition), ['topic']);
    assert.deepStrictEqual(anchors.resolve('a', at(3), resolveDefinition), ['topic']);
    assert.strictEqual(calls, 1);
  });

  it('should detect anchors defined in terms of each other', () => {
    const anchors = new AnchorResolver();
    anchors.define('a', 0, at(1));
    anchors.define('b', 1, at(2));
    anchors.finishCollection();
    const resolveDefinition = (binding: AnchorBinding): EntryPath =>
      anchors.resolve(binding.name === 'a' ? 'b' : 'a', binding.location, resolveDefinition);
    assert.throws(() => anchors.resolve('a', at(1), resolveDefinition), CyclicReferenceError);
  });

  it('should not resolve references before scanning has finished', () => {
    const anchors = new AnchorResolver();
    anchors.define('a', 0, at(1));
    assert.throws(() => anchors.resolve('a', at(1), () => ['x']), /after scanning/);
  });

  it('should not accept definitions after scanning has finished', () => {
    const anchors = new AnchorResolver();
    anchors.finishCollection();
    assert.throws(() => anchors.define('a', 0, at(1)), /while scanning/);
  });
});
