import * as test from 'node:test';
import * as assert from 'node:assert';
import { ZodError } from 'zod';
import { parseRenderedIndex, serializeRenderedIndex } from '../index-schema.js';
import { RenderedIndex } from '../types.js';

const { describe, it } = test;

const sample: RenderedIndex = {
  firstInitial: 'F',
  items: [
    {
      kind: 'entry',
      entry: {
        id: 0,
        heading: 'fruit',
        path: ['fruit'],
        ranges: [
          {
            start: { mode: 'page', page: 12 },
            end: { mode: 'page', page: 14 },
            passim: false,
            span: false,
            rendered: [
              { mode: 'page', page: 12 },
              { mode: 'page', page: 14 }
            ],
            elided: [{ mode: 'page', page: 13 }],
            definitions: [{ mode: 'page', page: 13 }],
            endLabel: '14',
            suffix: 'n'
          }
        ],
        see: [],
        seeAlso: [{ path: ['vegetables'] }],
        subentries: [
          {
            id: 1,
            heading: 'apple',
            path: ['fruit', 'apple'],
            ranges: [],
            see: [],
            seeAlso: [],
            subentries: []
          }
        ]
      }
    },
    { kind: 'group', initial: 'V' }
  ]
};

describe('rendered index JSON', () => {
  it('should read back what it writes', () => {
    assert.deepStrictEqual(parseRenderedIndex(serializeRenderedIndex(sample, 2)), sample);
  });

  it('should reject a locator of an unknown mode', () => {
    const json = serializeRenderedIndex(sample).replace('"mode":"page","page":12', '"mode":"chapter","page":12');
    assert.throws(() => parseRenderedIndex(json), ZodError);
  });

  it('should reject an entry without a path', () => {
    const json = JSON.stringify({ items: [{ kind: 'entry', entry: { id: 0, heading: 'x' } }] });
    assert.throws(() => parseRenderedIndex(json), ZodError);
  });
});
