import { z } from 'zod';
import { RenderedEntry, RenderedIndex } from './types.js';

const locatorSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('reference'), id: z.number().int().positive() }),
  z.object({ mode: z.literal('page'), page: z.number().int().positive() })
]);

const rangeSchema = z.object({
  start: locatorSchema,
  end: locatorSchema,
  passim: z.boolean(),
  span: z.boolean(),
  rendered: z.array(locatorSchema).min(1).max(2),
  elided: z.array(locatorSchema),
  definitions: z.array(locatorSchema),
  endLabel: z.string(),
  suffix: z.string().optional()
});

const redirectSchema = z.object({
  path: z.array(z.string()).min(1),
  targetId: z.number().int().nonnegative().optional()
});

export const renderedEntrySchema: z.ZodType<RenderedEntry> = z.lazy(() =>
  z.object({
    id: z.number().int().nonnegative(),
    heading: z.string(),
    path: z.array(z.string()).min(1),
    ranges: z.array(rangeSchema),
    see: z.array(redirectSchema),
    seeAlso: z.array(redirectSchema),
    subentries: z.array(renderedEntrySchema)
  })
);

export const renderedIndexSchema: z.ZodType<RenderedIndex> = z.object({
  firstInitial: z.string().optional(),
  items: z.array(
    z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('group'), initial: z.string() }),
      z.object({ kind: z.literal('entry'), entry: renderedEntrySchema })
    ])
  )
});

/**
 * JSON form of a rendered index, for callers that lay it out themselves.
 */
export function serializeRenderedIndex(index: RenderedIndex, space?: number): string {
  return JSON.stringify(index, null, space);
}

/**
 * Parse and validate JSON produced by `serializeRenderedIndex`.
 */
export function parseRenderedIndex(json: string): RenderedIndex {
  return renderedIndexSchema.parse(JSON.parse(json));
}
