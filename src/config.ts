/**
 * Index configuration.
 *
 * Settings are layered, lowest precedence first: built-in defaults,
 * indexmark.config.json in the document's directory, options passed in
 * code, and finally the option string on the `{index …}` placeholder.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { z } from 'zod';
import { IndexWarning, InvalidConfigurationError } from './errors.js';
import { SourceLocation } from './types.js';

export const CONFIG_FILE_NAME = 'indexmark.config.json';

const htmlId = z.string().regex(/^[A-Za-z][\w-]*$/, 'must start with a letter and contain only letters, digits, "_" or "-"');

export const indexConfigSchema = z
  .object({
    mode: z.enum(['reference', 'paginated']),
    idPrefix: htmlId,
    entryIdPrefix: htmlId,
    seeLabel: z.string(),
    seeAlsoLabel: z.string(),
    pathSeparator: z.string(),
    listSeparator: z.string(),
    fieldSeparator: z.string(),
    categorySeparator: z.string(),
    rangeSeparator: z.string(),
    groupHeadings: z.boolean(),
    sortEmphasisFirst: z.boolean(),
    includeHeader: z.boolean(),
    headerText: z.string(),
    includeFooter: z.boolean(),
    footerText: z.string(),
    verbose: z.boolean(),
    showWarnings: z.boolean()
  })
  .strict();

export const partialConfigSchema = indexConfigSchema.partial();

export type IndexConfig = z.infer<typeof indexConfigSchema>;
export type PartialIndexConfig = z.infer<typeof partialConfigSchema>;

export const DEFAULT_CONFIG: IndexConfig = {
  mode: 'reference',
  idPrefix: 'idx',
  entryIdPrefix: 'entry',
  seeLabel: 'see',
  seeAlsoLabel: 'see also',
  pathSeparator: ': ',
  listSeparator: '; ',
  fieldSeparator: ', ',
  categorySeparator: '. ',
  rangeSeparator: '–',
  groupHeadings: false,
  sortEmphasisFirst: false,
  includeHeader: false,
  headerText: 'Index',
  includeFooter: false,
  footerText: '',
  verbose: false,
  showWarnings: true
};

/** Short names accepted in placeholder option strings */
const OPTION_ALIASES: Record<string, keyof IndexConfig> = {
  see: 'seeLabel',
  also: 'seeAlsoLabel',
  seealso: 'seeAlsoLabel',
  prefix: 'idPrefix'
};

function isConfigKey(key: string): key is keyof IndexConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

function describeIssues(error: z.ZodError, source: string): string {
  const details = error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return `Invalid configuration in ${source}: ${details}`;
}

/**
 * Validate one layer of settings.
 */
export function validateConfig(value: unknown, source: string): PartialIndexConfig {
  const result = partialConfigSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidConfigurationError(describeIssues(result.error, source));
  }
  return result.data;
}

/**
 * Merge layers over the defaults; later layers win.
 */
export function resolveConfig(...layers: Array<PartialIndexConfig | undefined>): IndexConfig {
  let config: IndexConfig = { ...DEFAULT_CONFIG };
  layers.forEach((layer, index) => {
    if (layer) {
      config = { ...config, ...validateConfig(layer, `options layer ${index + 1}`) };
    }
  });
  return config;
}

function camelCase(key: string): string {
  return key.replace(/[_-]([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function coerce(key: keyof IndexConfig, value: string): string | boolean {
  if (typeof DEFAULT_CONFIG[key] !== 'boolean') {
    return value;
  }
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
    case 'on':
    case '1':
      return true;
    case 'false':
    case 'no':
    case 'off':
    case '0':
      return false;
    default:
      // Left as text so validation reports it
      return value;
  }
}

const OPTION_PATTERN = /([A-Za-z_][\w-]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|(\S+))|(\S+)/g;

export interface OptionStringResult {
  config: IndexConfig;
  warnings: IndexWarning[];
}

/**
 * Apply a placeholder option string such as
 * `see="compare" also='see further' group_headings=yes` on top of `config`.
 * Unknown keys are reported as warnings, not errors.
 */
export function applyOptionString(config: IndexConfig, options: string, location?: SourceLocation): OptionStringResult {
  const warnings: IndexWarning[] = [];
  const overrides: Record<string, string | boolean> = {};

  for (const match of options.matchAll(OPTION_PATTERN)) {
    const [, rawKey, doubleQuoted, singleQuoted, bare, stray] = match;
    if (stray !== undefined || rawKey === undefined) {
      warnings.push({ code: 'UnknownOption', message: `Ignoring index option "${stray ?? match[0]}"`, location });
      continue;
    }
    const normalized = camelCase(rawKey);
    const key = OPTION_ALIASES[normalized.toLowerCase()] ?? normalized;
    if (!isConfigKey(key)) {
      warnings.push({ code: 'UnknownOption', message: `Unknown index option "${rawKey}"`, location });
      continue;
    }
    overrides[key] = coerce(key, doubleQuoted ?? singleQuoted ?? bare ?? '');
  }

  return {
    config: { ...config, ...validateConfig(overrides, 'index placeholder options') },
    warnings
  };
}

/**
 * Read indexmark.config.json from `dir`, if there is one.
 */
export async function loadConfig(dir: string): Promise<PartialIndexConfig> {
  const configPath = path.join(dir, CONFIG_FILE_NAME);
  if (!(await fs.pathExists(configPath))) {
    return {};
  }
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`Could not read ${CONFIG_FILE_NAME}: ${reason}`);
  }
  return validateConfig(raw, CONFIG_FILE_NAME);
}
