import * as test from 'node:test';
import * as assert from 'node:assert';
import * as os from 'node:os';
import * as path from 'node:path';
import fs from 'fs-extra';
import {
  applyOptionString,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
  validateConfig
} from '../config.js';
import { InvalidConfigurationError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

describe('resolveConfig', () => {
  it('should start from the defaults', () => {
    const config = resolveConfig();
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
    assert.notStrictEqual(config, DEFAULT_CONFIG);
  });

  it('should let later layers win', () => {
    const config = resolveConfig({ mode: 'paginated', idPrefix: 'a' }, undefined, { idPrefix: 'b' });
    assert.strictEqual(config.mode, 'paginated');
    assert.strictEqual(config.idPrefix, 'b');
    assert.strictEqual(config.seeLabel, 'see');
  });

  it('should reject an id prefix that is not a valid HTML id', () => {
    assert.throws(() => resolveConfig({ idPrefix: '1x' }), InvalidConfigurationError);
  });
});

describe('validateConfig', () => {
  it('should reject unknown keys and name the source', () => {
    assert.throws(
      () => validateConfig({ colour: 'red' }, 'test.json'),
      (err: unknown) => err instanceof InvalidConfigurationError && err.message.startsWith('Invalid configuration in test.json: ')
    );
  });

  it('should reject values of the wrong type', () => {
    assert.throws(() => validateConfig({ groupHeadings: 'yes' }, 'test'), InvalidConfigurationError);
    assert.throws(() => validateConfig({ mode: 'pages' }, 'test'), InvalidConfigurationError);
  });
});

describe('applyOptionString', () => {
  it('should read quoted, bare and aliased options', () => {
    const { config, warnings } = applyOptionString(
      DEFAULT_CONFIG,
      `see="compare with" also=cf. group_headings=yes prefix='ref' colour=red`
    );
    assert.strictEqual(config.seeLabel, 'compare with');
    assert.strictEqual(config.seeAlsoLabel, 'cf.');
    assert.strictEqual(config.groupHeadings, true);
    assert.strictEqual(config.idPrefix, 'ref');
    assert.deepStrictEqual(
      warnings.map(w => w.message),
      ['Unknown index option "colour"']
    );
  });

  it('should accept camelCase keys and boolean words', () => {
    const { config } = applyOptionString(DEFAULT_CONFIG, 'sortEmphasisFirst=on showWarnings=off');
    assert.strictEqual(config.sortEmphasisFirst, true);
    assert.strictEqual(config.showWarnings, false);
  });

  it('should ignore a stray word with a warning', () => {
    const { config, warnings } = applyOptionString(DEFAULT_CONFIG, 'oops');
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
    assert.deepStrictEqual(
      warnings.map(w => w.message),
      ['Ignoring index option "oops"']
    );
  });

  it('should reject a value that is not a boolean word', () => {
    assert.throws(() => applyOptionString(DEFAULT_CONFIG, 'verbose=maybe'), InvalidConfigurationError);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'indexmark-test-'));
  });

  afterEach(() => {
    fs.removeSync(tempDir);
  });

  it('should read the config file of a directory', async () => {
    await fs.writeJson(path.join(tempDir, CONFIG_FILE_NAME), { mode: 'paginated', seeLabel: 'cf.' });
    assert.deepStrictEqual(await loadConfig(tempDir), { mode: 'paginated', seeLabel: 'cf.' });
  });

  it('should return no settings when there is no config file', async () => {
    assert.deepStrictEqual(await loadConfig(tempDir), {});
  });

  it('should reject a config file that is not JSON', async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), '{ mode: ');
    await assert.rejects(loadConfig(tempDir), InvalidConfigurationError);
  });

  it('should reject invalid settings in the config file', async () => {
    await fs.writeJson(path.join(tempDir, CONFIG_FILE_NAME), { rangeSeparator: 3 });
    await assert.rejects(loadConfig(tempDir), /Invalid configuration in indexmark\.config\.json/);
  });
});
