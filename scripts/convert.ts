/**
 * convert.ts - Indexes an annotated document and writes the result beside it
 *
 * Usage: tsx scripts/convert.ts <file> [--concordance=terms.tsv] [--latex] [--config=dir] [--verbose]
 * Output: <name>-converted.<ext> next to the input file
 *
 * Settings come from indexmark.config.json in --config (default: the
 * input file's directory).
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { parseConcordance } from '../src/concordance.js';
import { loadConfig } from '../src/config.js';
import { convertDocument, convertedPath } from '../src/convert.js';
import { IndexError } from '../src/errors.js';

interface Arguments {
  inputFile: string;
  concordance?: string;
  latex: boolean;
  configDir?: string;
  verbose: boolean;
}

const USAGE = 'Usage: tsx scripts/convert.ts <file> [--concordance=terms.tsv] [--latex] [--config=dir] [--verbose]';

function parseArguments(args: string[]): Arguments | null {
  const files = args.filter(a => !a.startsWith('--'));
  if (files.length !== 1) {
    return null;
  }
  const valueOf = (name: string) => args.find(a => a.startsWith(`--${name}=`))?.slice(name.length + 3);
  return {
    inputFile: files[0],
    concordance: valueOf('concordance'),
    latex: args.includes('--latex'),
    configDir: valueOf('config'),
    verbose: args.includes('--verbose')
  };
}

async function main(): Promise<void> {
  const parsed = parseArguments(process.argv.slice(2));
  if (!parsed) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const { inputFile, verbose } = parsed;
  if (!(await fs.pathExists(inputFile))) {
    console.error(`File not found: ${inputFile}`);
    process.exitCode = 1;
    return;
  }

  const fileConfig = await loadConfig(parsed.configDir ?? path.dirname(inputFile));
  const config = verbose ? { ...fileConfig, verbose } : fileConfig;
  const source = await fs.readFile(inputFile, 'utf-8');
  const concordanceSource = parsed.concordance ? await fs.readFile(parsed.concordance, 'utf-8') : undefined;

  try {
    const concordance = concordanceSource === undefined ? undefined : parseConcordance(concordanceSource);
    const result = convertDocument(source, {
      config,
      latex: parsed.latex,
      concordance,
      log: verbose ? message => console.log(message) : undefined
    });

    if (result.config.showWarnings) {
      for (const warning of result.warnings) {
        const where = warning.location ? ` (line ${warning.location.line})` : '';
        console.warn(`Warning: ${warning.message}${where}`);
      }
    }

    const outputFile = convertedPath(inputFile);
    await fs.writeFile(outputFile, result.document, 'utf-8');

    if (parsed.latex) {
      console.log(`Converted ${result.latexConverted} LaTeX index commands`);
    }
    if (concordance) {
      console.log(`Concordance rules added ${result.concordanceMarked} index marks`);
      if (result.concordanceSkipped > 0) {
        console.warn(`Warning: ${result.concordanceSkipped} concordance matches span a line break or contain "<" or ">" and were not marked`);
      }
    }
    console.log(
      `Indexed ${result.stats.entries} entries from ${result.stats.occurrences} occurrences; written: ${outputFile}`
    );
  } catch (err) {
    if (err instanceof IndexError) {
      console.error(`${inputFile}: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main().catch(error => {
  console.error('Conversion failed', error);
  process.exitCode = 1;
});
