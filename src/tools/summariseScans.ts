#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import YAML from 'yaml';
import { loadConfig } from '../config/loader.js';
import { ScanFileService, describeFailure, type ScanFileResult } from '../scan/ScanFileService.js';
import { decodeScanText } from '../scan/parsers/scanCommon.js';
import { formatSummaryCsv } from '../scan/tableExport.js';

const USAGE = 'Usage: npx tsx src/tools/summariseScans.ts [--csv] <scan-file>...';

function toReport(result: ScanFileResult) {
  return {
    file: result.fileName,
    title: result.title,
    blocks: result.blockCount,
    metadata: result.metadata.rows,
    preview: result.preview,
  };
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const csv = args.includes('--csv');
  const paths = args.filter((arg) => arg !== '--csv');
  if (paths.length === 0) {
    console.error(USAGE);
    return 1;
  }

  const config = await loadConfig();
  const service = new ScanFileService(config.scans);
  let failures = 0;

  for (const path of paths) {
    const absPath = resolve(path);
    try {
      const content = decodeScanText(await readFile(absPath));
      const result = service.analyseText(basename(absPath), content);
      if (csv) {
        process.stdout.write(formatSummaryCsv(result.summary));
      } else {
        process.stdout.write(`---\n${YAML.stringify(toReport(result))}`);
      }
    } catch (err) {
      failures += 1;
      const failure = describeFailure(err);
      console.error(`${path}: ${failure.code}: ${failure.message}`);
    }
  }

  return failures > 0 ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
);
