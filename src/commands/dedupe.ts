import { readJson, writeJson } from '../io/json-file.js';
import { candidateListSchema, dedupeMasterList, type DedupeReport } from '../master-list/dedupe.js';

export interface DedupeCommandOptions {
  inputPath: string;
  outputPath: string;
  minSize: number;
}

export async function runDedupe(options: DedupeCommandOptions): Promise<DedupeReport> {
  const entries = candidateListSchema.parse(await readJson(options.inputPath));
  const report = dedupeMasterList(entries, { minSize: options.minSize });
  await writeJson(options.outputPath, report.entries);

  console.log(`Input entries: ${report.input}`);
  if (options.minSize > 0) {
    console.log(`After size filter (>= ${options.minSize} bytes): ${report.afterSizeFilter}`);
  }
  console.log(`After protocol dedupe: ${report.afterProtocolDedupe}`);
  console.log(`After content dedupe: ${report.afterContentDedupe}`);
  console.log(`Master list: ${options.outputPath}`);
  return report;
}
