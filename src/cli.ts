#!/usr/bin/env node
/**
 * RMR14 analysis of a traverse file.
 *
 * Usage:
 *   rmr14 [input.csv|input.xlsx] [outDir]
 *
 * With no input the bundled example traverse is analysed. Settings come from
 * RMR_* environment variables (or .env); see src/lib/config.ts.
 */

import 'dotenv/config';
import { loadConfig } from './lib/config';
import { EXAMPLE_TRAVERSE_FILE, loadCodeDictionary, loadStationTable, locateDataFile } from './lib/pipeline/01-ingest';
import { runRmrPipeline } from './lib/pipeline';
import type { AnalysisResult } from './lib/pipeline/types';
import { formatClassification } from './lib/pipeline/utils/classification';

function printSummary(result: AnalysisResult) {
  const scores = new Map(result.stationScores.map((s) => [s.unit.id, s]));

  console.log('');
  console.log('Station        n    RMR14  Classification');
  for (const station of result.stations) {
    const score = scores.get(station.id);
    const cells = score
      ? `${score.total.toFixed(1).padStart(5)}  ${formatClassification(score.classification)}`
      : '    -  not scored';
    console.log(`${station.id.padEnd(12)} ${String(station.discontinuities.length).padStart(3)}  ${cells}`);
  }

  for (const summary of result.families) {
    const { family } = summary;
    const rating = summary.score ? `RMR14 ${summary.score.total.toFixed(1)}` : 'not scored';
    console.log(
      `Family ${family.id}: ${summary.memberCount} members, ${family.meanDip.toFixed(0)}/${family.meanDipDirection
        .toFixed(0)
        .padStart(3, '0')}, ${rating}`
    );
  }

  const o = result.overview;
  console.log(
    `\n${o.validRecords}/${o.totalRecords} records valid, ${o.familyCount} families, ${o.unclusteredCount} unclustered, ${
      result.issues.length + result.failures.length
    } issues`
  );
}

async function main() {
  const [inputArg, outArg] = process.argv.slice(2);
  const config = loadConfig();

  const dictionary = await loadCodeDictionary(config.dictionaryPath ?? undefined);
  const stations = config.stationsPath ? await loadStationTable(config.stationsPath) : undefined;

  const { result, exports } = await runRmrPipeline({
    input: { inputPath: inputArg ?? locateDataFile(EXAMPLE_TRAVERSE_FILE) },
    dictionary,
    options: { ...config.options, stations },
    outDir: outArg ?? config.exportDir
  });

  printSummary(result);
  if (exports) {
    console.log(`Exports written to ${exports.outDir}`);
  }
}

main().catch((err: unknown) => {
  console.error(' RMR14 analysis failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
