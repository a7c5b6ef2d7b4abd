/**
 * CLI Airtime Command - time-on-air and throughput estimates
 */

import { LIMITS } from '../src/utils/constants.js';
import { estimateTransferStats, compareTransfers, type TransferStats, type TransferComparison } from '../src/lib/airtime.js';
import { formatStatsRow, formatComparison } from './report.js';

export interface AirtimeOptions {
  sf: number[];
  bw: number;
  cr: number;
  compressed?: number;
  exact?: boolean;
  json?: boolean;
}

export type AirtimeReport =
  | { kind: 'single'; rows: { sf: number; stats: TransferStats }[] }
  | { kind: 'comparison'; rows: TransferComparison[] };

export function airtimeCommand(bytes: number | undefined, options: AirtimeOptions): AirtimeReport {
  const audioBytes = bytes ?? LIMITS.DEFAULT_TEST_BYTES;
  const statsOptions = { exactLastFragment: options.exact };

  const report: AirtimeReport = options.compressed !== undefined
    ? {
        kind: 'comparison',
        rows: compareTransfers(audioBytes, options.compressed, options.sf, options.bw, options.cr, statsOptions),
      }
    : {
        kind: 'single',
        rows: options.sf.map(sf => ({
          sf,
          stats: estimateTransferStats(audioBytes, sf, options.bw, options.cr, statsOptions),
        })),
      };

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return report;
  }

  console.log(`Airtime for ${audioBytes} bytes at ${options.bw} kHz, CR4/${options.cr}${options.exact ? ' (exact last fragment)' : ''}`);
  if (report.kind === 'comparison') {
    for (const row of report.rows) {
      console.log('');
      for (const line of formatComparison(row)) console.log(line);
    }
  } else {
    for (const row of report.rows) {
      console.log(formatStatsRow(`SF${row.sf}`, row.stats));
    }
  }

  return report;
}
