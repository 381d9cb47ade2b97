// ---------------------------------------------------------------------------
// Datalog CSV reader
// ---------------------------------------------------------------------------
// Layout written by the sensor vendor's logger:
//   # comment lines
//   Timestamp UTC [Unix],Timestamp Local [yyyy-MM-dd hh:mm:ss],<port> CO2 [ppm]
//   1721410561,2025-07-19 18:36:01,412
// Only the first three columns are read.

import type { GasSample } from '../types.js';

export interface DatalogParseResult {
  samples: GasSample[];
  /** Data rows dropped because the timestamp or CO2 did not parse */
  dropped: number;
  header: string[] | null;
}

function splitRow(line: string): string[] {
  return line.split(',').map((cell) => cell.trim().replace(/^"(.*)"$/, '$1'));
}

function toNumber(cell: string | undefined): number {
  if (cell === undefined || cell === '') return NaN;
  return Number(cell);
}

export function parseDatalogCsv(text: string): DatalogParseResult {
  const samples: GasSample[] = [];
  let header: string[] | null = null;
  let dropped = 0;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;

    const cells = splitRow(line);
    const timestamp = toNumber(cells[0]);

    if (header === null && samples.length === 0 && dropped === 0 && Number.isNaN(timestamp)) {
      header = cells;
      continue;
    }

    const concentrationPpm = toNumber(cells[2]);
    if (!Number.isFinite(timestamp) || !Number.isFinite(concentrationPpm)) {
      dropped++;
      continue;
    }

    const time = cells[1];
    samples.push(time ? { timestamp, concentrationPpm, time } : { timestamp, concentrationPpm });
  }

  return { samples, dropped, header };
}

/** Last data row of a datalog, or null when it has none yet. */
export function lastDatalogSample(text: string): GasSample | null {
  const { samples } = parseDatalogCsv(text);
  return samples.length > 0 ? samples[samples.length - 1]! : null;
}
