import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { CoinSnapshot, MaybeNumber } from './types.js';
import { normalizeValue, formatMaybe } from './utils/normalizer.js';
import { log } from './utils/logger.js';

type CsvColumn = Exclude<keyof CoinSnapshot, 'coin' | 'volumeToMarketCap24h'>;

const COLUMNS: ReadonlyArray<{ header: string; field: CsvColumn }> = [
  { header: 'Timestamp', field: 'capturedAt' },
  { header: 'Price (USD)', field: 'price' },
  { header: 'Price Change 24h (%)', field: 'priceChange24hPercent' },
  { header: 'Low 24h (USD)', field: 'low24h' },
  { header: 'High 24h (USD)', field: 'high24h' },
  { header: 'Volume 24h (USD)', field: 'volume24h' },
  { header: 'Market Cap (USD)', field: 'marketCap' },
  { header: 'Fully Diluted Valuation (USD)', field: 'fullyDilutedValuation' },
  { header: 'Circulating Supply', field: 'circulatingSupply' },
  { header: 'Total Supply', field: 'totalSupply' },
  { header: 'Max Supply', field: 'maxSupply' }
];

export const SNAPSHOT_CSV_HEADER = COLUMNS.map(column => column.header).join(',');

export function snapshotLogPath(dataDir: string, coin: string): string {
  return path.join(dataDir, 'realtime', coin, 'stats', `${coin}_stats.csv`);
}

function formatCell(snapshot: CoinSnapshot, field: CsvColumn): string {
  const value = snapshot[field];
  if (typeof value === 'string') {
    return value;
  }
  return formatMaybe(value, number => String(number));
}

export function formatSnapshotRow(snapshot: CoinSnapshot): string {
  return COLUMNS.map(column => formatCell(snapshot, column.field)).join(',');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Appends one row to the coin's stats log, writing the header first when the
 * file is new. Returns the file path.
 */
export async function appendSnapshotRow(dataDir: string, snapshot: CoinSnapshot): Promise<string> {
  const filePath = snapshotLogPath(dataDir, snapshot.coin);
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const isNew = !(await fileExists(filePath));
  const lines = isNew ? `${SNAPSHOT_CSV_HEADER}\n${formatSnapshotRow(snapshot)}\n` : `${formatSnapshotRow(snapshot)}\n`;
  await fs.appendFile(filePath, lines, 'utf-8');

  log('INFO', `Appended snapshot row for ${snapshot.coin}`, { filePath, header: isNew });
  return filePath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cell(row: Record<string, unknown>, header: string): string | undefined {
  const value = row[header];
  return typeof value === 'string' ? value : undefined;
}

/** Reads the stats log back in file order. "N/A" cells come back as null. */
export async function readSnapshotRows(dataDir: string, coin: string): Promise<CoinSnapshot[]> {
  const filePath = snapshotLogPath(dataDir, coin);
  if (!(await fileExists(filePath))) {
    return [];
  }

  const rows: unknown = parse(await fs.readFile(filePath, 'utf-8'), {
    columns: true,
    skip_empty_lines: true,
    trim: true
  });
  if (!Array.isArray(rows)) {
    return [];
  }

  const snapshots: CoinSnapshot[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const record = row;
    const read = (header: string): MaybeNumber => normalizeValue(cell(record, header));

    const price = read('Price (USD)');
    const capturedAt = cell(record, 'Timestamp');
    if (price === null || capturedAt === undefined) continue;

    snapshots.push({
      coin,
      price,
      priceChange24hPercent: read('Price Change 24h (%)'),
      low24h: read('Low 24h (USD)'),
      high24h: read('High 24h (USD)'),
      volume24h: read('Volume 24h (USD)'),
      marketCap: read('Market Cap (USD)'),
      fullyDilutedValuation: read('Fully Diluted Valuation (USD)'),
      volumeToMarketCap24h: null,
      totalSupply: read('Total Supply'),
      maxSupply: read('Max Supply'),
      circulatingSupply: read('Circulating Supply'),
      capturedAt
    });
  }
  return snapshots;
}
