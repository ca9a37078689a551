/**
 * Document discovery
 *
 * Call documents follow the series naming PROGRAM-YYYY-TYPE-GRANT-CATEGORY-XX
 * (e.g. AMIF-2024-TF2-AG-INTE-01). Within a series only the lowest XX is
 * kept; the rest are amendments or translations of the same call.
 *
 * @module services/ingest/discovery
 */

import { readdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import { pathNotDirectoryError, pathNotFoundError } from '../../server/errors.js';

const SERIES_PATTERN = /([A-Z0-9]+)-\d{4}-([A-Z0-9]+)-([A-Z0-9]+)-([A-Z]+)-(\d{2})/i;

/**
 * The series title inside a file name, or null
 */
export function seriesTitle(fileName: string): string | null {
  const match = SERIES_PATTERN.exec(fileName);
  return match ? match[0] : null;
}

/**
 * Identifier for a discovered file: its series title, else its base name
 */
export function documentIdFor(filePath: string): string {
  const name = basename(filePath);
  return seriesTitle(name) ?? basename(name, extname(name));
}

/**
 * List the call-for-proposal PDFs of a directory, one per series.
 *
 * @throws MCPError PATH_NOT_FOUND or PATH_NOT_DIRECTORY
 */
export async function findCallPdfs(dir: string): Promise<string[]> {
  const info = await stat(dir).catch(() => null);
  if (!info) {
    throw pathNotFoundError(dir);
  }
  if (!info.isDirectory()) {
    throw pathNotDirectoryError(dir);
  }

  const lowestPerSeries = new Map<string, { number: number; path: string }>();
  const others: string[] = [];

  const entries = await readdir(dir, { withFileTypes: true });
  // Name order decides ties between equal XX values
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const lower = entry.name.toLowerCase();
    if (!entry.isFile() || !lower.endsWith('.pdf') || !lower.includes('call')) continue;

    const filePath = join(dir, entry.name);
    const match = SERIES_PATTERN.exec(entry.name);
    if (!match) {
      others.push(filePath);
      continue;
    }
    const [, program, type, grant, category, xx] = match;
    const key = [program, type, grant, category].map((p) => p.toUpperCase()).join('|');
    const number = parseInt(xx, 10);
    const current = lowestPerSeries.get(key);
    if (!current || number < current.number) {
      lowestPerSeries.set(key, { number, path: filePath });
    }
  }

  const selected = [...[...lowestPerSeries.values()].map((c) => c.path), ...others].sort();
  console.error(`[Discovery] ${selected.length} call documents selected in ${dir}`);
  return selected;
}
