/**
 * Deduplicator - collapse semantically repeated monetary facts
 *
 * Only records of one document with the same value and currency are ever
 * compared. Within such a group the originating sentences are embedded and
 * clustered; each cluster keeps its member with the longest sentence, placed
 * where the cluster's earliest record stood. Clustering is repeated over the
 * survivors until nothing more merges, so a second pass is a no-op.
 *
 * @module services/dedup/deduplicator
 */

import { averageLinkageClusters } from './clustering.js';
import { EmbeddingError, type EmbeddingProvider } from '../embedding/ollama.js';
import { normalizeForEmbedding } from '../segmentation/text-normalizer.js';
import type { MoneyRecord } from '../../models/extraction.js';

export const DEFAULT_DEDUP_THRESHOLD = 0.5;

export interface DedupOptions {
  embedder: EmbeddingProvider;
  /** Cosine distance below which mentions are the same concept */
  threshold?: number;
}

export interface DedupResult {
  records: MoneyRecord[];
  duplicatesRemoved: number;
  /** Ids of records passed through because their sentence could not be embedded */
  unembedded: string[];
}

function groupKey(record: MoneyRecord): string {
  return JSON.stringify([record.documentId, record.value, record.currency.trim().toLowerCase()]);
}

/**
 * Longest originating sentence wins; the earliest record wins a tie
 */
function pickRepresentative(records: readonly MoneyRecord[], members: number[]): number {
  let best = members[0];
  for (const m of members) {
    if (records[m].originalSentence.length > records[best].originalSentence.length) {
      best = m;
    }
  }
  return best;
}

/**
 * Deduplicate money records, grouping by document first.
 */
export async function deduplicateByDocument(
  records: readonly MoneyRecord[],
  options: DedupOptions
): Promise<DedupResult> {
  const threshold = options.threshold ?? DEFAULT_DEDUP_THRESHOLD;
  if (!(threshold >= 0)) {
    throw new RangeError(`Dedup threshold must be a non-negative number, got ${threshold}`);
  }

  const groups = new Map<string, number[]>();
  records.forEach((record, i) => {
    const key = groupKey(record);
    const group = groups.get(key);
    if (group) {
      group.push(i);
    } else {
      groups.set(key, [i]);
    }
  });

  // Position of a removed record maps to null, a cluster's first slot to its representative
  const placement = new Map<number, MoneyRecord | null>();
  const unembedded: string[] = [];
  const vectors = new Map<string, Float32Array>();

  for (const indices of groups.values()) {
    if (indices.length < 2) continue;

    const embedded: number[] = [];
    const groupVectors: Float32Array[] = [];
    for (const i of indices) {
      const text = normalizeForEmbedding(records[i].originalSentence);
      try {
        let vector = vectors.get(text);
        if (!vector) {
          vector = await options.embedder.embed(text);
          vectors.set(text, vector);
        }
        const expected = groupVectors[0]?.length ?? vector.length;
        if (vector.length !== expected) {
          throw new EmbeddingError(
            `Embedding has ${vector.length} dimensions, expected ${expected}`,
            'DIMENSION_MISMATCH',
            { actualDim: vector.length, expectedDim: expected }
          );
        }
        embedded.push(i);
        groupVectors.push(vector);
      } catch (error) {
        if (!(error instanceof EmbeddingError)) throw error;
        console.error(`[Dedup] Record ${records[i].id} passes through unmerged: ${error.message}`);
        unembedded.push(records[i].id);
      }
    }

    // slot: output position the survivor occupies; recordIndex: the record shown there
    let survivors = embedded.map((recordIndex, k) => ({
      slot: recordIndex,
      recordIndex,
      vector: groupVectors[k],
    }));

    for (;;) {
      const clusters = averageLinkageClusters(
        survivors.map((s) => s.vector),
        threshold
      );
      if (clusters.length === survivors.length) break;

      survivors = clusters.map((members) => {
        const chosen = pickRepresentative(
          records,
          members.map((m) => survivors[m].recordIndex)
        );
        const holder = survivors.find((s) => s.recordIndex === chosen);
        if (!holder) {
          throw new Error(`Representative ${chosen} missing from its cluster`);
        }
        // members are ascending, so the first one holds the earliest slot
        return { slot: survivors[members[0]].slot, recordIndex: chosen, vector: holder.vector };
      });
    }

    for (const i of embedded) {
      placement.set(i, null);
    }
    for (const s of survivors) {
      placement.set(s.slot, records[s.recordIndex]);
    }
  }

  const output: MoneyRecord[] = [];
  records.forEach((record, i) => {
    const placed = placement.get(i);
    if (placed === undefined) {
      output.push(record);
    } else if (placed !== null) {
      output.push(placed);
    }
  });

  const duplicatesRemoved = records.length - output.length;
  if (duplicatesRemoved > 0) {
    console.error(`[Dedup] Removed ${duplicatesRemoved} duplicate records of ${records.length}`);
  }
  return { records: output, duplicatesRemoved, unembedded };
}

/**
 * Deduplicate the money records of one document.
 */
export async function deduplicate(
  records: readonly MoneyRecord[],
  options: DedupOptions
): Promise<MoneyRecord[]> {
  return (await deduplicateByDocument(records, options)).records;
}
