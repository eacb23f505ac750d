import { createRecord, getOwn } from '../../models/records';
import { DataTable, predictorSchema, recordCodec } from '../../repositories/DataTable';
import { LockRequest, TableRegistry } from '../../repositories/TableRegistry';
import { CacheMeta, Predictor, PredictorRecord, Token } from '../../types/models';
import { BiasTable } from './BiasTable';
import { FrequencySnapshot, FrequencyStore } from './FrequencyStore';

export const WORD_SCORE_TABLE = 'word_score';

export interface PredictorSettings {
  nObservationsRequired: number;
  minimumWordProb: number;
  maximumWordProb: number;
  debug?: number;
}

export function clampProbability(p: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, p));
}

/**
 * Per-token predictors, generalising Graham's two-category formula
 *
 *                 (b / nb) * bb
 *   p(bad) = -------------------------------
 *            (g / ng) * gb + (b / nb) * bb
 *
 * to N categories: each category's biased relative frequency is divided by
 * the sum over all categories.
 */
export function computePredictors(
  snapshot: FrequencySnapshot,
  biases: Record<string, number>,
  settings: PredictorSettings
): Array<[Token, PredictorRecord]> {
  const categories = Object.keys(snapshot.categoryCounts);
  const predictors: Array<[Token, PredictorRecord]> = [];

  for (const [token, counts] of snapshot.wordCounts) {
    const ratios = createRecord<number>();
    let ratioSum = 0;
    let observations = 0;

    for (const [category, count] of Object.entries(counts)) {
      observations += count;
      const messages = getOwn(snapshot.categoryCounts, category) ?? 0;
      if (messages > 0) {
        const ratio = (count / messages) * (getOwn(biases, category) ?? 1);
        ratios[category] = ratio;
        ratioSum += ratio;
      }
    }

    if (observations < settings.nObservationsRequired) continue;
    // Only seen in categories that no longer have any messages
    if (ratioSum <= 0) continue;

    const record = createRecord<Predictor>();
    for (const category of categories) {
      const p = clampProbability(
        (getOwn(ratios, category) ?? 0) / ratioSum,
        settings.minimumWordProb,
        settings.maximumWordProb
      );
      record[category] = [p, p * p];
    }
    predictors.push([token, record]);
  }

  return predictors;
}

/**
 * Cached predictors derived from the frequency store. Rebuilt in bulk;
 * never updated token by token.
 */
export class PredictorCache {
  private inFlight?: Promise<boolean>;

  private constructor(
    private readonly registry: TableRegistry,
    readonly table: DataTable<PredictorRecord>
  ) {}

  static async create(registry: TableRegistry, onDisk: boolean = false): Promise<PredictorCache> {
    const table = await registry.addDataTable(
      WORD_SCORE_TABLE,
      recordCodec(WORD_SCORE_TABLE, predictorSchema),
      onDisk
    );
    return new PredictorCache(registry, table);
  }

  static isStale(meta: CacheMeta, scoreDelay: number): boolean {
    return meta.messagesProcessed - meta.messagesScoredAsOf >= scoreDelay;
  }

  /**
   * Full rebuild. The frequency tables are only read-locked while they are
   * copied; the predictor table is write-locked while the result is stored.
   * Resolves to false when a forget overtook the rebuild and it was dropped.
   */
  async refresh(store: FrequencyStore, bias: BiasTable, settings: PredictorSettings): Promise<boolean> {
    const snapshot = await store.snapshot();
    const biases = await bias.resolve(Object.keys(snapshot.categoryCounts));

    if ((settings.debug ?? 0) >= 5) {
      console.log(`🔄 Updating predictors after ${snapshot.messagesProcessed} messages`);
    }

    const predictors = computePredictors(snapshot, biases, settings);

    const locks: LockRequest[] = [
      { table: store.cacheMeta, mode: 'write' },
      { table: this.table, mode: 'write' }
    ];

    return this.registry.withLocks(locks, async () => {
      if (!(await store.markScoredUnlocked(snapshot))) {
        return false;
      }
      await this.table.replaceAll(predictors);
      return true;
    });
  }

  /**
   * Rebuild when the store has moved at least `scoreDelay` messages past
   * the cache. Concurrent callers share one rebuild.
   */
  async refreshIfStale(
    store: FrequencyStore,
    bias: BiasTable,
    settings: PredictorSettings,
    scoreDelay: number
  ): Promise<boolean> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.refreshWhenStale(store, bias, settings, scoreDelay);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = undefined;
    }
  }

  private async refreshWhenStale(
    store: FrequencyStore,
    bias: BiasTable,
    settings: PredictorSettings,
    scoreDelay: number
  ): Promise<boolean> {
    if (!PredictorCache.isStale(await store.getCacheMeta(), scoreDelay)) {
      return false;
    }
    return this.refresh(store, bias, settings);
  }

  async get(token: Token): Promise<PredictorRecord | undefined> {
    return this.table.lock.withRead(() => this.table.get(token));
  }

  /**
   * Callers hold the read lock
   */
  async getUnlocked(token: Token): Promise<PredictorRecord | undefined> {
    return this.table.get(token);
  }

  async size(): Promise<number> {
    return this.table.lock.withRead(() => this.table.size());
  }

  async clearUnlocked(): Promise<void> {
    await this.table.clear();
  }
}
