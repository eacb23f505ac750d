import { copyRecord, getOwn, recordFromEntries } from '../../models/records';
import { DataTable, countSchema, jsonCodec, recordCodec } from '../../repositories/DataTable';
import { LockRequest, TableRegistry } from '../../repositories/TableRegistry';
import { CacheMeta, CategoryCounts, Token } from '../../types/models';

export const CATEGORIES_TABLE = 'categories';
export const WORD_COUNT_TABLE = 'word_count';
export const CACHE_META_TABLE = 'cache_meta';

const MESSAGES_PROCESSED = 'messages_processed';
const MESSAGES_SCORED_AS_OF = 'messages_scored_as_of';
// Bumped by forget so a rebuild started before it can tell it is outdated
const GENERATION = 'generation';

/**
 * Consistent copy of the frequency tables, taken under shared locks
 */
export interface FrequencySnapshot {
  categoryCounts: CategoryCounts;
  wordCounts: Array<[Token, CategoryCounts]>;
  messagesProcessed: number;
  generation: number;
}

/**
 * Per-category message counts and per-token per-category occurrence
 * counts. Counts never go negative: entries that reach zero are removed.
 */
export class FrequencyStore {
  private constructor(
    private readonly registry: TableRegistry,
    readonly categories: DataTable<number>,
    readonly wordCounts: DataTable<CategoryCounts>,
    readonly cacheMeta: DataTable<number>
  ) {}

  static async create(registry: TableRegistry, onDisk: boolean = false): Promise<FrequencyStore> {
    const categories = await registry.addDataTable(CATEGORIES_TABLE, jsonCodec(CATEGORIES_TABLE, countSchema));
    const cacheMeta = await registry.addDataTable(CACHE_META_TABLE, jsonCodec(CACHE_META_TABLE, countSchema));
    const wordCounts = await registry.addDataTable(
      WORD_COUNT_TABLE,
      recordCodec(WORD_COUNT_TABLE, countSchema),
      onDisk
    );
    return new FrequencyStore(registry, categories, wordCounts, cacheMeta);
  }

  async learn(category: string, tokens: Iterable<Token>): Promise<void> {
    await this.registry.withLocks(this.writeLocks(), async () => {
      await this.categories.set(category, ((await this.categories.get(category)) ?? 0) + 1);
      await this.incrementProcessed();

      for (const token of tokens) {
        const record = copyRecord(await this.wordCounts.get(token));
        record[category] = (getOwn(record, category) ?? 0) + 1;
        await this.wordCounts.set(token, record);
      }
    });
  }

  /**
   * Reverse of learn, saturating at zero. Still counts as a processed
   * message so the predictor cache notices the change.
   */
  async unlearn(category: string, tokens: Iterable<Token>): Promise<void> {
    await this.registry.withLocks(this.writeLocks(), async () => {
      const count = (await this.categories.get(category)) ?? 0;
      if (count > 1) {
        await this.categories.set(category, count - 1);
      } else if (count === 1) {
        await this.categories.delete(category);
      }
      await this.incrementProcessed();

      for (const token of tokens) {
        const record = await this.wordCounts.get(token);
        const tokenCount = getOwn(record, category) ?? 0;
        if (tokenCount === 0) continue;

        const updated = copyRecord(record);
        if (tokenCount > 1) {
          updated[category] = tokenCount - 1;
        } else {
          delete updated[category];
        }

        if (Object.keys(updated).length === 0) {
          await this.wordCounts.delete(token);
        } else {
          await this.wordCounts.set(token, updated);
        }
      }
    });
  }

  async forget(): Promise<void> {
    await this.registry.withLocks(this.writeLocks(), () => this.clearUnlocked());
  }

  /**
   * Reset counts and cache meta. Callers hold write locks on this store's tables.
   */
  async clearUnlocked(): Promise<void> {
    const generation = ((await this.cacheMeta.get(GENERATION)) ?? 0) + 1;
    await this.categories.clear();
    await this.wordCounts.clear();
    await this.cacheMeta.replaceAll([
      [MESSAGES_PROCESSED, 0],
      [MESSAGES_SCORED_AS_OF, 0],
      [GENERATION, generation]
    ]);
  }

  async getCategoryCounts(): Promise<CategoryCounts> {
    return this.categories.lock.withRead(() => this.readCategoryCounts());
  }

  async getCategoryCount(category: string): Promise<number> {
    return this.categories.lock.withRead(async () => (await this.categories.get(category)) ?? 0);
  }

  async getTokenCounts(token: Token): Promise<CategoryCounts> {
    return this.wordCounts.lock.withRead(async () => copyRecord(await this.wordCounts.get(token)));
  }

  async getVocabularySize(): Promise<number> {
    return this.wordCounts.lock.withRead(() => this.wordCounts.size());
  }

  async getCacheMeta(): Promise<CacheMeta> {
    return this.cacheMeta.lock.withRead(() => this.readCacheMeta());
  }

  /**
   * Copy of everything a predictor rebuild needs, read under shared locks
   * that are released before the rebuild starts.
   */
  async snapshot(): Promise<FrequencySnapshot> {
    const locks: LockRequest[] = [
      { table: this.categories, mode: 'read' },
      { table: this.wordCounts, mode: 'read' },
      { table: this.cacheMeta, mode: 'read' }
    ];

    return this.registry.withLocks(locks, async () => ({
      categoryCounts: await this.readCategoryCounts(),
      wordCounts: await this.wordCounts.entries(),
      messagesProcessed: await this.metaValue(MESSAGES_PROCESSED),
      generation: await this.metaValue(GENERATION)
    }));
  }

  /**
   * Record that predictors reflect the given snapshot. Callers hold the
   * cache meta write lock. Returns false when forget ran after the snapshot.
   */
  async markScoredUnlocked(snapshot: FrequencySnapshot): Promise<boolean> {
    if ((await this.metaValue(GENERATION)) !== snapshot.generation) {
      return false;
    }
    await this.cacheMeta.set(MESSAGES_SCORED_AS_OF, snapshot.messagesProcessed);
    return true;
  }

  async readCategoryCounts(): Promise<CategoryCounts> {
    return recordFromEntries(await this.categories.entries());
  }

  async readCacheMeta(): Promise<CacheMeta> {
    return {
      messagesProcessed: await this.metaValue(MESSAGES_PROCESSED),
      messagesScoredAsOf: await this.metaValue(MESSAGES_SCORED_AS_OF)
    };
  }

  private async incrementProcessed(): Promise<void> {
    await this.cacheMeta.set(MESSAGES_PROCESSED, (await this.metaValue(MESSAGES_PROCESSED)) + 1);
  }

  private async metaValue(key: string): Promise<number> {
    return (await this.cacheMeta.get(key)) ?? 0;
  }

  private writeLocks(): LockRequest[] {
    return [
      { table: this.categories, mode: 'write' },
      { table: this.wordCounts, mode: 'write' },
      { table: this.cacheMeta, mode: 'write' }
    ];
  }
}
