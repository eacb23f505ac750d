import { DataTable, countSchema, jsonCodec } from '../../repositories/DataTable';
import { TableRegistry } from '../../repositories/TableRegistry';
import {
  CategoryScore,
  ClassifiableDocument,
  ClassifierOptions,
  RandomSource,
  ScoreDetails,
  Token,
  UNKNOWN_CATEGORY
} from '../../types/models';
import { DEFAULT_BIAS } from './BiasTable';
import { ClassificationModel } from './ClassificationModel';
import { CATEGORIES_TABLE } from './FrequencyStore';
import { createSeededRandom, randomInt } from './random';

/**
 * Baseline that guesses a category at random, weighted by how many
 * messages of each category it has seen
 */
export class TrivialModel implements ClassificationModel {
  readonly kind = 'trivial' as const;

  private constructor(
    readonly options: ClassifierOptions,
    readonly tables: TableRegistry,
    private readonly categories: DataTable<number>,
    private readonly random: RandomSource
  ) {}

  static async create(options: ClassifierOptions, random: RandomSource = createSeededRandom()): Promise<TrivialModel> {
    const tables = new TableRegistry(options.scratchDir);
    const categories = await tables.addDataTable(
      CATEGORIES_TABLE,
      jsonCodec(CATEGORIES_TABLE, countSchema),
      options.onDisk
    );
    return new TrivialModel(options, tables, categories, random);
  }

  isValid(_document: ClassifiableDocument): boolean {
    return true;
  }

  parse(_document: ClassifiableDocument): Set<Token> {
    return new Set();
  }

  async learn(category: string, _document: ClassifiableDocument): Promise<void> {
    await this.categories.lock.withWrite(async () => {
      await this.categories.set(category, ((await this.categories.get(category)) ?? 0) + 1);
    });
  }

  async unlearn(category: string, _document: ClassifiableDocument): Promise<void> {
    await this.categories.lock.withWrite(async () => {
      const count = (await this.categories.get(category)) ?? 0;
      if (count > 1) {
        await this.categories.set(category, count - 1);
      } else if (count === 1) {
        await this.categories.delete(category);
      }
    });
  }

  async score(_document: ClassifiableDocument): Promise<CategoryScore[]> {
    const counts = await this.categories.lock.withRead(() => this.categories.entries());
    const total = counts.reduce((sum, [, count]) => sum + count, 0);

    if (total === 0) {
      return [{ category: UNKNOWN_CATEGORY, probability: 1 }];
    }

    const pick = randomInt(this.random, total) + 1;
    let seen = 0;
    for (const [category, count] of counts) {
      seen += count;
      if (pick <= seen) {
        return [{ category, probability: 1 }];
      }
    }

    return [{ category: UNKNOWN_CATEGORY, probability: 1 }];
  }

  async explain(document: ClassifiableDocument): Promise<ScoreDetails> {
    return { scores: await this.score(document), interestingWords: [] };
  }

  async forget(): Promise<void> {
    await this.tables.withAllLocked(() => this.categories.clear());
  }

  /**
   * No biases in this model; always the default
   */
  async bias(_category: string, _value?: number): Promise<number> {
    return DEFAULT_BIAS;
  }

  close(): Promise<void> {
    return this.tables.close();
  }
}
