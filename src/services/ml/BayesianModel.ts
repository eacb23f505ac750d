import { TableRegistry } from '../../repositories/TableRegistry';
import {
  CategoryScore,
  ClassifiableDocument,
  ClassifierOptions,
  ScoreDetails,
  Token
} from '../../types/models';
import { BiasTable } from './BiasTable';
import { ClassificationModel } from './ClassificationModel';
import { createCombiner } from './combiners';
import { FrequencyStore } from './FrequencyStore';
import { PredictorCache } from './PredictorCache';
import { Scorer } from './Scorer';
import { TokenExtractor } from './TokenExtractor';

/**
 * Frequency-weighted Bayesian filter in the style of Paul Graham's
 * "A Plan for Spam", generalised to any number of categories
 */
export class BayesianModel implements ClassificationModel {
  readonly kind = 'bayesian' as const;
  private readonly extractor: TokenExtractor;
  private readonly scorer: Scorer;

  private constructor(
    readonly options: ClassifierOptions,
    readonly tables: TableRegistry,
    readonly store: FrequencyStore,
    readonly biases: BiasTable,
    readonly cache: PredictorCache
  ) {
    this.extractor = new TokenExtractor(options.ignoredTokens);
    this.scorer = new Scorer(
      tables,
      store,
      biases,
      cache,
      this.extractor,
      createCombiner(options.combiner),
      options
    );
  }

  static async create(options: ClassifierOptions): Promise<BayesianModel> {
    const tables = new TableRegistry(options.scratchDir);

    try {
      const store = await FrequencyStore.create(tables, options.onDisk);
      const biases = await BiasTable.create(tables);
      const cache = await PredictorCache.create(tables, options.onDisk);
      return new BayesianModel(options, tables, store, biases, cache);
    } catch (error) {
      console.error('❌ Failed to create data tables:', error);
      await tables.close();
      throw error;
    }
  }

  /**
   * Only messages with at least one text part carry anything to learn from
   */
  isValid(document: ClassifiableDocument): boolean {
    return document.parts.some(part => part.mediaType.toLowerCase().startsWith('text/'));
  }

  parse(document: ClassifiableDocument): Set<Token> {
    return this.extractor.extract(document);
  }

  async learn(category: string, document: ClassifiableDocument): Promise<void> {
    const tokens = this.parse(document);
    if (this.options.debug >= 5) {
      console.log(`📥 Learning ${document.id} as ${category} (${tokens.size} tokens)`);
    }
    await this.store.learn(category, tokens);
  }

  async unlearn(category: string, document: ClassifiableDocument): Promise<void> {
    const tokens = this.parse(document);
    if (this.options.debug >= 5) {
      console.log(`📤 Unlearning ${document.id} from ${category}`);
    }
    await this.store.unlearn(category, tokens);
  }

  score(document: ClassifiableDocument): Promise<CategoryScore[]> {
    return this.scorer.score(document);
  }

  explain(document: ClassifiableDocument): Promise<ScoreDetails> {
    return this.scorer.explain(document);
  }

  /**
   * Drop counts and predictors. Biases are configuration and survive.
   */
  async forget(): Promise<void> {
    await this.tables.withAllLocked(async () => {
      await this.store.clearUnlocked();
      await this.cache.clearUnlocked();
    });
  }

  bias(category: string, value?: number): Promise<number> {
    return this.biases.bias(category, value);
  }

  close(): Promise<void> {
    return this.tables.close();
  }
}
