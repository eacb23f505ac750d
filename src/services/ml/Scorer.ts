import { createRecord, getOwn } from '../../models/records';
import { LockRequest, TableRegistry } from '../../repositories/TableRegistry';
import {
  CategoryScore,
  ClassifiableDocument,
  ClassifierOptions,
  InterestingWord,
  ScoreDetails,
  Token
} from '../../types/models';
import { BiasTable } from './BiasTable';
import { ProbabilityCombiner } from './combiners';
import { FrequencyStore } from './FrequencyStore';
import { PredictorCache } from './PredictorCache';
import { TokenExtractor } from './TokenExtractor';

export type ScorerSettings = Pick<
  ClassifierOptions,
  'debug' | 'nObservationsRequired' | 'numberOfPredictors' | 'minimumWordProb' | 'maximumWordProb' | 'scoreDelay'
>;

export function compareScores(a: CategoryScore, b: CategoryScore): number {
  if (b.probability !== a.probability) return b.probability - a.probability;
  return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
}

export function compareInterestingWords(a: InterestingWord, b: InterestingWord): number {
  if (b.significance !== a.significance) return b.significance - a.significance;
  return a.token < b.token ? -1 : a.token > b.token ? 1 : 0;
}

/**
 * Scores documents against every known category using the most
 * significant cached predictors
 */
export class Scorer {
  constructor(
    private readonly registry: TableRegistry,
    private readonly store: FrequencyStore,
    private readonly biases: BiasTable,
    private readonly cache: PredictorCache,
    private readonly extractor: TokenExtractor,
    private readonly combiner: ProbabilityCombiner,
    private readonly settings: ScorerSettings
  ) {}

  async score(document: ClassifiableDocument): Promise<CategoryScore[]> {
    return (await this.explain(document)).scores;
  }

  async explain(document: ClassifiableDocument): Promise<ScoreDetails> {
    await this.cache.refreshIfStale(this.store, this.biases, this.settings, this.settings.scoreDelay);

    const details = await this.scoreTokens(this.extractor.extract(document));

    if (this.settings.debug >= 10) {
      const summary = details.scores.map(s => `${s.category}=${s.probability.toFixed(4)}`).join(' ');
      console.log(`📊 Scored ${document.id}: ${summary || 'no categories'} (${details.interestingWords.length} predictors)`);
    }
    if (this.settings.debug >= 15) {
      for (const word of details.interestingWords) {
        console.log(`   ${word.token} significance=${word.significance.toFixed(4)}`);
      }
    }

    return details;
  }

  /**
   * Score an already extracted token set against the current cache,
   * without triggering a refresh
   */
  async scoreTokens(tokens: Iterable<Token>): Promise<ScoreDetails> {
    const locks: LockRequest[] = [
      { table: this.store.categories, mode: 'read' },
      { table: this.cache.table, mode: 'read' }
    ];

    return this.registry.withLocks(locks, async () => {
      const categories = Object.keys(await this.store.readCategoryCounts()).sort();
      const candidates: InterestingWord[] = [];

      for (const token of tokens) {
        const record = await this.cache.getUnlocked(token);
        if (!record) continue;

        const probabilities = createRecord<number>();
        let significance = 0;
        for (const category of categories) {
          const predictor = getOwn(record, category);
          if (!predictor) continue;
          probabilities[category] = predictor[0];
          significance += predictor[1];
        }
        candidates.push({ token, significance, probabilities });
      }

      const interestingWords = candidates
        .sort(compareInterestingWords)
        .slice(0, this.settings.numberOfPredictors);

      const scores = categories
        .map(category => {
          const evidence: number[] = [];
          for (const word of interestingWords) {
            const p = getOwn(word.probabilities, category);
            if (p !== undefined) evidence.push(p);
          }
          return { category, probability: this.combiner.combine(evidence) };
        })
        .sort(compareScores);

      return { scores, interestingWords };
    });
  }
}
