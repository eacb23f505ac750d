import { TableRegistry } from '../../repositories/TableRegistry';
import {
  CategoryScore,
  ClassifiableDocument,
  ClassifierOptions,
  ModelKind,
  ScoreDetails,
  Token
} from '../../types/models';

/**
 * Common surface of the classification models the harness drives
 */
export interface ClassificationModel {
  readonly kind: ModelKind;
  readonly options: ClassifierOptions;
  readonly tables: TableRegistry;

  /**
   * Whether the model can learn from / score this document at all
   */
  isValid(document: ClassifiableDocument): boolean;
  parse(document: ClassifiableDocument): Set<Token>;
  learn(category: string, document: ClassifiableDocument): Promise<void>;
  unlearn(category: string, document: ClassifiableDocument): Promise<void>;
  score(document: ClassifiableDocument): Promise<CategoryScore[]>;
  explain(document: ClassifiableDocument): Promise<ScoreDetails>;
  forget(): Promise<void>;
  bias(category: string, value?: number): Promise<number>;
  close(): Promise<void>;
}
