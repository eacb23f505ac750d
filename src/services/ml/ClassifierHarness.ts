import { loadEnvironment, resolveClassifierOptions } from '../../config/classifier';
import { loadOptionsFile, saveOptionsFile } from '../../config/optionsFile';
import {
  ConfigurationError,
  ResourceError,
  assertCategoryName,
  assertClassifyOptions,
  assertCrossValidationOptions,
  throwValidationError,
  validateCorpusList
} from '../../models/validation';
import { createRecord, getOwn } from '../../models/records';
import { SnapshotRepository } from '../../repositories/SnapshotRepository';
import {
  CategoryScore,
  ClassifiableDocument,
  ClassifierOptions,
  ClassifyOptions,
  ConfusionMatrix,
  CorpusList,
  CrossValidationOptions,
  ModelKind,
  RandomSource,
  ScoreDetails,
  UNKNOWN_CATEGORY
} from '../../types/models';
import { DocumentSource } from '../email/DocumentSource';
import { JsonFileDocumentSource } from '../email/JsonFileDocumentSource';
import { ClassificationModel } from './ClassificationModel';
import { createModel } from './modelFactory';
import { createSeededRandom, randomInt } from './random';

export interface HarnessDependencies {
  source?: DocumentSource;
  random?: RandomSource;
  snapshots?: SnapshotRepository;
}

interface OpenedSource {
  name: string;
  category: string;
  documents: ClassifiableDocument[];
}

/**
 * Empty confusion matrix: one row per input category, each pre-seeded
 * with UNK and every input category at zero
 */
export function createConfusionMatrix(categories: Iterable<string>): ConfusionMatrix {
  const unique = Array.from(new Set(categories)).sort();
  const matrix: ConfusionMatrix = createRecord<Record<string, number>>();

  for (const category of unique) {
    const row = createRecord<number>();
    row[UNKNOWN_CATEGORY] = 0;
    for (const predicted of unique) {
      row[predicted] = 0;
    }
    matrix[category] = row;
  }

  return matrix;
}

/**
 * The best category when it clears the threshold, otherwise UNK
 */
export function predictCategory(scores: CategoryScore[], threshold: number): string {
  const [best] = scores;
  return best && best.probability >= threshold ? best.category : UNKNOWN_CATEGORY;
}

/**
 * Drives a classification model over named document sources: training,
 * held-out classification and N-fold cross-validation
 */
export class ClassifierHarness {
  private readonly source: DocumentSource;
  private readonly random?: RandomSource;
  private readonly snapshots: SnapshotRepository;

  private constructor(private readonly model: ClassificationModel, dependencies: HarnessDependencies) {
    this.source = dependencies.source ?? new JsonFileDocumentSource();
    this.random = dependencies.random;
    this.snapshots = dependencies.snapshots ?? new SnapshotRepository();
  }

  /**
   * Build a harness around a fresh model. Options not given come from the
   * environment (CLASSIFIER_*), then from defaults.
   */
  static async create(
    kind: ModelKind = 'bayesian',
    options: Partial<ClassifierOptions> | Record<string, unknown> = {},
    dependencies: HarnessDependencies = {}
  ): Promise<ClassifierHarness> {
    loadEnvironment();
    const resolved = resolveClassifierOptions(options);
    const model = await createModel(kind, resolved, dependencies.random);
    return new ClassifierHarness(model, dependencies);
  }

  /**
   * Build a harness from a KEY=VALUE options file
   */
  static async fromConfig(
    filename: string,
    kind: ModelKind = 'bayesian',
    dependencies: HarnessDependencies = {}
  ): Promise<ClassifierHarness> {
    return ClassifierHarness.create(kind, await loadOptionsFile(filename), dependencies);
  }

  /**
   * Restore a harness saved with `save`. Disk-backed tables come back in
   * fresh scratch files.
   */
  static async load(filename: string, dependencies: HarnessDependencies = {}): Promise<ClassifierHarness> {
    const snapshots = dependencies.snapshots ?? new SnapshotRepository();
    const snapshot = await snapshots.load(filename);
    const model = await createModel(snapshot.meta.kind, snapshot.meta.options, dependencies.random);

    try {
      await model.tables.withAllLocked(() => model.tables.importTables(snapshot.tables));
    } catch (error) {
      await model.close();
      console.error(`❌ Snapshot ${filename} doesn't match a ${snapshot.meta.kind} model:`, error);
      throw new ResourceError(`Can't load classifier from '${filename}'`, filename, error);
    }

    return new ClassifierHarness(model, { ...dependencies, snapshots });
  }

  get kind(): ModelKind {
    return this.model.kind;
  }

  get options(): ClassifierOptions {
    return { ...this.model.options, ignoredTokens: [...this.model.options.ignoredTokens] };
  }

  /**
   * Get, or set when a level is given, the debug level
   */
  debug(level?: number): number {
    if (level !== undefined) {
      if (!Number.isInteger(level) || level < 0) {
        throw new ConfigurationError(`Debug level must be a non-negative integer, got ${level}`);
      }
      this.model.options.debug = level;
    }
    return this.model.options.debug;
  }

  async bias(category: string, value?: number): Promise<number> {
    assertCategoryName(category);
    return this.model.bias(category, value);
  }

  isValid(document: ClassifiableDocument): boolean {
    return this.model.isValid(document);
  }

  async learn(category: string, document: ClassifiableDocument): Promise<void> {
    assertCategoryName(category);
    await this.model.learn(category, document);
  }

  async unlearn(category: string, document: ClassifiableDocument): Promise<void> {
    assertCategoryName(category);
    await this.model.unlearn(category, document);
  }

  score(document: ClassifiableDocument): Promise<CategoryScore[]> {
    return this.model.score(document);
  }

  explain(document: ClassifiableDocument): Promise<ScoreDetails> {
    return this.model.explain(document);
  }

  forget(): Promise<void> {
    return this.model.forget();
  }

  /**
   * Learn every valid document of each source under its category.
   * Resolves to the number of documents learned.
   */
  async train(corpusList: CorpusList): Promise<number> {
    const result = validateCorpusList(corpusList);
    if (result.error) {
      throwValidationError(result);
    }

    let learned = 0;
    for (const [name, category] of Object.entries(corpusList)) {
      const opened = await this.openSource(name, category);
      if (this.model.options.debug >= 1) {
        console.log(`🧠 Training ${category} from ${name}`);
      }
      learned += await this.learnAll(category, opened.documents);
    }

    return learned;
  }

  async retrain(corpusList: CorpusList): Promise<number> {
    const result = validateCorpusList(corpusList);
    if (result.error) {
      throwValidationError(result);
    }

    await this.forget();
    return this.train(corpusList);
  }

  /**
   * Score every valid document against the current model. Leaves the
   * model untouched.
   */
  async classify(options: ClassifyOptions): Promise<ConfusionMatrix> {
    assertClassifyOptions(options);

    const sources = await this.openSources(options.corpusList);
    const matrix = createConfusionMatrix(Object.values(options.corpusList));

    for (const source of sources) {
      if (this.model.options.debug >= 1) {
        console.log(`📊 Scoring source ${source.name}`);
      }
      for (const document of source.documents) {
        if (!this.model.isValid(document)) continue;
        await this.tally(matrix, source.category, document, options.threshold);
      }
    }

    return matrix;
  }

  /**
   * N-fold cross-validation. Each document is assigned a random fold;
   * each fold is scored by a model trained on the other folds only.
   * Destructive: the model is left empty.
   */
  async crossval(options: CrossValidationOptions): Promise<ConfusionMatrix> {
    assertCrossValidationOptions(options);

    const random = options.random ?? createSeededRandom();
    const sources = await this.openSources(options.corpusList);
    const matrix = createConfusionMatrix(Object.values(options.corpusList));

    const folds = new Map<ClassifiableDocument, number>();
    for (const source of sources) {
      for (const document of source.documents) {
        folds.set(document, randomInt(random, options.folds));
      }
    }

    for (let fold = 0; fold < options.folds; fold++) {
      if (this.model.options.debug >= 1) {
        console.log(`🔁 Cross-validation fold ${fold + 1} of ${options.folds}`);
      }

      await this.forget();

      for (const source of sources) {
        await this.learnAll(
          source.category,
          source.documents.filter(document => folds.get(document) !== fold)
        );
      }

      for (const source of sources) {
        for (const document of source.documents) {
          if (folds.get(document) !== fold || !this.model.isValid(document)) continue;
          await this.tally(matrix, source.category, document, options.threshold);
        }
      }
    }

    await this.forget();
    return matrix;
  }

  /**
   * Independent copy of this harness and all of its tables
   */
  async clone(): Promise<ClassifierHarness> {
    const target = await createModel(this.model.kind, this.options, this.random);

    try {
      const tables = await this.model.tables.withAllLocked(() => this.model.tables.exportTables());
      await target.tables.withAllLocked(() => target.tables.importTables(tables));
    } catch (error) {
      await target.close();
      throw error;
    }

    return new ClassifierHarness(target, {
      source: this.source,
      random: this.random,
      snapshots: this.snapshots
    });
  }

  save(filename: string): Promise<void> {
    return this.snapshots.save(this.model, filename);
  }

  saveConfig(filename: string): Promise<void> {
    return saveOptionsFile(this.model.options, filename);
  }

  /**
   * Release the model's tables, deleting any scratch files
   */
  close(): Promise<void> {
    return this.model.close();
  }

  private async learnAll(category: string, documents: ClassifiableDocument[]): Promise<number> {
    let learned = 0;
    for (const document of documents) {
      if (!this.model.isValid(document)) continue;
      await this.model.learn(category, document);
      learned++;
    }
    return learned;
  }

  private async tally(
    matrix: ConfusionMatrix,
    category: string,
    document: ClassifiableDocument,
    threshold: number
  ): Promise<void> {
    const scores = await this.model.score(document);
    const predicted = predictCategory(scores, threshold);
    if (this.model.options.debug >= 5) {
      console.log(`✉️  ${document.id}: ${category} -> ${predicted}`);
    }
    const row = getOwn(matrix, category) ?? createRecord<number>();
    row[predicted] = (getOwn(row, predicted) ?? 0) + 1;
    matrix[category] = row;
  }

  /**
   * Open every source before anything is trained or scored
   */
  private async openSources(corpusList: CorpusList): Promise<OpenedSource[]> {
    const opened: OpenedSource[] = [];
    for (const [name, category] of Object.entries(corpusList)) {
      opened.push(await this.openSource(name, category));
    }
    return opened;
  }

  private async openSource(name: string, category: string): Promise<OpenedSource> {
    let documents: ClassifiableDocument[];
    try {
      documents = await this.source.open(name);
    } catch (error) {
      if (error instanceof ResourceError) {
        throw error;
      }
      console.error(`❌ Couldn't open source ${name}:`, error);
      throw new ResourceError(`Couldn't open source ${name}`, name, error);
    }

    if (this.model.options.debug >= 1) {
      console.log(`📬 ${documents.length} messages in source ${name}`);
    }
    return { name, category, documents };
  }
}
