/**
 * mail-sieve: incremental probabilistic mail classification
 */

export * from './types/models';
export {
  ValidationError,
  ConfigurationError,
  ResourceError,
  classifierOptionsSchema,
  validateClassifierOptions
} from './models/validation';
export { loadEnvironment, resolveClassifierOptions } from './config/classifier';
export { formatOptionsFile, parseOptionsFile, loadOptionsFile, saveOptionsFile } from './config/optionsFile';

export { DataTable, TableCodec } from './repositories/DataTable';
export { TableRegistry, LockRequest, EncodedTable } from './repositories/TableRegistry';
export { SnapshotRepository, ModelSnapshot } from './repositories/SnapshotRepository';
export { ReadWriteLock, LockMode, ReleaseLock } from './services/locking/ReadWriteLock';

export { DocumentSource, InMemoryDocumentSource, EmailParser, JsonFileDocumentSource } from './services/email';

export { TokenExtractor, HTML_MARKER_TOKEN } from './services/ml/TokenExtractor';
export { FrequencyStore, FrequencySnapshot } from './services/ml/FrequencyStore';
export { BiasTable, DEFAULT_BIAS } from './services/ml/BiasTable';
export { PredictorCache, computePredictors } from './services/ml/PredictorCache';
export {
  ProbabilityCombiner,
  RobinsonFisherCombiner,
  OddsProductCombiner,
  chiSquareSurvival,
  createCombiner
} from './services/ml/combiners';
export { Scorer } from './services/ml/Scorer';
export { ClassificationModel } from './services/ml/ClassificationModel';
export { BayesianModel } from './services/ml/BayesianModel';
export { TrivialModel } from './services/ml/TrivialModel';
export { createModel } from './services/ml/modelFactory';
export { SeededRandom, createSeededRandom } from './services/ml/random';
export {
  ClassifierHarness,
  HarnessDependencies,
  createConfusionMatrix,
  predictCategory
} from './services/ml/ClassifierHarness';
