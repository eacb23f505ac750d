import dotenv from 'dotenv';
import { ClassifierOptions } from '../types/models';
import { ClassifierOptionsInput, throwValidationError, validateClassifierOptions } from '../models/validation';

const DEFAULT_PREDICTORS = {
  'odds-product': 15,
  'robinson-fisher': 41
} as const;

const ENV_KEYS: Record<string, keyof ClassifierOptions> = {
  CLASSIFIER_DEBUG: 'debug',
  CLASSIFIER_ON_DISK: 'onDisk',
  CLASSIFIER_N_OBSERVATIONS_REQUIRED: 'nObservationsRequired',
  CLASSIFIER_NUMBER_OF_PREDICTORS: 'numberOfPredictors',
  CLASSIFIER_MINIMUM_WORD_PROB: 'minimumWordProb',
  CLASSIFIER_MAXIMUM_WORD_PROB: 'maximumWordProb',
  CLASSIFIER_SCORE_DELAY: 'scoreDelay',
  CLASSIFIER_IGNORED_TOKENS: 'ignoredTokens',
  CLASSIFIER_COMBINER: 'combiner',
  CLASSIFIER_SCRATCH_DIR: 'scratchDir'
};

let environmentLoaded = false;

/**
 * Load .env into process.env once
 */
export function loadEnvironment(): void {
  if (environmentLoaded) {
    return;
  }
  dotenv.config();
  environmentLoaded = true;
}

/**
 * Collects option values from CLASSIFIER_* variables. Values stay strings;
 * Joi converts them during validation.
 */
export function readEnvironmentOptions(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const options: Record<string, unknown> = {};

  for (const [envKey, optionKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw === '') continue;

    if (optionKey === 'ignoredTokens') {
      options[optionKey] = raw.split(',').map(token => token.trim()).filter(Boolean);
    } else {
      options[optionKey] = raw;
    }
  }

  return options;
}

/**
 * Merge defaults, environment and explicit overrides into validated options.
 * Explicit overrides win over the environment.
 */
export function resolveClassifierOptions(
  overrides: Partial<ClassifierOptions> | Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env
): ClassifierOptions {
  const result = validateClassifierOptions({ ...readEnvironmentOptions(env), ...overrides });
  if (result.error || !result.value) {
    throwValidationError(result);
  }

  return withPredictorDefault(result.value);
}

function withPredictorDefault(input: ClassifierOptionsInput): ClassifierOptions {
  return {
    ...input,
    numberOfPredictors: input.numberOfPredictors ?? DEFAULT_PREDICTORS[input.combiner]
  };
}
