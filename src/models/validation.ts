import Joi from 'joi';
import {
  ClassifierOptions,
  ClassifyOptions,
  CombinerName,
  CrossValidationOptions,
  ModelKind,
  RawEmailData,
  UNKNOWN_CATEGORY
} from '../types/models';

/**
 * Validation schemas and functions for classifier options and run options
 */

export type ClassifierOptionsInput = Omit<ClassifierOptions, 'numberOfPredictors'> & {
  numberOfPredictors?: number;
};

export const COMBINERS: CombinerName[] = ['robinson-fisher', 'odds-product'];

export const MODEL_KINDS: ModelKind[] = ['bayesian', 'trivial'];

export const modelKindSchema = Joi.string<ModelKind>().valid(...MODEL_KINDS).required();

export const classifierOptionsSchema = Joi.object<ClassifierOptionsInput>({
  debug: Joi.number().integer().min(0).default(0),
  onDisk: Joi.boolean().default(false),
  nObservationsRequired: Joi.number().integer().min(0).default(5),
  numberOfPredictors: Joi.number().integer().min(1).optional(),
  minimumWordProb: Joi.number().greater(0).less(1).default(0.01),
  maximumWordProb: Joi.number()
    .less(1)
    .greater(Joi.ref('minimumWordProb'))
    .default(0.99)
    .messages({
      'number.greater': 'maximumWordProb must be greater than minimumWordProb'
    }),
  scoreDelay: Joi.number().integer().min(0).default(1),
  // Commas separate entries in options files and the environment
  ignoredTokens: Joi.array().items(Joi.string().pattern(/^[^,\s]+$/, 'bare word')).default([]),
  combiner: Joi.string().valid(...COMBINERS).default('robinson-fisher'),
  scratchDir: Joi.string().optional()
});

export const categoryNameSchema = Joi.string()
  .min(1)
  .invalid(UNKNOWN_CATEGORY)
  .required()
  .messages({
    'any.invalid': `Can't accept reserved category '${UNKNOWN_CATEGORY}'`
  });

export const corpusListSchema = Joi.object().pattern(Joi.string(), categoryNameSchema).required();

export const thresholdSchema = Joi.number()
  .min(0)
  .max(1)
  .required()
  .messages({
    'number.min': 'Threshold must be [0,1]',
    'number.max': 'Threshold must be [0,1]'
  });

export const foldsSchema = Joi.number()
  .integer()
  .min(2)
  .required()
  .messages({
    'number.min': "Can't crossval with less than 2 folds",
    'number.integer': 'Folds must be an integer'
  });

export const classifyOptionsSchema = Joi.object({
  threshold: thresholdSchema,
  corpusList: corpusListSchema
});

export const crossValidationOptionsSchema = classifyOptionsSchema.keys({
  folds: foldsSchema
});

const rawMessagePartSchema: Joi.ObjectSchema = Joi.object({
  mimeType: Joi.string().allow(null, ''),
  filename: Joi.string().allow(null, ''),
  headers: Joi.array()
    .items(Joi.object({ name: Joi.string().allow(null, ''), value: Joi.string().allow(null, '') }).unknown(true))
    .allow(null),
  body: Joi.object({
    data: Joi.string().allow(null, ''),
    attachmentId: Joi.string().allow(null, ''),
    size: Joi.number().allow(null)
  })
    .unknown(true)
    .allow(null),
  parts: Joi.array().items(Joi.link('#rawMessagePart')).allow(null)
})
  .id('rawMessagePart')
  .unknown(true);

export const rawEmailSchema = Joi.object<RawEmailData>({
  id: Joi.string().allow(null, ''),
  threadId: Joi.string().allow(null, ''),
  payload: rawMessagePartSchema.required()
}).unknown(true);

/**
 * A mailbox file is either a bare array of messages or `{ messages: [...] }`
 */
export const mailboxFileSchema = Joi.alternatives<RawEmailData[] | { messages: RawEmailData[] }>().try(
  Joi.array().items(rawEmailSchema),
  Joi.object({ messages: Joi.array().items(rawEmailSchema).required() }).unknown(true)
);

// Validation functions
export function validateClassifierOptions(options: unknown): { error?: Joi.ValidationError; value?: ClassifierOptionsInput } {
  return classifierOptionsSchema.validate(options, { abortEarly: false });
}

export function validateCategoryName(category: unknown): { error?: Joi.ValidationError } {
  return categoryNameSchema.validate(category);
}

export function validateCorpusList(corpusList: unknown): { error?: Joi.ValidationError } {
  return corpusListSchema.validate(corpusList, { abortEarly: false });
}

/**
 * Throws a ConfigurationError unless the threshold and corpus list are usable.
 * The random source on cross-validation options is not part of the schema.
 */
export function assertClassifyOptions(options: ClassifyOptions): void {
  const result = classifyOptionsSchema.validate(
    { threshold: options.threshold, corpusList: options.corpusList },
    { abortEarly: false }
  );
  if (result.error) {
    throwValidationError(result);
  }
}

export function assertCrossValidationOptions(options: CrossValidationOptions): void {
  const result = crossValidationOptionsSchema.validate(
    { threshold: options.threshold, corpusList: options.corpusList, folds: options.folds },
    { abortEarly: false }
  );
  if (result.error) {
    throwValidationError(result);
  }
}

export function assertCategoryName(category: string): void {
  const result = validateCategoryName(category);
  if (result.error) {
    throwValidationError(result);
  }
}

// Custom validation error class
export class ValidationError extends Error {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[]) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Bad thresholds, fold counts, reserved category names or options.
 * Raised before any state is touched.
 */
export class ConfigurationError extends ValidationError {
  constructor(message: string, details: Joi.ValidationErrorItem[] = []) {
    super(message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A document source or snapshot could not be opened or read
 */
export class ResourceError extends Error {
  public readonly resource: string;

  constructor(message: string, resource: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ResourceError';
    this.resource = resource;
  }
}

// Helper function to throw validation errors
export function throwValidationError(result: { error?: Joi.ValidationError }): never {
  if (result.error) {
    throw new ConfigurationError(result.error.message, result.error.details);
  }
  throw new ConfigurationError('Validation failed');
}
