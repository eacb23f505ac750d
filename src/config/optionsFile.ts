import { promises as fs } from 'fs';
import dotenv from 'dotenv';
import { ClassifierOptions } from '../types/models';
import { getOwn } from '../models/records';
import { ResourceError } from '../models/validation';

/**
 * Plain KEY=VALUE options files. Keys use snake_case
 * (n_observations_required=5); `#` starts a comment. `ignored_tokens` is a
 * comma-separated list of bare words, so an entry cannot contain a comma.
 */

const FILE_KEYS: Record<string, keyof ClassifierOptions> = {
  debug: 'debug',
  on_disk: 'onDisk',
  n_observations_required: 'nObservationsRequired',
  number_of_predictors: 'numberOfPredictors',
  minimum_word_prob: 'minimumWordProb',
  maximum_word_prob: 'maximumWordProb',
  score_delay: 'scoreDelay',
  ignored_tokens: 'ignoredTokens',
  combiner: 'combiner',
  scratch_dir: 'scratchDir'
};

export function formatOptionsFile(options: ClassifierOptions, createdAt: Date = new Date()): string {
  const lines = [`# mail-sieve options file created ${createdAt.toISOString()}`];

  for (const [fileKey, optionKey] of Object.entries(FILE_KEYS)) {
    const value = options[optionKey];
    if (value === undefined) continue;
    lines.push(`${fileKey}=${Array.isArray(value) ? value.join(',') : String(value)}`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Parse options file contents into raw option values. Unknown keys are
 * kept under their own name so validation can reject them.
 */
export function parseOptionsFile(contents: string): Record<string, unknown> {
  const parsed = dotenv.parse(contents);
  const options: Record<string, unknown> = {};

  for (const [fileKey, raw] of Object.entries(parsed)) {
    const optionKey = getOwn(FILE_KEYS, fileKey.toLowerCase()) ?? fileKey;
    options[optionKey] = optionKey === 'ignoredTokens'
      ? raw.split(',').map(token => token.trim()).filter(Boolean)
      : raw;
  }

  return options;
}

export async function saveOptionsFile(options: ClassifierOptions, filename: string): Promise<void> {
  try {
    await fs.writeFile(filename, formatOptionsFile(options), 'utf-8');
  } catch (error) {
    console.error(`❌ Failed to write options file ${filename}:`, error);
    throw new ResourceError(`Can't write options file '${filename}'`, filename, error);
  }
}

export async function loadOptionsFile(filename: string): Promise<Record<string, unknown>> {
  let contents: string;
  try {
    contents = await fs.readFile(filename, 'utf-8');
  } catch (error) {
    console.error(`❌ Failed to read options file ${filename}:`, error);
    throw new ResourceError(`Can't open options file '${filename}'`, filename, error);
  }
  return parseOptionsFile(contents);
}
