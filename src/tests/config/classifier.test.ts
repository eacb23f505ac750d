import { describe, it, expect } from '@jest/globals';
import { readEnvironmentOptions, resolveClassifierOptions } from '../../config/classifier';
import { getScratchDirectory } from '../../config/database';
import { ConfigurationError } from '../../models/validation';

describe('readEnvironmentOptions', () => {
  it('should map CLASSIFIER_* variables onto option names', () => {
    expect(
      readEnvironmentOptions({
        CLASSIFIER_DEBUG: '3',
        CLASSIFIER_COMBINER: 'odds-product',
        CLASSIFIER_IGNORED_TOKENS: 'the, a,,re',
        CLASSIFIER_ON_DISK: '',
        UNRELATED: 'x'
      })
    ).toEqual({
      debug: '3',
      combiner: 'odds-product',
      ignoredTokens: ['the', 'a', 're']
    });
  });
});

describe('resolveClassifierOptions', () => {
  it('should fill in defaults', () => {
    expect(resolveClassifierOptions({}, {})).toEqual({
      debug: 0,
      onDisk: false,
      nObservationsRequired: 5,
      numberOfPredictors: 41,
      minimumWordProb: 0.01,
      maximumWordProb: 0.99,
      scoreDelay: 1,
      ignoredTokens: [],
      combiner: 'robinson-fisher'
    });
  });

  it('should default the predictor count by combiner', () => {
    expect(resolveClassifierOptions({ combiner: 'odds-product' }, {}).numberOfPredictors).toBe(15);
    expect(resolveClassifierOptions({ combiner: 'odds-product', numberOfPredictors: 3 }, {}).numberOfPredictors).toBe(3);
  });

  it('should let explicit options win over the environment', () => {
    const options = resolveClassifierOptions(
      { debug: 1 },
      { CLASSIFIER_DEBUG: '3', CLASSIFIER_SCORE_DELAY: '7', CLASSIFIER_ON_DISK: 'true' }
    );

    expect(options.debug).toBe(1);
    expect(options.scoreDelay).toBe(7);
    expect(options.onDisk).toBe(true);
  });

  it('should reject an unknown combiner', () => {
    expect(() => resolveClassifierOptions({}, { CLASSIFIER_COMBINER: 'median' })).toThrow(ConfigurationError);
  });

  it('should reject inverted probability bounds', () => {
    expect(() => resolveClassifierOptions({ minimumWordProb: 0.6, maximumWordProb: 0.4 }, {})).toThrow(
      'maximumWordProb must be greater than minimumWordProb'
    );
  });

  it('should reject ignore entries that are not bare words', () => {
    expect(() => resolveClassifierOptions({ ignoredTokens: ['1,000'] }, {})).toThrow(
      '"ignoredTokens[0]" with value "1,000" fails to match the bare word pattern'
    );
    expect(() => resolveClassifierOptions({ ignoredTokens: ['two words'] }, {})).toThrow(ConfigurationError);
  });

  it('should reject unknown options', () => {
    expect(() => resolveClassifierOptions({ colour: 'red' }, {})).toThrow(ConfigurationError);
  });
});

describe('getScratchDirectory', () => {
  it('should prefer an explicit directory', () => {
    expect(getScratchDirectory('/var/tmp/sieve')).toBe('/var/tmp/sieve');
  });
});
