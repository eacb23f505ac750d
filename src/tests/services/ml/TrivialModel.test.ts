import { describe, it, expect, afterEach } from '@jest/globals';
import { TrivialModel } from '../../../services/ml/TrivialModel';
import { RandomSource } from '../../../types/models';
import { attachmentOnlyDocument, testOptions, textDocument } from '../../fixtures';

class FixedRandom implements RandomSource {
  constructor(private readonly values: number[]) {}

  next(): number {
    return this.values.shift() ?? 0;
  }
}

describe('TrivialModel', () => {
  let model: TrivialModel | undefined;

  afterEach(async () => {
    await model?.close();
    model = undefined;
  });

  it('should answer UNK before anything is learned', async () => {
    model = await TrivialModel.create(testOptions());

    expect(await model.score(textDocument('anything'))).toEqual([{ category: 'UNK', probability: 1 }]);
  });

  it('should pick categories in proportion to their message counts', async () => {
    model = await TrivialModel.create(testOptions(), new FixedRandom([0, 0.3, 0.99]));
    await model.learn('HAM', textDocument('one'));
    for (let i = 0; i < 3; i++) {
      await model.learn('SPAM', textDocument('two'));
    }

    // 4 messages: draw 1 is HAM, draws 2..4 are SPAM
    expect(await model.score(textDocument('x'))).toEqual([{ category: 'HAM', probability: 1 }]);
    expect(await model.score(textDocument('x'))).toEqual([{ category: 'SPAM', probability: 1 }]);
    expect(await model.score(textDocument('x'))).toEqual([{ category: 'SPAM', probability: 1 }]);
  });

  it('should accept every message and parse nothing', async () => {
    model = await TrivialModel.create(testOptions());

    expect(model.isValid(attachmentOnlyDocument())).toBe(true);
    expect(model.parse(textDocument('hello world')).size).toBe(0);
  });

  it('should unlearn and forget', async () => {
    model = await TrivialModel.create(testOptions(), new FixedRandom([]));
    await model.learn('SPAM', textDocument('a'));
    await model.learn('HAM', textDocument('b'));

    await model.unlearn('HAM', textDocument('b'));
    expect(await model.score(textDocument('x'))).toEqual([{ category: 'SPAM', probability: 1 }]);

    await model.forget();
    expect(await model.score(textDocument('x'))).toEqual([{ category: 'UNK', probability: 1 }]);
  });

  it('should ignore biases', async () => {
    model = await TrivialModel.create(testOptions());

    expect(await model.bias('SPAM', 5)).toBe(1);
    expect((await model.explain(textDocument('x'))).interestingWords).toEqual([]);
  });
});
