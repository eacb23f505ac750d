import { ClassifierOptions, ModelKind, RandomSource } from '../../types/models';
import { BayesianModel } from './BayesianModel';
import { ClassificationModel } from './ClassificationModel';
import { TrivialModel } from './TrivialModel';

export function createModel(
  kind: ModelKind,
  options: ClassifierOptions,
  random?: RandomSource
): Promise<ClassificationModel> {
  switch (kind) {
    case 'bayesian':
      return BayesianModel.create(options);
    case 'trivial':
      return TrivialModel.create(options, random);
  }
}
