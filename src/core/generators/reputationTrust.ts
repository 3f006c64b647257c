import { z } from 'zod';
import { AgentBehaviour } from '../../models/types';
import { MalformedGameError } from '../../models/errors';
import { defineGenerator, intParam, numberParam, seedParam } from './generator';

const BEHAVIOUR_PARAMS: [string, AgentBehaviour][] = [
  ['cooperators', 'always_cooperate'],
  ['defectors', 'always_defect'],
  ['tit_for_tat', 'tit_for_tat'],
  ['grim_trigger', 'grim_trigger'],
  ['reputation_based', 'reputation_based'],
  ['random', 'random'],
];

export const reputationTrust = defineGenerator({
  info: {
    id: 'reputation_trust',
    name: 'Reputation & Trust',
    category: 'underrated',
    tier: 2,
    description: 'Repeated prisoner’s dilemma among mixed behaviours with public reputations.',
  },
  schema: z
    .object({
      cooperators: intParam(0, 20, 2),
      defectors: intParam(0, 20, 1),
      tit_for_tat: intParam(0, 20, 2),
      grim_trigger: intParam(0, 20, 1),
      reputation_based: intParam(0, 20, 2),
      random: intParam(0, 20, 0),
      rounds: intParam(1, 10_000, 50),
      learning_rate: numberParam(0.001, 1, 0.2),
      trust_threshold: numberParam(0, 1, 0.5),
      initial_reputation: numberParam(0, 1, 0.5),
      temptation: numberParam(-1000, 1000, 5),
      reward: numberParam(-1000, 1000, 3),
      punishment: numberParam(-1000, 1000, 1),
      sucker: numberParam(-1000, 1000, 0),
      seed: seedParam(),
    })
    .strict(),
  generate: (params) => {
    const counts: Record<string, number> = {
      cooperators: params.cooperators,
      defectors: params.defectors,
      tit_for_tat: params.tit_for_tat,
      grim_trigger: params.grim_trigger,
      reputation_based: params.reputation_based,
      random: params.random,
    };
    const behaviours: AgentBehaviour[] = [];
    for (const [key, behaviour] of BEHAVIOUR_PARAMS) {
      for (let i = 0; i < counts[key]; i++) behaviours.push(behaviour);
    }
    if (behaviours.length < 2) {
      throw new MalformedGameError('At least two agents are required', { agents: behaviours.length });
    }

    return {
      kind: 'reputation',
      behaviours,
      stage: {
        temptation: params.temptation,
        reward: params.reward,
        punishment: params.punishment,
        sucker: params.sucker,
      },
      learning_rate: params.learning_rate,
      trust_threshold: params.trust_threshold,
      initial_reputation: params.initial_reputation,
      rounds: params.rounds,
      seed: params.seed,
      analytics: { agents: behaviours.length },
    };
  },
});
