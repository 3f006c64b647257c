import {
  AgentBehaviour,
  DilemmaPayoffs,
  ReputationSnapshot,
  ReputationSpec,
  SolverConfig,
} from '../../models/types';
import { MalformedGameError, IntractableGameError } from '../../models/errors';
import { SeededRandom } from '../../utils/random';
import { runBoundedLoop } from './loop';

type Move = 'C' | 'D';

interface RoundState {
  snapshot: ReputationSnapshot;

  /** last_moves[i][j]: what j played against i in the previous round. */
  last_moves: (Move | null)[][];

  /** betrayed[i][j]: j has defected against i at some point. */
  betrayed: boolean[][];
}

export function stagePayoffs(stage: DilemmaPayoffs, a: Move, b: Move): [number, number] {
  if (a === 'C' && b === 'C') return [stage.reward, stage.reward];
  if (a === 'C' && b === 'D') return [stage.sucker, stage.temptation];
  if (a === 'D' && b === 'C') return [stage.temptation, stage.sucker];
  return [stage.punishment, stage.punishment];
}

function chooseMove(
  behaviour: AgentBehaviour,
  self: number,
  partner: number,
  state: RoundState,
  spec: ReputationSpec,
  rng: SeededRandom,
): Move {
  switch (behaviour) {
    case 'always_cooperate':
      return 'C';
    case 'always_defect':
      return 'D';
    case 'tit_for_tat':
      return state.last_moves[self][partner] ?? 'C';
    case 'grim_trigger':
      return state.betrayed[self][partner] ? 'D' : 'C';
    case 'reputation_based':
      return state.snapshot.reputations[partner] >= spec.trust_threshold ? 'C' : 'D';
    case 'random':
      return rng.chance(0.5) ? 'C' : 'D';
  }
}

export function validateReputationSpec(spec: ReputationSpec, config: SolverConfig): void {
  if (spec.behaviours.length < 2) {
    throw new MalformedGameError('Repeated play needs at least two agents', {
      agents: spec.behaviours.length,
    });
  }
  const { temptation: t, reward: r, punishment: p, sucker: s } = spec.stage;
  if (!(t > r && r > p && p > s)) {
    throw new MalformedGameError('Stage game must satisfy T > R > P > S', { t, r, p, s });
  }
  if (!(spec.learning_rate > 0 && spec.learning_rate <= 1)) {
    throw new MalformedGameError('Learning rate must lie in (0, 1]', {
      learning_rate: spec.learning_rate,
    });
  }
  if (!(spec.initial_reputation >= 0 && spec.initial_reputation <= 1)) {
    throw new MalformedGameError('Initial reputation must lie in [0, 1]', {
      initial_reputation: spec.initial_reputation,
    });
  }
  if (spec.rounds > config.dynamics.max_steps) {
    throw new IntractableGameError('Requested rounds exceed the dynamics ceiling', {
      rounds: spec.rounds,
      max_steps: config.dynamics.max_steps,
    });
  }
}

/**
 * Round-robin repeated prisoner's dilemma with public reputations.
 * All moves of a round are chosen from the state at its start; afterwards each
 * agent's reputation moves toward the share of its moves that cooperated:
 * r' = (1 − α) r + α · share.
 */
export function runReputationDynamics(spec: ReputationSpec, config: SolverConfig): ReputationSnapshot[] {
  validateReputationSpec(spec, config);
  const n = spec.behaviours.length;
  const rng = new SeededRandom(spec.seed);
  const square = <T>(value: T): T[][] =>
    Array.from({ length: n }, () => new Array<T>(n).fill(value));

  const initial: RoundState = {
    snapshot: {
      kind: 'reputation',
      round: 0,
      reputations: new Array<number>(n).fill(spec.initial_reputation),
      cooperation_rate: 0,
      cumulative_payoffs: new Array<number>(n).fill(0),
    },
    last_moves: square<Move | null>(null),
    betrayed: square(false),
  };

  const loop = runBoundedLoop<RoundState>({
    initial,
    step: (state, index) => {
      const lastMoves = state.last_moves.map((row) => [...row]);
      const betrayed = state.betrayed.map((row) => [...row]);
      const cumulative = [...state.snapshot.cumulative_payoffs];
      const cooperated = new Array<number>(n).fill(0);
      let cooperativeMoves = 0;

      for (let i = 0; i < n; i++) {
        for (let j = i + 1; j < n; j++) {
          const a = chooseMove(spec.behaviours[i], i, j, state, spec, rng);
          const b = chooseMove(spec.behaviours[j], j, i, state, spec, rng);
          const [pa, pb] = stagePayoffs(spec.stage, a, b);
          cumulative[i] += pa;
          cumulative[j] += pb;

          lastMoves[i][j] = b;
          lastMoves[j][i] = a;
          if (b === 'D') betrayed[i][j] = true;
          if (a === 'D') betrayed[j][i] = true;

          if (a === 'C') cooperated[i]++;
          if (b === 'C') cooperated[j]++;
          cooperativeMoves += (a === 'C' ? 1 : 0) + (b === 'C' ? 1 : 0);
        }
      }

      const alpha = spec.learning_rate;
      const reputations = state.snapshot.reputations.map(
        (r, i) => (1 - alpha) * r + alpha * (cooperated[i] / (n - 1)),
      );

      return {
        snapshot: {
          kind: 'reputation',
          round: index + 1,
          reputations,
          cooperation_rate: cooperativeMoves / (n * (n - 1)),
          cumulative_payoffs: cumulative,
        },
        last_moves: lastMoves,
        betrayed,
      };
    },
    max_steps: spec.rounds,
  });

  return loop.states.map((s) => s.snapshot);
}
