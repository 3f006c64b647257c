import { z } from 'zod';
import { SolverConfig } from '../models/types';
import { MalformedGameError } from '../models/errors';

const SolverConfigSchema = z.object({
  tolerance: z.number().positive().max(1e-2),
  max_strategies_per_player: z.number().int().positive(),
  max_profiles: z.number().int().positive(),
  max_support_pairs: z.number().int().positive(),
  max_tree_nodes: z.number().int().positive(),
  max_coalition_players: z.number().int().min(1).max(24),
  fictitious_play: z.object({
    max_rounds: z.number().int().positive(),
    window: z.number().int().positive(),
    tolerance: z.number().positive(),
  }),
  dynamics: z.object({
    max_steps: z.number().int().positive(),
    convergence_tolerance: z.number().nonnegative(),
  }),
  efficiency_tolerance: z.number().positive(),
  strict_convergence: z.boolean(),
});

export type SolverConfigOverrides = Partial<
  Omit<SolverConfig, 'fictitious_play' | 'dynamics'>
> & {
  fictitious_play?: Partial<SolverConfig['fictitious_play']>;
  dynamics?: Partial<SolverConfig['dynamics']>;
};

function freezeConfig(config: SolverConfig): SolverConfig {
  Object.freeze(config.fictitious_play);
  Object.freeze(config.dynamics);
  return Object.freeze(config);
}

function mergeConfig(base: SolverConfig, overrides?: SolverConfigOverrides): SolverConfig {
  const merged = {
    ...base,
    ...overrides,
    fictitious_play: { ...base.fictitious_play, ...overrides?.fictitious_play },
    dynamics: { ...base.dynamics, ...overrides?.dynamics },
  };

  const parsed = SolverConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new MalformedGameError('Invalid solver configuration', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  if (parsed.data.fictitious_play.window > parsed.data.fictitious_play.max_rounds) {
    throw new MalformedGameError('fictitious_play.window cannot exceed max_rounds', {
      window: parsed.data.fictitious_play.window,
      max_rounds: parsed.data.fictitious_play.max_rounds,
    });
  }

  return freezeConfig(parsed.data);
}

/**
 * Create the default solver configuration:
 *
 * ε = 1e-6 for equilibrium checks and probability sums.
 * At most 100 strategies per player and 100,000 profiles for enumeration.
 * Fictitious play: up to 100,000 rounds, converged when the empirical mix
 * moves less than 1e-3 over the trailing 50 rounds.
 * Shapley efficiency checked to 1e-9.
 */
export function createDefaultSolverConfig(overrides?: SolverConfigOverrides): SolverConfig {
  const base: SolverConfig = {
    tolerance: 1e-6,
    max_strategies_per_player: 100,
    max_profiles: 100_000,
    max_support_pairs: 250_000,
    max_tree_nodes: 200_000,
    max_coalition_players: 12,
    fictitious_play: {
      max_rounds: 100_000,
      window: 50,
      tolerance: 1e-3,
    },
    dynamics: {
      max_steps: 10_000,
      convergence_tolerance: 1e-9,
    },
    efficiency_tolerance: 1e-9,
    strict_convergence: false,
  };

  return mergeConfig(base, overrides);
}

/**
 * Create a config with small ceilings for tests (fast failure on big games).
 */
export function createTestSolverConfig(overrides?: SolverConfigOverrides): SolverConfig {
  const base = createDefaultSolverConfig({
    max_profiles: 10_000,
    max_support_pairs: 20_000,
    max_tree_nodes: 20_000,
    fictitious_play: {
      max_rounds: 2_000,
      window: 50,
      tolerance: 1e-3,
    },
    dynamics: {
      max_steps: 1_000,
      convergence_tolerance: 1e-9,
    },
  });

  return mergeConfig(base, overrides);
}
