export interface BoundedLoopSpec<S> {
  initial: S;

  /** Produces the next state; must not mutate its input. */
  step: (state: S, index: number) => S;

  /** Hard ceiling on the number of steps. */
  max_steps: number;

  /** Checked after every step against the retained history (oldest first). */
  converged?: (history: readonly S[]) => boolean;

  /** Keep only the trailing N states instead of the whole trajectory. */
  history_limit?: number;
}

export interface BoundedLoopResult<S> {
  /** Retained states, initial state first when nothing was dropped. */
  states: S[];
  final: S;
  steps: number;
  converged: boolean;
}

/**
 * Drive a step function until it converges or hits `max_steps`.
 * Iterative heuristics and dynamics are all expressed through this loop so
 * none of them can run unbounded.
 */
export function runBoundedLoop<S>(spec: BoundedLoopSpec<S>): BoundedLoopResult<S> {
  const limit = spec.history_limit ?? Infinity;
  const states: S[] = [spec.initial];
  let current = spec.initial;
  let steps = 0;
  let converged = false;

  while (steps < spec.max_steps) {
    current = spec.step(current, steps);
    steps++;
    states.push(current);
    if (states.length > limit) states.shift();

    if (spec.converged && spec.converged(states)) {
      converged = true;
      break;
    }
  }

  return { states, final: current, steps, converged };
}
