import type { PayoffModel } from '../core/payoffModel';
import type { GameTree } from '../core/gameTree';
import type { CoalitionGame } from '../core/cooperative/coalitionGame';
import type { Graph } from '../core/dynamics/graphs';

// ─── Catalog ────────────────────────────────────────────────────────────────────

/**
 * Every simulation family in the catalog.
 * New families are added here and registered in the generator factory.
 */
export type GameFamily =
  // Tier 1 — classical
  | 'prisoners_dilemma'
  | 'public_goods'
  | 'stag_hunt'
  | 'battle_of_sexes'
  | 'matching_pennies'
  | 'rock_paper_scissors'
  | 'ultimatum'
  | 'centipede'
  | 'ess_module'
  // Tier 2 — underrated
  | 'colonel_blotto'
  | 'auction_mechanisms'
  | 'war_of_attrition'
  | 'bayesian_signaling'
  | 'supply_chain'
  | 'stackelberg'
  | 'cournot_bertrand'
  | 'reputation_trust'
  | 'market_entry'
  | 'coordination_general'
  // Tier 3 — innovation
  | 'network_contagion'
  | 'coalition_formation'
  | 'multi_agent_negotiation';

export type GameCategory = 'classical' | 'underrated' | 'innovation';

export type GameClass =
  | 'normal_form'
  | 'extensive_form'
  | 'evolutionary'
  | 'network'
  | 'repeated'
  | 'cooperative';

export interface GameInfo {
  id: GameFamily;
  name: string;
  category: GameCategory;
  tier: 1 | 2 | 3;
  description: string;
}

/** Flat parameter mapping decoded by the request layer. */
export type SimulationParams = Record<string, number | string>;

export interface SimulationRequest {
  game_id: string;
  params?: SimulationParams;
}

// ─── Solver Configuration ───────────────────────────────────────────────────────

export interface FictitiousPlayConfig {
  /** Hard ceiling on rounds played. */
  max_rounds: number;

  /** Trailing window K over which the empirical mix must stay put. */
  window: number;

  /** Max-abs movement of the empirical mix allowed across the window. */
  tolerance: number;
}

export interface DynamicsConfig {
  /** Ceiling on any requested step count. */
  max_steps: number;

  /** L1 change below which a population is considered at rest. */
  convergence_tolerance: number;
}

/**
 * Read-only solver settings shared by every request.
 * Created once via `createDefaultSolverConfig` and passed explicitly.
 */
export interface SolverConfig {
  /** ε used for best-response ties, probability sums and equilibrium checks. */
  readonly tolerance: number;

  readonly max_strategies_per_player: number;
  readonly max_profiles: number;
  readonly max_support_pairs: number;
  readonly max_tree_nodes: number;
  readonly max_coalition_players: number;

  readonly fictitious_play: Readonly<FictitiousPlayConfig>;
  readonly dynamics: Readonly<DynamicsConfig>;

  /** Tolerance of the Shapley efficiency self-check. */
  readonly efficiency_tolerance: number;

  /** Raise NoConvergenceError instead of returning an approximate result. */
  readonly strict_convergence: boolean;
}

// ─── Strategic Form ─────────────────────────────────────────────────────────────

export interface Player {
  index: number;
  label: string;
}

/** One strategy index per player. */
export type StrategyProfile = readonly number[];

/** One payoff per player. */
export type PayoffVector = readonly number[];

/** Probability distribution over one player's strategies. */
export type MixedStrategy = readonly number[];

/** One mixed strategy per player. */
export type MixedProfile = readonly MixedStrategy[];

/** Row player's payoffs indexed [row][column]. */
export type PayoffMatrix = readonly (readonly number[])[];

// ─── Equilibria ─────────────────────────────────────────────────────────────────

export type EquilibriumType = 'pure' | 'mixed' | 'approximate';

export interface Equilibrium {
  type: EquilibriumType;

  /**
   * Strategy indices for pure strategic-form equilibria, null otherwise.
   * A subgame-perfect equilibrium is pure with a null profile; its plan is
   * under `induction`.
   */
  profile: number[] | null;

  /** Per-player probability vectors (degenerate for pure equilibria, empty for game trees). */
  strategies: number[][];

  /** Expected payoff per player. */
  payoffs: number[];

  /** Game values for constant-sum games (player 1 value, player 2 value). */
  values?: number[];
}

export type ConvergenceStatus = 'converged' | 'no_convergence';

export interface ConvergenceDiagnostics {
  status: ConvergenceStatus;
  iterations: number;

  /** Movement measured at the last convergence check. */
  residual: number;

  /** Largest unilateral gain available at the reported profile. */
  max_regret?: number;
}

// ─── Extensive Form ─────────────────────────────────────────────────────────────

export interface DecisionNode {
  kind: 'decision';
  player: number;
  label: string;
  children: readonly { action: string; node: GameTreeNode }[];
}

export interface ChanceNode {
  kind: 'chance';
  label: string;
  outcomes: readonly { label: string; probability: number; node: GameTreeNode }[];
}

export interface TerminalNode {
  kind: 'terminal';
  payoffs: PayoffVector;
}

export type GameTreeNode = DecisionNode | ChanceNode | TerminalNode;

export interface InductionStep {
  player: number | 'chance';
  node_label: string;
  action: string;
}

export interface BackwardInductionResult {
  /** Value of the root under subgame-perfect play. */
  payoffs: number[];

  /** Moves from the root to a terminal node. */
  path: InductionStep[];

  /** Chosen action at every decision node, keyed by node label. */
  plan: Record<string, string>;
}

// ─── Dynamics ───────────────────────────────────────────────────────────────────

export interface PopulationSnapshot {
  kind: 'population';
  step: number;
  shares: number[];
  average_payoff: number;
}

export interface NetworkSnapshot {
  kind: 'network';
  step: number;
  strategies: number[];

  /** Share of nodes playing each strategy. */
  adoption: number[];
  switches: number;
}

export interface ReputationSnapshot {
  kind: 'reputation';
  round: number;
  reputations: number[];
  cooperation_rate: number;
  cumulative_payoffs: number[];
}

export type TrajectorySnapshot = PopulationSnapshot | NetworkSnapshot | ReputationSnapshot;

export type AgentBehaviour =
  | 'always_cooperate'
  | 'always_defect'
  | 'tit_for_tat'
  | 'grim_trigger'
  | 'reputation_based'
  | 'random';

/** Stage game for repeated play: payoffs to the row player. */
export interface DilemmaPayoffs {
  temptation: number;
  reward: number;
  punishment: number;
  sucker: number;
}

// ─── Cooperative ────────────────────────────────────────────────────────────────

export interface BlockingCoalition {
  members: number[];
  coalition_value: number;
  allocated: number;
  surplus: number;
}

export interface CoreCheck {
  in_core: boolean;
  efficient: boolean;
  blocking_coalitions: BlockingCoalition[];
}

export interface CooperativeSolution {
  players: string[];
  shapley_value: number[];
  grand_coalition_value: number;
  superadditive: boolean;

  /** Whether the Shapley allocation lies in the core. */
  core: CoreCheck;
}

// ─── Game Specs (generator output) ──────────────────────────────────────────────

export type SummaryValue = number | string | boolean | number[];
export type Summary = Record<string, SummaryValue>;

export interface NormalFormSpec {
  kind: 'normal_form';
  model: PayoffModel;
  analytics?: Summary;
}

export interface ExtensiveFormSpec {
  kind: 'extensive_form';
  tree: GameTree;
  analytics?: Summary;
}

export interface ReplicatorSpec {
  kind: 'replicator';
  labels: string[];
  matrix: PayoffMatrix;
  initial: MixedStrategy;
  steps: number;
  analytics?: Summary;
}

export interface NetworkSpec {
  kind: 'network';
  labels: string[];
  graph: Graph;
  matrix: PayoffMatrix;
  initial_strategies: number[];
  steps: number;
  analytics?: Summary;
}

export interface ReputationSpec {
  kind: 'reputation';
  behaviours: AgentBehaviour[];
  stage: DilemmaPayoffs;
  learning_rate: number;
  trust_threshold: number;
  initial_reputation: number;
  rounds: number;
  seed: number;
  analytics?: Summary;
}

export interface CooperativeSpec {
  kind: 'cooperative';
  game: CoalitionGame;
  analytics?: Summary;
}

export type GameSpec =
  | NormalFormSpec
  | ExtensiveFormSpec
  | ReplicatorSpec
  | NetworkSpec
  | ReputationSpec
  | CooperativeSpec;

// ─── Result Envelope ────────────────────────────────────────────────────────────

export interface SimulationResult {
  game_id: GameFamily;
  game_class: GameClass;
  equilibria: Equilibrium[];

  /** Time-ordered states for dynamics requests. */
  trajectory?: TrajectorySnapshot[];

  /** Subgame-perfect analysis for extensive-form requests. */
  induction?: BackwardInductionResult;

  cooperative?: CooperativeSolution;

  /** Present whenever an iterative heuristic produced the result. */
  convergence?: ConvergenceDiagnostics;

  summary: Summary;

  metadata: {
    compute_time_ms: number;
    player_labels?: string[];
    strategy_labels?: string[][];
  };
}
