// ─── Types ──────────────────────────────────────────────────────────────────────
export type {
  GameFamily,
  GameCategory,
  GameClass,
  GameInfo,
  SimulationParams,
  SimulationRequest,
  SolverConfig,
  FictitiousPlayConfig,
  DynamicsConfig,
  Player,
  StrategyProfile,
  PayoffVector,
  MixedStrategy,
  MixedProfile,
  PayoffMatrix,
  Equilibrium,
  EquilibriumType,
  ConvergenceDiagnostics,
  ConvergenceStatus,
  GameTreeNode,
  DecisionNode,
  ChanceNode,
  TerminalNode,
  InductionStep,
  BackwardInductionResult,
  PopulationSnapshot,
  NetworkSnapshot,
  ReputationSnapshot,
  TrajectorySnapshot,
  AgentBehaviour,
  DilemmaPayoffs,
  BlockingCoalition,
  CoreCheck,
  CooperativeSolution,
  GameSpec,
  Summary,
  SimulationResult,
} from './models/types';

// ─── Errors ─────────────────────────────────────────────────────────────────────
export {
  GameEngineError,
  MalformedGameError,
  IntractableGameError,
  NoConvergenceError,
  InternalInconsistencyError,
  isGameEngineError,
} from './models/errors';
export type { GameEngineErrorCode } from './models/errors';

// ─── Engine ─────────────────────────────────────────────────────────────────────
export { simulate, SimulationEngine } from './core/engine';
export { formatResultReport } from './core/report';

// ─── Configs ────────────────────────────────────────────────────────────────────
export { createDefaultSolverConfig, createTestSolverConfig } from './core/configs';
export type { SolverConfigOverrides } from './core/configs';

// ─── Catalog ────────────────────────────────────────────────────────────────────
export { getGenerator, getGameInfo, listGames, isGameFamily } from './core/generatorFactory';
export { defineGenerator } from './core/generators/generator';
export type { GameGenerator } from './core/generators/generator';

// ─── Strategic form ─────────────────────────────────────────────────────────────
export {
  PayoffModel,
  buildPayoffModel,
  buildPayoffModelFromTable,
  buildBimatrixModel,
  validateMixedStrategy,
} from './core/payoffModel';
export { findPureEquilibria, assertTractable } from './core/solvers/pureEquilibria';
export { solveZeroSum } from './core/solvers/zeroSum';
export { findMixedEquilibria } from './core/solvers/supportEnumeration';
export { runFictitiousPlay } from './core/solvers/fictitiousPlay';
export { solveNormalForm } from './core/solvers/normalForm';
export { maxRegret, pureRegret } from './core/solvers/regret';

// ─── Extensive form ─────────────────────────────────────────────────────────────
export { GameTree, buildGameTree, decision, chance, terminal } from './core/gameTree';
export { solveBackwardInduction } from './core/solvers/backwardInduction';

// ─── Dynamics ───────────────────────────────────────────────────────────────────
export { runBoundedLoop } from './core/dynamics/loop';
export { replicatorStep, runReplicatorDynamics } from './core/dynamics/replicator';
export { isEvolutionarilyStable, findEvolutionarilyStableStrategies } from './core/dynamics/ess';
export { buildGraph, edgeList, graphFromAdjacency } from './core/dynamics/graphs';
export type { Graph, Topology } from './core/dynamics/graphs';
export { runNetworkContagion, contagionThreshold } from './core/dynamics/contagion';
export { runReputationDynamics } from './core/dynamics/reputation';

// ─── Cooperative ────────────────────────────────────────────────────────────────
export { CoalitionGame, buildCoalitionGame, buildCoalitionGameFromTable } from './core/cooperative/coalitionGame';
export { computeShapleyValue } from './core/cooperative/shapley';
export { checkCore, isSuperadditive } from './core/cooperative/core';
export { solveCooperativeGame } from './core/cooperative/solve';

// ─── Utils ──────────────────────────────────────────────────────────────────────
export { SeededRandom } from './utils/random';
