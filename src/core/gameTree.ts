import {
  GameTreeNode,
  DecisionNode,
  ChanceNode,
  TerminalNode,
  SolverConfig,
} from '../models/types';
import { MalformedGameError, IntractableGameError } from '../models/errors';

/**
 * Immutable, validated extensive-form game. Build with `buildGameTree`.
 */
export class GameTree {
  readonly root: GameTreeNode;
  readonly player_labels: readonly string[];
  readonly node_count: number;

  constructor(root: GameTreeNode, playerLabels: readonly string[], nodeCount: number) {
    this.root = root;
    this.player_labels = Object.freeze([...playerLabels]);
    this.node_count = nodeCount;
  }

  get num_players(): number {
    return this.player_labels.length;
  }
}

export function terminal(payoffs: readonly number[]): TerminalNode {
  return { kind: 'terminal', payoffs };
}

export function decision(
  player: number,
  label: string,
  children: readonly { action: string; node: GameTreeNode }[],
): DecisionNode {
  return { kind: 'decision', player, label, children };
}

export function chance(
  label: string,
  outcomes: readonly { label: string; probability: number; node: GameTreeNode }[],
): ChanceNode {
  return { kind: 'chance', label, outcomes };
}

class TreeValidator {
  private count = 0;
  private readonly labels = new Set<string>();

  constructor(
    private readonly numPlayers: number,
    private readonly config: SolverConfig,
  ) {}

  copy(node: GameTreeNode): GameTreeNode {
    this.count++;
    if (this.count > this.config.max_tree_nodes) {
      throw new IntractableGameError('Game tree exceeds the node ceiling', {
        max_tree_nodes: this.config.max_tree_nodes,
      });
    }

    switch (node.kind) {
      case 'terminal':
        return this.copyTerminal(node);
      case 'decision':
        return this.copyDecision(node);
      case 'chance':
        return this.copyChance(node);
    }
  }

  get nodeCount(): number {
    return this.count;
  }

  private claimLabel(label: string): void {
    if (this.labels.has(label)) {
      throw new MalformedGameError('Node labels must be unique', { label });
    }
    this.labels.add(label);
  }

  private copyTerminal(node: TerminalNode): TerminalNode {
    if (node.payoffs.length !== this.numPlayers) {
      throw new MalformedGameError('Terminal payoff vector length does not match player count', {
        expected: this.numPlayers,
        received: node.payoffs.length,
      });
    }
    if (!node.payoffs.every((v) => Number.isFinite(v))) {
      throw new MalformedGameError('Terminal payoff contains a non-finite value', {
        payoffs: node.payoffs.map(String),
      });
    }
    return Object.freeze({ kind: 'terminal', payoffs: Object.freeze([...node.payoffs]) });
  }

  private copyDecision(node: DecisionNode): DecisionNode {
    this.claimLabel(node.label);
    if (!Number.isInteger(node.player) || node.player < 0 || node.player >= this.numPlayers) {
      throw new MalformedGameError('Decision node owner out of range', {
        label: node.label,
        player: node.player,
      });
    }
    if (node.children.length === 0) {
      throw new MalformedGameError('Decision node has no actions', { label: node.label });
    }
    const children = node.children.map((c) => Object.freeze({ action: c.action, node: this.copy(c.node) }));
    return Object.freeze({
      kind: 'decision',
      player: node.player,
      label: node.label,
      children: Object.freeze(children),
    });
  }

  private copyChance(node: ChanceNode): ChanceNode {
    this.claimLabel(node.label);
    if (node.outcomes.length === 0) {
      throw new MalformedGameError('Chance node has no outcomes', { label: node.label });
    }
    if (node.outcomes.some((o) => !Number.isFinite(o.probability) || o.probability < 0)) {
      throw new MalformedGameError('Chance probabilities must be non-negative', { label: node.label });
    }
    const total = node.outcomes.reduce((s, o) => s + o.probability, 0);
    if (Math.abs(total - 1) > this.config.tolerance) {
      throw new MalformedGameError('Chance probabilities must sum to 1', {
        label: node.label,
        sum: total,
      });
    }
    const outcomes = node.outcomes.map((o) =>
      Object.freeze({ label: o.label, probability: o.probability, node: this.copy(o.node) }),
    );
    return Object.freeze({
      kind: 'chance',
      label: node.label,
      outcomes: Object.freeze(outcomes),
    });
  }
}

/**
 * Validate a tree and return a frozen copy of it.
 * Decision and chance labels must be unique; they key the solved plan.
 */
export function buildGameTree(
  root: GameTreeNode,
  playerLabels: readonly string[],
  config: SolverConfig,
): GameTree {
  if (playerLabels.length === 0) {
    throw new MalformedGameError('A game needs at least one player');
  }
  const validator = new TreeValidator(playerLabels.length, config);
  const copy = validator.copy(root);
  return new GameTree(copy, playerLabels, validator.nodeCount);
}
