import {
  BackwardInductionResult,
  DecisionNode,
  GameTreeNode,
  InductionStep,
} from '../../models/types';
import { GameTree } from '../gameTree';

/**
 * Subgame-perfect solution by backward induction.
 *
 * Each decision node takes the child maximizing its owner's payoff. Ties go
 * to the first child in the tree's action order: a reproducibility
 * convention, not a model of how real players break indifference. Chance
 * nodes take the probability-weighted payoff of their outcomes.
 */
export function solveBackwardInduction(tree: GameTree, tolerance = 1e-9): BackwardInductionResult {
  const choices = new Map<DecisionNode, number>();
  const plan: Record<string, string> = {};

  const value = (node: GameTreeNode): number[] => {
    switch (node.kind) {
      case 'terminal':
        return [...node.payoffs];

      case 'chance': {
        const total = new Array<number>(tree.num_players).fill(0);
        for (const outcome of node.outcomes) {
          value(outcome.node).forEach((v, p) => (total[p] += outcome.probability * v));
        }
        return total;
      }

      case 'decision': {
        let bestIndex = 0;
        let best = value(node.children[0].node);
        for (let i = 1; i < node.children.length; i++) {
          const candidate = value(node.children[i].node);
          if (candidate[node.player] > best[node.player] + tolerance) {
            best = candidate;
            bestIndex = i;
          }
        }
        choices.set(node, bestIndex);
        plan[node.label] = node.children[bestIndex].action;
        return best;
      }
    }
  };

  const payoffs = value(tree.root);

  // Walk the equilibrium path; at chance nodes follow the likeliest outcome.
  const path: InductionStep[] = [];
  let node = tree.root;
  while (node.kind !== 'terminal') {
    if (node.kind === 'decision') {
      const child = node.children[choices.get(node) ?? 0];
      path.push({ player: node.player, node_label: node.label, action: child.action });
      node = child.node;
    } else {
      let likeliest = node.outcomes[0];
      for (const o of node.outcomes) {
        if (o.probability > likeliest.probability) likeliest = o;
      }
      path.push({ player: 'chance', node_label: node.label, action: likeliest.label });
      node = likeliest.node;
    }
  }

  return { payoffs, path, plan };
}
