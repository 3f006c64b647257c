import { Equilibrium, SimulationResult, SummaryValue } from '../models/types';

function fmt(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

function formatValue(value: SummaryValue): string {
  if (Array.isArray(value)) return `[${value.map(fmt).join(', ')}]`;
  if (typeof value === 'number') return fmt(value);
  return String(value);
}

function describeEquilibrium(eq: Equilibrium, labels?: string[][]): string {
  if (eq.profile) {
    const names = eq.profile.map((s, p) => labels?.[p]?.[s] ?? String(s));
    return `(${names.join(', ')})`;
  }
  if (eq.strategies.length === 0) return 'subgame-perfect';
  return eq.strategies.map((mix) => `[${mix.map(fmt).join(', ')}]`).join(' × ');
}

/**
 * Plain-text report of a result, for the command-line runner.
 */
export function formatResultReport(result: SimulationResult): string {
  const lines: string[] = [];
  const hr = '═'.repeat(72);

  lines.push('');
  lines.push(hr);
  lines.push(`  ${result.game_id.toUpperCase()} — ${result.game_class}`);
  lines.push(hr);
  lines.push('');

  if (result.equilibria.length > 0) {
    lines.push('  EQUILIBRIA');
    lines.push('  ' + '─'.repeat(60));
    for (const eq of result.equilibria) {
      lines.push(
        `  ${eq.type.padEnd(12)} ${describeEquilibrium(eq, result.metadata.strategy_labels)}` +
        `  payoffs [${eq.payoffs.map(fmt).join(', ')}]` +
        (eq.values ? `  values [${eq.values.map(fmt).join(', ')}]` : ''),
      );
    }
    lines.push('');
  }

  if (result.induction) {
    lines.push('  SUBGAME-PERFECT PATH');
    lines.push('  ' + '─'.repeat(60));
    for (const step of result.induction.path) {
      const who = step.player === 'chance' ? 'chance' : `player ${step.player + 1}`;
      lines.push(`  ${step.node_label.padEnd(24)} ${who.padEnd(10)} ${step.action}`);
    }
    lines.push(`  payoffs [${result.induction.payoffs.map(fmt).join(', ')}]`);
    lines.push('');
  }

  const cooperative = result.cooperative;
  if (cooperative) {
    lines.push('  SHAPLEY VALUE');
    lines.push('  ' + '─'.repeat(60));
    cooperative.players.forEach((player, i) => {
      lines.push(`  ${player.padEnd(22)} ${fmt(cooperative.shapley_value[i]).padStart(12)}`);
    });
    lines.push('');
  }

  if (result.convergence) {
    const c = result.convergence;
    lines.push(`  Convergence: ${c.status} after ${c.iterations} iterations (residual ${c.residual.toExponential(2)})`);
    lines.push('');
  }

  lines.push('  SUMMARY');
  lines.push('  ' + '─'.repeat(60));
  for (const [key, value] of Object.entries(result.summary)) {
    lines.push(`  ${key.padEnd(36)} ${formatValue(value)}`);
  }
  lines.push('');
  lines.push(`  Computed in ${result.metadata.compute_time_ms} ms`);
  lines.push(hr);

  return lines.join('\n');
}
