import { z } from 'zod';
import {
  GameFamily,
  GameInfo,
  GameSpec,
  SimulationParams,
  SolverConfig,
} from '../../models/types';
import { MalformedGameError } from '../../models/errors';

/**
 * A catalog entry: static info plus a pure function from validated
 * parameters to a game specification.
 */
export interface GameGenerator {
  readonly id: GameFamily;
  readonly info: GameInfo;
  build(params: SimulationParams | undefined, config: SolverConfig): GameSpec;
}

export interface GeneratorDefinition<S extends z.ZodTypeAny> {
  info: GameInfo;
  schema: S;
  generate: (params: z.output<S>, config: SolverConfig) => GameSpec;
}

export function parseParams<S extends z.ZodTypeAny>(
  id: GameFamily,
  schema: S,
  raw: SimulationParams | undefined,
): z.output<S> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new MalformedGameError('Invalid parameters', {
      game_id: id,
      issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    });
  }
  return parsed.data;
}

export function defineGenerator<S extends z.ZodTypeAny>(
  definition: GeneratorDefinition<S>,
): GameGenerator {
  const { info, schema, generate } = definition;
  return {
    id: info.id,
    info,
    build: (params, config) => generate(parseParams(info.id, schema, params), config),
  };
}

// ─── Parameter helpers ──────────────────────────────────────────────────────────

/** Numeric parameter; strings from the CLI are coerced. */
export function numberParam(min: number, max: number, fallback: number) {
  return z.coerce.number().finite().min(min).max(max).default(fallback);
}

export function intParam(min: number, max: number, fallback: number) {
  return z.coerce.number().int().min(min).max(max).default(fallback);
}

export function seedParam() {
  return z.coerce.number().int().min(0).max(0xffffffff).default(42);
}

/** Ascending grid min, min + step, ... up to max (inclusive within rounding). */
export function grid(min: number, max: number, step: number): number[] {
  const values: number[] = [];
  const count = Math.floor((max - min) / step + 1e-9);
  for (let i = 0; i <= count; i++) {
    values.push(Number((min + i * step).toFixed(10)));
  }
  return values;
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
}
