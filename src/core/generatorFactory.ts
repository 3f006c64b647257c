import { GameFamily, GameInfo } from '../models/types';
import { MalformedGameError } from '../models/errors';
import { GameGenerator } from './generators/generator';
import {
  battleOfSexes,
  coordinationGeneral,
  matchingPennies,
  prisonersDilemma,
  rockPaperScissors,
  stagHunt,
} from './generators/matrixGames';
import {
  auctionMechanisms,
  cournotBertrand,
  marketEntry,
  publicGoods,
  warOfAttrition,
} from './generators/markets';
import { centipede, stackelberg, supplyChain, ultimatum } from './generators/sequential';
import { colonelBlotto } from './generators/colonelBlotto';
import { bayesianSignaling } from './generators/bayesianSignaling';
import { essModule } from './generators/evolutionary';
import { networkContagion } from './generators/networkContagion';
import { reputationTrust } from './generators/reputationTrust';
import { coalitionFormation, multiAgentNegotiation } from './generators/coalitions';

/**
 * Catalog of game generators.
 *
 * To register a new family:
 * 1. Add its key to the GameFamily union in types.ts
 * 2. Write a generator with defineGenerator
 * 3. Add it to the generatorMap below
 */
const generatorMap: Record<GameFamily, GameGenerator> = {
  // Tier 1 — classical
  prisoners_dilemma: prisonersDilemma,
  public_goods: publicGoods,
  stag_hunt: stagHunt,
  battle_of_sexes: battleOfSexes,
  matching_pennies: matchingPennies,
  rock_paper_scissors: rockPaperScissors,
  ultimatum,
  centipede,
  ess_module: essModule,
  // Tier 2 — underrated
  colonel_blotto: colonelBlotto,
  auction_mechanisms: auctionMechanisms,
  war_of_attrition: warOfAttrition,
  bayesian_signaling: bayesianSignaling,
  supply_chain: supplyChain,
  stackelberg,
  cournot_bertrand: cournotBertrand,
  reputation_trust: reputationTrust,
  market_entry: marketEntry,
  coordination_general: coordinationGeneral,
  // Tier 3 — innovation
  network_contagion: networkContagion,
  coalition_formation: coalitionFormation,
  multi_agent_negotiation: multiAgentNegotiation,
};

export function isGameFamily(id: string): id is GameFamily {
  return Object.prototype.hasOwnProperty.call(generatorMap, id);
}

/**
 * Get the generator for a catalog key.
 */
export function getGenerator(id: string): GameGenerator {
  if (!isGameFamily(id)) {
    throw new MalformedGameError(`Unknown game: ${id}`, { game_id: id });
  }
  return generatorMap[id];
}

export function getGameInfo(id: string): GameInfo {
  return getGenerator(id).info;
}

/**
 * List every catalog entry, in catalog order.
 */
export function listGames(): GameInfo[] {
  return Object.values(generatorMap).map((g) => g.info);
}
