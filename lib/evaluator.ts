import { buildCost, buildScore, checkCompatibility, resolveBuild } from './compatibility';
import { InventoryIndex } from './inventory';
import { Kit, KitEvaluation, Selection } from './types';

export const NO_BUILD = 'NONE';

export const EMPTY_SELECTION: Selection = { maxScore: 0n, bestBuild: NO_BUILD };

/**
 * Resolve, type-match, cost and compatibility checks, in that order; the first failure
 * decides the rejection reason.
 */
export function evaluateKit(kit: Kit, inventory: InventoryIndex, budget: bigint): KitEvaluation {
  const resolution = resolveBuild(kit, inventory);
  if (!resolution.ok) {
    return { status: 'rejected', kitId: kit.id, reason: resolution.reason };
  }

  const { build } = resolution;
  const cost = buildCost(build);
  if (cost > budget) {
    return { status: 'rejected', kitId: kit.id, reason: { code: 'over-budget', cost, budget } };
  }

  const compatibility = checkCompatibility(build);
  if (!compatibility.compatible) {
    return { status: 'rejected', kitId: kit.id, reason: compatibility.reason };
  }

  return { status: 'valid', kitId: kit.id, cost, score: buildScore(build) };
}

// Only a strictly higher score replaces the current best, so ties keep the earlier kit
// and a score of 0 never beats the empty selection.
export const selectBestBuild = (evaluations: KitEvaluation[]): Selection =>
  evaluations.reduce<Selection>(
    (best, evaluation) =>
      evaluation.status === 'valid' && evaluation.score > best.maxScore
        ? { maxScore: evaluation.score, bestBuild: evaluation.kitId }
        : best,
    EMPTY_SELECTION
  );
