import { EMPTY_SELECTION, evaluateKit, selectBestBuild } from './evaluator';
import { InventoryIndex } from './inventory';
import { Logger, silentLogger } from './logger';
import { parseInput } from './parsing';
import { describeRejection, formatReport } from './report';
import { ValidationSummary } from './types';

export interface ValidateOptions {
  logger?: Logger;
}

/**
 * Parses the whole input and evaluates every kit in input order. Never throws: a bad
 * budget or component count gives the empty selection, anything else only drops the
 * offending row or kit.
 */
export function validateBuilds(text: string, options: ValidateOptions = {}): ValidationSummary {
  const logger = options.logger ?? silentLogger;
  const parsed = parseInput(text);
  if (!parsed.ok) {
    logger.debug('Input rejected, reporting no build', { error: parsed.error });
    return {
      aborted: true,
      selection: EMPTY_SELECTION,
      evaluations: [],
      discardedComponents: [],
      discardedKits: []
    };
  }

  const { budget, components, kits } = parsed.value;
  components.discarded.forEach(row => logger.debug('Skipped component row', { ...row }));
  kits.discarded.forEach(row => logger.debug('Skipped kit row', { ...row }));

  const inventory = InventoryIndex.from(components.accepted);
  logger.info('Inventory loaded', {
    components: inventory.size,
    kits: kits.accepted.length,
    budget: budget.toString()
  });

  const evaluations = kits.accepted.map(kit => evaluateKit(kit, inventory, budget));
  evaluations.forEach(evaluation => {
    if (evaluation.status === 'rejected') {
      logger.debug('Kit rejected', { kitId: evaluation.kitId, reason: describeRejection(evaluation.reason) });
    } else {
      logger.debug('Kit valid', {
        kitId: evaluation.kitId,
        score: evaluation.score.toString(),
        cost: evaluation.cost.toString()
      });
    }
  });

  return {
    aborted: false,
    selection: selectBestBuild(evaluations),
    evaluations,
    discardedComponents: components.discarded,
    discardedKits: kits.discarded
  };
}

export const runValidation = (text: string, options: ValidateOptions = {}) =>
  formatReport(validateBuilds(text, options).selection);
