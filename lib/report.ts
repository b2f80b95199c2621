import { RejectionReason, Selection } from './types';

export const formatReport = (selection: Selection) =>
  `Maximum Score: ${selection.maxScore}\nBest Build: ${selection.bestBuild}`;

export function describeRejection(reason: RejectionReason): string {
  switch (reason.code) {
    case 'missing-component':
      return `unknown component id(s): ${reason.ids.join(', ')}`;
    case 'category-mismatch':
      return `wrong component category in slot(s): ${reason.slots.join(', ')}`;
    case 'over-budget':
      return `cost ${reason.cost} exceeds budget ${reason.budget}`;
    case 'socket-mismatch':
      return `CPU socket ${reason.cpuSocket} does not fit motherboard socket ${reason.motherboardSocket}`;
    case 'memory-mismatch':
      return `RAM type ${reason.ramType} not supported by motherboard (${reason.motherboardType})`;
    case 'invalid-power-spec':
      return `${reason.field} is not an integer: ${reason.value}`;
    case 'insufficient-power':
      return `PSU provides ${reason.available}W, needs ${reason.required}W`;
  }
}
