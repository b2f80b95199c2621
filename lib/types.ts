export type ComponentCategory = 'CPU' | 'Motherboard' | 'GPU' | 'RAM' | 'PSU';

export const COMPONENT_CATEGORIES: readonly ComponentCategory[] = ['CPU', 'Motherboard', 'GPU', 'RAM', 'PSU'];

/**
 * A part from the inventory. `spec1`/`spec2` mean different things per category:
 *
 * | category    | spec1           | spec2            |
 * |-------------|-----------------|------------------|
 * | CPU         | socket          | TDP (int string) |
 * | Motherboard | socket          | memory type      |
 * | GPU         | unused          | TDP (int string) |
 * | RAM         | memory type     | unused           |
 * | PSU         | wattage (int)   | unused           |
 *
 * Scores, costs and the numeric specs are arbitrary-size integers, hence `bigint`.
 * `category` is kept as read; it is only checked against a slot when a kit is resolved.
 */
export interface Component {
  id: string;
  category: string;
  performance: bigint;
  cost: bigint;
  spec1: string;
  spec2: string;
}

export type Slots<T> = Record<ComponentCategory, T>;

export interface Kit {
  id: string;
  slots: Slots<string>;
}

export interface Build {
  kitId: string;
  parts: Slots<Component>;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type RowOutcome<T> =
  | { kind: 'accepted'; record: T }
  | { kind: 'discarded'; line: string; reason: string };

export interface DiscardedRow {
  line: string;
  reason: string;
}

export interface FilteredRows<T> {
  accepted: T[];
  discarded: DiscardedRow[];
}

export interface ParsedInput {
  budget: bigint;
  components: FilteredRows<Component>;
  kits: FilteredRows<Kit>;
}

export type RejectionReason =
  | { code: 'missing-component'; ids: string[] }
  | { code: 'category-mismatch'; slots: ComponentCategory[] }
  | { code: 'over-budget'; cost: bigint; budget: bigint }
  | { code: 'socket-mismatch'; cpuSocket: string; motherboardSocket: string }
  | { code: 'memory-mismatch'; ramType: string; motherboardType: string }
  | { code: 'invalid-power-spec'; field: 'cpuTdp' | 'gpuTdp' | 'psuWattage'; value: string }
  | { code: 'insufficient-power'; required: bigint; available: bigint };

export type BuildResolution = { ok: true; build: Build } | { ok: false; reason: RejectionReason };

export type CompatibilityOutcome = { compatible: true } | { compatible: false; reason: RejectionReason };

export type KitEvaluation =
  | { status: 'valid'; kitId: string; cost: bigint; score: bigint }
  | { status: 'rejected'; kitId: string; reason: RejectionReason };

export interface Selection {
  maxScore: bigint;
  bestBuild: string;
}

export interface ValidationSummary {
  aborted: boolean;
  selection: Selection;
  evaluations: KitEvaluation[];
  discardedComponents: DiscardedRow[];
  discardedKits: DiscardedRow[];
}
