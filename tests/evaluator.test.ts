import { SAFETY_MARGIN_WATTS } from '@/lib/compatibility';
import { evaluateKit, selectBestBuild } from '@/lib/evaluator';
import { InventoryIndex } from '@/lib/inventory';
import { Component, Kit, KitEvaluation } from '@/lib/types';

const part = (
  id: string,
  category: string,
  performance: number,
  cost: number,
  spec1: string,
  spec2: string
): Component => ({ id, category, performance: BigInt(performance), cost: BigInt(cost), spec1, spec2 });

// CPU 100W + GPU 200W + margin 50W = 350W, exactly what the PSU gives.
const BASE_PARTS = [
  part('cpu', 'CPU', 300, 200, 'AM5', '100'),
  part('mobo', 'Motherboard', 100, 150, 'AM5', 'DDR5'),
  part('gpu', 'GPU', 400, 500, '-', '200'),
  part('ram', 'RAM', 80, 100, 'DDR5', '-'),
  part('psu', 'PSU', 20, 50, '350', '-')
];

const inventoryWith = (...overrides: Component[]) => InventoryIndex.from([...BASE_PARTS, ...overrides]);

const kit = (id: string, slots: Partial<Kit['slots']> = {}): Kit => ({
  id,
  slots: { CPU: 'cpu', Motherboard: 'mobo', GPU: 'gpu', RAM: 'ram', PSU: 'psu', ...slots }
});

describe('evaluateKit', () => {
  it('scores a compatible kit that costs exactly the budget', () => {
    expect(evaluateKit(kit('k1'), inventoryWith(), 1000n)).toEqual({
      status: 'valid',
      kitId: 'k1',
      cost: 1000n,
      score: 900n
    });
  });

  it('rejects kits over budget', () => {
    expect(evaluateKit(kit('k1'), inventoryWith(), 999n)).toEqual({
      status: 'rejected',
      kitId: 'k1',
      reason: { code: 'over-budget', cost: 1000n, budget: 999n }
    });
  });

  it('rejects kits referencing unknown components', () => {
    const result = evaluateKit(kit('k1', { GPU: 'ghost' }), inventoryWith(), 10000n);
    expect(result).toEqual({
      status: 'rejected',
      kitId: 'k1',
      reason: { code: 'missing-component', ids: ['ghost'] }
    });
  });

  it('rejects components placed in the wrong slot', () => {
    const result = evaluateKit(kit('k1', { CPU: 'ram', RAM: 'cpu' }), inventoryWith(), 10000n);
    expect(result.status === 'rejected' && result.reason).toEqual({
      code: 'category-mismatch',
      slots: ['CPU', 'RAM']
    });
  });

  it('reports missing components before category mismatches', () => {
    const result = evaluateKit(kit('k1', { CPU: 'ram', GPU: 'ghost' }), inventoryWith(), 10000n);
    expect(result.status === 'rejected' && result.reason.code).toBe('missing-component');
  });

  it('checks the budget before compatibility', () => {
    const inventory = inventoryWith(part('cpu', 'CPU', 300, 200, 'LGA1700', '100'));
    const result = evaluateKit(kit('k1'), inventory, 500n);
    expect(result.status === 'rejected' && result.reason.code).toBe('over-budget');
  });

  it('compares sockets case-sensitively', () => {
    const inventory = inventoryWith(part('cpu', 'CPU', 300, 200, 'am5', '100'));
    expect(evaluateKit(kit('k1'), inventory, 10000n)).toEqual({
      status: 'rejected',
      kitId: 'k1',
      reason: { code: 'socket-mismatch', cpuSocket: 'am5', motherboardSocket: 'AM5' }
    });
  });

  it('rejects RAM the motherboard does not support', () => {
    const inventory = inventoryWith(part('ram', 'RAM', 80, 100, 'DDR4', '-'));
    const result = evaluateKit(kit('k1'), inventory, 10000n);
    expect(result.status === 'rejected' && result.reason).toEqual({
      code: 'memory-mismatch',
      ramType: 'DDR4',
      motherboardType: 'DDR5'
    });
  });

  it('checks the socket before the memory type', () => {
    const inventory = inventoryWith(
      part('cpu', 'CPU', 300, 200, 'AM4', '100'),
      part('ram', 'RAM', 80, 100, 'DDR4', '-')
    );
    const result = evaluateKit(kit('k1'), inventory, 10000n);
    expect(result.status === 'rejected' && result.reason.code).toBe('socket-mismatch');
  });

  it('rejects a non-integer CPU TDP whatever the budget', () => {
    const inventory = inventoryWith(part('cpu', 'CPU', 300, 200, 'AM5', '95W'));
    const result = evaluateKit(kit('k1'), inventory, BigInt(Number.MAX_SAFE_INTEGER) * 10n);
    expect(result.status === 'rejected' && result.reason).toEqual({
      code: 'invalid-power-spec',
      field: 'cpuTdp',
      value: '95W'
    });
  });

  it('rejects a non-integer GPU TDP', () => {
    const inventory = inventoryWith(part('gpu', 'GPU', 400, 500, '-', 'n/a'));
    const result = evaluateKit(kit('k1'), inventory, 10000n);
    expect(result.status === 'rejected' && result.reason).toEqual({
      code: 'invalid-power-spec',
      field: 'gpuTdp',
      value: 'n/a'
    });
  });

  it('compares power above the safe integer range exactly', () => {
    const huge = 2n ** 60n;
    const inventory = inventoryWith(
      part('cpu', 'CPU', 300, 200, 'AM5', String(huge)),
      part('psu', 'PSU', 20, 50, String(huge + 249n), '-')
    );
    expect(evaluateKit(kit('k1'), inventory, 10000n)).toEqual({
      status: 'rejected',
      kitId: 'k1',
      reason: { code: 'insufficient-power', required: huge + 250n, available: huge + 249n }
    });
  });

  it('rejects a PSU without a numeric wattage', () => {
    const inventory = inventoryWith(part('psu', 'PSU', 20, 50, '-', '-'));
    const result = evaluateKit(kit('k1'), inventory, 10000n);
    expect(result.status === 'rejected' && result.reason).toEqual({
      code: 'invalid-power-spec',
      field: 'psuWattage',
      value: '-'
    });
  });

  it('accepts a PSU at the power margin and rejects one watt below', () => {
    const required = 100n + 200n + SAFETY_MARGIN_WATTS;
    const atMargin = inventoryWith(part('psu', 'PSU', 20, 50, String(required), '-'));
    const belowMargin = inventoryWith(part('psu', 'PSU', 20, 50, String(required - 1n), '-'));

    expect(evaluateKit(kit('k1'), atMargin, 10000n).status).toBe('valid');
    expect(evaluateKit(kit('k1'), belowMargin, 10000n)).toEqual({
      status: 'rejected',
      kitId: 'k1',
      reason: { code: 'insufficient-power', required: 350n, available: 349n }
    });
  });

  it('treats GPU and RAM placeholders as opaque', () => {
    const inventory = inventoryWith(part('gpu', 'GPU', 400, 500, 'anything', '200'), part('ram', 'RAM', 80, 100, 'DDR5', '?'));
    expect(evaluateKit(kit('k1'), inventory, 10000n).status).toBe('valid');
  });
});

describe('selectBestBuild', () => {
  const valid = (kitId: string, score: bigint): KitEvaluation => ({ status: 'valid', kitId, cost: 0n, score });

  it('reports no build when nothing is valid', () => {
    expect(selectBestBuild([])).toEqual({ maxScore: 0n, bestBuild: 'NONE' });
    expect(
      selectBestBuild([{ status: 'rejected', kitId: 'k1', reason: { code: 'over-budget', cost: 2n, budget: 1n } }])
    ).toEqual({ maxScore: 0n, bestBuild: 'NONE' });
  });

  it('never selects a zero-score kit', () => {
    expect(selectBestBuild([valid('k1', 0n)])).toEqual({ maxScore: 0n, bestBuild: 'NONE' });
  });

  it('keeps the earlier kit on a tie', () => {
    expect(selectBestBuild([valid('k1', 10n), valid('k2', 30n), valid('k3', 30n), valid('k4', 20n)])).toEqual({
      maxScore: 30n,
      bestBuild: 'k2'
    });
  });
});
