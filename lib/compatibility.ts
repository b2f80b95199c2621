import { InventoryIndex } from './inventory';
import { parseInteger } from './parsing';
import {
  Build,
  BuildResolution,
  COMPONENT_CATEGORIES,
  CompatibilityOutcome,
  Component,
  ComponentCategory,
  Kit,
  Slots
} from './types';

/** Headroom, in watts, the PSU must provide on top of CPU + GPU TDP. */
export const SAFETY_MARGIN_WATTS = 50n;

export function resolveBuild(kit: Kit, inventory: InventoryIndex): BuildResolution {
  const lookup = (category: ComponentCategory) => inventory.lookup(kit.slots[category]);
  const cpu = lookup('CPU');
  const motherboard = lookup('Motherboard');
  const gpu = lookup('GPU');
  const ram = lookup('RAM');
  const psu = lookup('PSU');

  if (!cpu || !motherboard || !gpu || !ram || !psu) {
    const missing = COMPONENT_CATEGORIES.filter(category => !lookup(category)).map(category => kit.slots[category]);
    return { ok: false, reason: { code: 'missing-component', ids: missing } };
  }

  const parts: Slots<Component> = { CPU: cpu, Motherboard: motherboard, GPU: gpu, RAM: ram, PSU: psu };
  const mismatched = COMPONENT_CATEGORIES.filter(category => parts[category].category !== category);
  if (mismatched.length > 0) {
    return { ok: false, reason: { code: 'category-mismatch', slots: mismatched } };
  }

  return { ok: true, build: { kitId: kit.id, parts } };
}

export const buildCost = (build: Build) =>
  COMPONENT_CATEGORIES.reduce((sum, category) => sum + build.parts[category].cost, 0n);

export const buildScore = (build: Build) =>
  COMPONENT_CATEGORIES.reduce((sum, category) => sum + build.parts[category].performance, 0n);

export function checkCompatibility(build: Build): CompatibilityOutcome {
  const { CPU: cpu, Motherboard: motherboard, GPU: gpu, RAM: ram, PSU: psu } = build.parts;

  if (cpu.spec1 !== motherboard.spec1) {
    return {
      compatible: false,
      reason: { code: 'socket-mismatch', cpuSocket: cpu.spec1, motherboardSocket: motherboard.spec1 }
    };
  }

  if (ram.spec1 !== motherboard.spec2) {
    return {
      compatible: false,
      reason: { code: 'memory-mismatch', ramType: ram.spec1, motherboardType: motherboard.spec2 }
    };
  }

  const cpuTdp = parseInteger(cpu.spec2);
  if (!cpuTdp.ok) {
    return { compatible: false, reason: { code: 'invalid-power-spec', field: 'cpuTdp', value: cpu.spec2 } };
  }
  const gpuTdp = parseInteger(gpu.spec2);
  if (!gpuTdp.ok) {
    return { compatible: false, reason: { code: 'invalid-power-spec', field: 'gpuTdp', value: gpu.spec2 } };
  }
  const wattage = parseInteger(psu.spec1);
  if (!wattage.ok) {
    return { compatible: false, reason: { code: 'invalid-power-spec', field: 'psuWattage', value: psu.spec1 } };
  }

  const required = cpuTdp.value + gpuTdp.value + SAFETY_MARGIN_WATTS;
  if (wattage.value < required) {
    return { compatible: false, reason: { code: 'insufficient-power', required, available: wattage.value } };
  }

  return { compatible: true };
}
