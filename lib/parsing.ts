import { z } from 'zod';
import { Component, FilteredRows, Kit, ParsedInput, ParseResult, RowOutcome } from './types';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const COMPONENT_FIELDS = ['id', 'category', 'performance', 'cost', 'spec1', 'spec2'];
const KIT_FIELDS = ['kitId', 'cpuId', 'motherboardId', 'gpuId', 'ramId', 'psuId'];

/** Base-10 integers of any size with an optional sign; no whitespace, decimals or exponents. */
export const parseInteger = (text: string): ParseResult<bigint> =>
  INTEGER_PATTERN.test(text)
    ? { ok: true, value: BigInt(text) }
    : { ok: false, error: `Not an integer: "${text}"` };

const field = z.string();
const integerField = z
  .string()
  .regex(INTEGER_PATTERN, 'Expected an integer')
  .transform(value => BigInt(value));

// Extra trailing tokens are tolerated and ignored.
const componentRowSchema = z
  .tuple([field, field, integerField, integerField, field, field])
  .rest(field)
  .transform(
    ([id, category, performance, cost, spec1, spec2]): Component => ({
      id,
      category,
      performance,
      cost,
      spec1,
      spec2
    })
  );

const kitRowSchema = z
  .tuple([field, field, field, field, field, field])
  .rest(field)
  .transform(
    ([id, cpu, motherboard, gpu, ram, psu]): Kit => ({
      id,
      slots: { CPU: cpu, Motherboard: motherboard, GPU: gpu, RAM: ram, PSU: psu }
    })
  );

export const tokenize = (line: string) => line.trim().split(/\s+/).filter(Boolean);

const describeIssues = (error: z.ZodError, fieldNames: string[]) =>
  error.issues
    .map(issue => {
      const [index] = issue.path;
      const label = typeof index === 'number' ? fieldNames[index] ?? `field ${index + 1}` : 'row';
      return `${label}: ${issue.message}`;
    })
    .join('; ');

const rowParser =
  <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, fieldNames: string[]) =>
  (line: string): RowOutcome<T> => {
    const result = schema.safeParse(tokenize(line));
    if (result.success) {
      return { kind: 'accepted', record: result.data };
    }
    return { kind: 'discarded', line, reason: describeIssues(result.error, fieldNames) };
  };

export const parseComponentRow = rowParser(componentRowSchema, COMPONENT_FIELDS);
export const parseKitRow = rowParser(kitRowSchema, KIT_FIELDS);

export function filterRows<T>(lines: string[], parseRow: (line: string) => RowOutcome<T>): FilteredRows<T> {
  const filtered: FilteredRows<T> = { accepted: [], discarded: [] };
  lines.forEach(line => {
    const outcome = parseRow(line);
    if (outcome.kind === 'accepted') {
      filtered.accepted.push(outcome.record);
    } else {
      filtered.discarded.push({ line: outcome.line, reason: outcome.reason });
    }
  });
  return filtered;
}

/**
 * Reads the count-prefixed input:
 *
 * ```
 * <budget>
 * <P>
 * P component rows
 * <K>
 * K kit rows
 * ```
 *
 * Blank lines are skipped. A bad or missing budget/P fails the whole parse; short sections
 * are truncated and a bad or missing K means no kits.
 */
export function parseInput(text: string): ParseResult<ParsedInput> {
  const lines = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
  let cursor = 0;
  const nextLine = () => (cursor < lines.length ? lines[cursor++] : undefined);
  const takeLines = (count: bigint) => {
    const remaining = lines.length - cursor;
    const wanted = count <= 0n ? 0 : count >= BigInt(remaining) ? remaining : Number(count);
    const taken = lines.slice(cursor, cursor + wanted);
    cursor += taken.length;
    return taken;
  };

  const budgetLine = nextLine();
  if (budgetLine === undefined) return { ok: false, error: 'Input is empty' };
  const budget = parseInteger(budgetLine);
  if (!budget.ok) return { ok: false, error: `Invalid budget: ${budget.error}` };

  const componentCountLine = nextLine();
  if (componentCountLine === undefined) return { ok: false, error: 'Missing component count' };
  const componentCount = parseInteger(componentCountLine);
  if (!componentCount.ok) return { ok: false, error: `Invalid component count: ${componentCount.error}` };

  const components = filterRows(takeLines(componentCount.value), parseComponentRow);

  const kitCountLine = nextLine();
  const kitCount = kitCountLine === undefined ? undefined : parseInteger(kitCountLine);
  const kits = filterRows(takeLines(kitCount?.ok ? kitCount.value : 0n), parseKitRow);

  return { ok: true, value: { budget: budget.value, components, kits } };
}
