/**
 * Calculation trace
 *
 * Every computed figure on a ledger row is recorded as a typed entry: the
 * formula, a snapshot of its inputs, the exact value and the value actually
 * used. Inputs and values are decimal strings so that a replay from the same
 * inputs and configuration matches character for character.
 */

import type { TraceEntry } from '../../../shared/types/index.js';
import { Decimal, roundCents, toCentsString } from '../utils/decimal.js';

export type TraceInput = Decimal | number | string;

function stringify(value: TraceInput): string {
  if (value instanceof Decimal) {
    return value.toString();
  }
  if (typeof value === 'number') {
    return new Decimal(value).toString();
  }
  return value;
}

export class CalculationTrace {
  private readonly entries: TraceEntry[] = [];

  /**
   * Record a value carried forward at full precision
   */
  exact(label: string, formula: string, inputs: Record<string, TraceInput>, value: Decimal): Decimal {
    this.push(label, formula, inputs, value, value.toString(), 'NONE');
    return value;
  }

  /**
   * Record a line item rounded half up to cents; returns the rounded value
   */
  cents(label: string, formula: string, inputs: Record<string, TraceInput>, raw: Decimal): Decimal {
    const rounded = roundCents(raw);
    this.push(label, formula, inputs, raw, toCentsString(rounded), 'ROUND_HALF_UP_CENTS');
    return rounded;
  }

  get length(): number {
    return this.entries.length;
  }

  toArray(): TraceEntry[] {
    return [...this.entries];
  }

  private push(
    label: string,
    formula: string,
    inputs: Record<string, TraceInput>,
    raw: Decimal,
    value: string,
    rounding: TraceEntry['rounding']
  ): void {
    const snapshot: Record<string, string> = {};
    for (const [name, input] of Object.entries(inputs)) {
      snapshot[name] = stringify(input);
    }

    this.entries.push({
      step: this.entries.length + 1,
      label,
      formula,
      inputs: snapshot,
      rawValue: raw.toString(),
      value,
      rounding,
    });
  }
}

/**
 * Look up an entry by label, e.g. for reports that read stored intermediates
 */
export function findTraceEntry(trace: readonly TraceEntry[], label: string): TraceEntry | undefined {
  return trace.find(entry => entry.label === label);
}
