import { InvalidRateError } from './errors.js';
import type { RateConfig, RateConfigInput } from './types.js';
import { formatCurrency } from './format.js';

function checkRate(value: number, label: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidRateError(`${label} must be a number`);
  }
  if (value < 0) {
    throw new InvalidRateError(`${label} cannot be negative`);
  }
  return value;
}

/**
 * Build the next rate configuration. Nothing is installed here; the ledger takes
 * the returned value once it has been persisted.
 */
export function updateRateConfig(current: RateConfig, input: RateConfigInput): RateConfig {
  const baseRate = checkRate(input.baseRate ?? current.baseRate, 'Base rate');
  const avgTipRate = checkRate(input.avgTipRate ?? current.avgTipRate, 'Average tip rate');
  const includeTips = input.includeTips ?? current.includeTips;

  return Object.freeze({ baseRate, includeTips, avgTipRate });
}

export function effectiveHourlyRate(config: RateConfig): number {
  return config.includeTips ? config.baseRate + config.avgTipRate : config.baseRate;
}

/** One-line summary shown next to the period totals */
export function describeRate(config: RateConfig): string {
  const effective = formatCurrency(effectiveHourlyRate(config));
  if (config.includeTips) {
    return `Rate: ${effective}/hr (${formatCurrency(config.baseRate)} + ${formatCurrency(config.avgTipRate)} avg tips)`;
  }
  return `Rate: ${effective}/hr (tips excluded)`;
}
