import { CostEntry, WebhookPayload } from './types';

export const REPORT_TITLE = 'AWS Cost and Usage';

const LABEL_WIDTH = 40;
const AMOUNT_WIDTH = 10;
const AMOUNT_DECIMALS = 3;

// Plain substring removal, so "AWSLambda" becomes "Lambda".
const PROVIDER_NAMES = /AWS|Amazon/g;

export function cleanLabel(label: string): string {
  return label.replace(PROVIDER_NAMES, '').trim();
}

/**
 * Fixed-point rendering with `%.3f` rounding: an exact binary tie goes to
 * the even digit, where `toFixed` would round it up.
 */
export function formatAmount(value: number): string {
  const rounded = value.toFixed(AMOUNT_DECIMALS);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return rounded;
  }

  // 100 digits is exact enough: a tie needs exactly 4 fractional digits.
  const [whole, fraction] = Math.abs(value).toFixed(100).split('.');
  const isTie = fraction[AMOUNT_DECIMALS] === '5' && /^0*$/.test(fraction.slice(AMOUNT_DECIMALS + 1));
  if (!isTie || Number(fraction[AMOUNT_DECIMALS - 1]) % 2 === 1) {
    return rounded;
  }

  return `${value < 0 ? '-' : ''}${whole}.${fraction.slice(0, AMOUNT_DECIMALS)}`;
}

/**
 * Renders one entry as `%-40s : %10.3f %s`.
 */
export function formatCostLine(entry: CostEntry): string {
  const label = cleanLabel(entry.label).padEnd(LABEL_WIDTH);
  const amount = formatAmount(entry.amount).padStart(AMOUNT_WIDTH);
  return `${label} : ${amount} ${entry.unit.trim()}`;
}

export function formatCostTable(entries: CostEntry[]): string {
  const lines = entries.map(formatCostLine);
  return '```\n' + lines.join('\n') + '\n```';
}

export function buildWebhookPayload(channelName: string, entries: CostEntry[]): WebhookPayload {
  return {
    text: REPORT_TITLE,
    channelName,
    attachments: [
      {
        text: formatCostTable(entries),
      },
    ],
  };
}
