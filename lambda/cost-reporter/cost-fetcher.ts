import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  GetCostAndUsageCommandInput,
  GetCostAndUsageCommandOutput,
} from '@aws-sdk/client-cost-explorer';
import { FetchError, ParseError } from './errors';
import { cleanLabel } from './report-formatter';
import { CostEntry, CostSource, DateRange } from './types';

const METRIC = 'UnblendedCost';
const TOTAL_LABEL = 'Total';
const TOTAL_UNIT = '*';

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function createCostExplorerSource(region: string): CostSource {
  const ce = new CostExplorerClient({ region });
  return {
    getCostAndUsage: (input) => ce.send(new GetCostAndUsageCommand(input)),
  };
}

function toDateString(date: Date): string {
  return date.toISOString().split('T')[0];
}

// Current calendar month in UTC, end exclusive.
export function getCurrentMonthRange(now: Date = new Date()): DateRange {
  const monthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  const nextMonthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
  return {
    start: toDateString(monthStart),
    end: toDateString(nextMonthStart),
  };
}

export function parseAmount(raw: string, service: string): number {
  const value = Number(raw);
  if (!DECIMAL_PATTERN.test(raw) || !Number.isFinite(value)) {
    throw new ParseError(`Failed to parse amount "${raw}" for service "${service}"`, raw);
  }
  return value;
}

export async function fetchCosts(source: CostSource, now: Date = new Date()): Promise<CostEntry[]> {
  const dateRange = getCurrentMonthRange(now);

  const input: GetCostAndUsageCommandInput = {
    TimePeriod: {
      Start: dateRange.start,
      End: dateRange.end,
    },
    Granularity: 'MONTHLY',
    Metrics: [METRIC],
    GroupBy: [
      {
        Type: 'DIMENSION',
        Key: 'SERVICE',
      },
    ],
  };

  console.log(`Fetching cost and usage for ${dateRange.start} to ${dateRange.end}`);

  let response: GetCostAndUsageCommandOutput;
  try {
    response = await source.getCostAndUsage(input);
  } catch (error) {
    console.error('Cost and usage request failed', JSON.stringify({ input }), error);
    throw new FetchError(`Failed to get cost and usage for ${dateRange.start} to ${dateRange.end}`, {
      cause: error,
    });
  }

  console.log('Cost and usage', JSON.stringify({ input, output: response.ResultsByTime }));

  const costs: CostEntry[] = [];
  for (const timeEntry of response.ResultsByTime ?? []) {
    for (const group of timeEntry.Groups ?? []) {
      const service = group.Keys?.[0] ?? '';
      const metric = group.Metrics?.[METRIC];
      const amount = parseAmount(metric?.Amount ?? '', service);

      costs.push({
        label: cleanLabel(service),
        amount,
        unit: metric?.Unit ?? '',
      });
    }
  }

  costs.sort((a, b) => b.amount - a.amount);

  const total = costs.reduce((sum, item) => sum + item.amount, 0);

  console.log(`Cost entries collected: ${costs.length} services, total ${total.toFixed(3)}`);

  return [{ label: TOTAL_LABEL, amount: total, unit: TOTAL_UNIT }, ...costs];
}
