import type { ScheduledHandler } from 'aws-lambda';
import { loadConfig } from './config';
import { createCostExplorerSource, fetchCosts } from './cost-fetcher';
import { CostReportError, describeError } from './errors';
import { createKmsDecrypter } from './secrets';
import { CostEntry, CostSource, Decrypter, ReporterConfig } from './types';
import { sendReport } from './webhook';

export interface PipelineDeps {
  costSource: CostSource;
  send?: typeof sendReport;
  now?: () => Date;
}

export interface HandlerDeps {
  env: Record<string, string | undefined>;
  decrypter?: Decrypter;
  createCostSource: (config: ReporterConfig) => CostSource;
  send?: typeof sendReport;
  now?: () => Date;
}

function logFailure(message: string, error: unknown): void {
  console.error(message, {
    stage: error instanceof CostReportError ? error.stage : 'unknown',
    error: describeError(error),
    cause: error instanceof Error && error.cause !== undefined ? describeError(error.cause) : undefined,
  });
}

/**
 * Fetches the current month's costs and posts them to the configured webhook.
 * Resolves with the entries that were sent.
 */
export async function runReport(config: ReporterConfig, deps: PipelineDeps): Promise<CostEntry[]> {
  const send = deps.send ?? sendReport;
  const now = deps.now ? deps.now() : new Date();

  let entries: CostEntry[];
  try {
    entries = await fetchCosts(deps.costSource, now);
  } catch (error) {
    logFailure('Failed to get cost', error);
    throw error;
  }

  try {
    await send(config.webhookEndpoint, config.channelName, entries);
  } catch (error) {
    logFailure('Failed to send cost into webhook', error);
    throw error;
  }

  console.log(`Sent cost report with ${entries.length - 1} services to channel ${config.channelName}`);

  return entries;
}

export function createHandler(deps: HandlerDeps): () => Promise<void> {
  let configPromise: Promise<ReporterConfig> | undefined;

  const resolveConfig = (): Promise<ReporterConfig> => {
    if (!configPromise) {
      configPromise = loadConfig(deps.env, deps.decrypter).catch((error: unknown) => {
        // Let the next invocation try again.
        configPromise = undefined;
        throw error;
      });
    }
    return configPromise;
  };

  return async () => {
    try {
      const config = await resolveConfig();
      await runReport(config, {
        costSource: deps.createCostSource(config),
        send: deps.send,
        now: deps.now,
      });
    } catch (error) {
      logFailure('Error processing cost report', error);
      throw error;
    }
  };
}

export const handler: ScheduledHandler = createHandler({
  env: process.env,
  decrypter: createKmsDecrypter(),
  createCostSource: (config) => createCostExplorerSource(config.costExplorerRegion),
});
