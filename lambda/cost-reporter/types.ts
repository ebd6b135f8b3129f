import type {
  GetCostAndUsageCommandInput,
  GetCostAndUsageCommandOutput,
} from '@aws-sdk/client-cost-explorer';

export type InvocationMode = 'lambda' | 'local';

export interface CostEntry {
  label: string;
  amount: number;
  unit: string;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface ReporterConfig {
  webhookEndpoint: string;
  channelName: string;
  mode: InvocationMode;
  costExplorerRegion: string;
}

export interface WebhookAttachment {
  text: string;
}

export interface WebhookPayload {
  text: string;
  channelName: string;
  attachments: WebhookAttachment[];
}

/**
 * Anything that can answer a Cost Explorer `GetCostAndUsage` request.
 */
export interface CostSource {
  getCostAndUsage(input: GetCostAndUsageCommandInput): Promise<GetCostAndUsageCommandOutput>;
}

/**
 * Turns a base64 ciphertext into its plaintext.
 */
export interface Decrypter {
  decrypt(ciphertext: string): Promise<string>;
}
