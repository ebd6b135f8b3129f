import http from 'http';
import https from 'https';
import { URL } from 'url';
import { describeError, SendError } from './errors';
import { buildWebhookPayload } from './report-formatter';
import { CostEntry } from './types';

interface WebhookResponse {
  statusCode?: number;
  statusMessage?: string;
  body: string;
}

function parseWebhookUrl(endpoint: string): URL {
  let url: URL;

  try {
    url = new URL(endpoint);
  } catch (e) {
    throw new SendError('Invalid webhook URL format', { cause: e });
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new SendError(`Webhook endpoint must use HTTP or HTTPS, got ${url.protocol}`);
  }

  return url;
}

// Keeps only the origin; the path of a chat webhook is its secret.
export function redactEndpoint(endpoint: string): string {
  return endpoint.replace(/^(https?:\/\/[^\/]+)(.*)$/, '$1/***');
}

function postJson(url: URL, payload: string): Promise<WebhookResponse> {
  const transport = url.protocol === 'http:' ? http : https;

  return new Promise((resolve, reject) => {
    const req = transport.request(
      {
        hostname: url.hostname,
        port: url.port || (url.protocol === 'http:' ? 80 : 443),
        path: url.pathname + url.search,
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(payload),
        },
      },
      (res) => {
        let responseBody = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          responseBody += chunk;
        });
        res.on('end', () => {
          resolve({
            statusCode: res.statusCode,
            statusMessage: res.statusMessage,
            body: responseBody,
          });
        });
        res.on('error', reject);
      }
    );

    req.on('error', reject);
    req.write(payload);
    req.end();
  });
}

export async function sendReport(
  endpoint: string,
  channelName: string,
  entries: CostEntry[]
): Promise<void> {
  const url = parseWebhookUrl(endpoint);
  const redactedEndpoint = redactEndpoint(endpoint);
  const request = buildWebhookPayload(channelName, entries);

  console.log(`Sending report to webhook: ${redactedEndpoint}`);

  let response: WebhookResponse;
  try {
    response = await postJson(url, JSON.stringify(request));
  } catch (error) {
    console.error(
      'Webhook request failed',
      JSON.stringify({ endpoint: redactedEndpoint, request, error: describeError(error) })
    );
    throw new SendError(`Failed to send request to ${redactedEndpoint}`, { cause: error });
  }

  console.log(
    'Webhook response',
    JSON.stringify({
      endpoint: redactedEndpoint,
      request,
      status: response.statusCode,
      body: response.body,
    })
  );

  if (response.statusCode !== 200) {
    throw new SendError(
      `Webhook request failed with status ${response.statusCode} ${response.statusMessage ?? ''}`.trim(),
      { status: response.statusCode }
    );
  }
}
