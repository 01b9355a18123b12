/**
 * Prometheus metrics for chat completion calls.
 */

import client from 'prom-client';

// Separate from the prom-client global registry
const register = new client.Registry();

const requestDuration = new client.Histogram({
  name: 'chat_client_request_duration_seconds',
  help: 'Duration of chat completion calls in seconds',
  labelNames: ['model', 'outcome'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

const tokensUsed = new client.Counter({
  name: 'chat_client_tokens_total',
  help: 'Total tokens reported by chat completion responses',
  labelNames: ['model', 'type'],
  registers: [register],
});

export interface MetricsRecorder {
  trackChatRequest(model: string, outcome: string, durationSeconds: number): void;
  trackTokens(model: string, promptTokens: number, completionTokens: number): void;
}

/**
 * Track chat completion latency. `outcome` is `success` or the failure kind.
 */
export function trackChatRequest(
  model: string,
  outcome: string,
  durationSeconds: number
): void {
  requestDuration.observe({ model, outcome }, durationSeconds);
}

/**
 * Track token usage. Counters only go up, so negative counts are skipped.
 */
export function trackTokens(
  model: string,
  promptTokens: number,
  completionTokens: number
): void {
  if (promptTokens >= 0) tokensUsed.inc({ model, type: 'prompt' }, promptTokens);
  if (completionTokens >= 0) tokensUsed.inc({ model, type: 'completion' }, completionTokens);
}

export const defaultMetrics: MetricsRecorder = { trackChatRequest, trackTokens };

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export { register };
