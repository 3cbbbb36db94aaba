/**
 * Prometheus metrics for provider invocations.
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { MessageErrorKind } from '../errors.js';

export type InvocationStatus = 'success' | MessageErrorKind | 'validation' | 'aborted';

export class InvocationMetrics {
  readonly register: Registry;
  private readonly providerLatency: Histogram<'provider' | 'model' | 'status'>;
  private readonly tokensUsed: Counter<'provider' | 'model' | 'type'>;
  private readonly attempts: Counter<'provider' | 'outcome'>;
  private readonly errors: Counter<'provider' | 'kind'>;

  /**
   * @param register Registry to publish into; a private one by default so
   * that several instances never collide.
   */
  constructor(register: Registry = new Registry()) {
    this.register = register;

    this.providerLatency = new Histogram({
      name: 'llm_provider_latency_seconds',
      help: 'Duration of LLM invocations in seconds, retries included',
      labelNames: ['provider', 'model', 'status'],
      buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
      registers: [register],
    });

    this.tokensUsed = new Counter({
      name: 'llm_tokens_total',
      help: 'Total tokens reported by LLM providers',
      labelNames: ['provider', 'model', 'type'],
      registers: [register],
    });

    this.attempts = new Counter({
      name: 'llm_provider_attempts_total',
      help: 'HTTP attempts made against LLM providers',
      labelNames: ['provider', 'outcome'],
      registers: [register],
    });

    this.errors = new Counter({
      name: 'llm_invocation_errors_total',
      help: 'Failed LLM invocations by error kind',
      labelNames: ['provider', 'kind'],
      registers: [register],
    });
  }

  /**
   * Track one invocation, from template validation to the final answer.
   */
  trackInvocation(provider: string, model: string, status: InvocationStatus, durationSeconds: number): void {
    this.providerLatency.observe({ provider, model, status }, durationSeconds);
    if (status !== 'success') {
      this.errors.inc({ provider, kind: status });
    }
  }

  trackAttempt(provider: string, outcome: 'success' | 'failure'): void {
    this.attempts.inc({ provider, outcome });
  }

  trackTokens(provider: string, model: string, promptTokens: number, completionTokens: number): void {
    this.tokensUsed.inc({ provider, model, type: 'prompt' }, promptTokens);
    this.tokensUsed.inc({ provider, model, type: 'completion' }, completionTokens);
  }

  /**
   * Get metrics in Prometheus format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  get contentType(): string {
    return this.register.contentType;
  }
}
