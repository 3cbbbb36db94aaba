/**
 * Tests for Prometheus invocation metrics.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from 'prom-client';
import { InvocationMetrics } from '../../../src/middleware/metrics.js';

async function valuesOf(metrics: InvocationMetrics, name: string) {
  const all = await metrics.register.getMetricsAsJSON();
  return all.find(metric => metric.name === name)?.values ?? [];
}

describe('InvocationMetrics', () => {
  let metrics: InvocationMetrics;

  beforeEach(() => {
    metrics = new InvocationMetrics();
  });

  describe('getMetrics', () => {
    it('should return Prometheus formatted metrics', async () => {
      const text = await metrics.getMetrics();

      expect(text).toContain('llm_provider_latency_seconds');
      expect(text).toContain('llm_tokens_total');
      expect(text).toContain('llm_provider_attempts_total');
      expect(text).toContain('llm_invocation_errors_total');
    });

    it('should expose the Prometheus content type', () => {
      expect(metrics.contentType).toContain('text/plain');
    });
  });

  describe('trackInvocation', () => {
    it('should track invocation latency', async () => {
      metrics.trackInvocation('openai', 'gpt-4o-mini', 'success', 1.5);

      const values = await valuesOf(metrics, 'llm_provider_latency_seconds');
      expect(values).toContainEqual(expect.objectContaining({
        metricName: 'llm_provider_latency_seconds_count',
        labels: { provider: 'openai', model: 'gpt-4o-mini', status: 'success' },
        value: 1,
      }));
      expect(await valuesOf(metrics, 'llm_invocation_errors_total')).toEqual([]);
    });

    it('should count failures by kind', async () => {
      metrics.trackInvocation('anthropic', 'claude-3-5-sonnet-20240620', 'no_choices', 0.5);
      metrics.trackInvocation('anthropic', 'claude-3-5-sonnet-20240620', 'no_choices', 0.7);

      const values = await valuesOf(metrics, 'llm_invocation_errors_total');
      expect(values).toContainEqual(expect.objectContaining({
        labels: { provider: 'anthropic', kind: 'no_choices' },
        value: 2,
      }));
    });
  });

  describe('trackTokens', () => {
    it('should track prompt and completion tokens', async () => {
      metrics.trackTokens('openai', 'gpt-4o-mini', 100, 50);

      const values = await valuesOf(metrics, 'llm_tokens_total');
      expect(values).toContainEqual(expect.objectContaining({
        labels: { provider: 'openai', model: 'gpt-4o-mini', type: 'prompt' },
        value: 100,
      }));
      expect(values).toContainEqual(expect.objectContaining({
        labels: { provider: 'openai', model: 'gpt-4o-mini', type: 'completion' },
        value: 50,
      }));
    });
  });

  describe('trackAttempt', () => {
    it('should count attempts by outcome', async () => {
      metrics.trackAttempt('ollama', 'failure');
      metrics.trackAttempt('ollama', 'failure');
      metrics.trackAttempt('ollama', 'success');

      const values = await valuesOf(metrics, 'llm_provider_attempts_total');
      expect(values).toContainEqual(expect.objectContaining({ labels: { provider: 'ollama', outcome: 'failure' }, value: 2 }));
      expect(values).toContainEqual(expect.objectContaining({ labels: { provider: 'ollama', outcome: 'success' }, value: 1 }));
    });
  });

  it('should publish into a supplied registry', async () => {
    const register = new Registry();
    const shared = new InvocationMetrics(register);
    shared.trackAttempt('openai', 'success');

    expect(await register.metrics()).toContain('llm_provider_attempts_total{provider="openai",outcome="success"} 1');
  });

  it('should allow several collectors side by side', () => {
    expect(() => {
      new InvocationMetrics();
      new InvocationMetrics();
    }).not.toThrow();
  });
});
