import { describe, it, expect } from 'vitest';
import { addUsage, emptyUsageStats } from '../src/types/token-usage';
import { UsageTrackingProvider } from '../src/providers/usage-tracking-provider';
import type { LLMProvider, LLMResult } from '../src/providers/llm-provider';

describe('token usage', () => {
  it('adds reported tokens and counts the request', () => {
    const stats = addUsage(emptyUsageStats(), { inputTokens: 100, outputTokens: 40 });
    expect(stats).toEqual({ totalInputTokens: 100, totalOutputTokens: 40, requests: 1 });
  });

  it('counts requests without reported usage', () => {
    expect(addUsage(emptyUsageStats())).toEqual({ totalInputTokens: 0, totalOutputTokens: 0, requests: 1 });
  });
});

describe('UsageTrackingProvider', () => {
  it('totals usage across requests and passes results through', async () => {
    const replies: LLMResult<unknown>[] = [
      { data: { a: 1 }, usage: { inputTokens: 10, outputTokens: 3 } },
      { data: { b: 2 } },
    ];
    const inner: LLMProvider = {
      runPromptStructured: async () => {
        const next = replies.shift();
        if (!next) throw new Error('no more replies');
        return next;
      },
    };
    const tracked = new UsageTrackingProvider(inner);
    const schema = { name: 'submit_summary', schema: {} };

    await expect(tracked.runPromptStructured('c', 'p', schema)).resolves.toEqual({
      data: { a: 1 },
      usage: { inputTokens: 10, outputTokens: 3 },
    });
    await tracked.runPromptStructured('c', 'p', schema);
    await expect(tracked.runPromptStructured('c', 'p', schema)).rejects.toThrow('no more replies');

    expect(tracked.getUsage()).toEqual({ totalInputTokens: 10, totalOutputTokens: 3, requests: 2 });
  });
});
