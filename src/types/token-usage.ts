export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface TokenUsageStats {
    totalInputTokens: number;
    totalOutputTokens: number;
    requests: number;
}

export function emptyUsageStats(): TokenUsageStats {
    return { totalInputTokens: 0, totalOutputTokens: 0, requests: 0 };
}

/**
 * Folds one request's usage into running totals. Requests whose provider
 * reported no usage still count toward `requests`.
 */
export function addUsage(stats: TokenUsageStats, usage?: TokenUsage): TokenUsageStats {
    return {
        totalInputTokens: stats.totalInputTokens + (usage?.inputTokens ?? 0),
        totalOutputTokens: stats.totalOutputTokens + (usage?.outputTokens ?? 0),
        requests: stats.requests + 1,
    };
}
