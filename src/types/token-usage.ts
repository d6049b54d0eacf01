export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface TokenUsageStats {
    totalInputTokens: number;
    totalOutputTokens: number;
    totalCost?: number; // Only set if pricing configured
}

export interface PricingConfig {
    inputPricePerMillion?: number;
    outputPricePerMillion?: number;
}

export function emptyUsageStats(): TokenUsageStats {
    return { totalInputTokens: 0, totalOutputTokens: 0 };
}

/**
 * Folds one call's usage into running totals. Calls that report no usage
 * (the simulated backend, some Gemini responses) leave the totals unchanged.
 */
export function addUsage(stats: TokenUsageStats, usage: TokenUsage | undefined): TokenUsageStats {
    if (!usage) return stats;
    return {
        ...stats,
        totalInputTokens: stats.totalInputTokens + usage.inputTokens,
        totalOutputTokens: stats.totalOutputTokens + usage.outputTokens,
    };
}

/**
 * Calculates the cost for a given token usage and pricing configuration.
 * Returns undefined if pricing is insufficient (missing input/output prices).
 */
export function calculateCost(usage: TokenUsage, pricing?: PricingConfig): number | undefined {
    if (!pricing || pricing.inputPricePerMillion === undefined || pricing.outputPricePerMillion === undefined) {
        return undefined;
    }

    const inputCost = (usage.inputTokens / 1_000_000) * pricing.inputPricePerMillion;
    const outputCost = (usage.outputTokens / 1_000_000) * pricing.outputPricePerMillion;

    return inputCost + outputCost;
}

export function withCost(stats: TokenUsageStats, pricing?: PricingConfig): TokenUsageStats {
    const cost = calculateCost({ inputTokens: stats.totalInputTokens, outputTokens: stats.totalOutputTokens }, pricing);
    return cost === undefined ? stats : { ...stats, totalCost: cost };
}
