import chalk from 'chalk';
import { MODEL_PRICING, type SupportedChatModel } from '../config.js';
import type { TokenStats } from '../fixing/types.js';

/**
 * Calculate cost in USD from token usage and model pricing
 */
export function calculateCost(
  model: SupportedChatModel,
  inputTokens: number,
  outputTokens: number,
): number {
  const pricing = MODEL_PRICING[model];
  const inputCost = (inputTokens / 1_000_000) * pricing.inputCostPerMillion;
  const outputCost = (outputTokens / 1_000_000) * pricing.outputCostPerMillion;
  return inputCost + outputCost;
}

export function calculateSessionCost(
  model: SupportedChatModel,
  tokenStats: TokenStats,
): number {
  return calculateCost(model, tokenStats.input, tokenStats.output);
}

export function formatCost(cost: number): string {
  return `$${cost.toFixed(4)}`;
}

export function formatCostDisplay(info: {
  totalCost: number;
  inputTokens: number;
  outputTokens: number;
}): string {
  return chalk.gray(
    `  Cost: ${formatCost(info.totalCost)} (${info.inputTokens} input + ${info.outputTokens} output tokens)`,
  );
}
