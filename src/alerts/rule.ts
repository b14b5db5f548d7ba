import type { AlertRule } from "../config.js";
import type { FilingData } from "../types.js";

/** Pure decision: enabled, ticker whitelist, required code, value floor. All must pass. */
export function shouldAlert(rule: AlertRule, filing: FilingData): boolean {
  if (!rule.enabled) return false;

  if (rule.tickers.length) {
    const ticker = filing.ticker.trim().toUpperCase();
    if (!rule.tickers.some((item) => item.trim().toUpperCase() === ticker)) return false;
  }

  const requiredCode = rule.requiredCode.trim().toUpperCase();
  if (!filing.transactions.some((tx) => tx.code.trim().toUpperCase() === requiredCode)) {
    return false;
  }

  return filing.totalValueUsd >= rule.minValueUsd;
}
