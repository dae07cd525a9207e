import { Decimal } from "decimal.js";
import type { DbCashbackRule } from "@qrcashback/shared";

const ZERO = new Decimal(0);
const HUNDRED = new Decimal(100);

type RuleBase = { id: string; name: string; threshold: Decimal; priority: number };

export type FixedRule = RuleBase & { type: "fixed"; cashAmount: Decimal };
export type PercentageRule = RuleBase & { type: "percentage"; percentage: Decimal };
export type TieredRule = RuleBase & { type: "tiered"; cashAmount: Decimal; percentage: Decimal };
export type CashbackRule = FixedRule | PercentageRule | TieredRule;

/** What one matching rule adds, and whether lower-ranked rules still get a turn. */
export type RuleStep = { contribution: Decimal; continue: boolean };

export type CashbackBreakdown = {
  cashback: Decimal;
  applied: Array<{ ruleId: string; type: CashbackRule["type"]; contribution: Decimal }>;
};

export function evaluateRule(rule: CashbackRule, amount: Decimal): RuleStep {
  switch (rule.type) {
    case "fixed":
      return { contribution: rule.cashAmount, continue: false };
    case "percentage":
      return { contribution: amount.mul(rule.percentage).div(HUNDRED), continue: false };
    case "tiered": {
      // Tiers stack: a tiered match never ends the walk.
      const base = amount.minus(rule.threshold);
      if (rule.cashAmount.gt(0)) return { contribution: rule.cashAmount, continue: true };
      if (rule.percentage.gt(0)) return { contribution: rule.percentage.mul(base).div(HUNDRED), continue: true };
      return { contribution: ZERO, continue: true };
    }
  }
}

export function compareRules(a: CashbackRule, b: CashbackRule): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return b.threshold.comparedTo(a.threshold);
}

export function computeCashbackBreakdown(amount: Decimal, rules: ReadonlyArray<CashbackRule>): CashbackBreakdown {
  if (amount.lte(0)) return { cashback: ZERO.toDecimalPlaces(2), applied: [] };

  const ordered = [...rules].sort(compareRules);
  let total = ZERO;
  const applied: CashbackBreakdown["applied"] = [];
  for (const rule of ordered) {
    if (amount.lt(rule.threshold)) continue;
    const step = evaluateRule(rule, amount);
    total = total.plus(step.contribution);
    applied.push({ ruleId: rule.id, type: rule.type, contribution: step.contribution });
    if (!step.continue) break;
  }
  return { cashback: total.toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN), applied };
}

export function computeCashback(amount: Decimal, rules: ReadonlyArray<CashbackRule>): Decimal {
  return computeCashbackBreakdown(amount, rules).cashback;
}

function toDecimal(value: string): Decimal | null {
  try {
    const d = new Decimal(value);
    return d.isFinite() ? d : null;
  } catch {
    return null;
  }
}

/**
 * Turns a stored rule row into an engine rule. Returns null for rows that break
 * the rule invariants (unknown type, negative amounts, percentage outside 0..100).
 */
export function toCashbackRule(row: DbCashbackRule): CashbackRule | null {
  const threshold = toDecimal(row.threshold);
  const cashAmount = toDecimal(row.cash_amount);
  const percentage = toDecimal(row.percentage);
  if (!threshold || !cashAmount || !percentage) return null;
  if (threshold.lt(0) || cashAmount.lt(0)) return null;
  if (percentage.lt(0) || percentage.gt(100)) return null;
  if (!Number.isInteger(row.priority)) return null;

  const base: RuleBase = { id: row.id, name: row.name, threshold, priority: row.priority };
  switch (row.rule_type) {
    case "fixed":
      return { ...base, type: "fixed", cashAmount };
    case "percentage":
      return { ...base, type: "percentage", percentage };
    case "tiered":
      return { ...base, type: "tiered", cashAmount, percentage };
    default:
      return null;
  }
}
