/**
 * Decides which new sales are worth a notification
 */

import type { LastSoldRecord } from "../types/record";

export interface AlertPolicy {
  alertAllNewSales: boolean;
  maxPriceAlert: number;
  minCondition: string;
}

// Grading ladder, best first. Abbreviations share their full name's rung.
const GRADE_RANK = new Map<string, number>([
  ["mint", 0],
  ["near mint", 1],
  ["nm", 1],
  ["lightly played", 2],
  ["lp", 2],
  ["moderately played", 3],
  ["mp", 3],
  ["heavily played", 4],
  ["hp", 4],
  ["damaged", 5],
  ["dmg", 5],
]);

/** Rung of a condition label on the grading ladder, or null if not a grade */
export function gradeRank(condition: string): number | null {
  return GRADE_RANK.get(condition.trim().toLowerCase()) ?? null;
}

/**
 * With `alertAllNewSales` every sale passes. Otherwise the price must not
 * exceed `maxPriceAlert` and the grade must be `minCondition` or better;
 * labels that are not grades (language, finish, unknown) skip the grade
 * check.
 */
export function shouldAlert(record: LastSoldRecord, policy: AlertPolicy): boolean {
  if (policy.alertAllNewSales) return true;
  if (record.price > policy.maxPriceAlert) return false;

  const rank = gradeRank(record.condition);
  const minRank = gradeRank(policy.minCondition);
  if (rank === null || minRank === null) return true;
  return rank <= minRank;
}
