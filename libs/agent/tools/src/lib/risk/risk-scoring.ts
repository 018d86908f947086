import {
  RiskAssessment,
  RiskCategory,
  RISK_POINTS,
  RiskThresholds,
  ScheduleComparisonRow,
  ScheduleItem,
} from '@risk-router/shared/types';

/** Returned when inputs cannot produce a percentage */
export const RISK_COMPUTATION_ERROR = -1;

/**
 * Schedule slip relative to the time left before the P6 due date, in percent.
 * Anything already due (or past due) is 100. Rounded to 2 decimals.
 */
export function riskPercentage(daysVariance: number, daysUntilDue: number): number {
  if (!Number.isFinite(daysVariance) || Number.isNaN(daysUntilDue)) {
    return RISK_COMPUTATION_ERROR;
  }
  if (daysUntilDue <= 0) {
    return 100;
  }
  if (!Number.isFinite(daysUntilDue)) {
    return RISK_COMPUTATION_ERROR;
  }
  return Math.round(Math.abs((daysVariance / daysUntilDue) * 100) * 100) / 100;
}

/**
 * Tier thresholds are closed below: 5 is Medium, 15 is High.
 */
export function categorize(percentage: number): RiskAssessment {
  let riskFlag: RiskCategory;
  if (percentage < RiskThresholds.MEDIUM) {
    riskFlag = RiskCategory.LOW;
  } else if (percentage < RiskThresholds.HIGH) {
    riskFlag = RiskCategory.MEDIUM;
  } else {
    riskFlag = RiskCategory.HIGH;
  }
  return { riskFlag, riskPoints: RISK_POINTS[riskFlag] };
}

/**
 * Text form used in tool results: "100.0" when already due, 2 decimals otherwise
 */
export function formatRiskPercentage(daysVariance: number, daysUntilDue: number): string {
  const value = riskPercentage(daysVariance, daysUntilDue);
  if (value === RISK_COMPUTATION_ERROR) return '-1';
  if (daysUntilDue <= 0) return '100.0';
  return value.toFixed(2);
}

/**
 * Attach risk percentage and category to a schedule row.
 * Rows missing either day count are scored as a computation error (-1, Low).
 */
export function scoreScheduleRow(row: ScheduleComparisonRow): ScheduleItem {
  const percentage =
    row.days_variance === null || row.days_until_p6_due === null
      ? RISK_COMPUTATION_ERROR
      : riskPercentage(row.days_variance, row.days_until_p6_due);
  const { riskFlag, riskPoints } = categorize(percentage);

  return {
    ...row,
    risk_percentage: percentage,
    risk_flag: riskFlag,
    risk_points: riskPoints,
  };
}
