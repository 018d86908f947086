/**
 * Risk scoring Tests
 */

import { RiskCategory } from '@risk-router/shared/types';
import { categorize, formatRiskPercentage, riskPercentage, scoreScheduleRow } from './risk-scoring';

describe('riskPercentage', () => {
  it('is 100 when the item is due today or already past due', () => {
    expect(riskPercentage(3, 0)).toBe(100);
    expect(riskPercentage(-40, -12)).toBe(100);
    expect(riskPercentage(0, 0)).toBe(100);
  });

  it('is symmetric in the sign of the variance', () => {
    expect(riskPercentage(-7, 30)).toBe(riskPercentage(7, 30));
    expect(riskPercentage(7, 30)).toBe(23.33);
  });

  it('rounds to two decimals', () => {
    expect(riskPercentage(1, 3)).toBe(33.33);
    expect(riskPercentage(2, 3)).toBe(66.67);
  });

  it('returns -1 for non-numeric input', () => {
    expect(riskPercentage(Number.NaN, 10)).toBe(-1);
    expect(riskPercentage(5, Number.NaN)).toBe(-1);
  });
});

describe('categorize', () => {
  it.each([
    [0, RiskCategory.LOW, 1],
    [4.99, RiskCategory.LOW, 1],
    [5, RiskCategory.MEDIUM, 3],
    [14.99, RiskCategory.MEDIUM, 3],
    [15, RiskCategory.HIGH, 5],
    [100, RiskCategory.HIGH, 5],
  ])('%p%% is %s worth %p points', (percentage, riskFlag, riskPoints) => {
    expect(categorize(percentage)).toEqual({ riskFlag, riskPoints });
  });
});

describe('formatRiskPercentage', () => {
  it('matches the tool text format', () => {
    expect(formatRiskPercentage(5, 0)).toBe('100.0');
    expect(formatRiskPercentage(10, 200)).toBe('5.00');
    expect(formatRiskPercentage(Number.NaN, 1)).toBe('-1');
  });
});

describe('scoreScheduleRow', () => {
  const base = {
    project_name: 'North Plant',
    project_country: 'Canada',
    equipment_code: 'EQ-100',
    equipment_name: 'Transformer',
    p6_schedule_due_date: '2025-06-01',
    equipment_milestone_due_date: '2025-06-15',
  };

  it('adds percentage, flag and points', () => {
    expect(scoreScheduleRow({ ...base, days_variance: 14, days_until_p6_due: 100 })).toMatchObject({
      risk_percentage: 14,
      risk_flag: RiskCategory.MEDIUM,
      risk_points: 3,
    });
  });

  it('scores rows with missing day counts as a computation error', () => {
    expect(scoreScheduleRow({ ...base, days_variance: null, days_until_p6_due: 30 })).toMatchObject({
      risk_percentage: -1,
      risk_flag: RiskCategory.LOW,
    });
  });
});
