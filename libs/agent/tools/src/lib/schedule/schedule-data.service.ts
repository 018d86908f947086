import { Injectable, Logger } from '@nestjs/common';
import { LogRpc, ScheduleComparisonRow, ScheduleItem } from '@risk-router/shared/types';
import { LogStoreService, isRecord } from '@risk-router/persistence/log-store';
import { scoreScheduleRow } from '../risk/risk-scoring';

const numberOrNull = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const stringOrNull = (value: unknown): string | null =>
  value === null || value === undefined ? null : String(value);

/**
 * Reads the equipment schedule comparison from the log store and scores every row
 */
@Injectable()
export class ScheduleDataService {
  private readonly logger = new Logger(ScheduleDataService.name);

  constructor(private readonly logStore: LogStoreService) {}

  async fetchScheduleItems(): Promise<ScheduleItem[]> {
    const data = await this.logStore.rpc(LogRpc.SCHEDULE_COMPARISON);
    const rows = Array.isArray(data) ? data.filter(isRecord) : [];
    this.logger.debug(`Schedule comparison returned ${rows.length} rows`);
    return rows.map((row) => scoreScheduleRow(toScheduleRow(row)));
  }
}

function toScheduleRow(row: Record<string, unknown>): ScheduleComparisonRow {
  return {
    project_name: stringOrNull(row['project_name']),
    project_country: stringOrNull(row['project_country']),
    equipment_code: String(row['equipment_code'] ?? ''),
    equipment_name: stringOrNull(row['equipment_name']),
    equipment_type: stringOrNull(row['equipment_type']),
    p6_schedule_due_date: stringOrNull(row['p6_schedule_due_date']),
    equipment_milestone_due_date: stringOrNull(row['equipment_milestone_due_date']),
    days_variance: numberOrNull(row['days_variance']),
    days_until_p6_due: numberOrNull(row['days_until_p6_due']),
    supplier_name: stringOrNull(row['supplier_name']),
    manufacturing_location: stringOrNull(row['manufacturing_location']),
    shipping_port: stringOrNull(row['shipping_port']),
    receiving_port: stringOrNull(row['receiving_port']),
    logistics_method: stringOrNull(row['logistics_method']),
    alternative_suppliers: stringOrNull(row['alternative_suppliers']),
  };
}
