/**
 * Rows written to the log store
 */

import { LogTable, ThinkingStatus } from './enums';

export interface ThinkingLogInsert {
  agent_name: string;
  thinking_stage: string;
  thought_content: string;
  conversation_id: string;
  session_id?: string | null;
  thinking_stage_output?: string | null;
  agent_output?: string | null;
  agent_id?: string | null;
  model_deployment_name?: string | null;
  thread_id?: string | null;
  user_query?: string | null;
  status: ThinkingStatus;
}

export interface EventLogInsert {
  event_id: string;
  agent_name: string;
  action: string;
  result_summary: string;
  conversation_id: string;
  session_id?: string | null;
  user_query?: string | null;
  agent_output?: string | null;
  event_time: string;
}

export interface ReportInsert {
  session_id: string | null;
  conversation_id: string;
  filename: string;
  blob_url: string;
  report_type: string;
}

export interface LogRecordByTable {
  [LogTable.THINKING]: ThinkingLogInsert;
  [LogTable.EVENT]: EventLogInsert;
  [LogTable.REPORT]: ReportInsert;
}
