/**
 * Shared enums used across the entire application
 * Pipeline, tools, log store and API all reference these constants
 */

// ============================================================================
// Pipeline States
// ============================================================================

export enum PipelineState {
  ROUTER = 'router',
  SCHEDULER = 'scheduler',
  POLITICAL = 'political',
  TARIFF = 'tariff',
  LOGISTICS = 'logistics',
  REPORTING = 'reporting',
  ASSISTANT = 'assistant',
  DONE = 'done',
}

/**
 * States that execute a stage (everything except the entry and terminal states)
 */
export type StageState = Exclude<PipelineState, PipelineState.ROUTER | PipelineState.DONE>;

export const STAGE_STATES: readonly StageState[] = [
  PipelineState.SCHEDULER,
  PipelineState.POLITICAL,
  PipelineState.TARIFF,
  PipelineState.LOGISTICS,
  PipelineState.REPORTING,
  PipelineState.ASSISTANT,
];

// ============================================================================
// Stage Names (as they appear in transcripts and log rows)
// ============================================================================

export enum StageName {
  SCHEDULER = 'SCHEDULER_AGENT',
  POLITICAL = 'POLITICAL_RISK_AGENT',
  TARIFF = 'TARIFF_RISK_AGENT',
  LOGISTICS = 'LOGISTICS_RISK_AGENT',
  REPORTING = 'REPORTING_AGENT',
  ASSISTANT = 'ASSISTANT_AGENT',
}

export const STAGE_NAMES: Record<StageState, StageName> = {
  [PipelineState.SCHEDULER]: StageName.SCHEDULER,
  [PipelineState.POLITICAL]: StageName.POLITICAL,
  [PipelineState.TARIFF]: StageName.TARIFF,
  [PipelineState.LOGISTICS]: StageName.LOGISTICS,
  [PipelineState.REPORTING]: StageName.REPORTING,
  [PipelineState.ASSISTANT]: StageName.ASSISTANT,
};

/** Agent name recorded on event rows written for the user's own query */
export const USER_AGENT_NAME = 'USER';
export const USER_QUERY_ACTION = 'User Query';

// ============================================================================
// Tool Names
// ============================================================================

export enum ToolName {
  GET_SCHEDULE_COMPARISON_DATA = 'get_schedule_comparison_data',
  CALCULATE_RISK_PERCENTAGE = 'calculate_risk_percentage',
  CATEGORIZE_RISK = 'categorize_risk',
  LOG_AGENT_THINKING = 'log_agent_thinking',
  WEB_SEARCH = 'web_search',
  CONVERT_TO_JSON = 'convert_to_json',
  STORE_POLITICAL_JSON = 'store_political_json_output_agent_event',
  EXTRACT_CITATIONS = 'extract_citations',
  SAVE_REPORT_TO_FILE = 'save_report_to_file',
}

// ============================================================================
// Risk Categories
// ============================================================================

export enum RiskCategory {
  LOW = 'Low Risk',
  MEDIUM = 'Medium Risk',
  HIGH = 'High Risk',
}

export const RISK_POINTS: Record<RiskCategory, number> = {
  [RiskCategory.LOW]: 1,
  [RiskCategory.MEDIUM]: 3,
  [RiskCategory.HIGH]: 5,
};

/** Lower bounds (inclusive) of the medium and high tiers, in percent */
export const RiskThresholds = {
  MEDIUM: 5,
  HIGH: 15,
} as const;

// ============================================================================
// Log Store Tables and RPCs
// ============================================================================

export enum LogTable {
  THINKING = 'dim_agent_thinking_log',
  EVENT = 'dim_agent_event_log',
  REPORT = 'fact_risk_report',
}

export enum LogRpc {
  SCHEDULE_COMPARISON = 'get_schedule_comparison_data',
  RECENT_CONVERSATIONS = 'get_recent_conversations',
  COUNTRY_RISK_HEATMAP = 'get_country_risk_heatmap_data',
}

export enum ThinkingStatus {
  SUCCESS = 'success',
  ERROR = 'error',
}

// ============================================================================
// SSE Stream Event Types
// ============================================================================

export enum StreamEventType {
  CONNECTED = 'connected',
  TURN_STARTED = 'turn_started',
  STAGE_STARTED = 'stage_started',
  TOOL = 'tool',
  STAGE_COMPLETED = 'stage_completed',
  COMPLETE = 'complete',
  ERROR = 'error',
}

// ============================================================================
// Anthropic Model IDs
// ============================================================================

export enum AnthropicModel {
  /** Fast, cost-effective for high-volume tool loops */
  HAIKU_4_5 = 'claude-haiku-4-5-20251001',
  SONNET_4_5 = 'claude-sonnet-4-5-20250929',
}

export const DEFAULT_MODEL = AnthropicModel.HAIKU_4_5;

// ============================================================================
// Pipeline Limits
// ============================================================================

export const PipelineLimits = {
  TURN_TIMEOUT_MS: 300000, // 5 minute wall clock per turn
  STAGE_MAX_ITERATIONS: 10, // model round trips per stage
  STAGE_MAX_TOKENS: 4096,
  SEARCH_MAX_RESULTS: 5,
} as const;

export const LogStoreLimits = {
  MAX_ATTEMPTS: 3,
  RETRY_DELAY_MS: 500,
  MAX_TEXT_LENGTH: 50000,
  THINKING_LOG_READ_LIMIT: 500,
  RECENT_CONVERSATIONS_LIMIT: 10,
} as const;

export const TRUNCATION_MARKER = '... [TRUNCATED]';
export const AGENT_NOT_AVAILABLE_MESSAGE = 'Agent not available';
export const ITERATION_LIMIT_MESSAGE = 'Stage stopped after reaching its tool iteration limit.';

export const WORKFLOW_MESSAGE =
  'Analyze the current equipment schedule and generate a comprehensive risk report.';

// ============================================================================
// Event Names (for EventEmitter)
// ============================================================================

export const createEventName = (sessionId: string): string => {
  return `pipeline.${sessionId}`;
};

export const PIPELINE_EVENT_PATTERN = 'pipeline.*';
