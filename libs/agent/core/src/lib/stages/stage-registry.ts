import {
  PipelineState,
  StageName,
  StageState,
  STAGE_NAMES,
  ToolName,
} from '@risk-router/shared/types';
import {
  ASSISTANT_PROMPT,
  LOGISTICS_RISK_PROMPT,
  POLITICAL_RISK_PROMPT,
  REPORTING_PROMPT,
  SCHEDULER_PROMPT,
  TARIFF_RISK_PROMPT,
} from './prompts';

export interface StageConfig {
  state: StageState;
  name: StageName;
  instructions: string;
  tools: ToolName[];
  /** Event-log action recorded when the stage completes */
  action: string;
  resultSummary: string;
}

// Simple key-value registry, keyed by pipeline state
export const STAGE_CONFIGS: Record<StageState, StageConfig> = {
  [PipelineState.SCHEDULER]: {
    state: PipelineState.SCHEDULER,
    name: STAGE_NAMES[PipelineState.SCHEDULER],
    instructions: SCHEDULER_PROMPT,
    tools: [
      ToolName.GET_SCHEDULE_COMPARISON_DATA,
      ToolName.CALCULATE_RISK_PERCENTAGE,
      ToolName.CATEGORIZE_RISK,
      ToolName.LOG_AGENT_THINKING,
    ],
    action: 'Generated schedule analysis',
    resultSummary: 'Schedule risk analysis completed',
  },

  [PipelineState.POLITICAL]: {
    state: PipelineState.POLITICAL,
    name: STAGE_NAMES[PipelineState.POLITICAL],
    instructions: POLITICAL_RISK_PROMPT,
    tools: [
      ToolName.WEB_SEARCH,
      ToolName.CONVERT_TO_JSON,
      ToolName.STORE_POLITICAL_JSON,
      ToolName.EXTRACT_CITATIONS,
      ToolName.LOG_AGENT_THINKING,
    ],
    action: 'Generated political risk analysis',
    resultSummary: 'Political risk analysis completed',
  },

  [PipelineState.TARIFF]: {
    state: PipelineState.TARIFF,
    name: STAGE_NAMES[PipelineState.TARIFF],
    instructions: TARIFF_RISK_PROMPT,
    tools: [ToolName.WEB_SEARCH, ToolName.LOG_AGENT_THINKING],
    action: 'Generated tariff risk analysis',
    resultSummary: 'Tariff risk analysis completed',
  },

  [PipelineState.LOGISTICS]: {
    state: PipelineState.LOGISTICS,
    name: STAGE_NAMES[PipelineState.LOGISTICS],
    instructions: LOGISTICS_RISK_PROMPT,
    tools: [ToolName.WEB_SEARCH, ToolName.LOG_AGENT_THINKING],
    action: 'Generated logistics risk analysis',
    resultSummary: 'Logistics risk analysis completed',
  },

  [PipelineState.REPORTING]: {
    state: PipelineState.REPORTING,
    name: STAGE_NAMES[PipelineState.REPORTING],
    instructions: REPORTING_PROMPT,
    tools: [ToolName.SAVE_REPORT_TO_FILE, ToolName.LOG_AGENT_THINKING],
    action: 'Generated risk report',
    resultSummary: 'Comprehensive risk report generated',
  },

  [PipelineState.ASSISTANT]: {
    state: PipelineState.ASSISTANT,
    name: STAGE_NAMES[PipelineState.ASSISTANT],
    instructions: ASSISTANT_PROMPT,
    tools: [ToolName.LOG_AGENT_THINKING],
    action: 'Generated assistant response',
    resultSummary: 'Assistant response generated',
  },
};

export function getStageConfig(state: StageState): StageConfig {
  return STAGE_CONFIGS[state];
}
