import { ToolName } from '@risk-router/shared/types';

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: ToolInputSchema;
}

const conversationProperties = {
  conversation_id: {
    type: 'string',
    description: 'Optional: conversation id (defaults to the current conversation)',
  },
  session_id: {
    type: 'string',
    description: 'Optional: session id (defaults to the current session)',
  },
};

const riskAnalysisProperty = {
  risk_analysis: {
    type: 'string',
    description: 'The full political risk analysis text, including the markdown risk table',
  },
};

export const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
  [ToolName.GET_SCHEDULE_COMPARISON_DATA]: {
    name: ToolName.GET_SCHEDULE_COMPARISON_DATA,
    description: `Retrieve the equipment schedule comparison for every project.

Each row includes project, equipment code and name, P6 schedule due date, milestone due date,
days_variance, days_until_p6_due, supplier and logistics details, and the computed
risk_percentage, risk_flag and risk_points. Returns [] when no schedule rows exist.
Call this tool ONCE per analysis.`,
    inputSchema: { type: 'object', properties: {} },
  },

  [ToolName.CALCULATE_RISK_PERCENTAGE]: {
    name: ToolName.CALCULATE_RISK_PERCENTAGE,
    description:
      'Calculate schedule risk percentage from days of variance and days until the P6 due date. Returns "100.0" when already due and "-1" on invalid input.',
    inputSchema: {
      type: 'object',
      properties: {
        days_variance: { type: 'number', description: 'Milestone date minus P6 due date, in days' },
        days_until_due: { type: 'number', description: 'Days remaining until the P6 due date' },
      },
      required: ['days_variance', 'days_until_due'],
    },
  },

  [ToolName.CATEGORIZE_RISK]: {
    name: ToolName.CATEGORIZE_RISK,
    description:
      'Categorize a risk percentage: below 5 is Low Risk (1 point), below 15 is Medium Risk (3 points), otherwise High Risk (5 points).',
    inputSchema: {
      type: 'object',
      properties: {
        risk_percentage: { type: 'number', description: 'Risk percentage from calculate_risk_percentage' },
      },
      required: ['risk_percentage'],
    },
  },

  [ToolName.LOG_AGENT_THINKING]: {
    name: ToolName.LOG_AGENT_THINKING,
    description:
      'Record one step of your reasoning in the audit log. Use it at each significant stage of your analysis.',
    inputSchema: {
      type: 'object',
      properties: {
        thinking_stage: { type: 'string', description: 'Short label for the step (e.g. "data_retrieval")' },
        thought_content: { type: 'string', description: 'What you considered at this step' },
        thinking_stage_output: { type: 'string', description: 'Optional: intermediate result of the step' },
        agent_output: { type: 'string', description: 'Optional: final output, when logging the last step' },
        user_query: { type: 'string', description: 'Optional: the user query being answered' },
        ...conversationProperties,
      },
      required: ['thinking_stage', 'thought_content'],
    },
  },

  [ToolName.WEB_SEARCH]: {
    name: ToolName.WEB_SEARCH,
    description:
      'Search the web for recent news. Returns up to 5 results with title, source, url and snippet. Make ONE well-targeted search per analysis.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query' },
      },
      required: ['query'],
    },
  },

  [ToolName.CONVERT_TO_JSON]: {
    name: ToolName.CONVERT_TO_JSON,
    description: 'Convert a political risk analysis (markdown risk table) into structured JSON.',
    inputSchema: { type: 'object', properties: riskAnalysisProperty, required: ['risk_analysis'] },
  },

  [ToolName.STORE_POLITICAL_JSON]: {
    name: ToolName.STORE_POLITICAL_JSON,
    description:
      'Convert a political risk analysis to structured JSON and store it in the event log for the country risk heatmap.',
    inputSchema: {
      type: 'object',
      properties: {
        ...riskAnalysisProperty,
        agent_name: { type: 'string', description: 'Optional: agent name (defaults to the current stage)' },
        ...conversationProperties,
      },
      required: ['risk_analysis'],
    },
  },

  [ToolName.EXTRACT_CITATIONS]: {
    name: ToolName.EXTRACT_CITATIONS,
    description: 'Extract the deduplicated list of citations referenced in a political risk analysis table.',
    inputSchema: { type: 'object', properties: riskAnalysisProperty, required: ['risk_analysis'] },
  },

  [ToolName.SAVE_REPORT_TO_FILE]: {
    name: ToolName.SAVE_REPORT_TO_FILE,
    description:
      'Save the final markdown report. Returns filename, blob_url and report_id; include them in your answer.',
    inputSchema: {
      type: 'object',
      properties: {
        report_content: { type: 'string', description: 'Complete report in markdown' },
        report_type: { type: 'string', description: 'Optional: report type (default "comprehensive")' },
        ...conversationProperties,
      },
      required: ['report_content'],
    },
  },
};
