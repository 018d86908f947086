import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { StageName, ThinkingStatus, ToolName } from '@risk-router/shared/types';
import { getErrorMessage } from '@risk-router/shared/utils';
import { LogStoreService } from '@risk-router/persistence/log-store';
import { categorize, formatRiskPercentage } from './risk/risk-scoring';
import { ScheduleDataService } from './schedule/schedule-data.service';
import { SearxngClient } from './search/searxng.client';
import { extractCitations, parsePoliticalRisks } from './political/political-risk.parser';
import { REPORT_TYPE_PATTERN, ReportWriterService } from './reporting/report-writer.service';
import { TOOL_DEFINITIONS, ToolDefinition } from './tool-definitions';

/**
 * Identity of the turn a tool call belongs to; fills ids the model leaves out
 */
export interface ToolContext {
  sessionId: string;
  conversationId: string;
  stage: StageName;
  userQuery?: string;
}

const ids = {
  conversation_id: z.string().optional(),
  session_id: z.string().optional(),
};

const schemas = {
  riskPercentage: z.object({ days_variance: z.number(), days_until_due: z.number() }),
  categorize: z.object({ risk_percentage: z.number() }),
  thinking: z.object({
    thinking_stage: z.string(),
    thought_content: z.string(),
    thinking_stage_output: z.string().optional(),
    agent_output: z.string().optional(),
    user_query: z.string().optional(),
    ...ids,
  }),
  search: z.object({ query: z.string().min(1) }),
  analysis: z.object({ risk_analysis: z.string() }),
  storePolitical: z.object({ risk_analysis: z.string(), agent_name: z.string().optional(), ...ids }),
  report: z.object({
    report_content: z.string().min(1),
    report_type: z.string().regex(REPORT_TYPE_PATTERN).optional(),
    ...ids,
  }),
};

export function isToolName(value: string): value is ToolName {
  return Object.values<string>(ToolName).includes(value);
}

/**
 * Tool Registry
 *
 * Definitions are handed to the model per stage; executeTool runs a call and
 * returns the text fed back as the tool result. Failures come back as
 * `{"error": ...}` text so the stage can continue.
 */
@Injectable()
export class ToolRegistry {
  private readonly logger = new Logger(ToolRegistry.name);

  constructor(
    private readonly logStore: LogStoreService,
    private readonly scheduleData: ScheduleDataService,
    private readonly search: SearxngClient,
    private readonly reportWriter: ReportWriterService
  ) {}

  getTools(names: readonly ToolName[]): ToolDefinition[] {
    return names.map((name) => TOOL_DEFINITIONS[name]);
  }

  async executeTool(name: string, input: unknown, context: ToolContext): Promise<string> {
    this.logger.debug(`[${context.conversationId}] ${context.stage} → ${name}`);

    if (!isToolName(name)) {
      return JSON.stringify({ error: `Unknown tool: ${name}` });
    }

    try {
      return await this.dispatch(name, input, context);
    } catch (error) {
      const message =
        error instanceof z.ZodError
          ? `Invalid input: ${error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`
          : getErrorMessage(error);
      this.logger.warn(`[${context.conversationId}] Tool ${name} failed: ${message}`);
      return JSON.stringify({ error: message });
    }
  }

  private async dispatch(name: ToolName, input: unknown, context: ToolContext): Promise<string> {
    switch (name) {
      case ToolName.GET_SCHEDULE_COMPARISON_DATA: {
        const items = await this.scheduleData.fetchScheduleItems();
        return items.length > 0 ? JSON.stringify(items) : '[]';
      }

      case ToolName.CALCULATE_RISK_PERCENTAGE: {
        const parsed = schemas.riskPercentage.safeParse(input);
        if (!parsed.success) return '-1';
        return formatRiskPercentage(parsed.data.days_variance, parsed.data.days_until_due);
      }

      case ToolName.CATEGORIZE_RISK: {
        const { risk_percentage } = schemas.categorize.parse(input);
        const { riskFlag, riskPoints } = categorize(risk_percentage);
        return JSON.stringify({ risk_flag: riskFlag, risk_points: riskPoints });
      }

      case ToolName.LOG_AGENT_THINKING:
        return this.logThinking(schemas.thinking.parse(input), context);

      case ToolName.WEB_SEARCH: {
        const { query } = schemas.search.parse(input);
        const results = await this.search.search(query);
        return JSON.stringify({ query, results, count: results.length });
      }

      case ToolName.CONVERT_TO_JSON: {
        const { risk_analysis } = schemas.analysis.parse(input);
        return JSON.stringify(parsePoliticalRisks(risk_analysis), null, 2);
      }

      case ToolName.STORE_POLITICAL_JSON: {
        const args = schemas.storePolitical.parse(input);
        const document = parsePoliticalRisks(args.risk_analysis);
        const eventId = await this.logStore.insertEvent({
          agentName: args.agent_name ?? context.stage,
          action: 'Political Risk JSON Data',
          resultSummary: `Structured JSON data with ${document.political_risks.length} political risks`,
          agentOutput: JSON.stringify(document),
          conversationId: args.conversation_id ?? context.conversationId,
          sessionId: args.session_id ?? context.sessionId,
        });
        return JSON.stringify({
          success: true,
          message: 'Political risk JSON data stored in agent event log',
          event_id: eventId,
          json_data: document,
        });
      }

      case ToolName.EXTRACT_CITATIONS: {
        const { risk_analysis } = schemas.analysis.parse(input);
        const citations = extractCitations(risk_analysis);
        return JSON.stringify({ citations, count: citations.length, timestamp: new Date().toISOString() });
      }

      case ToolName.SAVE_REPORT_TO_FILE: {
        const args = schemas.report.parse(input);
        const saved = await this.reportWriter.saveReport({
          content: args.report_content,
          reportType: args.report_type,
          conversationId: args.conversation_id ?? context.conversationId,
          sessionId: args.session_id ?? context.sessionId,
        });
        return JSON.stringify(saved);
      }
    }
  }

  private async logThinking(args: z.infer<typeof schemas.thinking>, context: ToolContext): Promise<string> {
    const conversationId = args.conversation_id ?? context.conversationId;
    try {
      await this.logStore.insertThinking({
        agentName: context.stage,
        thinkingStage: args.thinking_stage,
        thoughtContent: args.thought_content,
        thinkingStageOutput: args.thinking_stage_output,
        agentOutput: args.agent_output,
        conversationId,
        sessionId: args.session_id ?? context.sessionId,
        userQuery: args.user_query ?? context.userQuery,
        status: ThinkingStatus.SUCCESS,
      });
      return JSON.stringify({ success: true, conversation_id: conversationId });
    } catch (error) {
      this.logger.warn(`[${conversationId}] Thinking log not stored: ${getErrorMessage(error)}`);
      return JSON.stringify({ success: false, error: getErrorMessage(error) });
    }
  }
}
