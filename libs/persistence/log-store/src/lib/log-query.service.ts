import { Injectable, Logger } from '@nestjs/common';
import { LogRpc, LogStoreLimits, LogTable } from '@risk-router/shared/types';
import { isRecord, LogStoreService } from './log-store.service';

export interface ConversationMessageView {
  event_time: string | null;
  user_query: string | null;
  agent_output: string | null;
  agent_name: string | null;
  action: string | null;
}

export interface ConversationView {
  conversation_id: string;
  last_interaction: string | null;
  messages: ConversationMessageView[];
}

export interface SessionView {
  session_id: string;
  conversations: ConversationView[];
}

export interface SessionIdView {
  session_id: string;
  user_query: string;
  session_date: string;
}

export interface ThoughtView {
  thought_content: string | null;
  thinking_stage: string | null;
  thinking_stage_output: string | null;
  created_date: string | null;
}

export interface AgentThoughtsView {
  agent_name: string;
  first_appearance: string | null;
  thoughts: ThoughtView[];
}

export interface ThinkingConversationView {
  conversation_id: string;
  user_query: string | null;
  agents: AgentThoughtsView[];
}

export interface ThinkingSessionView {
  session_id: string;
  conversations: ThinkingConversationView[];
}

export interface ThinkingLogIdView {
  session_id: string;
  first_query: string | null;
}

export interface HeatmapView {
  datetime_stamp: string;
  conversation_id: string;
  session_id: string;
  country: string;
  average_risk: string;
  breakdown: string;
}

export interface ReportView {
  session_id: string;
  blob_url: string;
  filename: string;
  report_type: string;
  created_date: string;
}

const text = (row: Record<string, unknown>, key: string): string | null => {
  const value = row[key];
  if (value === undefined || value === null) return null;
  return typeof value === 'string' ? value : String(value);
};

const key = (row: Record<string, unknown>, column: string): string => text(row, column) ?? '';

/**
 * LogQueryService
 * Read-side projections of the audit tables, grouped for the history views
 */
@Injectable()
export class LogQueryService {
  private readonly logger = new Logger(LogQueryService.name);

  constructor(private readonly logStore: LogStoreService) {}

  /**
   * All event rows grouped session → conversation, newest rows first
   */
  async listSessions(): Promise<SessionView[]> {
    const rows = await this.logStore.query(LogTable.EVENT, {
      orderBy: 'event_time',
      ascending: false,
    });
    return groupSessions(rows);
  }

  /**
   * One session's conversations in chronological order, or null when it has no rows
   */
  async getSession(sessionId: string): Promise<SessionView | null> {
    const rows = await this.logStore.query(LogTable.EVENT, {
      eq: { session_id: sessionId },
      orderBy: 'event_time',
      ascending: true,
    });
    if (rows.length === 0) {
      return null;
    }
    return { session_id: sessionId, conversations: groupConversations(rows) };
  }

  /**
   * First query and start date of every session, most recent session first
   */
  async listSessionIds(): Promise<SessionIdView[]> {
    const rows = await this.logStore.query(LogTable.EVENT, {
      columns: 'session_id, user_query, event_time',
      notNull: ['user_query'],
      orderBy: 'event_time',
      ascending: true,
    });

    const sessions = new Map<string, SessionIdView>();
    for (const row of rows) {
      const sessionId = key(row, 'session_id');
      if (!sessions.has(sessionId)) {
        sessions.set(sessionId, {
          session_id: sessionId,
          user_query: key(row, 'user_query'),
          session_date: key(row, 'event_time'),
        });
      }
    }

    return [...sessions.values()].sort((a, b) => b.session_date.localeCompare(a.session_date));
  }

  async listThinkingLogs(): Promise<ThinkingSessionView[]> {
    const rows = await this.logStore.query(LogTable.THINKING, {
      orderBy: 'created_date',
      ascending: false,
      limit: LogStoreLimits.THINKING_LOG_READ_LIMIT,
    });

    const bySession = new Map<string, Record<string, unknown>[]>();
    for (const row of rows) {
      const sessionId = key(row, 'session_id');
      bySession.set(sessionId, [...(bySession.get(sessionId) ?? []), row]);
    }

    return [...bySession.entries()].map(([sessionId, sessionRows]) => ({
      session_id: sessionId,
      conversations: groupThinking(sessionRows),
    }));
  }

  async getThinkingLogs(sessionId: string): Promise<ThinkingSessionView> {
    const rows = await this.logStore.query(LogTable.THINKING, {
      eq: { session_id: sessionId },
      orderBy: 'created_date',
      ascending: true,
    });
    return { session_id: sessionId, conversations: groupThinking(rows) };
  }

  /**
   * Sessions that have thinking rows, with the most recent query seen for each
   */
  async listThinkingLogIds(): Promise<ThinkingLogIdView[]> {
    const rows = await this.logStore.query(LogTable.THINKING, {
      columns: 'session_id, user_query, created_date',
      notNull: ['user_query'],
      orderBy: 'created_date',
      ascending: false,
    });

    const sessions = new Map<string, ThinkingLogIdView>();
    for (const row of rows) {
      const sessionId = key(row, 'session_id');
      if (!sessions.has(sessionId)) {
        sessions.set(sessionId, { session_id: sessionId, first_query: text(row, 'user_query') });
      }
    }
    return [...sessions.values()];
  }

  async getConversationEvents(conversationId: string): Promise<ConversationMessageView[]> {
    const rows = await this.logStore.query(LogTable.EVENT, {
      eq: { conversation_id: conversationId },
      orderBy: 'event_time',
      ascending: true,
    });
    return rows.map(toMessageView);
  }

  async getRecentConversations(limit: number = LogStoreLimits.RECENT_CONVERSATIONS_LIMIT): Promise<unknown[]> {
    const data = await this.logStore.rpc(LogRpc.RECENT_CONVERSATIONS, { row_limit: limit });
    return Array.isArray(data) ? data : [];
  }

  async getHeatmap(filters: { conversationId?: string; sessionId?: string }): Promise<HeatmapView[]> {
    const data = await this.logStore.rpc(LogRpc.COUNTRY_RISK_HEATMAP, {
      p_conversation_id: filters.conversationId ?? null,
      p_session_id: filters.sessionId ?? null,
    });
    if (!Array.isArray(data)) {
      this.logger.warn('Heatmap RPC returned no rows');
      return [];
    }

    return data.filter(isRecord).map((row) => ({
      datetime_stamp: key(row, 'datetime_stamp'),
      conversation_id: key(row, 'conversation_id'),
      session_id: key(row, 'session_id'),
      country: key(row, 'country'),
      average_risk: String(Math.round(Number(row['average_risk'] ?? 0) || 0)),
      breakdown: formatBreakdown(row['breakdown']),
    }));
  }

  async listReports(): Promise<ReportView[]> {
    const rows = await this.logStore.query(LogTable.REPORT, {
      columns: 'session_id, blob_url, filename, report_type, created_date',
      orderBy: 'created_date',
      ascending: false,
    });
    return rows.map((row) => ({
      session_id: key(row, 'session_id'),
      blob_url: key(row, 'blob_url'),
      filename: key(row, 'filename'),
      report_type: key(row, 'report_type'),
      created_date: key(row, 'created_date'),
    }));
  }
}

function toMessageView(row: Record<string, unknown>): ConversationMessageView {
  return {
    event_time: text(row, 'event_time'),
    user_query: text(row, 'user_query'),
    agent_output: text(row, 'agent_output'),
    agent_name: text(row, 'agent_name'),
    action: text(row, 'action'),
  };
}

function groupConversations(rows: Record<string, unknown>[]): ConversationView[] {
  const conversations = new Map<string, ConversationView>();
  for (const row of rows) {
    const conversationId = key(row, 'conversation_id');
    const message = toMessageView(row);
    const conversation = conversations.get(conversationId) ?? {
      conversation_id: conversationId,
      last_interaction: message.event_time,
      messages: [],
    };
    conversation.messages.push(message);
    if (message.event_time && message.event_time > (conversation.last_interaction ?? '')) {
      conversation.last_interaction = message.event_time;
    }
    conversations.set(conversationId, conversation);
  }
  return [...conversations.values()];
}

function groupSessions(rows: Record<string, unknown>[]): SessionView[] {
  const bySession = new Map<string, Record<string, unknown>[]>();
  for (const row of rows) {
    const sessionId = key(row, 'session_id');
    bySession.set(sessionId, [...(bySession.get(sessionId) ?? []), row]);
  }
  return [...bySession.entries()].map(([sessionId, sessionRows]) => ({
    session_id: sessionId,
    conversations: groupConversations(sessionRows),
  }));
}

function groupThinking(rows: Record<string, unknown>[]): ThinkingConversationView[] {
  const conversations = new Map<string, { view: ThinkingConversationView; agents: Map<string, AgentThoughtsView> }>();

  for (const row of rows) {
    const conversationId = key(row, 'conversation_id');
    const agentName = key(row, 'agent_name');

    let entry = conversations.get(conversationId);
    if (!entry) {
      entry = {
        view: { conversation_id: conversationId, user_query: text(row, 'user_query'), agents: [] },
        agents: new Map(),
      };
      conversations.set(conversationId, entry);
    }
    if (!entry.view.user_query) {
      entry.view.user_query = text(row, 'user_query');
    }

    let agent = entry.agents.get(agentName);
    if (!agent) {
      agent = { agent_name: agentName, first_appearance: text(row, 'created_date'), thoughts: [] };
      entry.agents.set(agentName, agent);
      entry.view.agents.push(agent);
    }
    agent.thoughts.push({
      thought_content: text(row, 'thought_content'),
      thinking_stage: text(row, 'thinking_stage'),
      thinking_stage_output: text(row, 'thinking_stage_output'),
      created_date: text(row, 'created_date'),
    });
  }

  return [...conversations.values()].map(({ view }) => view);
}

function formatBreakdown(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
