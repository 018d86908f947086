/**
 * Workflow API DTOs
 */

export interface WorkflowRunResponseDto {
  status: 'success';
  report: string;
  workflowRunId: string;
  sessionId: string;
  conversationId: string;
  timestamp: string;
}
