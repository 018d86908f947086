import { z } from 'zod';

/**
 * Chat API DTOs
 */

export const ChatRequestSchema = z.object({
  sessionId: z.string().trim().min(1).max(200).optional(),
  message: z.string().trim().min(1, 'must not be empty'),
});

export type ChatRequestDto = z.infer<typeof ChatRequestSchema>;

export interface ChatResponseDto {
  status: 'success';
  response: string;
  sessionId: string;
  conversationId: string;
}

export interface ErrorResponseDto {
  status: 'error';
  error: string;
  sessionId?: string;
}
