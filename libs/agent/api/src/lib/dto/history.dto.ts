import { z } from 'zod';

export const RecentConversationsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const HeatmapQuerySchema = z.object({
  conversationId: z.string().min(1).optional(),
  sessionId: z.string().min(1).optional(),
});
