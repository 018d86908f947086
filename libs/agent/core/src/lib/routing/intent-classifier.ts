import { Injectable } from '@nestjs/common';
import { Message, PipelineState, Transcript } from '@risk-router/shared/types';

/**
 * Injection token for IntentClassifier
 */
export const INTENT_CLASSIFIER = 'INTENT_CLASSIFIER';

export type RouterTarget =
  | PipelineState.POLITICAL
  | PipelineState.TARIFF
  | PipelineState.LOGISTICS
  | PipelineState.SCHEDULER
  | PipelineState.ASSISTANT;

export type SchedulerFollowUp =
  | PipelineState.POLITICAL
  | PipelineState.TARIFF
  | PipelineState.LOGISTICS
  | PipelineState.REPORTING
  | PipelineState.DONE;

export interface IntentClassifier {
  /** Target for the message that opens a turn */
  classifyRequest(message: string): RouterTarget;
  /** Where to go once the scheduler has answered */
  classifyFollowUp(transcript: Transcript): SchedulerFollowUp;
}

interface KeywordRule<T> {
  keywords: string[];
  target: T;
}

// Rules are checked in order; the first match wins
const REQUEST_RULES: KeywordRule<RouterTarget>[] = [
  { keywords: ['political'], target: PipelineState.POLITICAL },
  { keywords: ['tariff'], target: PipelineState.TARIFF },
  { keywords: ['logistics', 'shipping'], target: PipelineState.LOGISTICS },
  { keywords: ['schedule', 'risk'], target: PipelineState.SCHEDULER },
];

const FOLLOW_UP_RULES: KeywordRule<SchedulerFollowUp>[] = [
  { keywords: ['political'], target: PipelineState.POLITICAL },
  { keywords: ['tariff'], target: PipelineState.TARIFF },
  { keywords: ['logistic', 'shipping'], target: PipelineState.LOGISTICS },
  { keywords: ['report'], target: PipelineState.REPORTING },
];

function match<T>(text: string, rules: KeywordRule<T>[], fallback: T): T {
  const lowered = text.toLowerCase();
  const rule = rules.find(({ keywords }) => keywords.some((keyword) => lowered.includes(keyword)));
  return rule ? rule.target : fallback;
}

export function lastUserMessage(transcript: Transcript): Message | undefined {
  for (let i = transcript.length - 1; i >= 0; i--) {
    if (transcript[i].role === 'user') {
      return transcript[i];
    }
  }
  return undefined;
}

/**
 * Substring keyword matching on the lowercased user text
 */
@Injectable()
export class KeywordIntentClassifier implements IntentClassifier {
  classifyRequest(message: string): RouterTarget {
    return match(message, REQUEST_RULES, PipelineState.ASSISTANT);
  }

  classifyFollowUp(transcript: Transcript): SchedulerFollowUp {
    const message = lastUserMessage(transcript);
    if (!message) {
      return PipelineState.DONE;
    }
    return match(message.content, FOLLOW_UP_RULES, PipelineState.DONE);
  }
}
