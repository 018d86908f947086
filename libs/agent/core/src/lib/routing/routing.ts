import { PipelineState, Transcript } from '@risk-router/shared/types';
import { IntentClassifier, lastUserMessage } from './intent-classifier';

/**
 * Transition function of the routing state machine.
 *
 * ROUTER sends every analysis request through SCHEDULER first; only requests with
 * no keyword go straight to ASSISTANT. The risk stages always hand off to
 * REPORTING. DONE is absorbing.
 */
export function nextState(
  current: PipelineState,
  transcript: Transcript,
  classifier: IntentClassifier
): PipelineState {
  switch (current) {
    case PipelineState.ROUTER: {
      const message = lastUserMessage(transcript);
      const target = classifier.classifyRequest(message?.content ?? '');
      return target === PipelineState.ASSISTANT ? PipelineState.ASSISTANT : PipelineState.SCHEDULER;
    }
    case PipelineState.SCHEDULER:
      return classifier.classifyFollowUp(transcript);
    case PipelineState.POLITICAL:
    case PipelineState.TARIFF:
    case PipelineState.LOGISTICS:
      return PipelineState.REPORTING;
    case PipelineState.REPORTING:
    case PipelineState.ASSISTANT:
    case PipelineState.DONE:
      return PipelineState.DONE;
  }
}

/**
 * States a turn will visit for a transcript whose stages add no user messages
 */
export function plannedRoute(transcript: Transcript, classifier: IntentClassifier): PipelineState[] {
  const route: PipelineState[] = [];
  let state = nextState(PipelineState.ROUTER, transcript, classifier);
  while (state !== PipelineState.DONE) {
    route.push(state);
    state = nextState(state, transcript, classifier);
  }
  route.push(PipelineState.DONE);
  return route;
}
