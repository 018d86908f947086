/**
 * Routing Tests
 * Keyword precedence, scheduler redirection and the second pass
 */

import { PipelineState, assistantMessage, StageName, Transcript, userMessage } from '@risk-router/shared/types';
import { KeywordIntentClassifier } from './intent-classifier';
import { nextState, plannedRoute } from './routing';

describe('KeywordIntentClassifier', () => {
  const classifier = new KeywordIntentClassifier();

  it.each([
    ['Any POLITICAL issues with our suppliers?', PipelineState.POLITICAL],
    ['tariff and political exposure', PipelineState.POLITICAL],
    ['What tariff applies to transformers?', PipelineState.TARIFF],
    ['Are there shipping delays?', PipelineState.LOGISTICS],
    ['logistics status please', PipelineState.LOGISTICS],
    ['Show the schedule', PipelineState.SCHEDULER],
    ['What is our risk?', PipelineState.SCHEDULER],
    ['hello', PipelineState.ASSISTANT],
    ['Generate a report', PipelineState.ASSISTANT],
  ])('routes %p to %s', (message, target) => {
    expect(classifier.classifyRequest(message)).toBe(target);
  });

  it('classifies the follow-up from the most recent user message', () => {
    const transcript: Transcript = [
      userMessage('political risk please'),
      assistantMessage('POLITICAL_RISK_AGENT > ...', StageName.POLITICAL),
      userMessage('now a shipping check'),
      assistantMessage('SCHEDULER_AGENT > ...', StageName.SCHEDULER),
    ];

    expect(classifier.classifyFollowUp(transcript)).toBe(PipelineState.LOGISTICS);
  });

  it('matches "logistic" without the trailing s on the follow-up pass', () => {
    expect(classifier.classifyFollowUp([userMessage('logistic risk')])).toBe(PipelineState.LOGISTICS);
    expect(classifier.classifyRequest('logistic risk')).toBe(PipelineState.SCHEDULER);
  });

  it('reaches REPORTING only on the follow-up pass', () => {
    expect(classifier.classifyFollowUp([userMessage('schedule report')])).toBe(PipelineState.REPORTING);
  });

  it('finishes when the follow-up has no keyword', () => {
    expect(classifier.classifyFollowUp([userMessage('schedule risk')])).toBe(PipelineState.DONE);
    expect(classifier.classifyFollowUp([])).toBe(PipelineState.DONE);
  });
});

describe('nextState', () => {
  const classifier = new KeywordIntentClassifier();

  it('sends risk stages to REPORTING and terminal stages to DONE', () => {
    const transcript = [userMessage('anything')];
    expect(nextState(PipelineState.POLITICAL, transcript, classifier)).toBe(PipelineState.REPORTING);
    expect(nextState(PipelineState.TARIFF, transcript, classifier)).toBe(PipelineState.REPORTING);
    expect(nextState(PipelineState.LOGISTICS, transcript, classifier)).toBe(PipelineState.REPORTING);
    expect(nextState(PipelineState.REPORTING, transcript, classifier)).toBe(PipelineState.DONE);
    expect(nextState(PipelineState.ASSISTANT, transcript, classifier)).toBe(PipelineState.DONE);
    expect(nextState(PipelineState.DONE, transcript, classifier)).toBe(PipelineState.DONE);
  });
});

describe('plannedRoute', () => {
  const classifier = new KeywordIntentClassifier();
  const route = (message: string) => plannedRoute([userMessage(message)], classifier);

  it('runs political requests through the scheduler and reporting', () => {
    expect(route('Check political risk for Germany')).toEqual([
      PipelineState.SCHEDULER,
      PipelineState.POLITICAL,
      PipelineState.REPORTING,
      PipelineState.DONE,
    ]);
  });

  it('answers greetings with the assistant only', () => {
    expect(route('hello')).toEqual([PipelineState.ASSISTANT, PipelineState.DONE]);
  });

  it('stops after the scheduler for plain schedule questions', () => {
    expect(route('schedule status')).toEqual([PipelineState.SCHEDULER, PipelineState.DONE]);
  });

  it('runs the report after the scheduler when a schedule request asks for one', () => {
    expect(route('schedule risk report')).toEqual([
      PipelineState.SCHEDULER,
      PipelineState.REPORTING,
      PipelineState.DONE,
    ]);
  });
});
