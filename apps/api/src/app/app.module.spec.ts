/**
 * AppModule Tests
 * Whole-module wiring with the model backend and log store replaced in process
 */

import { Test, TestingModule } from '@nestjs/testing';
import { LogTable, StageName } from '@risk-router/shared/types';
import { LOG_STORE_CLIENT, LogStoreService } from '@risk-router/persistence/log-store';
import { MODEL_BACKEND } from '@risk-router/agent/core';
import { InMemoryLogStoreClient } from '../../../../libs/persistence/log-store/src/lib/test-utils/in-memory-log-store.client';
import { ScriptedModelBackend } from '../../../../libs/agent/core/src/test-utils/scripted-model.backend';
import { ChatController, HistoryController } from '@risk-router/agent/api';
import { AppModule } from './app.module';

describe('AppModule', () => {
  let module: TestingModule;
  let backend: ScriptedModelBackend;
  let client: InMemoryLogStoreClient;

  beforeEach(async () => {
    backend = new ScriptedModelBackend();
    client = new InMemoryLogStoreClient();

    module = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(MODEL_BACKEND)
      .useValue(backend)
      .overrideProvider(LOG_STORE_CLIENT)
      .useValue(client)
      .compile();
    module.get(LogStoreService).setRetryDelay(0);
  });

  afterEach(async () => {
    await module.close();
  });

  it('runs a political request through scheduler, political and reporting', async () => {
    const chat = module.get(ChatController);

    const reply = await chat.chat({ sessionId: 'token-1', message: 'Any political risk for our suppliers?' });

    expect(reply.response).toBe('REPORTING_AGENT > Risk Report Writer reply');
    expect(client.rows(LogTable.EVENT).map((row) => row['agent_name'])).toEqual([
      'USER',
      StageName.SCHEDULER,
      StageName.POLITICAL,
      StageName.REPORTING,
    ]);
  });

  it('keeps the conversation id across turns of one session', async () => {
    const chat = module.get(ChatController);

    const first = await chat.chat({ sessionId: 'token-1', message: 'hello' });
    const second = await chat.chat({ sessionId: 'token-1', message: 'hello again' });

    expect(second.conversationId).toBe(first.conversationId);
    expect(backend.requests[1].messages).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'ASSISTANT_AGENT > Equipment Risk Assistant reply' },
      { role: 'user', content: 'hello again' },
    ]);
  });

  it('serves the logged turn back through the history endpoints', async () => {
    const reply = await module.get(ChatController).chat({ sessionId: 'token-1', message: 'hello' });

    const events = await module.get(HistoryController).getConversation(reply.conversationId);

    expect(events.map((event) => event.agent_name)).toEqual(['USER', StageName.ASSISTANT]);
  });
});
