/**
 * Run the automated schedule analysis once, without the HTTP server
 *
 * Usage: npm run build && npm run workflow
 */

// Load environment variables
import * as dotenv from 'dotenv';
dotenv.config();

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WorkflowService, workflowSessionId } from '@risk-router/agent/api';
import { AppModule } from './app/app.module';

async function runWorkflow(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['log', 'error', 'warn'] });

  try {
    const now = new Date();
    const result = await app.get(WorkflowService).run(workflowSessionId(now), now);
    Logger.log(`Workflow ${result.workflowRunId} finished (conversation ${result.conversationId})`, 'Workflow');
    process.stdout.write(`${result.report}\n`);
  } finally {
    await app.close();
  }
}

runWorkflow().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), 'Workflow');
  process.exitCode = 1;
});
