export * from './lib/risk/risk-scoring';
export * from './lib/schedule/schedule-data.service';
export * from './lib/search/searxng.client';
export * from './lib/political/political-risk.parser';
export * from './lib/reporting/report-writer.service';
export * from './lib/tool-definitions';
export * from './lib/tool-registry';
export * from './lib/tools.module';
