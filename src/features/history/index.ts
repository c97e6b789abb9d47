export { createHistory, recordHistory, summarizeHistory, formatHistorySummary } from './history';
export * from './types';
