export { DayRunner, type DayContext, type DayRunnerDeps, type DayRunnerOptions } from './day-runner.js';
export { CrawlOrchestrator, type CrawlRunOptions, type DayRunnerLike } from './orchestrator.js';
