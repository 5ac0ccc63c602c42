export { Processor } from './processor';
export type { ProcessorDependencies, ProcessorStats } from './processor';
export { Collector } from './collector';
export type { CollectorConfig, CollectorStats } from './collector';
export { IngestionBuffer } from './ingestion-buffer';
export type { BufferStats, IngestionBufferConfig, KindStats } from './ingestion-buffer';
export { RingBuffer } from './ring-buffer';
export { MetricAggregator, quantile } from './aggregator';
export type { AggregatorConfig, AggregatorStats } from './aggregator';
export { SpanAssembler, assembleTrace } from './span-assembler';
export type { SpanAssemblerConfig, SpanAssemblerStats } from './span-assembler';
export { AlertEvaluator, compare, readStatistic, ruleSeriesKey } from './alert-evaluator';
export type { AlertEvaluatorConfig, AlertEvaluatorStats } from './alert-evaluator';
export { ExportDispatcher, backoffDelay } from './export-dispatcher';
export type { ExportDispatcherConfig, ExportSink, LaneStats, RetryBackoff } from './export-dispatcher';
export { HealthRegistry } from './health-registry';
export { FileDeadLetterLog, LoggerDeadLetterLog, MemoryDeadLetterLog } from './dead-letter';
export type { DeadLetterEntry, DeadLetterLog } from './dead-letter';
export { LogNotifier, WebhookNotifier } from './notifiers';
export type { AlertNotifier } from './notifiers';
export { ConsoleSink, FileSink, HttpSink, createSink, toJsonLines } from './sinks';
export { loadAlertRules, parseAlertRules } from './rules';
export { loadEnvFile } from './env';
export { systemClock, sleep } from './clock';
export type { Clock, Sleep } from './clock';
export { logger, componentLogger } from './logger';
export type { Logger } from './logger';
