export { NOTIFIER_REGISTRY, describeNotifierViolation } from './notifier.port';
export type { Notifier } from './notifier.port';
export { OUTPUT_SINK } from './output-sink.port';
export type { OutputSink } from './output-sink.port';
