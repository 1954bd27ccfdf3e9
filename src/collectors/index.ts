/**
 * Collectors appended to every registry snapshot.
 */

export { ProcessCollector, type ProcessCollectorConfig } from './process-collector';
