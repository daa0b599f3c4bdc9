import type { KVBase, Logger, LogPayload } from '../src/index.js';
import { MemoryKVService, SimpleLogger } from '../src/index.js';

export const createTestLogger = (): { logger: Logger; records: LogPayload[] } => {
  const records: LogPayload[] = [];
  const logger = new SimpleLogger({ level: 'debug', console: false });
  logger.addListener((payload) => records.push(payload));
  return { logger, records };
};

export const createTestKv = (): KVBase => new MemoryKVService();
