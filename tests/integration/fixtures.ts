import type { SessionRecord } from '../../src/domain/entities/SessionRecord.js';
import { Logger } from '../../src/shared/Logger.js';

export function makeRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: '20240105_090307',
    timestamp: '2024-01-05T09:03:07.000Z',
    project: 'webapp',
    methodology: 'context-driven',
    working_directory: '/work/webapp',
    command: 'claude',
    log_file: '/logs/claude_webapp_context-driven_20240105_090307.log',
    duration: 120,
    end_time: '2024-01-05T09:05:07.000Z',
    features_worked_on: [],
    creative_energy: null,
    ...overrides,
  };
}

/** 收集 log 行，方便斷言 warn / error */
export function memoryLogger(level: 'debug' | 'warn' | 'error' = 'warn'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger('test', level, (line) => lines.push(line)), lines };
}
