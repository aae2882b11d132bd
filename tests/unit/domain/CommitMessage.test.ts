import { describe, it, expect } from 'vitest';
import { formatCommitMessage } from '../../../src/domain/value-objects/CommitMessage.js';
import type { SessionRecord } from '../../../src/domain/entities/SessionRecord.js';

function record(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: '20240105_090307',
    timestamp: '2024-01-05T09:03:07.000Z',
    project: 'webapp',
    methodology: 'context-driven',
    working_directory: '/work/webapp',
    command: 'claude',
    log_file: '/logs/x.log',
    duration: 90,
    end_time: '2024-01-05T09:04:37.000Z',
    features_worked_on: [],
    creative_energy: null,
    ...overrides,
  };
}

describe('formatCommitMessage', () => {
  it('omits energy when not captured', () => {
    expect(formatCommitMessage(record())).toBe(
      'context-driven: webapp (1.5min)\n\nSession ID: 20240105_090307\nCommand: claude\n',
    );
  });

  it('appends energy glyphs when captured', () => {
    expect(formatCommitMessage(record({ creative_energy: 3, duration: 600 }))).toBe(
      'context-driven: webapp (10.0min) | Energy: 🔋🔋🔋\n\nSession ID: 20240105_090307\nCommand: claude\n',
    );
  });

  it('treats a missing duration as zero', () => {
    const first = formatCommitMessage(record({ duration: null })).split('\n')[0];
    expect(first).toBe('context-driven: webapp (0.0min)');
  });
});
