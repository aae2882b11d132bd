import { describe, it, expect } from 'vitest';
import {
  formatTranscriptFooter,
  formatTranscriptHeader,
} from '../../../src/domain/value-objects/TranscriptFrame.js';
import type { SessionRecord } from '../../../src/domain/entities/SessionRecord.js';

const SEP = '='.repeat(50);

const record: SessionRecord = {
  id: '20240105_090307',
  timestamp: '2024-01-05T09:03:07.000Z',
  project: 'webapp',
  methodology: 'command-based',
  working_directory: '/work/webapp',
  command: 'claude --help',
  log_file: '/logs/claude_webapp_command-based_20240105_090307.log',
  duration: null,
  end_time: null,
  features_worked_on: [],
  creative_energy: null,
};

describe('TranscriptFrame', () => {
  it('writes the header block followed by a blank line', () => {
    expect(formatTranscriptHeader(record)).toBe(
      '=== Claude CLI Session Started ===\n'
      + 'Timestamp: 2024-01-05T09:03:07.000Z\n'
      + 'Project: webapp\n'
      + 'Methodology: command-based\n'
      + 'Working Directory: /work/webapp\n'
      + 'Command: claude --help\n'
      + `${SEP}\n\n`,
    );
  });

  it('writes the footer with two-decimal duration', () => {
    expect(formatTranscriptFooter('2024-01-05T09:05:07.000Z', 120)).toBe(
      `\n\n${SEP}\n`
      + '=== Claude CLI Session Ended ===\n'
      + 'End Time: 2024-01-05T09:05:07.000Z\n'
      + 'Duration: 120.00 seconds\n'
      + `${SEP}\n`,
    );
  });
});
