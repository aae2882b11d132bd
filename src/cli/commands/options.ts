import { InvalidArgumentError } from 'commander';
import { isMethodology, METHODOLOGIES, type Methodology } from '../../domain/entities/SessionRecord.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters/SessionFormatter.js';

/** commander option parser：輸出格式 */
export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parseMethodology(value: string): Methodology {
  if (!isMethodology(value)) {
    throw new InvalidArgumentError(`Expected one of: ${METHODOLOGIES.join(', ')}`);
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return n;
}
