import type { SessionRecord } from '../entities/SessionRecord.js';
import { energyGlyphs } from './CreativeEnergy.js';

/**
 * session commit 訊息
 *
 *   <methodology>: <project> (<min>min)[ | Energy: 🔋🔋]
 *
 *   Session ID: <id>
 *   Command: <command>
 */
export function formatCommitMessage(record: SessionRecord): string {
  const minutes = (record.duration ?? 0) / 60;
  const energy = record.creative_energy
    ? ` | Energy: ${energyGlyphs(record.creative_energy)}`
    : '';

  return (
    `${record.methodology}: ${record.project} (${minutes.toFixed(1)}min)${energy}\n\n`
    + `Session ID: ${record.id}\n`
    + `Command: ${record.command}\n`
  );
}
