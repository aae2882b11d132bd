import * as clack from '@clack/prompts';
import type { EnergyPromptPort } from '../../domain/ports/EnergyPromptPort.js';

const SCALE = [
  '1 🔋     - Depleted',
  '2 🔋🔋   - Neutral',
  '3 🔋🔋🔋 - Energized',
].join('\n');

export class ClackEnergyPrompt implements EnergyPromptPort {
  async ask(attempt: number): Promise<string | null> {
    if (attempt === 1) {
      clack.note(SCALE, 'How would you rate your creative energy after this session?');
    } else {
      clack.log.warn('Please enter 1, 2, or 3');
    }

    const answer = await clack.text({ message: 'Energy level (1-3)', placeholder: '2' });
    if (clack.isCancel(answer)) {
      clack.log.info('Skipping energy tracking');
      return null;
    }
    return answer;
  }
}
