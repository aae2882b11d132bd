import { describe, it, expect } from 'vitest';
import { CommandPagerAdapter } from '../../../src/infrastructure/process/CommandPagerAdapter.js';
import { Logger } from '../../../src/shared/Logger.js';
import { failed, fakeRunner, ok } from './fakes.js';

describe('CommandPagerAdapter', () => {
  it('splits the pager command and appends the file', async () => {
    const { runner, calls } = fakeRunner(() => ok());
    await new CommandPagerAdapter('less -R', new Logger('test', 'error', () => {}), runner).page('/logs/a.log');

    expect(calls).toEqual([{ file: 'less', args: ['-R', '/logs/a.log'], options: { interactive: true } }]);
  });

  it('warns when the pager exits abnormally', async () => {
    const lines: string[] = [];
    const { runner } = fakeRunner(() => failed(2));
    await new CommandPagerAdapter('less', new Logger('test', 'warn', (l) => lines.push(l)), runner).page('/x');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', message: 'Pager exited abnormally', exitCode: 2 });
  });
});
