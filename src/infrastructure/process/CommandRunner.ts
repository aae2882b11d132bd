import { execa } from 'execa';

export interface CommandResult {
  /** 程序未能啟動或被 signal 終止時為 undefined */
  exitCode: number | undefined;
  signal: string | undefined;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** true = 繼承終端 stdio（互動程序），不擷取輸出 */
  interactive?: boolean;
}

/** 外部程序執行的最小介面，測試時以假實作替換 */
export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

/** 以 execa 執行；非零結束碼不拋例外，由呼叫端判斷 */
export const execaRunner: CommandRunner = async (file, args, options = {}) => {
  if (options.interactive) {
    const result = await execa(file, args, { cwd: options.cwd, stdio: 'inherit', reject: false });
    return { exitCode: result.exitCode, signal: result.signal, stdout: '', stderr: '' };
  }

  const result = await execa(file, args, { cwd: options.cwd, reject: false });
  return {
    exitCode: result.exitCode,
    signal: result.signal,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};
