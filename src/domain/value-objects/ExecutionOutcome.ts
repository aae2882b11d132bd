/** 使用者中斷時回報的結束碼（128 + SIGINT） */
export const INTERRUPTED_EXIT_CODE = 130;

/** 委派執行的結果：正常結束（任意結束碼）或被中斷 */
export type ExecutionOutcome =
  | { kind: 'exited'; exitCode: number }
  | { kind: 'interrupted' };

export function exitCodeOf(outcome: ExecutionOutcome): number {
  return outcome.kind === 'interrupted' ? INTERRUPTED_EXIT_CODE : outcome.exitCode;
}
