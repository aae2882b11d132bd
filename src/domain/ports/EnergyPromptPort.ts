export interface EnergyPromptPort {
  /**
   * 詢問一次 creative energy
   * @param attempt - 第幾次詢問（從 1 開始），大於 1 代表前一次輸入無效
   * @returns 原始輸入文字；使用者中斷時為 null
   */
  ask(attempt: number): Promise<string | null>;
}
