export interface VersionControlPort {
  /**
   * 確保 dir 為 repository；已存在時不執行任何指令
   * @returns 本次是否進行了初始化
   */
  ensureRepository(dir: string): Promise<boolean>;

  /**
   * 僅 stage 指定檔案並 commit
   * @returns short commit hash；任一步驟失敗時為 null
   */
  commit(dir: string, files: string[], message: string): Promise<string | null>;

  /** 最近 count 筆 commit 的單行摘要；失敗時為 null */
  history(dir: string, count: number): Promise<string | null>;
}
