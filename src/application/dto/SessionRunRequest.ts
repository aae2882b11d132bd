/** 啟動一次紀錄 session 的輸入 */
export interface SessionRunRequest {
  /** session 開始時的工作目錄（專案根目錄） */
  projectDir: string;
  /** 原樣轉交給 assistant 的參數 */
  assistantArgs: string[];
  /** 結束後是否詢問 creative energy */
  trackEnergy: boolean;
}
