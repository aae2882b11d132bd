export interface PagerPort {
  page(filePath: string): Promise<void>;
}
