import fs from 'node:fs';
import path from 'node:path';
import type { Methodology } from '../../domain/entities/SessionRecord.js';

/** 專案內的方法論標記檔（相對於工作目錄） */
export const METHODOLOGY_MARKER = path.join('.claude', 'CLAUDE.md');

/** 依標記檔第一行分類（大小寫敏感） */
export function classifyMarkerLine(firstLine: string): Methodology {
  if (firstLine.includes('Context-Driven')) return 'context-driven';
  if (firstLine.includes('Spec-Driven')) return 'command-based';
  return 'unknown';
}

/**
 * 偵測專案採用的方法論
 *
 * 只看標記檔的第一行，不會往下掃描；標記檔不存在或不是一般檔案時為 unknown。
 */
export function detectMethodology(projectDir: string): Methodology {
  const markerPath = path.join(projectDir, METHODOLOGY_MARKER);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(markerPath);
  } catch {
    return 'unknown';
  }
  if (!stat.isFile()) return 'unknown';

  const content = fs.readFileSync(markerPath, 'utf-8');
  const newline = content.indexOf('\n');
  const firstLine = newline === -1 ? content : content.slice(0, newline);
  return classifyMarkerLine(firstLine);
}
