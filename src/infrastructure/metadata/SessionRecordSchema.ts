import { z } from 'zod';
import { METHODOLOGIES, type SessionRecord } from '../../domain/entities/SessionRecord.js';

/**
 * 單筆 session 紀錄的 schema
 * 舊版紀錄可能缺少 end_time / creative_energy / features_worked_on，載入時補預設值
 */
export const SessionRecordSchema: z.ZodType<SessionRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  timestamp: z.string().min(1),
  project: z.string(),
  methodology: z.enum(METHODOLOGIES),
  working_directory: z.string(),
  command: z.string(),
  log_file: z.string().min(1),
  duration: z.number().nonnegative().nullable(),
  end_time: z.string().nullable().default(null),
  features_worked_on: z.array(z.string()).default([]),
  creative_energy: z.number().int().min(1).max(3).nullable().default(null),
});

/** 把 zod 錯誤壓成一行，方便寫進 log */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
