import { mkdir, writeFile } from "fs/promises";
import { join, dirname } from "path";
import type { RawTurnPayload } from "../types/data.js";

export type RecordingFormat = "json" | "log";

/**
 * Get the recording directory path for a case file
 */
export function getCaseRecordingDir(
  baseDir: string,
  caseFilePath: string
): string {
  return join(baseDir, caseFilePath);
}

/**
 * Get the path of one case's payload file
 */
export function getCasePayloadPath(
  caseDir: string,
  caseIndex: number,
  format: RecordingFormat = "json"
): string {
  return join(caseDir, `case-${caseIndex}.${format}`);
}

/**
 * Ensure the recording directory exists
 */
export async function ensureRecordingDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a case's raw turn payload, replacing any earlier recording
 */
export async function recordTurnPayload(
  caseDir: string,
  caseIndex: number,
  payload: RawTurnPayload
): Promise<string> {
  const filePath = getCasePayloadPath(caseDir, caseIndex);
  await ensureRecordingDir(dirname(filePath));
  await writeFile(filePath, JSON.stringify(payload, null, 2) + "\n");
  return filePath;
}
