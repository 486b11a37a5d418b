import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

/** Writes a session's WAV container to `<outputDir>/asr_<sessionId>_<uuid>.wav`. */
export async function saveContainer(outputDir: string, sessionId: string, wav: Buffer): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const safeId = sessionId.replace(/[^\w.-]/g, '_');
  const filePath = path.join(outputDir, `asr_${safeId}_${randomUUID()}.wav`);
  await writeFile(filePath, wav);
  return filePath;
}
