import fs from 'fs/promises';
import path from 'path';
import { createLogger, errorMessage } from '../../logger.js';

const log = createLogger('debug');

/** Dumps a fetched document for offline inspection. A missing `debugDir` disables it. */
export async function writeDebugFile(debugDir: string | undefined, fileName: string, content: string): Promise<void> {
  if (!debugDir) {
    return;
  }
  try {
    await fs.mkdir(debugDir, { recursive: true });
    await fs.writeFile(path.join(debugDir, fileName), content, 'utf-8');
    log.debug(`Wrote ${path.join(debugDir, fileName)}`);
  } catch (error) {
    log.warn(`Failed to write debug file ${fileName}: ${errorMessage(error)}`);
  }
}
