import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { DaemonConfigContract } from './variants/types.js';

/**
 * Write the full daemon config (credentials included) for the daemon
 * process. The file is readable by its owner only.
 */
export async function writeDaemonConfig(config: DaemonConfigContract, filePath: string): Promise<void> {
  const content = config.dumpString();
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, { mode: 0o600 });
}
