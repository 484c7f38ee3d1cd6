import { join } from 'node:path';
import { homedir } from 'node:os';

/** Leading spaces per nesting level in markdown documents */
export const DEFAULT_INDENT_WIDTH = 4;

const STORE_FILE = 'tasks.jsonl';

/** Returns the platform-appropriate default store path */
export function getDefaultStorePath(): string {
  const override = process.env['TASKSYNC_STORE'];
  if (override) return override;

  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'tasksync');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'tasksync');
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'tasksync');
  }

  return join(dir, STORE_FILE);
}

/**
 * Indentation width from TASKSYNC_INDENT, falling back to the default
 * when unset or not a positive integer.
 */
export function getIndentWidth(): number {
  const raw = process.env['TASKSYNC_INDENT'];
  if (!raw) return DEFAULT_INDENT_WIDTH;
  const n = Number.parseInt(raw, 10);
  return Number.isInteger(n) && n > 0 ? n : DEFAULT_INDENT_WIDTH;
}
