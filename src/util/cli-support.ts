import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * True when `moduleUrl` is the script Node was started with
 * (also through an npm bin symlink)
 */
export function isEntryPoint(moduleUrl: string, argv1: string | undefined = process.argv[1]): boolean {
  if (!argv1) {
    return false;
  }
  try {
    return realpathSync(argv1) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    // argv[1] that does not exist on disk (node -e, REPL) is never us
    return false;
  }
}

/**
 * Errno code of a failed fs call, if any
 */
export function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
