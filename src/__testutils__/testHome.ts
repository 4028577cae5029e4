/**
 * Throwaway client directories for tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Create an empty temp directory; remove it with `removeTestHome`.
 */
export function createTestHome(prefix = 'pwvault-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTestHome(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
