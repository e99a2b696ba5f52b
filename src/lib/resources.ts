/**
 * Locate files shipped beside the package (prompt templates). The lookup walks
 * up from this module, so it works from both src/ and the compiled dist/ tree.
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { ConfigurationError } from './errors';

export function findResourceDir(name: string, start: string = __dirname): string {
  let dir = start;
  for (;;) {
    const candidate = join(dir, 'resources', name);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ConfigurationError(`Resource directory "resources/${name}" not found`, { start });
    }
    dir = parent;
  }
}
