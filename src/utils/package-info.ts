import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

export interface PackageInfo {
  version: string;
  description: string;
}

const packageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Finds the nearest package.json above this file, so the lookup works from
 * both src/ and dist/.
 */
export function getPackageInfo(startDir = dirname(fileURLToPath(import.meta.url))): PackageInfo {
  let dir = startDir;

  while (true) {
    try {
      const content = readFileSync(join(dir, 'package.json'), 'utf-8');
      const pkg = packageJsonSchema.safeParse(JSON.parse(content));
      if (pkg.success && pkg.data.name === 'matrixrun' && pkg.data.version) {
        return { version: pkg.data.version, description: pkg.data.description ?? '' };
      }
    } catch {
      // No readable package.json here
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { version: '0.0.0', description: '' };
}
