/**
 * Utility to load .env file from project root
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Find project root by looking for .env file
 * Starts from the given location and goes up
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from the nearest .env file above this module,
 * falling back to the working directory. Returns the file that was used.
 */
export function loadEnvFromRoot(): string | null {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const projectRoot = findProjectRoot(moduleDir);

  if (projectRoot) {
    const envPath = join(projectRoot, '.env');
    dotenv.config({ path: envPath });
    return envPath;
  }

  dotenv.config();
  return null;
}
