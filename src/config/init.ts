/**
 * `--init` support: copy the bundled example config into a project.
 */

import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from '../shared/errors.js';

/** The example config shipped beside the package's sources. */
export const EXAMPLE_CONFIG_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'config.example.yaml',
);

/**
 * Create `config/config.yaml` under `cwd` from the example.
 * @returns The path of the created file.
 * @throws ConfigError if the target exists or the example is missing.
 */
export function initConfig(cwd: string, examplePath: string = EXAMPLE_CONFIG_PATH): string {
  const targetPath = resolve(cwd, 'config', 'config.yaml');

  if (existsSync(targetPath)) {
    throw new ConfigError(`Config file already exists at ${targetPath}`);
  }

  if (!existsSync(examplePath)) {
    throw new ConfigError('Example config not found (package may be corrupted)');
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(examplePath, targetPath);
  return targetPath;
}
