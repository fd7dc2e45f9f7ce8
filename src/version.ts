/**
 * Package identity, read from package.json so the CTCP VERSION reply and the
 * ping announcement always match the released version.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
);

function readField(field: 'name' | 'version', fallback: string): string {
  if (typeof packageJson === 'object' && packageJson !== null && field in packageJson) {
    const value: unknown = Reflect.get(packageJson, field);
    if (typeof value === 'string') return value;
  }
  return fallback;
}

export const NAME: string = readField('name', 'webhook-irc-bridge');
export const VERSION: string = readField('version', '0.0.0');

/**
 * Human readable runtime description, e.g. `linux Node.js/v20.11.0`
 */
export function describeRuntime(): string {
  return `${process.platform} Node.js/${process.version}`;
}
