import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Read a file from tests/fixtures
 */
export function readFixture(name: string): string {
    return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8');
}
