// Runs one category of tests, selected by file suffix:
//   tsx scripts/run-tests.ts <unit|integration|system|regression>

import { spawnSync } from 'node:child_process';
import { resolve } from 'node:path';

const CATEGORIES = ['unit', 'integration', 'system', 'regression'] as const;

type Category = (typeof CATEGORIES)[number];

function isCategory(value: string | undefined): value is Category {
  return CATEGORIES.some((category) => category === value);
}

const category = process.argv[2];
if (!isCategory(category)) {
  console.error(`Usage: tsx scripts/run-tests.ts <${CATEGORIES.join('|')}>`);
  process.exit(1);
}

const vitest = resolve('node_modules', '.bin', process.platform === 'win32' ? 'vitest.cmd' : 'vitest');
// Vitest treats positional arguments as file name filters.
const result = spawnSync(vitest, ['run', `.${category}.test.ts`], { stdio: 'inherit' });
if (result.error) {
  console.error(result.error.message);
  process.exit(1);
}
process.exit(result.status ?? 1);
