import { mkdirSync, mkdtempSync } from 'fs';
import { join } from 'path';

// Each test file gets its own registry home, so files can run in parallel.
const testRoot = join(process.cwd(), '.tmp-test-db');
mkdirSync(testRoot, { recursive: true });

process.env.COHORT_REGISTRY_HOME = mkdtempSync(join(testRoot, 'registry-'));
