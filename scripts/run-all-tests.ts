/**
 * Unified Test Runner
 *
 * Runs every .test.ts script found in an __tests__ directory under src/,
 * each in its own process, and reports results
 *
 * Usage: npm test
 * Or:    npx tsx scripts/run-all-tests.ts
 */

import { spawn } from 'node:child_process';
import { readdirSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const rootDir = path.join(__dirname, '..');

interface TestResult {
  name: string;
  passed: boolean;
  duration: number;
  output?: string;
  error?: string;
}

/**
 * Run a command and capture output
 */
async function runCommand(
  command: string,
  args: string[],
  cwd: string = rootDir
): Promise<{ code: number; output: string }> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });

    let output = '';
    proc.stdout?.on('data', (data) => { output += data.toString(); });
    proc.stderr?.on('data', (data) => { output += data.toString(); });

    proc.on('error', reject);
    proc.on('close', (code) => {
      resolve({ code: code ?? 1, output });
    });
  });
}

/**
 * Run a single test script under the tsx loader
 */
async function runTest(file: string): Promise<TestResult> {
  const name = path.relative(rootDir, file);
  const startTime = Date.now();

  try {
    const result = await runCommand(process.execPath, ['--import', 'tsx', file]);
    return {
      name,
      passed: result.code === 0,
      duration: Date.now() - startTime,
      output: result.output,
      error: result.code !== 0 ? `Exit code ${result.code}` : undefined
    };
  } catch (err) {
    return {
      name,
      passed: false,
      duration: Date.now() - startTime,
      error: err instanceof Error ? err.message : String(err)
    };
  }
}

/**
 * Find test scripts under a directory
 */
function findTests(dir: string): string[] {
  const found: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...findTests(fullPath));
    } else if (entry.name.endsWith('.test.ts') && path.basename(dir) === '__tests__') {
      found.push(fullPath);
    }
  }
  return found.sort();
}

/**
 * Main test runner
 */
async function main() {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  Access Sync - Test Suite');
  console.log('═══════════════════════════════════════════════════════════\n');

  const results: TestResult[] = [];

  for (const file of findTests(path.join(rootDir, 'src'))) {
    const result = await runTest(file);
    results.push(result);
    console.log(`→ ${result.name}`);
    console.log(result.passed ? '  ✓ Passed' : '  ✗ Failed');
    console.log(`  Duration: ${result.duration}ms\n`);
  }

  printSummary(results);

  const allPassed = results.length > 0 && results.every(r => r.passed);
  process.exit(allPassed ? 0 : 1);
}

/**
 * Print test summary
 */
function printSummary(results: TestResult[]) {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  Test Summary');
  console.log('═══════════════════════════════════════════════════════════\n');

  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  const total = results.length;
  const totalDuration = results.reduce((sum, r) => sum + r.duration, 0);

  console.log(`Tests:    ${passed} passed, ${failed} failed, ${total} total`);
  console.log(`Duration: ${(totalDuration / 1000).toFixed(2)}s\n`);

  if (failed === 0) {
    console.log('✓ All tests passed!');
    return;
  }

  console.log(`✗ ${failed} test file(s) failed`);
  console.log('\nFailed Test Output:\n');
  for (const result of results.filter(r => !r.passed)) {
    console.log(`─── ${result.name} ───`);
    if (result.error) {
      console.log(`Error: ${result.error}`);
    }
    if (result.output) {
      console.log(result.output.slice(-2000));
    }
    console.log('');
  }
}

main().catch((err) => {
  console.error('Test runner failed:', err);
  process.exit(1);
});
