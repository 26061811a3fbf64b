/**
 * Create a new tax-year folder under TAX_DATA_DIR
 * Run with: npx tsx server/scripts/scaffoldTaxYear.ts <year> [--from <year>]
 */

import dotenv from 'dotenv';
import { getTaxDataDir } from '../src/config/env.js';
import { scaffoldTaxYear } from '../src/tax/config/scaffold.js';

dotenv.config();

function parseArgs(args: string[]): { year: number; fromYear?: number } | null {
  const [yearArg, ...rest] = args;
  const year = Number(yearArg);
  if (!yearArg || !Number.isInteger(year)) {
    return null;
  }

  if (rest.length === 0) {
    return { year };
  }
  if (rest.length === 2 && rest[0] === '--from' && Number.isInteger(Number(rest[1]))) {
    return { year, fromYear: Number(rest[1]) };
  }
  return null;
}

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  if (args === null) {
    console.error('Usage: scaffoldTaxYear <year> [--from <year>]');
    return 2;
  }

  const result = scaffoldTaxYear({ dataDir: getTaxDataDir(), ...args });

  console.log(`Created ${result.yearDir} (${result.mode})`);
  result.files.forEach(file => console.log(`  ${file}`));
  console.log('\nRecord the published figures in validation.json, then run validateTaxYear.');
  return 0;
}

try {
  process.exitCode = main();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
