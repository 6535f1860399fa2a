/**
 * Load demo categories and questions into the quiz database.
 *
 * Usage: npm run seed [-- path/to/catalog.json]
 *
 * Defaults to data/demo-catalog.json. Existing categories and questions are
 * left untouched, so the script can be run repeatedly.
 */

import * as path from 'path';
import { closeDb, getDb } from '../src/lib/db';
import { readCatalogSeed, seedCatalog } from '../src/lib/seed';

function main(): void {
  const seedPath = process.argv[2] ?? path.join(process.cwd(), 'data', 'demo-catalog.json');

  console.log('Loading demo data...');
  console.log(`Source: ${seedPath}\n`);

  const seed = readCatalogSeed(seedPath);
  const report = seedCatalog(getDb(), seed);

  console.log(`Categories: ${report.categoriesCreated} created, ${report.categoriesExisting} already present`);
  console.log(`Questions:  ${report.questionsCreated} created, ${report.questionsExisting} already present`);
  console.log(`Options:    ${report.optionsCreated} created`);
  console.log('\nDemo data loaded.');

  closeDb();
}

main();
