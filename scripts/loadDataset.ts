import 'dotenv/config';
import fs from 'node:fs/promises';
import path from 'node:path';
import { loadConfig } from '../src/config.js';
import { connectToDatabase, disconnectFromDatabase } from '../src/lib/db.js';
import { loadDataset } from '../src/lib/dataset.js';

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npm run load-dataset -- <path/to/exercises.csv>');
    process.exit(1);
  }

  const csv = await fs.readFile(path.resolve(process.cwd(), file));
  await connectToDatabase(loadConfig());

  try {
    const result = await loadDataset(csv);
    console.log(`[Dataset] ${result.loaded}/${result.total} rows loaded, ${result.skipped} skipped`);
  } finally {
    await disconnectFromDatabase();
  }
}

main().catch((err) => {
  console.error('❌ Dataset load failed:', err);
  process.exit(1);
});
