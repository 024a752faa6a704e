import { config } from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Pool } from 'pg';

config({ path: resolve(__dirname, '../.env') });

async function migrate() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    console.error('DATABASE_URL is not set in .env');
    process.exit(1);
  }

  const schema = readFileSync(resolve(__dirname, '../db/schema.sql'), 'utf8');
  const pool = new Pool({ connectionString });

  try {
    // The file contains dollar-quoted function bodies, so it is sent whole rather than split on ';'.
    await pool.query(schema);
    console.log('Schema applied');
  } finally {
    await pool.end();
  }
}

migrate().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
