/**
 * Database Setup Script
 *
 * Creates the state store schema by running migrations.
 * Usage: npm run build && npm run db:setup (from the repository root)
 */

import fs from 'fs';
import path from 'path';
import pg from 'pg';
import dotenv from 'dotenv';

// Load environment
dotenv.config();

const { Client } = pg;

const MIGRATIONS_DIR = path.resolve('src/infrastructure/database/migrations');

async function runMigrations(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    console.error('❌ DATABASE_URL environment variable is required');
    process.exitCode = 1;
    return;
  }

  const client = new Client({
    connectionString: databaseUrl,
  });

  try {
    console.log('🔌 Connecting to database...');
    await client.connect();
    console.log('✅ Connected successfully');

    // Get migration files
    const files = fs
      .readdirSync(MIGRATIONS_DIR)
      .filter(f => f.endsWith('.sql'))
      .sort();

    if (files.length === 0) {
      console.log('⚠️ No migration files found');
      return;
    }

    console.log(`\n📁 Found ${files.length} migration file(s):\n`);
    files.forEach(f => console.log(`   - ${f}`));
    console.log('');

    // Run each migration
    for (const file of files) {
      const filePath = path.join(MIGRATIONS_DIR, file);
      const sql = fs.readFileSync(filePath, 'utf-8');

      console.log(`⏳ Running migration: ${file}...`);
      const start = Date.now();

      try {
        await client.query(sql);
        console.log(`✅ Completed: ${file} (${Date.now() - start}ms)`);
      } catch (error) {
        console.error(`❌ Failed: ${file}`);
        throw error;
      }
    }

    console.log('\n🎉 All migrations completed successfully!\n');
  } catch (error) {
    console.error('\n❌ Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await client.end();
    console.log('\n🔌 Database connection closed');
  }
}

// Run migrations
runMigrations().catch((error: unknown) => {
  console.error('❌ Unexpected error:', error);
  process.exitCode = 1;
});
