import { defineConfig } from 'drizzle-kit';

// The worker owns only the outbox table; the customer tables are read-only
// mirrors of the system-of-record and are migrated by the upstream service.
const dbUrl = process.env.DATABASE_URL;

if (!dbUrl) {
  throw new Error('DATABASE_URL is not set. Point it at the customer database.');
}

export default defineConfig({
  out: './migrations',
  schema: './shared/outbox-schema.ts',
  dialect: 'postgresql',
  dbCredentials: {
    url: dbUrl,
  },
});
