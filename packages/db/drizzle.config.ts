import { defineConfig } from 'drizzle-kit';

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error('DATABASE_URL environment variable is required');
}

export default defineConfig({
  schema: [
    './src/schema/users.ts',
    './src/schema/warehouse.ts',
    './src/schema/requisitions.ts',
    './src/schema/audit.ts',
  ],
  schemaFilter: ['auth', 'warehouse', 'requisitions', 'audit'],
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: databaseUrl,
  },
  verbose: true,
  strict: true,
});
