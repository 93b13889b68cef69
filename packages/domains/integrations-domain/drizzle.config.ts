import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'postgresql',
  schema: './drizzle/schema.ts',
  out: './drizzle/migrations',
  schemaFilter: ['integrations'],
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/marketsync',
  },
});
