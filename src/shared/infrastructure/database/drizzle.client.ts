import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export const createPostgresClient = (connectionString: string) =>
  postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

export type PostgresClient = ReturnType<typeof createPostgresClient>;

export const createDrizzleClient = (client: PostgresClient) => {
  return drizzle(client, { schema });
};

export type DrizzleClient = ReturnType<typeof createDrizzleClient>;
