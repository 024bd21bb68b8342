import { Client, Pool, type ClientConfig } from "pg";

export type PgConnectionSettings = {
  databaseUrl: string;
  applicationName: string;
};

export function createPgClient(settings: PgConnectionSettings): Client {
  return new Client(toClientConfig(settings));
}

export function createPgPool(settings: PgConnectionSettings): Pool {
  return new Pool(toClientConfig(settings));
}

function toClientConfig(settings: PgConnectionSettings): ClientConfig {
  return {
    connectionString: settings.databaseUrl,
    application_name: settings.applicationName,
  };
}
