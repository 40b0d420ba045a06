import postgres from "postgres";

export type Sql = postgres.Sql;

export function createSql(databaseUrl: string, poolSize: number): Sql {
  return postgres(databaseUrl, {
    max: poolSize,
    idle_timeout: 20,
    transform: {
      undefined: null,
    },
  });
}
