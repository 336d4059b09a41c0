// src/db/drizzle.ts
import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import { ENV } from "../env";
import * as schema from "./schema";

export const pool = new Pool({ connectionString: ENV.DATABASE_URL });

export const db = drizzle(pool, { schema });

/** Either the pooled database or an open transaction. */
export type Db = PgDatabase<NodePgQueryResultHKT, typeof schema>;
