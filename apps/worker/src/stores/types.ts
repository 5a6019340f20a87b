import type { Pool } from "pg";

export type Db = Pick<Pool, "query">;

export interface Expirable {
  readonly collection: string;
  purgeExpired(now: Date): Promise<number>;
}
