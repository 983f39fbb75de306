import type { Knex } from "knex";
import { getPgDb, closeAll } from "./connector";
import { config } from "../config";

export const dbMain: Knex = getPgDb(config.dbMainUrl);

export async function closeAllDbs(): Promise<void> {
  await closeAll();
}
