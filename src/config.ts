import "dotenv/config";
import { z } from "zod";

const Env = z.object({
  DB_FILE: z.string().min(1).default("./data.sqlite3"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  SEED_FILE: z.string().min(1).optional(),
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

export type Config = z.infer<typeof Env>;

export const config: Config = Env.parse(process.env);
