import { z } from "zod";
import { isValidTimeZone } from "@/lib/dates";

const optionalText = z
  .string()
  .trim()
  .transform((val) => (val === "" ? undefined : val))
  .optional();

const configSchema = z.object({
  HOST: z.string().trim().min(1).default("127.0.0.1"),
  PORT: z.preprocess(
    (val) => (typeof val === "string" && val.trim() === "" ? undefined : val),
    z.coerce.number().int().min(0).max(65535).default(8000),
  ),
  EXPENSES_DB_PATH: z.string().trim().min(1).default("data/expenses.db"),
  EXPENSES_STATIC_DIR: z.string().trim().min(1).default("public"),
  EXPENSES_TIME_ZONE: optionalText.refine(
    (val) => val === undefined || isValidTimeZone(val),
    { message: "Unknown time zone" },
  ),
  EXPENSES_REQUEST_LOG: z
    .enum(["on", "off"])
    .default("on")
    .transform((val) => val === "on"),
});

export type AppConfig = {
  host: string;
  port: number;
  databasePath: string;
  staticDir: string;
  timeZone?: string;
  requestLog: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    databasePath: parsed.EXPENSES_DB_PATH,
    staticDir: parsed.EXPENSES_STATIC_DIR,
    timeZone: parsed.EXPENSES_TIME_ZONE,
    requestLog: parsed.EXPENSES_REQUEST_LOG,
  };
}
