import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ConfigSchema = z.object({
  port: z.number().int().nonnegative().max(65535).default(8080),
  host: z.string().min(1).default("0.0.0.0"),
  bodyLimit: z.string().min(1).default("1mb"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "silent"])
    .default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (config) {
    return config;
  }

  const rawConfig = {
    port: process.env.PORT ? parseInt(process.env.PORT, 10) : undefined,
    host: process.env.HOST || undefined,
    bodyLimit: process.env.BODY_LIMIT || undefined,
    logLevel: process.env.LOG_LEVEL || undefined,
    nodeEnv: process.env.NODE_ENV || undefined,
  };

  config = ConfigSchema.parse(rawConfig);
  return config;
}
