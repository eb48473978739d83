import path from "node:path";
import { z } from "zod";

export class ConfigError extends Error {}

export const settingsSchema = z.object({
  port: z.number().int().min(0).max(65535),
  jsonLimit: z.string().min(1),
  maxUploadBytes: z.number().int().positive(),
  requestLogFormat: z.string().min(1),
  publicDir: z.string().min(1),
  sdkDir: z.string().min(1),
});

export type Settings = z.infer<typeof settingsSchema>;

export const DEFAULT_PORT = 5555;

function defaults(): Settings {
  return {
    port: DEFAULT_PORT,
    jsonLimit: "10mb",
    maxUploadBytes: 10 * 1024 * 1024,
    requestLogFormat: "tiny",
    publicDir: path.resolve(process.cwd(), "public"),
    sdkDir: path.resolve(process.cwd(), "dist", "sdks", "typescript", "src"),
  };
}

export function resolveSettings(partial: Partial<Settings> = {}): Settings {
  const merged: Settings = { ...defaults(), ...partial };
  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid setting ${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const rawPort = env.PORT?.trim();
  if (!rawPort) {
    return resolveSettings();
  }

  const port = Number(rawPort);
  if (!Number.isInteger(port)) {
    throw new ConfigError(`PORT must be an integer, received "${rawPort}"`);
  }
  return resolveSettings({ port });
}
