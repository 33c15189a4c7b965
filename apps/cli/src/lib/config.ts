import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { SIZE_STRATEGIES } from "@bytetools/dir-size";
import { z } from "zod";

const ConfigSchema = z.object({
  /** Default strategy for `bytetools size` */
  strategy: z.enum(["flat", "nested"]).default("nested"),
  /** Default letter case for `bytetools hex encode` */
  uppercase: z.boolean().default(true),
});

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ["strategy", "uppercase"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function getBytetoolsDir(): string {
  return process.env.BYTETOOLS_HOME || path.join(os.homedir(), ".bytetools");
}

export function getConfigPath(): string {
  return path.join(getBytetoolsDir(), "config.json");
}

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load the user config. A missing, unparsable or invalid file yields the
 * defaults; the reason is passed to `onInvalid` when given.
 */
export function loadConfig(onInvalid?: (reason: string) => void): Config {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    onInvalid?.(`Cannot read ${configPath}: ${reason}`);
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    onInvalid?.(`Invalid ${configPath}: ${issues.join("; ")}`);
    return defaultConfig();
  }
  return parsed.data;
}

export function saveConfig(config: Config): void {
  const dir = getBytetoolsDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

export function setConfigValue(config: Config, key: string, value: string): void {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key} (expected ${CONFIG_KEYS.join(", ")})`);
  }

  switch (key) {
    case "strategy": {
      const strategy = SIZE_STRATEGIES.find((s) => s === value);
      if (!strategy) {
        throw new Error(
          `Invalid value for strategy: ${value} (expected ${SIZE_STRATEGIES.join(" or ")})`
        );
      }
      config.strategy = strategy;
      break;
    }
    case "uppercase":
      if (value !== "true" && value !== "false") {
        throw new Error(`Invalid value for uppercase: ${value} (expected true or false)`);
      }
      config.uppercase = value === "true";
      break;
  }
}

export function getConfigValue(config: Config, key: string): string | undefined {
  if (!isConfigKey(key)) return undefined;
  return String(config[key]);
}
