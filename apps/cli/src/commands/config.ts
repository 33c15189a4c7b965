import type { Command } from "commander";
import {
  CONFIG_KEYS,
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../lib/config";
import { createFormatter } from "../lib/output";
import type { GlobalOptions } from "../program";

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage CLI defaults");

  config
    .command("list")
    .alias("ls")
    .description("Show all configuration values")
    .action(() => {
      const formatter = createFormatter(program.opts<GlobalOptions>());
      const cfg = loadConfig((reason) => formatter.warn(reason));

      const rows = CONFIG_KEYS.map((key) => ({ key, value: String(cfg[key]) }));
      formatter.output(rows, () =>
        rows.map((row) => `${row.key.padEnd(10)} ${row.value}`).join("\n")
      );
    });

  config
    .command("set <key> <value>")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")})`)
    .action((key: string, value: string) => {
      const formatter = createFormatter(program.opts<GlobalOptions>());

      const cfg = loadConfig((reason) => formatter.warn(reason));
      setConfigValue(cfg, key, value);
      saveConfig(cfg);

      formatter.success(`Set ${key} = ${value}`);
    });

  config
    .command("get <key>")
    .description("Get a configuration value")
    .action((key: string) => {
      const formatter = createFormatter(program.opts<GlobalOptions>());

      const value = getConfigValue(loadConfig(), key);
      if (value === undefined) {
        throw new Error(`Configuration key "${key}" not found`);
      }

      formatter.output({ [key]: value }, () => value);
    });

  config
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      const formatter = createFormatter(program.opts<GlobalOptions>());
      const configPath = getConfigPath();
      formatter.output({ path: configPath }, () => configPath);
    });
}
