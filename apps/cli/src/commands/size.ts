import * as path from "node:path";
import { directorySize, SIZE_STRATEGIES, type SizeStrategy } from "@bytetools/dir-size";
import { formatSize } from "@bytetools/encoding";
import { type Command, Option } from "commander";
import { loadConfig } from "../lib/config";
import { createFormatter } from "../lib/output";
import type { GlobalOptions } from "../program";

function parseStrategy(value: string): SizeStrategy {
  const strategy = SIZE_STRATEGIES.find((s) => s === value);
  if (!strategy) {
    throw new Error(`Unknown strategy "${value}" (expected ${SIZE_STRATEGIES.join(" or ")})`);
  }
  return strategy;
}

export function registerSizeCommand(program: Command): void {
  program
    .command("size <path>")
    .description("Compute the total size of a directory tree")
    .addOption(
      new Option(
        "-s, --strategy <strategy>",
        "nested: file contents only; flat: also count directory entries"
      ).choices(SIZE_STRATEGIES)
    )
    .action((target: string, cmdOpts: { strategy?: string }) => {
      const formatter = createFormatter(program.opts<GlobalOptions>());
      const config = loadConfig((reason) => formatter.warn(reason));
      const strategy = parseStrategy(cmdOpts.strategy ?? config.strategy);
      const root = path.resolve(target);

      formatter.debug(`Strategy: ${strategy}`);

      const result = directorySize(root, {
        strategy,
        onError: (error) => formatter.warn(error.message),
      });

      if (!result.ok) {
        formatter.debug(`Partial total: ${result.partial.totalBytes} bytes`);
        throw new Error(result.error.message);
      }

      const report = result.value;
      formatter.output(
        {
          path: report.root,
          strategy: report.strategy,
          totalBytes: report.totalBytes,
          files: report.files,
          directories: report.directories,
          skipped: report.skipped,
          errors: report.errors.length,
        },
        () => {
          const lines = [
            `Path:         ${report.root}`,
            `Strategy:     ${report.strategy}`,
            `Total:        ${formatSize(report.totalBytes, { exact: true })}`,
            `Files:        ${report.files}`,
            `Directories:  ${report.directories}`,
            `Skipped:      ${report.skipped}`,
            `Errors:       ${report.errors.length}`,
          ];
          return lines.join("\n");
        }
      );
    });
}
