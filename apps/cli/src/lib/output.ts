import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class OutputFormatter {
  constructor(private options: OutputOptions) {}

  // Output structured data; text mode uses the formatter when given
  output<T>(data: T, textFormatter?: (data: T) => string): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data));
        break;
      case "table":
        if (Array.isArray(data)) {
          this.printTable(data.filter(isRecord));
        } else if (isRecord(data)) {
          this.printObjectTable(data);
        } else {
          console.log(formatValue(data));
        }
        break;
      default:
        console.log(textFormatter ? textFormatter(data) : data);
    }
  }

  // Print array as table
  printTable(rows: Array<Record<string, unknown>>): void {
    const firstRow = rows[0];
    if (!firstRow) {
      console.log("(empty)");
      return;
    }

    const cols = Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => String(row[c] ?? "")));
    }

    console.log(table.toString());
  }

  // Print object as key-value table
  printObjectTable(obj: Record<string, unknown>): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    console.log(table.toString());
  }

  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green("✓"), message);
    }
  }

  // Errors are printed even in quiet mode
  error(message: string): void {
    console.error(chalk.red("✗"), message);
  }

  warn(message: string): void {
    if (!this.options.quiet) {
      console.warn(chalk.yellow("⚠"), message);
    }
  }

  debug(message: string): void {
    if (this.options.verbose) {
      console.log(chalk.gray("⋯"), chalk.gray(message));
    }
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("—");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

// Helper to create formatter from global command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  const format = options.format ?? "text";
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output format "${format}" (expected ${OUTPUT_FORMATS.join("|")})`);
  }
  return new OutputFormatter({
    format,
    quiet: options.quiet ?? false,
    verbose: options.verbose ?? false,
  });
}
