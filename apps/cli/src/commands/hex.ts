import * as fs from "node:fs";
import { decodeHex, encodeHex } from "@bytetools/encoding";
import type { Command } from "commander";
import { loadConfig } from "../lib/config";
import { createFormatter } from "../lib/output";
import type { GlobalOptions } from "../program";

export function registerHexCommands(program: Command): void {
  const hex = program.command("hex").description("Hexadecimal encode/decode");

  hex
    .command("encode [text]")
    .description("Encode UTF-8 text, or a file's bytes, as hex")
    .option("--file <path>", "encode the contents of a file")
    .option("--lower", "use lowercase digits")
    .option("--upper", "use uppercase digits")
    .action(
      (text: string | undefined, cmdOpts: { file?: string; lower?: boolean; upper?: boolean }) => {
        const formatter = createFormatter(program.opts<GlobalOptions>());
        const config = loadConfig((reason) => formatter.warn(reason));

        let data: Uint8Array;
        if (cmdOpts.file !== undefined) {
          data = fs.readFileSync(cmdOpts.file);
        } else if (text !== undefined) {
          data = new TextEncoder().encode(text);
        } else {
          throw new Error("Nothing to encode: pass text or --file <path>");
        }

        const uppercase = cmdOpts.lower ? false : cmdOpts.upper ? true : config.uppercase;
        const result = encodeHex(data, uppercase);
        if (!result.ok) {
          throw new Error(`Encoding failed: ${result.error.message}`);
        }

        const encoded = result.value;
        formatter.output({ hex: encoded, length: data.length }, () => encoded);
        formatter.debug(`Encoded ${data.length} bytes (${uppercase ? "upper" : "lower"}case)`);
      }
    );

  hex
    .command("decode <hex>")
    .description("Decode a hex string")
    .option("--utf8", "print the decoded bytes as UTF-8 text")
    .option("-o, --out <path>", "write the decoded bytes to a file")
    .action((input: string, cmdOpts: { utf8?: boolean; out?: string }) => {
      const formatter = createFormatter(program.opts<GlobalOptions>());

      const result = decodeHex(input);
      if (!result.ok) {
        throw new Error(`Invalid hex input: ${result.error.message}`);
      }

      const bytes = result.value;
      if (cmdOpts.out !== undefined) {
        fs.writeFileSync(cmdOpts.out, bytes);
        formatter.success(`Wrote ${bytes.length} bytes to ${cmdOpts.out}`);
        return;
      }

      if (cmdOpts.utf8) {
        const text = new TextDecoder().decode(bytes);
        formatter.output({ text, length: bytes.length }, () => text);
        return;
      }

      const values = Array.from(bytes);
      formatter.output({ bytes: values, length: values.length }, () => values.join(" "));
    });

  hex
    .command("check <hex>")
    .description("Validate a hex string")
    .action((input: string) => {
      const formatter = createFormatter(program.opts<GlobalOptions>());

      const result = decodeHex(input);
      if (!result.ok) {
        throw new Error(`Invalid hex input: ${result.error.message}`);
      }

      const length = result.value.length;
      formatter.output({ valid: true, length }, () => `Valid hex (${length} bytes)`);
    });
}
