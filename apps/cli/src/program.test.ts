import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { run } from "./program";

const cli = (...args: string[]) => run(["node", "bytetools", ...args]);

describe("bytetools", () => {
  let home: string;
  let work: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "bytetools-home-"));
    work = fs.mkdtempSync(path.join(os.tmpdir(), "bytetools-work-"));
    process.env.BYTETOOLS_HOME = home;
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.BYTETOOLS_HOME;
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(work, { recursive: true, force: true });
  });

  // ==========================================================================
  // hex
  // ==========================================================================

  describe("hex", () => {
    it("encodes a file's bytes", async () => {
      const input = path.join(work, "input.bin");
      fs.writeFileSync(input, new Uint8Array([0xba, 0xad, 0xf0, 0x0d]));

      expect(await cli("hex", "encode", "--file", input)).toBe(0);
      expect(log).toHaveBeenCalledWith("BAADF00D");
    });

    it("encodes text in lowercase on request", async () => {
      expect(await cli("hex", "encode", "--lower", "hi")).toBe(0);
      expect(log).toHaveBeenCalledWith("6869");
    });

    it("uses the configured letter case", async () => {
      expect(await cli("config", "set", "uppercase", "false")).toBe(0);
      expect(await cli("hex", "encode", "\n")).toBe(0);
      expect(log).toHaveBeenLastCalledWith("0a");
    });

    it("fails when there is nothing to encode", async () => {
      expect(await cli("hex", "encode")).toBe(1);
      expect(error).toHaveBeenCalledWith(
        expect.any(String),
        "Nothing to encode: pass text or --file <path>"
      );
    });

    it("decodes to byte values", async () => {
      expect(await cli("hex", "decode", "BAADF00D")).toBe(0);
      expect(log).toHaveBeenCalledWith("186 173 240 13");
    });

    it("decodes to JSON", async () => {
      expect(await cli("-f", "json", "hex", "decode", "baadf00d")).toBe(0);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ bytes: [186, 173, 240, 13], length: 4 }, null, 2)
      );
    });

    it("decodes to UTF-8 text", async () => {
      expect(await cli("hex", "decode", "--utf8", "6869")).toBe(0);
      expect(log).toHaveBeenCalledWith("hi");
    });

    it("writes decoded bytes to a file", async () => {
      const out = path.join(work, "out.bin");
      expect(await cli("hex", "decode", "BAADF00D", "--out", out)).toBe(0);
      expect(new Uint8Array(fs.readFileSync(out))).toEqual(
        new Uint8Array([0xba, 0xad, 0xf0, 0x0d])
      );
    });

    it("reports odd-length input", async () => {
      expect(await cli("hex", "decode", "ABC")).toBe(1);
      expect(error).toHaveBeenCalledWith(
        expect.any(String),
        "Invalid hex input: Hex string must have even length (got 3)"
      );
    });

    it("reports the position of an invalid character", async () => {
      expect(await cli("hex", "check", "00ZZ")).toBe(1);
      expect(error).toHaveBeenCalledWith(
        expect.any(String),
        "Invalid hex input: Invalid hex character 'Z' at position 2"
      );
    });

    it("accepts valid input in check", async () => {
      expect(await cli("hex", "check", "00ff")).toBe(0);
      expect(log).toHaveBeenCalledWith("Valid hex (2 bytes)");
    });

    it("prints nothing in quiet mode", async () => {
      expect(await cli("-q", "hex", "encode", "hi")).toBe(0);
      expect(log).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // size
  // ==========================================================================

  describe("size", () => {
    beforeEach(() => {
      fs.writeFileSync(path.join(work, "data"), Buffer.alloc(5));
      fs.mkdirSync(path.join(work, "empty"));
    });

    it("prints a text report", async () => {
      expect(await cli("size", work)).toBe(0);
      expect(log).toHaveBeenCalledWith(
        [
          `Path:         ${path.resolve(work)}`,
          "Strategy:     nested",
          "Total:        5 B",
          "Files:        1",
          "Directories:  2",
          "Skipped:      0",
          "Errors:       0",
        ].join("\n")
      );
    });

    it("prints a JSON report with the chosen strategy", async () => {
      const dirSizes = [work, path.join(work, "empty")]
        .map((p) => fs.lstatSync(p).size)
        .reduce((a, b) => a + b, 0);

      expect(await cli("-f", "json", "size", "--strategy", "flat", work)).toBe(0);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
        path: path.resolve(work),
        strategy: "flat",
        totalBytes: 5 + dirSizes,
        files: 1,
        directories: 2,
        skipped: 0,
        errors: 0,
      });
    });

    it("fails on a missing directory", async () => {
      const missing = path.join(work, "nope");
      expect(await cli("size", missing)).toBe(1);
      expect(String(error.mock.calls[0]?.[1])).toMatch(/^Cannot read directory .*nope: ENOENT/);
    });

    it("rejects an unknown strategy", async () => {
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      expect(await cli("size", "--strategy", "sideways", work)).toBe(1);
    });
  });

  // ==========================================================================
  // config
  // ==========================================================================

  describe("config", () => {
    it("sets and gets a value", async () => {
      expect(await cli("config", "set", "strategy", "flat")).toBe(0);
      expect(await cli("config", "get", "strategy")).toBe(0);
      expect(log).toHaveBeenLastCalledWith("flat");
    });

    it("rejects an invalid value", async () => {
      expect(await cli("config", "set", "strategy", "sideways")).toBe(1);
      expect(error).toHaveBeenCalledWith(
        expect.any(String),
        "Invalid value for strategy: sideways (expected flat or nested)"
      );
    });

    it("lists values as rows", async () => {
      expect(await cli("config", "set", "uppercase", "false")).toBe(0);
      expect(await cli("-f", "json", "config", "list")).toBe(0);
      expect(log).toHaveBeenLastCalledWith(
        JSON.stringify(
          [
            { key: "strategy", value: "nested" },
            { key: "uppercase", value: "false" },
          ],
          null,
          2
        )
      );
    });

    it("lists values as text", async () => {
      expect(await cli("config", "list")).toBe(0);
      expect(log).toHaveBeenLastCalledWith("strategy   nested\nuppercase  true");
    });

    it("lists values as a table", async () => {
      expect(await cli("-f", "table", "config", "list")).toBe(0);
      const table = String(log.mock.lastCall?.[0]);
      expect(table).toContain("strategy");
      expect(table).toContain("nested");
    });

    it("reports an unknown key", async () => {
      expect(await cli("config", "get", "colour")).toBe(1);
      expect(error).toHaveBeenCalledWith(
        expect.any(String),
        'Configuration key "colour" not found'
      );
    });
  });

  it("rejects an unknown output format", async () => {
    expect(await cli("-f", "xml", "hex", "encode", "hi")).toBe(1);
    expect(error).toHaveBeenCalledWith(
      expect.any(String),
      'Unknown output format "xml" (expected text|json|yaml|table)'
    );
  });
});
