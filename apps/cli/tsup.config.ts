import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "node20",
  outDir: "dist",
  // Workspace packages ship TypeScript sources, so bundle them in
  noExternal: [/^@bytetools\//],
});
