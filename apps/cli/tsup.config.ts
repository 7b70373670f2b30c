import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Workspace packages point at their TypeScript sources, so bundle them in
  noExternal: [/^@brinksmanship\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
