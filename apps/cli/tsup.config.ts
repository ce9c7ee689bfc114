import { defineConfig } from "tsup";

// Workspace packages point their entry at TypeScript sources, so they are
// bundled straight into the CLI rather than resolved at run time.
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

  noExternal: [/^@pegcross\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
