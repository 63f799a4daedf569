import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  // The engine workspace ships TypeScript sources, so it is bundled in.
  noExternal: ["@sentiscore/engine"],
});
