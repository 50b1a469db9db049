import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";
import packageJson from "./package.json";

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  plugins: [
    // Keeps the CLI bundle runnable as `textnorm`
    {
      name: "preserve-shebang",
      generateBundle(_options, bundle) {
        const indexBundle = bundle["index.js"];
        if (indexBundle && indexBundle.type === "chunk" && indexBundle.code) {
          indexBundle.code = `#!/usr/bin/env node\n${indexBundle.code}`;
        }
      },
      writeBundle(options) {
        const indexPath = path.join(options.dir || "dist", "index.js");
        if (fs.existsSync(indexPath)) {
          fs.chmodSync(indexPath, 0o755);
        }
      },
    },
  ],
  resolve: {
    extensions: [".ts", ".js", ".json"],
  },
  build: {
    outDir: "dist",
    sourcemap: true,
    emptyOutDir: true,
    lib: {
      entry: {
        index: fromRoot("./src/index.ts"),
        lib: fromRoot("./src/lib.ts"),
      },
      formats: ["es"],
    },
    rollupOptions: {
      external: [/^node:/, ...Object.keys(packageJson.dependencies || {})],
    },
    target: "node20",
    ssr: true,
  },
  test: {
    globals: true,
    environment: "node",
    testTimeout: 5000,
    include: ["src/**/*.test.ts"],
  },
});
