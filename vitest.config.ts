import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import { defineConfig } from "vitest/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: `${resolve(__dirname, "src")}/` }],
  },
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
  },
});
