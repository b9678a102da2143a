import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@specs-feup\/flow\/(.*)$/,
        replacement: fileURLToPath(new URL("./node_modules/@specs-feup/flow/src/$1.ts", import.meta.url)),
      },
    ],
  },
  test: {
    include: ["test/**/*_test.ts"],
    environment: "node",
  },
});
