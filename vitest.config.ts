import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (dir: string): string =>
  fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": fromRoot("./src/app"),
      "@config": fromRoot("./src/config"),
      "@domain": fromRoot("./src/domain"),
      "@infrastructure": fromRoot("./src/infrastructure"),
      "@interfaces": fromRoot("./src/interfaces"),
      "@middleware": fromRoot("./src/middleware"),
      "@routes": fromRoot("./src/routes"),
      "@typesLocal": fromRoot("./src/types"),
      "@utils": fromRoot("./src/utils"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      OPENAI_API_KEY: "test-key",
      LOG_FILE: "",
      LOG_LEVEL: "error",
    },
  },
});
