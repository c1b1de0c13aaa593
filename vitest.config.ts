import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "backend",
          include: ["backend/src/**/*.test.ts"],
        },
      },
      {
        test: {
          name: "launcher",
          include: ["launcher/src/**/*.test.ts"],
        },
      },
    ],
  },
});
