import { describe, expect, jest, test } from "@jest/globals";

import { createConfigLoader } from "../../../src/configs/shared/loader-factory.js";

interface TestLoaderOptions {
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

const TEST_ROOT = "/repo";

const baseLoader = createConfigLoader<string, TestLoaderOptions>({
  resolveFilePath: (root, options) => options.filePath ?? `${root}/config.yaml`,
  selectReadFile: (options) => options.readFile,
  handleMissing: ({ filePath }) => `missing ${filePath}`,
  parse: (content, { root }) => `${root}:${content}`,
});

describe("createConfigLoader", () => {
  test("hands the resolved path to handleMissing on ENOENT", () => {
    const error = new Error("missing") as NodeJS.ErrnoException;
    error.code = "ENOENT";

    const result = baseLoader({
      root: TEST_ROOT,
      readFile: () => {
        throw error;
      },
    });

    expect(result).toBe("missing /repo/config.yaml");
  });

  test("rethrows other read failures", () => {
    const error = new Error("denied") as NodeJS.ErrnoException;
    error.code = "EACCES";

    expect(() =>
      baseLoader({
        root: TEST_ROOT,
        readFile: () => {
          throw error;
        },
      }),
    ).toThrow("denied");
  });

  test("reads through the override with the resolved path", () => {
    const readFile = jest.fn((path: string) => `read ${path}`);

    const result = baseLoader({
      root: TEST_ROOT,
      filePath: "/elsewhere/custom.yaml",
      readFile,
    });

    expect(readFile).toHaveBeenCalledWith("/elsewhere/custom.yaml");
    expect(result).toBe("/repo:read /elsewhere/custom.yaml");
  });
});
