import path from "node:path";

import type { ResourceHandler } from "../../src/sprites/resources.js";
import { stripUrlSuffix } from "../../src/sprites/resources.js";

export interface MemoryResources extends ResourceHandler {
  files: Map<string, Buffer>;
}

/** In-process stand-in for the file system, keyed by posix paths. */
export const createMemoryResources = (
  initial: Record<string, string | Buffer> = {},
  documentRootDir = "/site",
): MemoryResources => {
  const files = new Map<string, Buffer>();
  for (const [filePath, content] of Object.entries(initial)) {
    files.set(filePath, Buffer.isBuffer(content) ? content : Buffer.from(content));
  }

  const readBinary = (resourcePath: string): Buffer => {
    const content = files.get(resourcePath);
    if (!content) {
      throw new Error(`Cannot read ${resourcePath}`);
    }
    return content;
  };

  return {
    files,
    resolvePath: (baseFile, resourcePath) => {
      const target = stripUrlSuffix(resourcePath);
      if (target.startsWith("/")) {
        return path.posix.join(documentRootDir, target);
      }
      return path.posix.join(path.posix.dirname(baseFile), target);
    },
    readText: (resourcePath) => readBinary(resourcePath).toString("utf8"),
    readBinary,
    writeText: (resourcePath, content) => {
      files.set(resourcePath, Buffer.from(content));
    },
    writeBinary: (resourcePath, content) => {
      files.set(resourcePath, content);
    },
  };
};
