import fs from "node:fs";
import path from "node:path";

/**
 * Access to stylesheets, images and outputs. Methods throw when a resource
 * cannot be read or written; callers decide whether that is fatal.
 */
export interface ResourceHandler {
  /** Resolve a path written in `baseFile` (a stylesheet) to a resource path. */
  resolvePath: (baseFile: string, resourcePath: string) => string;
  readText: (resourcePath: string) => string;
  readBinary: (resourcePath: string) => Buffer;
  writeText: (resourcePath: string, content: string) => void;
  writeBinary: (resourcePath: string, content: Buffer) => void;
}

/** Drop a query string or fragment such as `?v=2` from a url. */
export const stripUrlSuffix = (url: string): string =>
  url.replace(/[?#].*$/, "");

export const ensureDir = (dirPath: string): void => {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
};

export interface FileSystemResourceOptions {
  documentRootDir?: string;
  encoding?: BufferEncoding;
}

export const createFileSystemResourceHandler = (
  options: FileSystemResourceOptions = {},
): ResourceHandler => {
  const encoding = options.encoding ?? "utf8";

  const resolvePath = (baseFile: string, resourcePath: string): string => {
    const target = stripUrlSuffix(resourcePath);
    if (target.startsWith("/")) {
      const root = options.documentRootDir ?? path.dirname(baseFile);
      return path.resolve(root, `.${target}`);
    }
    return path.resolve(path.dirname(baseFile), target);
  };

  const readText = (resourcePath: string): string => {
    try {
      return fs.readFileSync(resourcePath, encoding);
    } catch (error) {
      throw new Error(`Cannot read ${resourcePath}`, { cause: error });
    }
  };

  const readBinary = (resourcePath: string): Buffer => {
    try {
      return fs.readFileSync(resourcePath);
    } catch (error) {
      throw new Error(`Cannot read ${resourcePath}`, { cause: error });
    }
  };

  const writeText = (resourcePath: string, content: string): void => {
    ensureDir(path.dirname(resourcePath));
    fs.writeFileSync(resourcePath, content, encoding);
  };

  const writeBinary = (resourcePath: string, content: Buffer): void => {
    ensureDir(path.dirname(resourcePath));
    fs.writeFileSync(resourcePath, content);
  };

  return { resolvePath, readText, readBinary, writeText, writeBinary };
};
