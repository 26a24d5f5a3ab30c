import path from "node:path";
import { z } from "zod";

import {
  cssEncodingSchema,
  logLevelSchema,
  parseEnvironment,
} from "./config/env.js";
import type { Environment } from "./config/env.js";

export const getArgValue = (
  argv: readonly string[],
  flag: string,
): string | undefined => {
  const prefix = `--${flag}=`;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token.startsWith(prefix)) {
      return token.slice(prefix.length);
    }

    if (token === `--${flag}` && i + 1 < argv.length) {
      const next = argv[i + 1];
      if (!next.startsWith("--")) {
        return next;
      }
    }
  }

  return undefined;
};

const csvToList = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const buildConfigSchema = z
  .object({
    rootDir: z
      .string({ required_error: "--root-dir (or SPRITES_ROOT_DIR) is required" })
      .min(1),
    outputDir: z.string().min(1).optional(),
    documentRootDir: z.string().min(1).optional(),
    cssFileSuffix: z.string(),
    cssFileEncoding: cssEncodingSchema,
    logLevel: logLevelSchema,
    verbose: z.boolean(),
    cssFiles: z.array(z.string().min(1)),
  })
  .refine(
    (config) => config.cssFileSuffix.length > 0 || config.outputDir !== undefined,
    {
      message:
        "--css-file-suffix may only be empty when --output-dir is set, otherwise sources would be overwritten",
      path: ["cssFileSuffix"],
    },
  );

export type BuildConfig = z.infer<typeof buildConfigSchema>;

const resolveOptional = (value: string | undefined): string | undefined =>
  value === undefined ? undefined : path.resolve(value);

/** Merge CLI flags over environment defaults and validate the result. */
export const getBuildConfig = (
  argv: readonly string[],
  environment: Environment,
): BuildConfig => {
  const rootDir = getArgValue(argv, "root-dir") ?? environment.SPRITES_ROOT_DIR;
  const cssFiles = getArgValue(argv, "css-files");

  const config = buildConfigSchema.parse({
    rootDir: resolveOptional(rootDir),
    outputDir: resolveOptional(
      getArgValue(argv, "output-dir") ?? environment.SPRITES_OUTPUT_DIR,
    ),
    documentRootDir: resolveOptional(
      getArgValue(argv, "document-root-dir") ??
        environment.SPRITES_DOCUMENT_ROOT_DIR,
    ),
    cssFileSuffix:
      getArgValue(argv, "css-file-suffix") ??
      environment.SPRITES_CSS_FILE_SUFFIX,
    cssFileEncoding:
      getArgValue(argv, "css-file-encoding") ??
      environment.SPRITES_CSS_FILE_ENCODING,
    logLevel: getArgValue(argv, "log-level") ?? environment.SPRITES_LOG_LEVEL,
    verbose: argv.includes("--verbose") || environment.BUILD_VERBOSE,
    cssFiles: cssFiles ? csvToList(cssFiles).map((file) => path.resolve(file)) : [],
  });

  return config;
};

/** Validate the environment and flags together, at call time. */
export const loadBuildConfig = (
  argv: readonly string[],
  rawEnv: NodeJS.ProcessEnv = process.env,
): BuildConfig => getBuildConfig(argv, parseEnvironment(rawEnv));
