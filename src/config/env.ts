import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const boolFromString = (value: string): boolean =>
  ["1", "true", "yes", "on"].includes(value.toLowerCase());

export const logLevelSchema = z.enum(["debug", "info", "warning"]);
export const cssEncodingSchema = z.enum([
  "utf8",
  "utf-8",
  "latin1",
  "ascii",
  "utf16le",
]);

const environmentSchema = z.object({
  SPRITES_ROOT_DIR: z.string().min(1).optional(),
  SPRITES_OUTPUT_DIR: z.string().min(1).optional(),
  SPRITES_DOCUMENT_ROOT_DIR: z.string().min(1).optional(),
  SPRITES_CSS_FILE_SUFFIX: z.string().default("-sprite"),
  SPRITES_CSS_FILE_ENCODING: cssEncodingSchema.default("utf8"),
  SPRITES_LOG_LEVEL: logLevelSchema.default("info"),
  BUILD_VERBOSE: z.string().default("0").transform(boolFromString),
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (
  rawEnv: NodeJS.ProcessEnv = process.env,
): Environment => environmentSchema.parse(rawEnv);
