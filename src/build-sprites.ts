#!/usr/bin/env node
import { loadBuildConfig } from "./cli.js";
import { buildSprites } from "./sprites/builder.js";
import {
  MemoryMessageSink,
  MessageLog,
  createConsoleSink,
} from "./sprites/messages.js";
import { logBuildOutcome } from "./sprites/reporting.js";
import { createFileSystemResourceHandler } from "./sprites/resources.js";
import { findCssFiles } from "./sprites/workflow.js";

const main = async (): Promise<void> => {
  const config = loadBuildConfig(process.argv.slice(2));
  const memorySink = new MemoryMessageSink();
  const messageLog = new MessageLog(
    createConsoleSink(config.verbose ? "debug" : config.logLevel),
    memorySink,
  );
  const resources = createFileSystemResourceHandler({
    documentRootDir: config.documentRootDir,
    encoding: config.cssFileEncoding,
  });

  const cssFiles =
    config.cssFiles.length > 0
      ? config.cssFiles
      : findCssFiles(config.rootDir, config.cssFileSuffix);
  if (cssFiles.length === 0) {
    console.warn(`⚠️ No stylesheets found under ${config.rootDir}`);
    return;
  }

  const result = await buildSprites(
    cssFiles,
    {
      rootDir: config.rootDir,
      outputDir: config.outputDir,
      cssFileSuffix: config.cssFileSuffix,
    },
    resources,
    messageLog,
  );

  logBuildOutcome(result, memorySink.count("warning"), config.verbose);
};

void main().catch((error: unknown) => {
  console.error("❌ Sprite build failed:", error);
  process.exitCode = 1;
});
