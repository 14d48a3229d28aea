#!/usr/bin/env node
// 入口：从环境变量（含 .env）读取发布信息，更新 appcast

import "dotenv/config";
import { run } from "./app/run.js";
import { ConfigError, loadReleaseConfig } from "./config/index.js";
import { logger } from "./logger/index.js";


async function main(): Promise<void> {
  const config = loadReleaseConfig();
  await run(config);
}


main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error("config", err.message, { issues: err.issues });
  } else {
    logger.error("app", "生成 appcast 失败", { err: err instanceof Error ? err.message : String(err) });
  }
  process.exitCode = 1;
});
