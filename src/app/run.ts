// 命令行流程：读签名与旧 appcast → 生成 → 写出新 appcast

import { readFile, writeFile } from "node:fs/promises";
import { updateAppcast } from "../appcast/update.js";
import type { ReleaseConfig } from "../config/index.js";
import { logger } from "../logger/index.js";


/** 读文件；不存在时返回 undefined，其他错误照常抛出 */
async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw err;
  }
}


export async function run(config: ReleaseConfig, now: Date = new Date()): Promise<string> {
  const signatureLine = await readFile(config.paths.signature, "utf-8");
  const existingXml = await readOptional(config.paths.appcast);
  const { xml, evicted, pruned } = updateAppcast({
    existingXml,
    signatureLine,
    release: {
      version: config.version,
      buildNumber: config.buildNumber,
      downloadUrl: config.downloadUrl,
      releaseNotes: config.releaseNotes,
      releaseUrl: config.releaseUrl,
      now,
    },
    profile: config.profile,
  });
  await writeFile(config.paths.output, xml, "utf-8");
  logger.info("app", `Generated ${config.paths.output} for version ${config.version}`, { evicted, pruned });
  return xml;
}
