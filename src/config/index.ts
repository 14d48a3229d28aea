// 发布配置：从环境变量读取并校验，缺少必填项视为致命错误

import { z } from "zod";
import type { FeedProfile } from "../feed/types.js";
import { ConfigError } from "./errors.js";

export { ConfigError } from "./errors.js";


/** 空字符串视为未设置 */
const optional = z.preprocess((v) => (v === "" ? undefined : v), z.string().optional());
const required = (name: string) => z.string({ required_error: `缺少 ${name}` }).min(1, `缺少 ${name}`);

const EnvSchema = z.object({
  VERSION: required("VERSION"),
  BUILD_NUMBER: required("BUILD_NUMBER"),
  DMG_URL: required("DMG_URL").url("DMG_URL 不是合法 URL"),
  RELEASE_NOTES: optional,
  RELEASE_URL: optional,
  APP_NAME: optional,
  REPO_URL: optional.pipe(z.string().url("REPO_URL 不是合法 URL").optional()),
  FEED_URL: optional,
  MIN_SYSTEM_VERSION: optional,
  SIGN_UPDATE_PATH: optional,
  APPCAST_PATH: optional,
  OUTPUT_PATH: optional,
});


export interface ReleaseConfig {
  version: string;
  buildNumber: string;
  downloadUrl: string;
  releaseNotes?: string;
  releaseUrl?: string;
  profile: FeedProfile;
  paths: {
    /** 签名工具输出，如 sparkle:edSignature="..." length="12345" */
    signature: string;
    /** 上一版 appcast，可不存在 */
    appcast: string;
    output: string;
  };
}


export function loadReleaseConfig(env: NodeJS.ProcessEnv = process.env): ReleaseConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => i.message);
    throw new ConfigError(`发布配置无效: ${issues.join("; ")}`, issues);
  }
  const e = result.data;
  const repoUrl = e.REPO_URL?.replace(/\/+$/, "");
  return {
    version: e.VERSION,
    buildNumber: e.BUILD_NUMBER,
    downloadUrl: e.DMG_URL,
    releaseNotes: e.RELEASE_NOTES,
    releaseUrl: e.RELEASE_URL,
    profile: {
      appName: e.APP_NAME ?? "App",
      feedUrl: e.FEED_URL ?? (repoUrl ? `${repoUrl}/releases/latest/download/appcast.xml` : undefined),
      repoUrl,
      minimumSystemVersion: e.MIN_SYSTEM_VERSION ?? "15.2",
    },
    paths: {
      signature: e.SIGN_UPDATE_PATH ?? "sign_update.txt",
      appcast: e.APPCAST_PATH ?? "appcast.xml",
      output: e.OUTPUT_PATH ?? "appcast_new.xml",
    },
  };
}
