import { describe, expect, it } from "vitest";
import { ConfigError, loadReleaseConfig } from "../src/config/index.js";


const BASE = {
  VERSION: "1.2.0",
  BUILD_NUMBER: "120",
  DMG_URL: "https://example.com/App.dmg",
  REPO_URL: "https://example.com/repo/",
};


describe("loadReleaseConfig", () => {
  it("读取必填项并补齐默认值", () => {
    expect(loadReleaseConfig(BASE)).toEqual({
      version: "1.2.0",
      buildNumber: "120",
      downloadUrl: "https://example.com/App.dmg",
      releaseNotes: undefined,
      releaseUrl: undefined,
      profile: {
        appName: "App",
        feedUrl: "https://example.com/repo/releases/latest/download/appcast.xml",
        repoUrl: "https://example.com/repo",
        minimumSystemVersion: "15.2",
      },
      paths: {
        signature: "sign_update.txt",
        appcast: "appcast.xml",
        output: "appcast_new.xml",
      },
    });
  });

  it("可选项覆盖默认值，空字符串视为未设置", () => {
    const config = loadReleaseConfig({
      ...BASE,
      RELEASE_NOTES: "- fix",
      RELEASE_URL: "",
      APP_NAME: "Beacon",
      MIN_SYSTEM_VERSION: "14.0",
      OUTPUT_PATH: "out.xml",
    });
    expect(config.releaseNotes).toBe("- fix");
    expect(config.releaseUrl).toBeUndefined();
    expect(config.profile.appName).toBe("Beacon");
    expect(config.profile.minimumSystemVersion).toBe("14.0");
    expect(config.paths.output).toBe("out.xml");
  });

  it("REPO_URL 可省略，此时不推导 feedUrl", () => {
    const { REPO_URL: _repo, ...rest } = BASE;
    const config = loadReleaseConfig({ ...rest, REPO_URL: "" });
    expect(config.profile.repoUrl).toBeUndefined();
    expect(config.profile.feedUrl).toBeUndefined();
    expect(loadReleaseConfig({ ...rest, FEED_URL: "https://example.com/feed.xml" }).profile.feedUrl).toBe(
      "https://example.com/feed.xml",
    );
  });

  it("REPO_URL 不是 URL 时报错", () => {
    expect(() => loadReleaseConfig({ ...BASE, REPO_URL: "repo" })).toThrow("REPO_URL 不是合法 URL");
  });

  it("缺少必填项抛出 ConfigError 并列出问题", () => {
    const { VERSION: _version, ...rest } = BASE;
    let caught: unknown;
    try {
      loadReleaseConfig({ ...rest, BUILD_NUMBER: "" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues).toEqual(["缺少 VERSION", "缺少 BUILD_NUMBER"]);
  });

  it("下载地址不是 URL 时报错", () => {
    expect(() => loadReleaseConfig({ ...BASE, DMG_URL: "not a url" })).toThrow("DMG_URL 不是合法 URL");
  });
});
