import { describe, expect, it } from "vitest";
import { appendItem, buildDescription, buildItem, ENCLOSURE_TYPE, formatDay, formatPubDate } from "../src/feed/item.js";
import { SPARKLE_NS } from "../src/feed/namespaces.js";
import { parseSignatureAttributes } from "../src/feed/signature.js";
import type { ReleaseInfo } from "../src/feed/types.js";
import { childText, findChild, isElement, qname, textContent } from "../src/feed/xml.js";
import { makeChannel, PROFILE } from "./helpers.js";


const NOW = new Date(Date.UTC(2026, 9, 19, 8, 5, 9));

function release(overrides: Partial<ReleaseInfo> = {}): ReleaseInfo {
  return {
    version: "1.2.0",
    buildNumber: "120",
    downloadUrl: "https://example.com/App.dmg",
    signature: parseSignatureAttributes('sparkle:edSignature="c2ln" length="42"'),
    now: NOW,
    ...overrides,
  };
}


describe("formatPubDate", () => {
  it("固定 UTC 的 RFC 822 格式", () => {
    expect(formatPubDate(NOW)).toBe("Mon, 19 Oct 2026 08:05:09 +0000");
    expect(formatPubDate(new Date(Date.UTC(2026, 0, 5)))).toBe("Mon, 05 Jan 2026 00:00:00 +0000");
  });

  it("formatDay 输出 YYYY-MM-DD", () => {
    expect(formatDay(new Date(Date.UTC(2026, 0, 5, 23, 59)))).toBe("2026-01-05");
  });
});


describe("buildDescription", () => {
  it("有发布说明时渲染 markdown 并加版本标题", () => {
    expect(buildDescription(release({ releaseNotes: "- **fast**" }), PROFILE)).toBe(
      "\n<h2>App v1.2.0</h2>\n<ul>\n  <li><strong>fast</strong></li>\n</ul>\n",
    );
  });

  it("发布说明为空时给出日期和发布页链接", () => {
    const expected = [
      "",
      "<h2>App v1.2.0</h2>",
      "<p>This release was published on 2026-10-19.</p>",
      "<p>",
      "View the full release notes on",
      '<a href="https://example.com/repo/releases/tag/v1.2.0">GitHub</a>.',
      "</p>",
      "",
    ].join("\n");
    expect(buildDescription(release(), PROFILE)).toBe(expected);
    expect(buildDescription(release({ releaseNotes: "  \n\t " }), PROFILE)).toBe(expected);
  });

  it("没有仓库地址时兜底描述只写日期", () => {
    expect(buildDescription(release(), { ...PROFILE, repoUrl: undefined })).toBe(
      "\n<h2>App v1.2.0</h2>\n<p>This release was published on 2026-10-19.</p>\n",
    );
  });
});


describe("buildItem", () => {
  it("按固定顺序生成子元素", () => {
    const item = buildItem(release({ releaseUrl: "https://example.com/repo/releases/v1.2.0" }), PROFILE);
    const names = item.children.filter(isElement).map((c) => (c.name.ns ? `sparkle:${c.name.local}` : c.name.local));
    expect(names).toEqual([
      "title",
      "pubDate",
      "sparkle:version",
      "sparkle:shortVersionString",
      "sparkle:minimumSystemVersion",
      "sparkle:fullReleaseNotesLink",
      "description",
      "enclosure",
    ]);
    expect(childText(item, qname("title"))).toBe("Version 1.2.0");
    expect(childText(item, qname("pubDate"))).toBe("Mon, 19 Oct 2026 08:05:09 +0000");
    expect(childText(item, qname("version", SPARKLE_NS))).toBe("120");
    expect(childText(item, qname("shortVersionString", SPARKLE_NS))).toBe("1.2.0");
    expect(childText(item, qname("minimumSystemVersion", SPARKLE_NS))).toBe("15.2");
    expect(childText(item, qname("fullReleaseNotesLink", SPARKLE_NS))).toBe("https://example.com/repo/releases/v1.2.0");
  });

  it("没有 releaseUrl 时不输出 fullReleaseNotesLink", () => {
    const item = buildItem(release(), PROFILE);
    expect(findChild(item, qname("fullReleaseNotesLink", SPARKLE_NS))).toBeUndefined();
  });

  it("enclosure 依次带上 url、type 与全部签名属性", () => {
    const enclosure = findChild(buildItem(release(), PROFILE), qname("enclosure"));
    expect(enclosure?.attributes).toEqual([
      { name: { local: "url" }, value: "https://example.com/App.dmg" },
      { name: { local: "type" }, value: ENCLOSURE_TYPE },
      { name: { ns: SPARKLE_NS, local: "edSignature" }, value: "c2ln" },
      { name: { local: "length" }, value: "42" },
    ]);
    expect(enclosure?.children).toEqual([]);
  });

  it("签名属性与已有属性同名时原位覆盖", () => {
    const enclosure = findChild(
      buildItem(release({ signature: parseSignatureAttributes('type="application/x-apple-diskimage"') }), PROFILE),
      qname("enclosure"),
    );
    expect(enclosure?.attributes.map((a) => `${a.name.local}=${a.value}`)).toEqual([
      "url=https://example.com/App.dmg",
      "type=application/x-apple-diskimage",
    ]);
  });

  it("appendItem 追加到 channel 末尾", () => {
    const channel = makeChannel([]);
    const item = buildItem(release(), PROFILE);
    appendItem(channel, item);
    expect(channel.children[channel.children.length - 1]).toBe(item);
    const description = findChild(item, qname("description"));
    expect(description && textContent(description)).toContain('href="https://example.com/repo/releases/tag/v1.2.0"');
  });
});
