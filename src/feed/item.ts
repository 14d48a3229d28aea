// 组装新的 appcast 条目：版本信息、发布说明 HTML、带签名属性的 enclosure

import { renderMarkdown } from "./markdown.js";
import { SPARKLE_NS } from "./namespaces.js";
import type { FeedProfile, ReleaseInfo, XmlElement } from "./types.js";
import { appendChild, element, qname, setAttribute } from "./xml.js";


export const ENCLOSURE_TYPE = "application/octet-stream";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];


function pad2(n: number): string {
  return String(n).padStart(2, "0");
}


/** RFC 822 风格的 pubDate，固定 UTC：Mon, 19 Oct 2026 08:05:09 +0000 */
export function formatPubDate(date: Date): string {
  const day = WEEKDAYS[date.getUTCDay()];
  const month = MONTHS[date.getUTCMonth()];
  const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${day}, ${pad2(date.getUTCDate())} ${month} ${date.getUTCFullYear()} ${time} +0000`;
}


/** YYYY-MM-DD（UTC） */
export function formatDay(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}


export function releaseTagUrl(repoUrl: string, version: string): string {
  return `${repoUrl.replace(/\/+$/, "")}/releases/tag/v${version}`;
}


/** 有发布说明时渲染 markdown，否则生成带日期的兜底描述；配置了仓库地址时附上发布页链接 */
export function buildDescription(release: ReleaseInfo, profile: FeedProfile): string {
  const heading = `<h2>${profile.appName} v${release.version}</h2>`;
  if (release.releaseNotes?.trim()) {
    return `\n${heading}\n${renderMarkdown(release.releaseNotes)}\n`;
  }
  const published = `<p>This release was published on ${formatDay(release.now)}.</p>`;
  if (!profile.repoUrl) {
    return ["", heading, published, ""].join("\n");
  }
  return [
    "",
    heading,
    published,
    "<p>",
    "View the full release notes on",
    `<a href="${releaseTagUrl(profile.repoUrl, release.version)}">GitHub</a>.`,
    "</p>",
    "",
  ].join("\n");
}


export function buildItem(release: ReleaseInfo, profile: FeedProfile): XmlElement {
  const item = element(qname("item"));
  appendChild(item, element(qname("title"), `Version ${release.version}`));
  appendChild(item, element(qname("pubDate"), formatPubDate(release.now)));
  // 客户端用 sparkle:version 与本地构建号比较
  appendChild(item, element(qname("version", SPARKLE_NS), release.buildNumber));
  appendChild(item, element(qname("shortVersionString", SPARKLE_NS), release.version));
  appendChild(item, element(qname("minimumSystemVersion", SPARKLE_NS), profile.minimumSystemVersion));
  if (release.releaseUrl) {
    appendChild(item, element(qname("fullReleaseNotesLink", SPARKLE_NS), release.releaseUrl));
  }
  appendChild(item, element(qname("description"), buildDescription(release, profile)));

  const enclosure = element(qname("enclosure"));
  setAttribute(enclosure, qname("url"), release.downloadUrl);
  setAttribute(enclosure, qname("type"), ENCLOSURE_TYPE);
  for (const attr of release.signature) {
    setAttribute(enclosure, attr.name, attr.value);
  }
  appendChild(item, enclosure);
  return item;
}


/** 新条目追加到 channel 末尾 */
export function appendItem(channel: XmlElement, item: XmlElement): void {
  appendChild(channel, item);
}
