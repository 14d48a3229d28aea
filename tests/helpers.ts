import { SPARKLE_NS } from "../src/feed/namespaces.js";
import type { FeedProfile, XmlElement } from "../src/feed/types.js";
import { childText, element, findChildren, qname } from "../src/feed/xml.js";


export const PROFILE: FeedProfile = {
  appName: "App",
  feedUrl: "https://example.com/appcast.xml",
  repoUrl: "https://example.com/repo",
  minimumSystemVersion: "15.2",
};


/** 构造一个最简条目：shortVersionString + 可选 pubDate */
export function makeItem(version: string, pubDate?: string): XmlElement {
  const item = element(qname("item"));
  item.children.push(element(qname("title"), `Version ${version}`));
  if (pubDate !== undefined) item.children.push(element(qname("pubDate"), pubDate));
  item.children.push(element(qname("shortVersionString", SPARKLE_NS), version));
  return item;
}


export function makeChannel(items: XmlElement[]): XmlElement {
  const channel = element(qname("channel"));
  channel.children.push(element(qname("title"), "App Updates"), ...items);
  return channel;
}


export function versionsOf(channel: XmlElement): string[] {
  return findChildren(channel, qname("item")).map((i) => childText(i, qname("shortVersionString", SPARKLE_NS)) ?? "");
}


/** 2026 年 1 月第 day 天 00:00:00 UTC 的 pubDate 文本 */
export function januaryDate(day: number): string {
  const weekdays = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
  const d = new Date(Date.UTC(2026, 0, day));
  return `${weekdays[d.getUTCDay()]}, ${String(day).padStart(2, "0")} Jan 2026 00:00:00 +0000`;
}
