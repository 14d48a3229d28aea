// 条目合并：先剔除同版本与无 pubDate 的条目，再按 pubDate 只保留最近 N 条

import { SPARKLE_NS } from "./namespaces.js";
import type { XmlElement } from "./types.js";
import { childText, findChildren, qname, removeChild } from "./xml.js";


/** 保留的历史条目数 */
export const PRUNE_LIMIT = 15;

const ITEM = qname("item");
const PUB_DATE = qname("pubDate");
const SHORT_VERSION = qname("shortVersionString", SPARKLE_NS);

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

// Www, DD Mon YYYY HH:MM:SS ±HHMM（也接受 ±HH:MM、GMT、UTC、Z）
const PUB_DATE_RE =
  /^(?:[A-Z][a-z]{2}),\s+(\d{1,2})\s+([A-Z][a-z]{2})\s+(\d{4})\s+(\d{2}):(\d{2}):(\d{2})\s+(?:([+-])(\d{2}):?(\d{2})|GMT|UTC|Z)$/;


export interface MergeResult {
  evicted: number;
  pruned: number;
}


/** 解析 pubDate 文本为 epoch 毫秒；格式不符返回 undefined */
export function parsePubDate(text: string): number | undefined {
  const m = PUB_DATE_RE.exec(text.trim());
  if (!m) return undefined;
  const [, day, mon, year, hh, mm, ss, sign, offH, offM] = m;
  const month = MONTHS.indexOf(mon);
  if (month < 0) return undefined;
  const daysInMonth = new Date(Date.UTC(Number(year), month + 1, 0)).getUTCDate();
  if (Number(day) < 1 || Number(day) > daysInMonth) return undefined;
  if (Number(hh) > 23 || Number(mm) > 59 || Number(ss) > 59) return undefined;
  if (sign && (Number(offH) > 23 || Number(offM) > 59)) return undefined;
  const utc = Date.UTC(Number(year), month, Number(day), Number(hh), Number(mm), Number(ss));
  const offsetMin = sign ? (Number(offH) * 60 + Number(offM)) * (sign === "-" ? -1 : 1) : 0;
  return utc - offsetMin * 60_000;
}


/** 条目的发布时间；缺少或无法解析的 pubDate 视为无日期 */
export function itemPublishedAt(item: XmlElement): number | undefined {
  const text = childText(item, PUB_DATE);
  return text === undefined ? undefined : parsePubDate(text);
}


export function itemVersion(item: XmlElement): string | undefined {
  return childText(item, SHORT_VERSION);
}


/** 第一遍：移除与 version 相同的条目，以及没有 pubDate 的条目；两个条件各自独立判断 */
export function evictEntries(channel: XmlElement, version: string): number {
  const stale = findChildren(channel, ITEM).filter(
    (item) => itemVersion(item) === version || itemPublishedAt(item) === undefined,
  );
  for (const item of stale) removeChild(channel, item);
  return stale.length;
}


/** 第二遍：有日期的条目按时间升序稳定排序，超出 limit 的旧条目移除 */
export function pruneEntries(channel: XmlElement, limit: number = PRUNE_LIMIT): number {
  const dated: Array<{ item: XmlElement; at: number }> = [];
  for (const item of findChildren(channel, ITEM)) {
    const at = itemPublishedAt(item);
    if (at !== undefined) dated.push({ item, at });
  }
  if (dated.length <= limit) return 0;
  dated.sort((a, b) => a.at - b.at);
  const drop = dated.slice(0, dated.length - limit);
  for (const { item } of drop) removeChild(channel, item);
  return drop.length;
}


export function mergeEntries(channel: XmlElement, version: string, limit: number = PRUNE_LIMIT): MergeResult {
  const evicted = evictEntries(channel, version);
  const pruned = pruneEntries(channel, limit);
  return { evicted, pruned };
}
