// 加载已有 appcast：解析失败、缺少 <channel> 或文件不存在时退回最小骨架，只告警不中断

import { XMLParser } from "fast-xml-parser";
import { logger } from "../logger/index.js";
import { XML_NS } from "./namespaces.js";
import type { FeedDocument, FeedProfile, XmlAttribute, XmlElement, XmlNode } from "./types.js";
import { element, findChild, isElement, qname } from "./xml.js";


const ATTR_PREFIX = "@_";
const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true,
});


type Scope = ReadonlyMap<string, string>;


export class UnboundPrefixError extends Error {
  constructor(prefix: string) {
    super(`未绑定的命名空间前缀: ${prefix}`);
    this.name = "UnboundPrefixError";
  }
}


function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}


function splitPrefix(raw: string): [prefix: string | undefined, local: string] {
  const colon = raw.indexOf(":");
  return colon < 0 ? [undefined, raw] : [raw.slice(0, colon), raw.slice(colon + 1)];
}


/** 收集本元素上的 xmlns 声明，返回新作用域；无声明时复用父作用域 */
function extendScope(scope: Scope, rawAttrs: Record<string, unknown>): Scope {
  let next: Map<string, string> | undefined;
  for (const [key, value] of Object.entries(rawAttrs)) {
    const name = key.slice(ATTR_PREFIX.length);
    if (name !== "xmlns" && !name.startsWith("xmlns:")) continue;
    next ??= new Map(scope);
    next.set(name === "xmlns" ? "" : name.slice("xmlns:".length), String(value));
  }
  return next ?? scope;
}


function resolveAttributes(rawAttrs: Record<string, unknown>, scope: Scope): XmlAttribute[] {
  const attrs: XmlAttribute[] = [];
  for (const [key, value] of Object.entries(rawAttrs)) {
    const raw = key.slice(ATTR_PREFIX.length);
    if (raw === "xmlns" || raw.startsWith("xmlns:")) continue;
    const [prefix, local] = splitPrefix(raw);
    let ns: string | undefined;
    if (prefix === "xml") {
      ns = XML_NS;
    } else if (prefix !== undefined) {
      ns = scope.get(prefix);
      if (!ns) throw new UnboundPrefixError(prefix);
    }
    attrs.push({ name: qname(local, ns), value: String(value) });
  }
  return attrs;
}


function toElement(tag: string, rawChildren: unknown, rawAttrs: unknown, parentScope: Scope): XmlElement {
  const attrRecord = isRecord(rawAttrs) ? rawAttrs : {};
  const scope = extendScope(parentScope, attrRecord);
  const [prefix, local] = splitPrefix(tag);
  // 无前缀元素落在默认命名空间（若有）
  const ns = scope.get(prefix ?? "");
  if (prefix !== undefined && !ns) throw new UnboundPrefixError(prefix);
  return {
    name: qname(local, ns || undefined),
    attributes: resolveAttributes(attrRecord, scope),
    children: toNodes(rawChildren, scope),
  };
}


function toNodes(raw: unknown, scope: Scope): XmlNode[] {
  if (!Array.isArray(raw)) return [];
  const nodes: XmlNode[] = [];
  for (const node of raw) {
    if (!isRecord(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRS_KEY) continue;
      if (key === TEXT_KEY) {
        const text = typeof value === "string" || typeof value === "number" ? String(value) : "";
        if (text) nodes.push({ text });
        continue;
      }
      nodes.push(toElement(key, value, node[ATTRS_KEY], scope));
    }
  }
  return nodes;
}


/** 解析 XML 文本为树；非良构或前缀未绑定时抛错 */
export function parseXml(xml: string): XmlElement {
  const parsed: unknown = parser.parse(xml, true);
  const root = toNodes(parsed, new Map()).find(isElement);
  if (!root) throw new Error("文档没有根元素");
  return root;
}


/** 最小合法骨架：<rss version="2.0"><channel> 标题/链接/描述/语言，无条目 */
export function createSkeletonDocument(profile: FeedProfile): FeedDocument {
  const channel = element(qname("channel"));
  channel.children.push(element(qname("title"), `${profile.appName} Updates`));
  if (profile.feedUrl) channel.children.push(element(qname("link"), profile.feedUrl));
  channel.children.push(
    element(qname("description"), `Updates for ${profile.appName}`),
    element(qname("language"), "en"),
  );
  const root = element(qname("rss"), undefined, [{ name: qname("version"), value: "2.0" }]);
  root.children.push(channel);
  return { root, channel };
}


/** 加载已有 appcast；raw 为空、解析失败或没有 <channel> 时返回骨架 */
export function loadFeedDocument(raw: string | Uint8Array | undefined, profile: FeedProfile): FeedDocument {
  const xml = raw === undefined || typeof raw === "string" ? raw : new TextDecoder().decode(raw);
  if (!xml?.trim()) {
    logger.warn("feed", "没有可用的 appcast，创建新文档");
    return createSkeletonDocument(profile);
  }
  let root: XmlElement;
  try {
    root = parseXml(xml);
  } catch (err) {
    logger.warn("feed", "无法解析已有 appcast，创建新文档", { err: err instanceof Error ? err.message : String(err) });
    return createSkeletonDocument(profile);
  }
  const channel = findChild(root, qname("channel"));
  if (!channel) {
    logger.warn("feed", "已有 appcast 缺少 <channel>，创建新文档");
    return createSkeletonDocument(profile);
  }
  return { root, channel };
}
