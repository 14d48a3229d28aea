// 解析签名工具输出：'sparkle:edSignature="..." length="12345"' → 有序限定名属性集

import { logger } from "../logger/index.js";
import { SIGNATURE_PREFIXES } from "./namespaces.js";
import type { QName, SignatureAttributeSet, XmlAttribute } from "./types.js";
import { clarkName, qname } from "./xml.js";


export interface SignatureParseOptions {
  /** 前缀 → 命名空间 URI，默认只识别 sparkle: */
  prefixes?: Readonly<Record<string, string>>;
}


function unquote(raw: string): string {
  return raw.trim().replace(/^"+|"+$/g, "");
}


/**
 * 解析一行以空白分隔的 key="value"。
 * 不含 "=" 的 token 忽略；带前缀的 key 转成 { ns, local }，未知前缀或本地名为空时跳过并告警；
 * 重复 key 后者覆盖前者，位置保持首次出现处。
 */
export function parseSignatureAttributes(line: string, options: SignatureParseOptions = {}): SignatureAttributeSet {
  const prefixes = options.prefixes ?? SIGNATURE_PREFIXES;
  const attrs = new Map<string, XmlAttribute>();
  for (const token of line.trim().split(/\s+/)) {
    const eq = token.indexOf("=");
    if (eq < 0) continue;
    const key = token.slice(0, eq);
    if (!key) continue;
    const value = unquote(token.slice(eq + 1));
    const colon = key.indexOf(":");
    let name: QName;
    if (colon < 0) {
      name = qname(key);
    } else {
      const prefix = key.slice(0, colon);
      const local = key.slice(colon + 1);
      // 只认前缀表自身的键，原型上的 constructor 等不算
      const ns = Object.hasOwn(prefixes, prefix) ? prefixes[prefix] : undefined;
      if (!ns || !local) {
        logger.warn("feed", "签名属性前缀未知，已跳过", { key });
        continue;
      }
      name = qname(local, ns);
    }
    const id = clarkName(name);
    const existing = attrs.get(id);
    if (existing) {
      existing.value = value;
    } else {
      attrs.set(id, { name, value });
    }
  }
  return Object.freeze([...attrs.values()].map((a) => Object.freeze({ ...a })));
}
