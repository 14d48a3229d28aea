// 将 appcast 树输出为 XML：固定的命名空间前缀表，输出只取决于树本身

import { ATOM_NS, DC_NS, SPARKLE_NS, XML_NS } from "./namespaces.js";
import type { FeedDocument, QName, XmlElement } from "./types.js";
import { isElement, isText } from "./xml.js";


/** 预注册前缀：同一命名空间每次都输出同一前缀 */
const REGISTERED_PREFIXES: ReadonlyMap<string, string> = new Map([
  [SPARKLE_NS, "sparkle"],
  [DC_NS, "dc"],
  [ATOM_NS, "atom"],
]);

const INDENT = "  ";


function escapeText(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}


function escapeAttr(s: string): string {
  return escapeText(s)
    .replace(/"/g, "&quot;")
    .replace(/\n/g, "&#10;")
    .replace(/\r/g, "&#13;")
    .replace(/\t/g, "&#9;");
}


/** 含标记的文本（如 description 里的 HTML）写成 CDATA */
function serializeText(s: string): string {
  if (s.includes("<") || s.includes(">")) {
    return `<![CDATA[${s.replace(/\]\]>/g, "]]]]><![CDATA[>")}]]>`;
  }
  return escapeText(s);
}


/** 按文档顺序收集用到的命名空间，并分配前缀 */
function collectPrefixes(root: XmlElement): Map<string, string> {
  const prefixes = new Map<string, string>();
  let generated = 0;
  const visit = (name: QName) => {
    const ns = name.ns;
    if (!ns || ns === XML_NS || prefixes.has(ns)) return;
    prefixes.set(ns, REGISTERED_PREFIXES.get(ns) ?? `ns${generated++}`);
  };
  const walk = (el: XmlElement) => {
    visit(el.name);
    for (const attr of el.attributes) visit(attr.name);
    for (const child of el.children) {
      if (isElement(child)) walk(child);
    }
  };
  walk(root);
  return prefixes;
}


function serializeName(name: QName, prefixes: ReadonlyMap<string, string>): string {
  if (!name.ns) return name.local;
  const prefix = name.ns === XML_NS ? "xml" : prefixes.get(name.ns);
  return prefix ? `${prefix}:${name.local}` : name.local;
}


function serializeElement(
  el: XmlElement,
  prefixes: ReadonlyMap<string, string>,
  depth: number,
  declarations: string,
): string {
  const pad = INDENT.repeat(depth);
  const tag = serializeName(el.name, prefixes);
  const attrs = el.attributes
    .map((a) => ` ${serializeName(a.name, prefixes)}="${escapeAttr(a.value)}"`)
    .join("");
  const open = `${pad}<${tag}${declarations}${attrs}`;

  if (el.children.length === 0) return `${open} />\n`;
  if (!el.children.some(isElement)) {
    const text = el.children.filter(isText).map((c) => c.text).join("");
    return `${open}>${serializeText(text)}</${tag}>\n`;
  }
  let buf = `${open}>\n`;
  for (const child of el.children) {
    buf += isElement(child)
      ? serializeElement(child, prefixes, depth + 1, "")
      : `${INDENT.repeat(depth + 1)}${serializeText(child.text)}\n`;
  }
  return `${buf}${pad}</${tag}>\n`;
}


export function serializeFeed(doc: FeedDocument): string {
  const prefixes = collectPrefixes(doc.root);
  const declarations = [...prefixes]
    .map(([ns, prefix]) => ` xmlns:${prefix}="${escapeAttr(ns)}"`)
    .join("");
  return `<?xml version="1.0" encoding="utf-8"?>\n${serializeElement(doc.root, prefixes, 0, declarations)}`;
}
