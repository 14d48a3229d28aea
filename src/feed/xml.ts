// XML 树的小工具：按限定名查找、增删子元素、读写属性

import type { QName, XmlAttribute, XmlElement, XmlNode, XmlText } from "./types.js";

export function qname(local: string, ns?: string): QName {
  return ns ? { ns, local } : { local };
}

export function qnameEquals(a: QName, b: QName): boolean {
  return a.local === b.local && (a.ns ?? "") === (b.ns ?? "");
}

/** Clark 记法 {ns}local，用作 Map 的 key */
export function clarkName(name: QName): string {
  return name.ns ? `{${name.ns}}${name.local}` : name.local;
}

export function isElement(node: XmlNode): node is XmlElement {
  return "name" in node;
}

export function isText(node: XmlNode): node is XmlText {
  return "text" in node;
}

/** 创建元素；text 非空时作为唯一文本子节点 */
export function element(name: QName, text?: string, attributes: XmlAttribute[] = []): XmlElement {
  return {
    name,
    attributes: [...attributes],
    children: text !== undefined ? [{ text }] : [],
  };
}

export function findChildren(parent: XmlElement, name: QName): XmlElement[] {
  return parent.children.filter((c): c is XmlElement => isElement(c) && qnameEquals(c.name, name));
}

export function findChild(parent: XmlElement, name: QName): XmlElement | undefined {
  return findChildren(parent, name)[0];
}

/** 元素的直接文本内容（拼接所有文本子节点） */
export function textContent(el: XmlElement): string {
  return el.children.filter(isText).map((t) => t.text).join("");
}

/** 子元素的文本；子元素不存在时返回 undefined */
export function childText(parent: XmlElement, name: QName): string | undefined {
  const child = findChild(parent, name);
  return child ? textContent(child) : undefined;
}

export function getAttribute(el: XmlElement, name: QName): string | undefined {
  return el.attributes.find((a) => qnameEquals(a.name, name))?.value;
}

/** 设置属性：已存在则原位覆盖，否则追加到末尾 */
export function setAttribute(el: XmlElement, name: QName, value: string): void {
  const existing = el.attributes.find((a) => qnameEquals(a.name, name));
  if (existing) {
    existing.value = value;
  } else {
    el.attributes.push({ name, value });
  }
}

export function appendChild(parent: XmlElement, child: XmlNode): void {
  parent.children.push(child);
}

/** 按引用移除子节点，返回是否移除 */
export function removeChild(parent: XmlElement, child: XmlNode): boolean {
  const idx = parent.children.indexOf(child);
  if (idx < 0) return false;
  parent.children.splice(idx, 1);
  return true;
}
