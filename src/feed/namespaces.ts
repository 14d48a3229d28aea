// appcast 用到的命名空间 URI

export const SPARKLE_NS = "http://www.andymatuschak.org/xml-namespaces/sparkle";
export const DC_NS = "http://purl.org/dc/elements/1.1/";
export const ATOM_NS = "http://www.w3.org/2005/Atom";
export const XML_NS = "http://www.w3.org/XML/1998/namespace";

/** 签名工具输出里可识别的 key 前缀 */
export const SIGNATURE_PREFIXES: Readonly<Record<string, string>> = {
  sparkle: SPARKLE_NS,
};
