// appcast 文档模型：与序列化前缀无关的 XML 树

/** 限定名：命名空间 URI + 本地名；ns 为空表示无命名空间 */
export interface QName {
  ns?: string;
  local: string;
}

export interface XmlAttribute {
  name: QName;
  value: string;
}

export interface XmlText {
  text: string;
}

export interface XmlElement {
  name: QName;
  /** 有序，序列化按此顺序输出 */
  attributes: XmlAttribute[];
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

/** 已加载的 appcast：root 为 <rss>，channel 为其下唯一的 <channel> */
export interface FeedDocument {
  root: XmlElement;
  channel: XmlElement;
}

/** 签名工具输出解析后的 enclosure 属性，解析后不再修改 */
export type SignatureAttributeSet = readonly XmlAttribute[];

/** 产品常量：骨架文档与新条目共用 */
export interface FeedProfile {
  /** 产品名，用于频道标题与描述标题，如 "App" */
  appName: string;
  /** appcast 自身的稳定下载地址；未设置时骨架不输出 <link> */
  feedUrl?: string;
  /** 仓库地址，兜底描述里的发布页链接由此拼出；未设置时不带链接 */
  repoUrl?: string;
  minimumSystemVersion: string;
}

/** 新发布条目的输入 */
export interface ReleaseInfo {
  /** 展示用版本号，写入 sparkle:shortVersionString */
  version: string;
  /** 构建号，写入 sparkle:version，客户端据此比较 */
  buildNumber: string;
  downloadUrl: string;
  signature: SignatureAttributeSet;
  now: Date;
  /** markdown 子集；空白时使用兜底描述 */
  releaseNotes?: string;
  releaseUrl?: string;
}
