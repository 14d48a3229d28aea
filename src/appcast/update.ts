// 生成新 appcast：加载 → 合并/裁剪 → 追加新条目 → 序列化

import { logger } from "../logger/index.js";
import { appendItem, buildItem } from "../feed/item.js";
import { loadFeedDocument } from "../feed/loader.js";
import { mergeEntries, PRUNE_LIMIT } from "../feed/merger.js";
import { serializeFeed } from "../feed/serializer.js";
import { parseSignatureAttributes } from "../feed/signature.js";
import type { FeedDocument, FeedProfile, ReleaseInfo } from "../feed/types.js";


export interface UpdateAppcastInput {
  /** 已有 appcast 内容；不存在时为 undefined */
  existingXml?: string;
  /** 签名工具输出的一行属性 */
  signatureLine: string;
  release: Omit<ReleaseInfo, "signature">;
  profile: FeedProfile;
  /** 保留条目数，默认 15 */
  limit?: number;
}


export interface UpdateAppcastResult {
  xml: string;
  document: FeedDocument;
  evicted: number;
  pruned: number;
}


export function updateAppcast(input: UpdateAppcastInput): UpdateAppcastResult {
  const { release, profile } = input;
  const signature = parseSignatureAttributes(input.signatureLine);
  const document = loadFeedDocument(input.existingXml, profile);
  const { evicted, pruned } = mergeEntries(document.channel, release.version, input.limit ?? PRUNE_LIMIT);
  if (evicted > 0 || pruned > 0) {
    logger.debug("feed", "已清理旧条目", { version: release.version, evicted, pruned });
  }
  appendItem(document.channel, buildItem({ ...release, signature }, profile));
  return { xml: serializeFeed(document), document, evicted, pruned };
}
