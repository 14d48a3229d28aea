// 发布说明的 markdown 子集 → HTML 片段：标题、无序列表、段落、链接/加粗/行内代码
// 不是通用 markdown 实现，也不转义 HTML


const LINK_RE = /\[([^\]]+)\]\(([^)]+)\)/g;
const BOLD_RE = /\*\*([^*]+)\*\*/g;
const CODE_RE = /`([^`]+)`/g;

/** 标题前缀按长度从长到短匹配 */
const HEADINGS: ReadonlyArray<[prefix: string, tag: string]> = [
  ["### ", "h4"],
  ["## ", "h3"],
  ["# ", "h2"],
];

const LIST_MARKERS = ["- ", "* "];


/** 行内替换：链接 → 加粗 → 行内代码，各替换一遍 */
export function renderInline(text: string): string {
  return text
    .replace(LINK_RE, '<a href="$2">$1</a>')
    .replace(BOLD_RE, "<strong>$1</strong>")
    .replace(CODE_RE, "<code>$1</code>");
}


export function renderMarkdown(md: string): string {
  const out: string[] = [];
  let inList = false;

  const closeList = () => {
    if (inList) {
      out.push("</ul>");
      inList = false;
    }
  };

  for (const line of md.trim().split("\n")) {
    const stripped = line.trim();

    if (!stripped) {
      closeList();
      out.push("");
      continue;
    }

    const heading = HEADINGS.find(([prefix]) => stripped.startsWith(prefix));
    if (heading) {
      const [prefix, tag] = heading;
      closeList();
      out.push(`<${tag}>${stripped.slice(prefix.length)}</${tag}>`);
      continue;
    }

    if (LIST_MARKERS.some((m) => stripped.startsWith(m))) {
      if (!inList) {
        out.push("<ul>");
        inList = true;
      }
      out.push(`  <li>${renderInline(stripped.slice(2))}</li>`);
      continue;
    }

    closeList();
    out.push(`<p>${renderInline(stripped)}</p>`);
  }

  closeList();
  return out.join("\n");
}
