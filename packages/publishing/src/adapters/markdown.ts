/**
 * Minimal markdown to HTML conversion for CMS APIs that take HTML.
 */
export function markdownToHtml(markdown: string): string {
  const blocks = markdown.replace(/\r\n/g, "\n").split(/\n{2,}/);

  return blocks
    .map((block) => block.trim())
    .filter((block) => block.length > 0)
    .map((block) => {
      const heading = /^(#{1,6})\s+(.+)$/.exec(block);
      if (heading && !block.includes("\n")) {
        const level = heading[1]?.length ?? 1;
        return `<h${level}>${inline(heading[2] ?? "")}</h${level}>`;
      }
      if (block.split("\n").every((line) => /^[-*]\s+/.test(line))) {
        const items = block.split("\n").map((line) => `<li>${inline(line.replace(/^[-*]\s+/, ""))}</li>`);
        return `<ul>${items.join("")}</ul>`;
      }
      return `<p>${inline(block).replace(/\n/g, "<br>")}</p>`;
    })
    .join("\n");
}

function inline(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\*\*(.+?)\*\*/g, "<strong>$1</strong>")
    .replace(/\*(.+?)\*/g, "<em>$1</em>")
    .replace(/`([^`]+)`/g, "<code>$1</code>")
    .replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, '<a href="$2">$1</a>');
}
