import type { VdomElement } from "./element.js";
import type { ChildNode } from "./types.js";
import { escapeHtml } from "./utils.js";

export function renderHtml(root: VdomElement): string {
  return renderElement(root);
}

function renderNode(node: ChildNode): string {
  if (node.type === "text") {
    return escapeHtml(node.value);
  }

  return renderElement(node);
}

// Childless elements still get a closing tag; there is no self-closing form.
function renderElement(node: VdomElement): string {
  const tag = escapeHtml(node.tagName);
  const attrs = buildRenderedAttributes(node);
  const body = node.children.map((child) => renderNode(child)).join("");
  return `<${tag}${attrs}>${body}</${tag}>`;
}

function buildRenderedAttributes(node: VdomElement): string {
  const entries: string[] = [];

  for (const [key, value] of Object.entries(node.attributes)) {
    entries.push(`${escapeHtml(key)}="${escapeHtml(value)}"`);
  }

  return entries.length > 0 ? ` ${entries.join(" ")}` : "";
}
