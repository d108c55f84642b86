export type Attributes = Readonly<Record<string, string>>;

export interface TextNode {
  readonly type: "text";
  readonly value: string;
}

export interface ElementNode {
  readonly type: "element";
  readonly tag: string;
  readonly attrs: Attributes;
  readonly children: readonly MarkupNode[];
}

export type MarkupNode = TextNode | ElementNode;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return String(value).replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] || char);
}

export function text(value: string): TextNode {
  return Object.freeze({ type: "text", value });
}

export function el(tag: string, attrs: Attributes = {}, children: ReadonlyArray<MarkupNode | string> = []): ElementNode {
  return Object.freeze({
    type: "element",
    tag,
    attrs: Object.freeze({ ...attrs }),
    children: Object.freeze(children.map((child) => (typeof child === "string" ? text(child) : child))),
  });
}

export const h1 = (content: string, attrs?: Attributes) => el("h1", attrs, [content]);
export const h2 = (content: string, attrs?: Attributes) => el("h2", attrs, [content]);
export const p = (children: ReadonlyArray<MarkupNode | string>, attrs?: Attributes) => el("p", attrs, children);
export const em = (content: string) => el("em", {}, [content]);
export const div = (children: ReadonlyArray<MarkupNode | string>, attrs?: Attributes) => el("div", attrs, children);
export const link = (href: string, label: string, attrs: Attributes = {}) => el("a", { href, ...attrs }, [label]);

function renderAttrs(attrs: Attributes): string {
  return Object.entries(attrs)
    .map(([name, value]) => ` ${name}="${escapeHtml(value)}"`)
    .join("");
}

function renderNode(node: MarkupNode): string {
  if (node.type === "text") {
    return escapeHtml(node.value);
  }
  return `<${node.tag}${renderAttrs(node.attrs)}>${node.children.map(renderNode).join("")}</${node.tag}>`;
}

export function serialize(nodes: readonly MarkupNode[], separator = "\n"): string {
  return nodes.map(renderNode).join(separator);
}
