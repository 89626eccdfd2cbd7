import { createComponent } from "./component.js";
import type { Component } from "./component.js";

// Elements that never take content
const VOID_TAGS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr",
]);

export function isVoidTag(tagName: string): boolean {
  return VOID_TAGS.has(tagName);
}

function tag(tagName: string): Component {
  return createComponent(tagName, { allowChildren: !isVoidTag(tagName) });
}

// ── Document ──

export const html = tag("html");
export const head = tag("head");
export const title = tag("title");
export const base = tag("base");
export const link = tag("link");
export const meta = tag("meta");
export const style = tag("style");
export const script = tag("script");
export const noscript = tag("noscript");
export const template = tag("template");
export const body = tag("body");

// ── Sections ──

export const header = tag("header");
export const footer = tag("footer");
export const main = tag("main");
export const nav = tag("nav");
export const section = tag("section");
export const article = tag("article");
export const aside = tag("aside");
export const address = tag("address");
export const h1 = tag("h1");
export const h2 = tag("h2");
export const h3 = tag("h3");
export const h4 = tag("h4");
export const h5 = tag("h5");
export const h6 = tag("h6");
export const hgroup = tag("hgroup");

// ── Grouping ──

export const div = tag("div");
export const p = tag("p");
export const hr = tag("hr");
export const pre = tag("pre");
export const blockquote = tag("blockquote");
export const ol = tag("ol");
export const ul = tag("ul");
export const li = tag("li");
export const dl = tag("dl");
export const dt = tag("dt");
export const dd = tag("dd");
export const figure = tag("figure");
export const figcaption = tag("figcaption");

// ── Text-level ──

export const a = tag("a");
export const em = tag("em");
export const strong = tag("strong");
export const small = tag("small");
export const s = tag("s");
export const cite = tag("cite");
export const q = tag("q");
export const dfn = tag("dfn");
export const abbr = tag("abbr");
export const time = tag("time");
export const code = tag("code");
export const samp = tag("samp");
export const kbd = tag("kbd");
export const sub = tag("sub");
export const sup = tag("sup");
export const i = tag("i");
export const b = tag("b");
export const u = tag("u");
export const mark = tag("mark");
export const span = tag("span");
export const br = tag("br");
export const wbr = tag("wbr");
export const ins = tag("ins");
export const del = tag("del");

// ── Embedded ──

export const picture = tag("picture");
export const source = tag("source");
export const img = tag("img");
export const iframe = tag("iframe");
export const embed = tag("embed");
export const param = tag("param");
export const video = tag("video");
export const audio = tag("audio");
export const track = tag("track");
export const canvas = tag("canvas");
export const area = tag("area");

// ── Tables ──

export const table = tag("table");
export const caption = tag("caption");
export const colgroup = tag("colgroup");
export const col = tag("col");
export const tbody = tag("tbody");
export const thead = tag("thead");
export const tfoot = tag("tfoot");
export const tr = tag("tr");
export const td = tag("td");
export const th = tag("th");

// ── Forms ──

export const form = tag("form");
export const label = tag("label");
export const input = tag("input");
export const button = tag("button");
export const select = tag("select");
export const optgroup = tag("optgroup");
export const option = tag("option");
export const textarea = tag("textarea");
export const output = tag("output");
export const progress = tag("progress");
export const meter = tag("meter");
export const fieldset = tag("fieldset");
export const legend = tag("legend");

// ── Interactive ──

export const details = tag("details");
export const summary = tag("summary");
export const dialog = tag("dialog");
