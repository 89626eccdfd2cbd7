import { describe, it, expect } from "vitest";
import { TextNode, VdomElement, elementsEqual, isChildInput, text } from "../../src/element.js";
import {
  AttributeTypeError,
  ChildTypeError,
  ImmutableMutationError,
  InvalidTagNameError,
  SchemaValidationError,
} from "../../src/errors.js";

describe("VdomElement construction", () => {
  it("materializes attributes and children when none are given", () => {
    const el = new VdomElement("div");

    expect(el.type).toBe("element");
    expect(el.tagName).toBe("div");
    expect(el.attributes).toEqual({});
    expect(el.children).toEqual([]);
    expect(el.key).toBeUndefined();
  });

  it("wraps string children as text nodes and keeps order", () => {
    const bold = new VdomElement("b", { children: ["x"] });
    const el = new VdomElement("p", { children: ["a", bold, text("c")] });

    expect(el.children).toHaveLength(3);
    expect(el.children[0]).toBeInstanceOf(TextNode);
    expect(el.children[1]).toBe(bold);
    expect(el.children.map((child) => (child.type === "text" ? child.value : child.tagName))).toEqual([
      "a",
      "b",
      "c",
    ]);
  });

  it("keeps the key", () => {
    expect(new VdomElement("li", { key: "row-1" }).key).toBe("row-1");
  });

  it("copies the children list and the attribute mapping", () => {
    const children: string[] = ["a"];
    const attributes: Record<string, string> = { id: "first" };
    const el = new VdomElement("p", { children, attributes });

    children.push("b");
    attributes.id = "second";

    expect(el.children).toHaveLength(1);
    expect(el.attributes.id).toBe("first");
  });

  it("rejects children that are not text or elements", () => {
    expect(() => new VdomElement("div", { children: [42] as any })).toThrow(ChildTypeError);
    expect(() => new VdomElement("div", { children: [{ tagName: "p" }] as any })).toThrow(
      "children must be text or element nodes"
    );
  });

  it("checks children before anything else", () => {
    expect(() => new VdomElement("", { children: [null] as any })).toThrow(ChildTypeError);
  });

  it("rejects an empty tag name", () => {
    expect(() => new VdomElement("")).toThrow(InvalidTagNameError);
  });

  it("rejects non-string attribute values", () => {
    expect(() => new VdomElement("div", { attributes: { hidden: true } as any })).toThrow(
      'attribute "hidden" must have a string value'
    );
    expect(() => new VdomElement("div", { attributes: [] as any })).toThrow(AttributeTypeError);
  });

  it("keeps a __proto__ attribute as an own attribute", () => {
    const attributes = JSON.parse('{"__proto__":"x"}');
    const el = new VdomElement("div", { attributes });

    expect(Object.keys(el.attributes)).toEqual(["__proto__"]);
    expect(el.toHtml()).toBe('<div __proto__="x"></div>');
  });

  it("validates against a supplied schema before returning", () => {
    const schema = { type: "object", properties: { tagName: { enum: ["span"] } } };

    expect(() => new VdomElement("div", { schema })).toThrow(SchemaValidationError);
    expect(new VdomElement("span", { schema }).tagName).toBe("span");
  });
});

describe("VdomElement immutability", () => {
  it("rejects field assignment and leaves the node unchanged", () => {
    const el = new VdomElement("div", { attributes: { id: "a" } });

    expect(() => Reflect.set(el, "tagName", "span")).toThrow(ImmutableMutationError);
    expect(() => Reflect.set(el, "key", "k")).toThrow(ImmutableMutationError);
    expect(el.tagName).toBe("div");
    expect(el.key).toBeUndefined();
  });

  it("rejects new fields, deletion and prototype changes", () => {
    const el = new VdomElement("div");

    expect(() => Reflect.set(el, "extra", 1)).toThrow(ImmutableMutationError);
    expect(() => Reflect.deleteProperty(el, "children")).toThrow(ImmutableMutationError);
    expect(() => Object.defineProperty(el, "tagName", { value: "p" })).toThrow(ImmutableMutationError);
    expect(() => Object.setPrototypeOf(el, null)).toThrow(ImmutableMutationError);
    expect("extra" in el).toBe(false);
    expect(el).toBeInstanceOf(VdomElement);
  });

  it("names the property in the error", () => {
    const el = new VdomElement("div");

    try {
      Reflect.set(el, "tagName", "span");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ImmutableMutationError);
      if (!(error instanceof ImmutableMutationError)) return;
      expect(error.property).toBe("tagName");
      expect(error.code).toBe("IMMUTABLE_MUTATION");
      expect(error.message).toBe('cannot change "tagName" of an immutable node');
    }
  });

  it("freezes the attribute mapping and the child list", () => {
    const el = new VdomElement("ul", { attributes: { id: "list" }, children: ["a"] });

    expect(() => Reflect.set(el.attributes, "id", "other")).toThrow(ImmutableMutationError);
    expect(() => Reflect.set(el.children, 1, "b")).toThrow(ImmutableMutationError);
    expect(el.attributes).toEqual({ id: "list" });
    expect(el.children).toHaveLength(1);
  });

  it("freezes text nodes", () => {
    const node = text("hi");
    expect(() => Reflect.set(node, "value", "bye")).toThrow(ImmutableMutationError);
    expect(node.value).toBe("hi");
  });
});

describe("VdomElement conversions", () => {
  const el = new VdomElement("p", { attributes: { class: "note" }, children: ["hi"] });

  it("toString matches toHtml", () => {
    expect(el.toString()).toBe('<p class="note">hi</p>');
    expect(`${el}`).toBe(el.toHtml());
  });

  it("JSON.stringify emits the wire format", () => {
    expect(JSON.stringify(el)).toBe('{"tagName":"p","attributes":{"class":"note"},"children":["hi"]}');
    expect(el.toJsonString()).toBe(JSON.stringify(el));
  });

  it("validate checks a caller-supplied schema", () => {
    expect(() => el.validate({ type: "object", required: ["key"] })).toThrow(SchemaValidationError);
    expect(() => el.validate({ type: "object", required: ["tagName"] })).not.toThrow();
  });
});

describe("elementsEqual", () => {
  it("ignores attribute order", () => {
    const a = new VdomElement("a", { attributes: { href: "/", title: "t" } });
    const b = new VdomElement("a", { attributes: { title: "t", href: "/" } });
    expect(elementsEqual(a, b)).toBe(true);
    expect(a.equals(b)).toBe(true);
  });

  it("compares keys, children and child kinds", () => {
    const base = new VdomElement("div", { children: ["x"], key: "k" });
    expect(base.equals(new VdomElement("div", { children: ["x"], key: "other" }))).toBe(false);
    expect(base.equals(new VdomElement("div", { children: ["y"], key: "k" }))).toBe(false);
    expect(base.equals(new VdomElement("div", { children: [new VdomElement("x")], key: "k" }))).toBe(false);
    expect(base.equals(new VdomElement("div", { children: ["x"], key: "k" }))).toBe(true);
  });
});

describe("isChildInput", () => {
  it("accepts strings, text nodes and elements only", () => {
    expect(isChildInput("x")).toBe(true);
    expect(isChildInput(text("x"))).toBe(true);
    expect(isChildInput(new VdomElement("b"))).toBe(true);
    expect(isChildInput({ type: "text", value: "x" })).toBe(false);
    expect(isChildInput(["x"])).toBe(false);
  });
});
