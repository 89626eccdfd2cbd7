import { toAttributes } from "./codec.js";
import { isChildInput, VdomElement } from "./element.js";
import { AttributeTypeError, ChildTypeError, DisallowedChildrenError } from "./errors.js";
import type { Attributes, ChildInput } from "./types.js";
import { hasOwn, isPlainObject } from "./utils.js";

export interface ComponentOptions {
  allowChildren?: boolean;
}

export type ComponentArg = ChildInput | readonly ChildInput[];

/**
 * Props bag given as the first argument of a component call.
 * `children` replaces the positional children; `attributes` replaces the
 * attributes gathered from every other key.
 */
export interface ComponentProps {
  children?: readonly ChildInput[];
  attributes?: Attributes;
  [attribute: string]: string | readonly ChildInput[] | Attributes | undefined;
}

export interface Component {
  (props: ComponentProps, ...children: ComponentArg[]): VdomElement;
  (...children: ComponentArg[]): VdomElement;
  readonly tagName: string;
  readonly allowChildren: boolean;
}

/**
 * Create a component for a markup tag.
 *
 * @example
 * ```ts
 * const marquee = createComponent("marquee");
 * marquee("woohoo").toHtml(); // <marquee>woohoo</marquee>
 * ```
 */
export function createComponent(tagName: string, options: ComponentOptions = {}): Component {
  const allowChildren = options.allowChildren ?? true;
  const component = (...args: unknown[]): VdomElement => buildElement(tagName, allowChildren, args);
  return Object.freeze(Object.assign(component, { tagName, allowChildren }));
}

/**
 * Build a single element without creating a component first.
 * `props.attrs` is merged under the remaining props.
 *
 * @example
 * ```ts
 * h("div", [h("p", "hey")]).toHtml(); // <div><p>hey</p></div>
 * ```
 */
export function h(tagName: string, props: ComponentProps, ...children: ComponentArg[]): VdomElement;
export function h(tagName: string, ...children: ComponentArg[]): VdomElement;
export function h(tagName: string, ...args: unknown[]): VdomElement {
  const [first, ...rest] = args;
  if (!isPlainObject(first)) {
    return buildElement(tagName, true, args);
  }

  const { attrs, ...props } = first;
  if (attrs !== undefined && !isPlainObject(attrs)) {
    throw new AttributeTypeError("attrs");
  }
  const base = isPlainObject(attrs) ? attrs : {};

  return buildElement(tagName, true, [{ ...base, ...props }, ...rest]);
}

function buildElement(tagName: string, allowChildren: boolean, args: unknown[]): VdomElement {
  const [first, ...rest] = args;
  const props = isPlainObject(first) ? first : undefined;
  const positional = props === undefined ? args : rest;

  const children = resolveChildren(props, positional);
  const attributes = resolveAttributes(props);

  if (!allowChildren && (!Array.isArray(children) || children.length > 0)) {
    throw new DisallowedChildrenError(tagName);
  }
  if (!Array.isArray(children)) {
    throw new ChildTypeError(children);
  }

  return new VdomElement(tagName, { attributes, children: children.map((child) => toChildInput(child)) });
}

// An explicit non-list `children` prop is returned as is and rejected by the caller.
function resolveChildren(props: Record<string, unknown> | undefined, positional: unknown[]): unknown {
  if (props !== undefined && hasOwn(props, "children")) {
    return props.children ?? [];
  }

  // Only a lone list argument is spread: div([a, b]) is div(a, b).
  const [only] = positional;
  if (positional.length === 1 && Array.isArray(only)) {
    return only;
  }

  return positional;
}

function resolveAttributes(props: Record<string, unknown> | undefined): Attributes {
  if (props === undefined) {
    return {};
  }

  if (hasOwn(props, "attributes")) {
    const explicit = props.attributes;
    if (!isPlainObject(explicit)) {
      throw new AttributeTypeError();
    }
    return toAttributes(explicit);
  }

  return toAttributes(Object.fromEntries(Object.entries(props).filter(([name]) => name !== "children")));
}

function toChildInput(child: unknown): ChildInput {
  if (isChildInput(child)) {
    return child;
  }
  throw new ChildTypeError(child);
}
