import { elementToStructured } from "./codec.js";
import type { VdomElement } from "./element.js";
import { renderHtml } from "./renderer.js";
import { TEXT_MIME_TYPE, VDOM_MIME_TYPE } from "./types.js";
import type { DisplayBundle, DisplayMimeType } from "./types.js";

export interface DisplayBundleOptions {
  /** Only these media types are produced when given. */
  include?: readonly DisplayMimeType[];
  exclude?: readonly DisplayMimeType[];
}

export function toDisplayBundle(element: VdomElement, options: DisplayBundleOptions = {}): DisplayBundle {
  const wanted = (mimeType: DisplayMimeType): boolean =>
    (options.include === undefined || options.include.includes(mimeType)) &&
    !(options.exclude?.includes(mimeType) ?? false);

  const bundle: DisplayBundle = {};

  if (wanted(VDOM_MIME_TYPE)) {
    bundle[VDOM_MIME_TYPE] = elementToStructured(element);
  }

  if (wanted(TEXT_MIME_TYPE)) {
    bundle[TEXT_MIME_TYPE] = renderHtml(element);
  }

  return bundle;
}
