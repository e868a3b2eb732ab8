/** A single entry in the package document's [manifest](https://www.w3.org/TR/epub-33/#sec-manifest-elem). */
export interface ManifestItem {
  /** Unique within the package; referenced by spine `itemref` elements. */
  id: string;

  /** Location of the resource, relative to the package document's directory. */
  href: string;

  mediaType: string;

  /** Space-separated manifest properties, such as `nav` or `cover-image`. */
  properties?: string;
}

export const MEDIA_TYPES = {
  ncx: "application/x-dtbncx+xml",
  xhtml: "application/xhtml+xml",
  css: "text/css",
  json: "application/json",
  package: "application/oebps-package+xml",
} as const;

export function hasProperty(item: ManifestItem, property: string): boolean {
  return (item.properties ?? "").split(/\s+/).includes(property);
}
