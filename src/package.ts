import { readFile, writeFile } from "fs/promises";
import path from "path";
import { ManifestItem } from "./document";
import {
  ContainerIOError,
  MalformedPackageError,
  describeError,
} from "./errors";
import { toPosixPath } from "./files";
import {
  childElements,
  isText,
  parseXml,
  removeWithIndentation,
  serializeXml,
} from "./xml";

interface SpineEntry {
  idref: string;
  element: Element;
}

function decodeHref(href: string): string {
  const withoutFragment = href.split("#")[0];
  try {
    return decodeURIComponent(withoutFragment);
  } catch {
    // Not percent-encoded after all; use it verbatim.
    return withoutFragment;
  }
}

/**
 * The ePub [Package Document](https://www.w3.org/TR/epub-33/#sec-package-doc).
 *
 * The manifest and spine are held as an explicit model keyed by item ID. The parsed XML tree
 * is kept only to preserve everything else (metadata, namespaces, unknown attributes) and is
 * brought in line with the model when the document is serialized.
 */
export class PackageDocument {
  /** Absolute path of the package document on disk. */
  readonly path: string;

  /** Directory that manifest hrefs are relative to. */
  readonly directory: string;

  protected readonly doc: Document;

  protected readonly manifestElement: Element;

  protected readonly spineElement: Element;

  protected readonly items = new Map<string, ManifestItem>();

  protected readonly itemElements = new Map<string, Element>();

  /** Spine entries in reading order; an item may appear more than once. */
  protected spineEntries: SpineEntry[] = [];

  protected constructor(
    opfPath: string,
    doc: Document,
    manifestElement: Element,
    spineElement: Element,
  ) {
    this.path = opfPath;
    this.directory = path.dirname(opfPath);
    this.doc = doc;
    this.manifestElement = manifestElement;
    this.spineElement = spineElement;
  }

  /** Reads and parses the package document at `opfPath`. */
  static async load(opfPath: string): Promise<PackageDocument> {
    let xml: string;
    try {
      xml = await readFile(opfPath, "utf-8");
    } catch (error) {
      throw new ContainerIOError(`cannot read package document ${opfPath}`, {
        path: opfPath,
        cause: error,
      });
    }
    return PackageDocument.parse(xml, opfPath);
  }

  static parse(xml: string, opfPath: string): PackageDocument {
    let doc: Document;
    try {
      doc = parseXml(xml, "package");
    } catch (error) {
      throw new MalformedPackageError(
        `cannot parse package document: ${describeError(error)}`,
        { path: opfPath, cause: error },
      );
    }

    const root = doc.documentElement;
    const namespace = root.namespaceURI ?? undefined;
    const [manifestElement] = childElements(root, namespace, "manifest");
    const [spineElement] = childElements(root, namespace, "spine");

    if (!manifestElement) {
      throw new MalformedPackageError("package document has no manifest", {
        path: opfPath,
      });
    }
    if (!spineElement) {
      throw new MalformedPackageError("package document has no spine", {
        path: opfPath,
      });
    }

    const pkg = new PackageDocument(
      opfPath,
      doc,
      manifestElement,
      spineElement,
    );

    for (const element of childElements(manifestElement, namespace, "item")) {
      const id = element.getAttribute("id");
      const href = element.getAttribute("href");

      if (!id || !href) {
        throw new MalformedPackageError(
          "manifest item is missing its id or href",
          { path: opfPath },
        );
      }
      if (pkg.items.has(id)) {
        throw new MalformedPackageError(`duplicate manifest item '${id}'`, {
          path: opfPath,
        });
      }

      pkg.items.set(id, {
        id,
        href,
        mediaType: element.getAttribute("media-type") ?? "",
        properties: element.getAttribute("properties") ?? undefined,
      });
      pkg.itemElements.set(id, element);
    }

    for (const element of childElements(spineElement, namespace, "itemref")) {
      const idref = element.getAttribute("idref");

      if (!idref || !pkg.items.has(idref)) {
        throw new MalformedPackageError(
          `spine entry '${idref ?? ""}' does not resolve in the manifest`,
          { path: opfPath },
        );
      }

      pkg.spineEntries.push({ idref, element });
    }

    return pkg;
  }

  get manifest(): ReadonlyMap<string, ManifestItem> {
    return this.items;
  }

  /** Manifest item IDs, in reading order. */
  get spine(): readonly string[] {
    return this.spineEntries.map((entry) => entry.idref);
  }

  /** The manifest ID of the NCX named by the spine's `toc` attribute, if any. */
  get tocId(): string | undefined {
    return this.spineElement.getAttribute("toc") ?? undefined;
  }

  getItem(id: string): ManifestItem | undefined {
    return this.items.get(id);
  }

  findItems(predicate: (item: ManifestItem) => boolean): ManifestItem[] {
    return [...this.items.values()].filter(predicate);
  }

  /** Absolute path on disk of a manifest href. */
  resolveHref(href: string): string {
    return path.resolve(this.directory, decodeHref(href));
  }

  /** The manifest href of an absolute path on disk. */
  hrefFor(filename: string): string {
    return toPosixPath(path.relative(this.directory, filename));
  }

  /**
   * Removes the first `count` spine entries and returns their IDs. A spine with fewer entries is
   * emptied. The manifest items stay, since navigation may still link to them.
   */
  removeLeadingSpineEntries(count: number): string[] {
    return this.spineEntries
      .splice(0, Math.max(0, count))
      .map((entry) => entry.idref);
  }

  /** Removes a manifest item, and any spine entry pointing at it. Returns whether it existed. */
  removeManifestItem(id: string): boolean {
    this.spineEntries = this.spineEntries.filter((entry) => entry.idref !== id);
    return this.items.delete(id);
  }

  /** Adds a manifest item, replacing any existing item with the same ID. */
  addManifestItem(item: ManifestItem): ManifestItem {
    this.items.set(item.id, { ...item });
    return item;
  }

  protected createChild(parent: Element, localName: string): Element {
    const qualifiedName = parent.prefix
      ? `${parent.prefix}:${localName}`
      : localName;
    const element = this.doc.createElementNS(parent.namespaceURI, qualifiedName);

    // Match the indentation of the existing children, and keep the closing tag on its own line.
    const [sibling] = childElements(parent);
    const indentation = sibling?.previousSibling;
    const last = parent.lastChild;

    if (indentation && isText(indentation) && last && isText(last)) {
      parent.insertBefore(this.doc.createTextNode(indentation.data), last);
      parent.insertBefore(element, last);
    } else {
      parent.appendChild(element);
    }

    return element;
  }

  /** Brings the XML tree in line with the manifest and spine model. */
  protected reconcile(): void {
    for (const [id, element] of this.itemElements) {
      const item = this.items.get(id);

      if (!item) {
        removeWithIndentation(element);
        this.itemElements.delete(id);
        continue;
      }

      element.setAttribute("href", item.href);
      element.setAttribute("media-type", item.mediaType);
      if (item.properties) {
        element.setAttribute("properties", item.properties);
      } else {
        element.removeAttribute("properties");
      }
    }

    for (const item of this.items.values()) {
      if (this.itemElements.has(item.id)) {
        continue;
      }

      const element = this.createChild(this.manifestElement, "item");
      element.setAttribute("id", item.id);
      element.setAttribute("href", item.href);
      element.setAttribute("media-type", item.mediaType);
      if (item.properties) {
        element.setAttribute("properties", item.properties);
      }
      this.itemElements.set(item.id, element);
    }

    const retained = new Set(this.spineEntries.map((entry) => entry.element));
    const itemrefs = childElements(
      this.spineElement,
      this.spineElement.namespaceURI ?? undefined,
      "itemref",
    );
    for (const element of itemrefs) {
      if (!retained.has(element)) {
        removeWithIndentation(element);
      }
    }
  }

  /** The package document as XML text, with an XML declaration and its original namespaces. */
  serialize(): string {
    this.reconcile();
    return serializeXml(this.doc);
  }

  async save(): Promise<void> {
    try {
      await writeFile(this.path, this.serialize(), "utf-8");
    } catch (error) {
      throw new ContainerIOError(`cannot write package document ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }
  }
}
