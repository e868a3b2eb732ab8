import { readFile, writeFile } from "fs/promises";
import path from "path";
import { MEDIA_TYPES, hasProperty } from "./document";
import { ProcessingWarning, describeError } from "./errors";
import { pathExists } from "./files";
import type { Logger } from "./logger";
import { PackageDocument } from "./package";
import {
  NAMESPACES,
  childElements,
  descendantElements,
  hasOnlyTextContent,
  parseXml,
  serializeXml,
} from "./xml";

/** A piece of human-readable table of contents text that can be rewritten in place. */
export interface LabelNode {
  readonly text: string;
  setText(text: string): void;
}

/** A navigation document whose entry labels can be rewritten without touching its structure. */
export interface NavigationDocument {
  readonly kind: "ncx" | "nav";

  /** Absolute path on disk. */
  readonly path: string;

  /** Every entry label, in document order. */
  labels(): LabelNode[];

  /** Labels of top-level entries that have nested entries. */
  sections(): string[];

  serialize(): string;
}

function elementLabel(element: Element): LabelNode {
  return {
    get text() {
      return element.textContent ?? "";
    },
    setText(text: string) {
      element.textContent = text;
    },
  };
}

/** A legacy [NCX](https://daisy.org/activities/standards/daisy/daisy-3/z39-86-2005-r2012-specifications-for-the-digital-talking-book/#NCX) table of contents. */
export class NcxDocument implements NavigationDocument {
  readonly kind = "ncx";

  constructor(
    readonly path: string,
    protected readonly doc: Document,
  ) {}

  static parse(xml: string, filename: string): NcxDocument {
    return new NcxDocument(filename, parseXml(xml, "ncx"));
  }

  labels(): LabelNode[] {
    return descendantElements(
      this.doc.documentElement,
      NAMESPACES.ncx,
      "navLabel",
    ).flatMap((navLabel) =>
      childElements(navLabel, NAMESPACES.ncx, "text").map(elementLabel),
    );
  }

  sections(): string[] {
    const [navMap] = childElements(
      this.doc.documentElement,
      NAMESPACES.ncx,
      "navMap",
    );
    if (!navMap) {
      return [];
    }

    return childElements(navMap, NAMESPACES.ncx, "navPoint")
      .filter(
        (navPoint) =>
          childElements(navPoint, NAMESPACES.ncx, "navPoint").length > 0,
      )
      .flatMap((navPoint) =>
        childElements(navPoint, NAMESPACES.ncx, "navLabel").flatMap(
          (navLabel) =>
            childElements(navLabel, NAMESPACES.ncx, "text").map((text) =>
              (text.textContent ?? "").trim(),
            ),
        ),
      );
  }

  serialize(): string {
    return serializeXml(this.doc);
  }
}

/** An EPUB 3 [navigation document](https://www.w3.org/TR/epub-33/#sec-nav). Each text-only anchor is an entry label. */
export class NavDocument implements NavigationDocument {
  readonly kind = "nav";

  constructor(
    readonly path: string,
    protected readonly doc: Document,
  ) {}

  static parse(xml: string, filename: string): NavDocument {
    return new NavDocument(filename, parseXml(xml, "html"));
  }

  labels(): LabelNode[] {
    return descendantElements(this.doc.documentElement, NAMESPACES.xhtml, "a")
      .filter(hasOnlyTextContent)
      .map(elementLabel);
  }

  sections(): string[] {
    const tocNav =
      descendantElements(this.doc.documentElement, NAMESPACES.xhtml, "nav").find(
        (nav) => nav.getAttributeNS(NAMESPACES.ops, "type") === "toc",
      ) ?? descendantElements(this.doc.documentElement, NAMESPACES.xhtml, "nav")[0];
    if (!tocNav) {
      return [];
    }

    const [list] = childElements(tocNav, NAMESPACES.xhtml, "ol");
    if (!list) {
      return [];
    }

    return childElements(list, NAMESPACES.xhtml, "li")
      .filter((li) => childElements(li, NAMESPACES.xhtml, "ol").length > 0)
      .map((li) => {
        const [heading] = childElements(li).filter(
          (element) => element.localName === "a" || element.localName === "span",
        );
        return (heading?.textContent ?? "").trim();
      });
  }

  serialize(): string {
    return serializeXml(this.doc);
  }
}

export interface NavigationFiles {
  ncx?: string;
  nav?: string;
}

/**
 * Finds the navigation documents of a package: the NCX named by the spine, or any NCX in the
 * manifest, or `toc.ncx`; and the manifest item with the `nav` property, or `nav.xhtml`.
 * Documents that do not exist on disk are left out.
 */
export async function findNavigationFiles(
  pkg: PackageDocument,
): Promise<NavigationFiles> {
  const tocItem = pkg.tocId ? pkg.getItem(pkg.tocId) : undefined;
  const [ncxItem] = pkg.findItems((item) => item.mediaType === MEDIA_TYPES.ncx);
  const [navItem] = pkg.findItems((item) => hasProperty(item, "nav"));

  const ncxCandidates = [
    tocItem && pkg.resolveHref(tocItem.href),
    ncxItem && pkg.resolveHref(ncxItem.href),
    path.join(pkg.directory, "toc.ncx"),
  ];
  const navCandidates = [
    navItem && pkg.resolveHref(navItem.href),
    path.join(pkg.directory, "nav.xhtml"),
  ];

  const files: NavigationFiles = {};
  for (const candidate of ncxCandidates) {
    if (candidate && (await pathExists(candidate))) {
      files.ncx = candidate;
      break;
    }
  }
  for (const candidate of navCandidates) {
    if (candidate && (await pathExists(candidate))) {
      files.nav = candidate;
      break;
    }
  }
  return files;
}

/** Rewrites every label of `document` through `rewrite`; returns how many labels changed. */
export function rewriteLabels(
  document: NavigationDocument,
  rewrite: (label: string) => string,
  logger: Logger,
): number {
  let modified = 0;

  for (const label of document.labels()) {
    const original = label.text;
    if (!original.trim()) {
      continue;
    }

    const rewritten = rewrite(original);
    if (rewritten !== original) {
      label.setText(rewritten);
      modified++;
      logger.debug({ from: original, to: rewritten }, "shortened title");
    }
  }

  return modified;
}

export interface NavigationRewriteResult {
  /** Labels changed in the NCX, or `undefined` if there was no NCX or it could not be processed. */
  ncx?: number;

  /** Labels changed in the nav document, or `undefined` if there was none or it could not be processed. */
  nav?: number;

  /** Section labels, from the NCX if it could be read, otherwise from the nav document. */
  sections: string[];

  warnings: ProcessingWarning[];
}

type NavigationParser = (xml: string, filename: string) => NavigationDocument;

const parsers: Record<NavigationDocument["kind"], NavigationParser> = {
  ncx: NcxDocument.parse,
  nav: NavDocument.parse,
};

/**
 * Shortens the entry labels of the package's NCX and nav documents, whichever exist. A document
 * that cannot be read, parsed or written is left unmodified and reported as a warning; the other
 * one is still processed.
 */
export async function rewriteNavigation(
  pkg: PackageDocument,
  rewrite: (label: string) => string,
  logger: Logger,
): Promise<NavigationRewriteResult> {
  const files = await findNavigationFiles(pkg);
  const result: NavigationRewriteResult = { sections: [], warnings: [] };
  const sections: Partial<Record<NavigationDocument["kind"], string[]>> = {};

  for (const kind of ["ncx", "nav"] as const) {
    const filename = files[kind];
    if (!filename) {
      logger.debug({ kind }, "no navigation document, skipping");
      continue;
    }

    try {
      const document = parsers[kind](await readFile(filename, "utf-8"), filename);
      const modified = rewriteLabels(document, rewrite, logger);
      await writeFile(filename, document.serialize(), "utf-8");

      result[kind] = modified;
      sections[kind] = document.sections();
      logger.info({ kind, modified }, "navigation titles processed");
    } catch (error) {
      const warning: ProcessingWarning = {
        kind: "navigation",
        message: `failed to process ${kind} navigation, continuing without its modifications: ${describeError(error)}`,
        path: filename,
      };
      result.warnings.push(warning);
      logger.warn({ err: error, path: filename }, warning.message);
    }
  }

  const present = Object.values(files).filter(Boolean).length;
  if (present > 0 && result.warnings.length === present) {
    const warning: ProcessingWarning = {
      kind: "navigation",
      message: "no navigation document could be processed; the table of contents is unmodified",
    };
    result.warnings.push(warning);
    logger.warn(warning.message);
  }

  result.sections = sections.ncx ?? sections.nav ?? [];
  return result;
}
