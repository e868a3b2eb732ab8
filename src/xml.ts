import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

export const NAMESPACES = {
  opf: "http://www.idpf.org/2007/opf",
  dc: "http://purl.org/dc/elements/1.1/",
  ncx: "http://www.daisy.org/z3986/2005/ncx/",
  xhtml: "http://www.w3.org/1999/xhtml",
  ops: "http://www.idpf.org/2007/ops",
  container: "urn:oasis:names:tc:opendocument:xmlns:container",
} as const;

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

export class XmlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "XmlParseError";
  }
}

/**
 * Parses an XML document. Any parser error or warning throws, since a document the parser could
 * only partly read would be written back altered. A document without a root element, or one whose
 * root element has a different local name than `expectedRoot`, throws as well.
 */
export function parseXml(source: string, expectedRoot?: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (message: string) => {
        problems.push(message);
      },
      error: (message: string) => {
        problems.push(message);
      },
      fatalError: (message: string) => {
        throw new XmlParseError(message);
      },
    },
  });

  const doc = parser.parseFromString(source, "text/xml");
  if (problems.length > 0) {
    throw new XmlParseError(problems.join("; "));
  }

  const root = doc.documentElement;
  if (!root) {
    throw new XmlParseError("document has no root element");
  }
  if (expectedRoot && root.localName !== expectedRoot) {
    throw new XmlParseError(
      `expected <${expectedRoot}> root element, found <${root.nodeName}>`,
    );
  }

  return doc;
}

/** Serializes a document, adding an XML declaration if the source had none. */
export function serializeXml(doc: Document): string {
  const text = new XMLSerializer().serializeToString(doc);
  return text.startsWith("<?xml") ? text : `${XML_DECLARATION}\n${text}`;
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

/** Direct element children of `parent`, optionally filtered by namespace and local name. */
export function childElements(
  parent: Node,
  namespace?: string,
  localName?: string,
): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes.item(i);
    if (
      child &&
      isElement(child) &&
      (namespace === undefined || child.namespaceURI === namespace) &&
      (localName === undefined || child.localName === localName)
    ) {
      result.push(child);
    }
  }
  return result;
}

/** A snapshot of all descendant elements with the given namespace and local name, in document order. */
export function descendantElements(
  parent: Element,
  namespace: string,
  localName: string,
): Element[] {
  const list = parent.getElementsByTagNameNS(namespace, localName);
  const result: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const element = list.item(i);
    if (element) {
      result.push(element);
    }
  }
  return result;
}

/** Whether every child of `element` is a text node (an element with no children counts). */
export function hasOnlyTextContent(element: Element): boolean {
  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (child && !isText(child)) {
      return false;
    }
  }
  return true;
}

/** Removes `node`, together with the indentation whitespace that precedes it. */
export function removeWithIndentation(node: Node): void {
  const parent = node.parentNode;
  if (!parent) {
    return;
  }

  const previous = node.previousSibling;
  if (previous && isText(previous) && /^\s*$/.test(previous.data)) {
    parent.removeChild(previous);
  }
  parent.removeChild(node);
}
