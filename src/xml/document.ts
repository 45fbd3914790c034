/**
 * Minimal document model over @xmldom/xmldom.
 *
 * Decoders only need the root element, its child elements and their text.
 */

import { DOMParser } from "@xmldom/xmldom";
import { SchemaError } from "../errors.js";

const ELEMENT_NODE = 1;

/** The slice of the DOM node interface this module reads. */
interface DomNode {
  nodeType: number;
  nodeName: string;
  textContent: string | null;
  childNodes: ArrayLike<DomNode>;
}

export interface XmlElement {
  readonly name: string;
  children(): XmlElement[];
  text(): string;
}

export interface XmlDocument {
  rootElement(): XmlElement | null;
}

class DomElement implements XmlElement {
  constructor(private readonly node: DomNode) {}

  get name(): string {
    return this.node.nodeName;
  }

  children(): XmlElement[] {
    return elementChildren(this.node).map((child) => new DomElement(child));
  }

  text(): string {
    return this.node.textContent ?? "";
  }
}

function elementChildren(node: DomNode): DomNode[] {
  return Array.from(node.childNodes).filter((child) => child.nodeType === ELEMENT_NODE);
}

/**
 * Parse XML text. Well-formedness errors raise SchemaError.
 */
export function parseXmlDocument(text: string): XmlDocument {
  const problems: string[] = [];
  const report = (msg: string) => {
    problems.push(msg);
  };

  const parser = new DOMParser({
    errorHandler: { error: report, fatalError: report },
  });
  let doc: { documentElement: DomNode | null };
  try {
    doc = parser.parseFromString(text, "text/xml");
  } catch (err) {
    throw new SchemaError(`Malformed XML: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (problems.length > 0) {
    throw new SchemaError(`Malformed XML: ${problems[0].trim()}`, {
      value: problems[0],
    });
  }

  const root = doc.documentElement;
  return {
    rootElement: () => (root ? new DomElement(root) : null),
  };
}

/**
 * Parse XML and require a root element with the given name.
 */
export function requireRoot(text: string, rootName: string): XmlElement {
  const root = parseXmlDocument(text).rootElement();
  if (!root) {
    throw new SchemaError(`Root of XML not found, expected <${rootName}>`);
  }
  if (root.name !== rootName) {
    throw new SchemaError(`<${rootName}> not found in doc, instead found <${root.name}>`, {
      value: root.name,
    });
  }
  return root;
}
