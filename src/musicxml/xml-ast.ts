// ─── keyline: XML AST ────────────────────────────────────────────────────────
//
// Builds a plain element tree from saxes events. Names are namespace-local;
// each element remembers where its open tag started.
// ─────────────────────────────────────────────────────────────────────────────

import { SaxesParser, type SaxesTag, type SaxesTagNS, type SaxesTagPlain } from "saxes";

export interface XmlLocation {
  line: number;
  column: number;
}

export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  /** Text and CDATA content, untrimmed. */
  text: string;
  location: XmlLocation;
}

/** Well-formedness error at the position the tokenizer stopped. */
export class XmlParseError extends Error {
  readonly location?: XmlLocation;

  constructor(message: string, location?: XmlLocation) {
    super(message);
    this.name = "XmlParseError";
    this.location = location;
  }
}

/** Parse XML text into its root element. Throws on the first error. */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  const parser = new SaxesParser({ xmlns: true, position: true, fileName: sourceName });
  const here = (): XmlLocation => ({ line: parser.line, column: parser.column + 1 });

  const open: XmlNode[] = [];
  let tagStart = here();
  let root: XmlNode | undefined;
  let failure: XmlParseError | undefined;

  parser.on("error", (error) => {
    if (!failure) failure = new XmlParseError(error.message, here());
  });

  parser.on("opentagstart", () => {
    tagStart = here();
  });

  parser.on("opentag", (tag) => {
    const node: XmlNode = {
      name: localName(tag),
      attributes: attributeMap(tag),
      children: [],
      text: "",
      location: tagStart,
    };
    const parent = open.at(-1);
    if (parent) parent.children.push(node);
    else root = node;
    open.push(node);
  });

  const appendText = (text: string): void => {
    const current = open.at(-1);
    if (current) current.text += text;
  };
  parser.on("text", appendText);
  parser.on("cdata", appendText);

  parser.on("closetag", () => {
    open.pop();
  });

  parser.write(xmlText).close();

  if (failure) throw failure;
  if (!root) throw new XmlParseError("No XML root element found");
  return root;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function stripPrefix(name: string): string {
  return name.slice(name.indexOf(":") + 1);
}

function localName(tag: SaxesTagNS | SaxesTagPlain): string {
  return "local" in tag && tag.local.length > 0 ? tag.local : stripPrefix(tag.name);
}

/** Values keyed by both qualified and local attribute names. */
function attributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, attr] of Object.entries(tag.attributes)) {
    if (typeof attr === "string") {
      out[key] = attr;
    } else {
      out[key] = attr.value;
      out[stripPrefix(attr.name)] = attr.value;
    }
  }
  return out;
}
