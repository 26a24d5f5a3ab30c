import type { MessageLocation, MessageLog } from "./messages.js";

export interface CssProperty {
  /** Lower-cased property name. */
  rule: string;
  value: string;
  important: boolean;
}

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const IMPORTANT_SUFFIX = /!\s*important\s*$/i;
const URL_LITERAL = /^url\(\s*(?:'([^']*)'|"([^"]*)"|([^'"()\s]*))\s*\)$/i;

/** Keep only the declaration part of a line such as `.a { x: y; }`. */
const toDeclarationText = (text: string): string => {
  let declarations = text.replace(BLOCK_COMMENT, "");
  const openBrace = declarations.lastIndexOf("{");
  if (openBrace >= 0) {
    declarations = declarations.slice(openBrace + 1);
  }
  const closeBrace = declarations.indexOf("}");
  if (closeBrace >= 0) {
    declarations = declarations.slice(0, closeBrace);
  }
  return declarations;
};

/** Split on semicolons that are not inside quotes or parentheses. */
export const splitDeclarations = (text: string): string[] => {
  const chunks: string[] = [];
  let current = "";
  let quote: string | undefined;
  let depth = 0;

  for (const char of text) {
    if (quote) {
      current += char;
      if (char === quote) {
        quote = undefined;
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
    } else if (char === "(") {
      depth += 1;
    } else if (char === ")") {
      depth = Math.max(0, depth - 1);
    } else if (char === ";" && depth === 0) {
      chunks.push(current);
      current = "";
      continue;
    }
    current += char;
  }

  chunks.push(current);
  return chunks.map((chunk) => chunk.trim()).filter((chunk) => chunk.length > 0);
};

/** Parse a bare `property: value; ...` list. */
export const parseDeclarations = (text: string): CssProperty[] => {
  const properties: CssProperty[] = [];

  for (const chunk of splitDeclarations(text)) {
    const colon = chunk.indexOf(":");
    if (colon <= 0) {
      continue;
    }

    const rule = chunk.slice(0, colon).trim().toLowerCase();
    let value = chunk.slice(colon + 1).trim();
    const important = IMPORTANT_SUFFIX.test(value);
    if (important) {
      value = value.replace(IMPORTANT_SUFFIX, "").trim();
    }

    properties.push({ rule, value, important });
  }

  return properties;
};

/** Extract `property: value` declarations from a line of CSS. */
export const extractProperties = (text: string): CssProperty[] =>
  parseDeclarations(toDeclarationText(text));

/** Return the address inside a `url(...)` literal, warning when there is none. */
export const unpackUrl = (
  value: string,
  messageLog: MessageLog,
  location: MessageLocation,
): string | undefined => {
  const match = URL_LITERAL.exec(value.trim());
  const url = match ? (match[1] ?? match[2] ?? match[3] ?? "") : "";
  if (url.trim().length === 0) {
    messageLog.warning("MALFORMED_URL", location, value);
    return undefined;
  }
  return url.trim();
};
