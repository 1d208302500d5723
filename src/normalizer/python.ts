import { ParseError } from "../errors.js";
import type { Normalizer } from "./normalizer.js";

const VERSION = "py-tokens/1";

type Token = { type: "NAME" | "NUM" | "STR" | "OP"; value: string; fstring?: boolean };

type Entry = { type: "line"; tokens: Token[] } | { type: "INDENT" } | { type: "DEDENT" };

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "->", ":=", "**", "//", "<<", ">>", "<=", ">=", "==", "!=",
  "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=",
  "+", "-", "*", "/", "%", "@", "&", "|", "^", "~", "<", ">",
  "(", ")", "[", "]", "{", "}", ",", ":", ".", ";", "=", "!",
];

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
const STRING_PREFIX = /^(?:[rRuUbBfF]|[rR][bBfF]|[bBfF][rR])$/;

const isNameStart = (c: string): boolean => /[\p{L}_]/u.test(c);
const isNameChar = (c: string): boolean => /[\p{L}\p{N}_]/u.test(c);
const isDigit = (c: string): boolean => c >= "0" && c <= "9";

/**
 * Tokenize Python source into logical lines separated by INDENT/DEDENT markers.
 * Comments, blank lines, explicit and implicit line joins and intra-line
 * whitespace do not survive.
 */
function tokenize(src: string, filePath: string): Entry[] {
  const entries: Entry[] = [];
  const indents = [0];
  const brackets: string[] = [];
  let line: Token[] = [];
  let atLineStart = true;
  let lineNo = 1;
  let i = 0;

  const fail = (detail: string): never => {
    throw new ParseError(filePath, `line ${lineNo}: ${detail}`);
  };

  const endLogicalLine = (): void => {
    if (line.length > 0) entries.push({ type: "line", tokens: line });
    line = [];
    atLineStart = true;
  };

  function readString(start: number, prefix: string): number {
    const quote = src[start];
    const triple = src.startsWith(quote.repeat(3), start);
    const delim = triple ? quote.repeat(3) : quote;
    let j = start + delim.length;
    const bodyStart = j;
    for (;;) {
      if (j >= src.length) fail("unterminated string literal");
      const ch = src[j];
      if (ch === "\\") {
        if (src[j + 1] === "\n") lineNo++;
        j += 2;
        continue;
      }
      if (ch === "\n") {
        if (!triple) fail("unterminated string literal");
        lineNo++;
      }
      if (src.startsWith(delim, j)) break;
      j++;
    }
    line.push({
      type: "STR",
      value: `${prefix}${JSON.stringify(src.slice(bodyStart, j))}`,
      fstring: prefix.includes("f"),
    });
    return j + delim.length;
  }

  while (i < src.length) {
    if (atLineStart && brackets.length === 0) {
      let col = 0;
      while (i < src.length && (src[i] === " " || src[i] === "\t" || src[i] === "\f")) {
        col = src[i] === "\t" ? (Math.floor(col / 8) + 1) * 8 : src[i] === "\f" ? 0 : col + 1;
        i++;
      }
      if (i >= src.length) break;
      if (src[i] === "\n" || src[i] === "#") {
        // blank or comment-only line
        while (i < src.length && src[i] !== "\n") i++;
        i++;
        lineNo++;
        continue;
      }
      const top = indents[indents.length - 1];
      if (col > top) {
        indents.push(col);
        entries.push({ type: "INDENT" });
      } else if (col < top) {
        while (col < indents[indents.length - 1]) {
          indents.pop();
          entries.push({ type: "DEDENT" });
        }
        if (col !== indents[indents.length - 1]) fail("unindent does not match any outer indentation level");
      }
      atLineStart = false;
    }

    const c = src[i];

    if (c === "\n") {
      i++;
      lineNo++;
      if (brackets.length === 0) endLogicalLine();
      continue;
    }
    if (c === " " || c === "\t" || c === "\f") {
      i++;
      continue;
    }
    if (c === "#") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }
    if (c === "\\") {
      if (src[i + 1] !== "\n") fail("unexpected character after line continuation");
      i += 2;
      lineNo++;
      continue;
    }

    if (isNameStart(c)) {
      let j = i;
      while (j < src.length && isNameChar(src[j])) j++;
      const word = src.slice(i, j);
      if ((src[j] === "'" || src[j] === '"') && STRING_PREFIX.test(word)) {
        i = readString(j, word.toLowerCase().split("").sort().join(""));
      } else {
        line.push({ type: "NAME", value: word });
        i = j;
      }
      continue;
    }

    if (c === "'" || c === '"') {
      i = readString(i, "");
      continue;
    }

    if (isDigit(c) || (c === "." && isDigit(src[i + 1] ?? ""))) {
      let j = i;
      while (j < src.length) {
        const d = src[j];
        if (/[0-9a-zA-Z_.]/.test(d)) {
          j++;
        } else if ((d === "+" || d === "-") && /[eE]/.test(src[j - 1]) && !/^0[xX]/.test(src.slice(i, j))) {
          j++;
        } else {
          break;
        }
      }
      line.push({ type: "NUM", value: src.slice(i, j).replace(/_/g, "").toLowerCase() });
      i = j;
      continue;
    }

    const op = OPERATORS.find((o) => src.startsWith(o, i));
    if (!op) fail(`unexpected character ${JSON.stringify(c)}`);
    else {
      if (OPENERS.has(op)) brackets.push(op);
      if (op in CLOSERS) {
        if (brackets.pop() !== CLOSERS[op]) fail(`unmatched '${op}'`);
      }
      line.push({ type: "OP", value: op });
      i += op.length;
    }
  }

  if (brackets.length > 0) fail(`unclosed '${brackets[brackets.length - 1]}'`);
  endLogicalLine();
  while (indents.length > 1) {
    indents.pop();
    entries.push({ type: "DEDENT" });
  }
  return entries;
}

/** A statement made only of plain string literals is descriptive (docstrings included). */
function isDescriptiveString(entry: Entry): boolean {
  return entry.type === "line" && entry.tokens.every((t) => t.type === "STR" && !t.fstring);
}

function render(entry: Entry): string {
  if (entry.type !== "line") return entry.type;
  return entry.tokens.map((t) => (t.type === "OP" ? t.value : `${t.type}:${t.value}`)).join(" ");
}

export const pythonNormalizer: Normalizer = {
  kind: "python",
  version: VERSION,
  normalize(content: string, filePath: string): string {
    return tokenize(content, filePath)
      .filter((e) => !isDescriptiveString(e))
      .map(render)
      .join("\n");
  },
};
