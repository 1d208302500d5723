import ts from "typescript";
import path from "node:path";
import { ParseError } from "../errors.js";
import type { Normalizer } from "./normalizer.js";

const VERSION = `ts-ast/2+typescript@${ts.versionMajorMinor}`;

function detectScriptKind(filePath: string): ts.ScriptKind {
  switch (path.posix.extname(filePath).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

/** Syntactic diagnostics only; no program, no type checking. */
function syntaxErrors(content: string, filePath: string): string[] {
  const out = ts.transpileModule(content, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ESNext,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });
  return (out.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => ts.flattenDiagnosticMessageText(d.messageText, " "));
}

/** Scalar syntax that the parser stores on the node instead of as a child token. */
function scalarAttributes(node: ts.Node): string[] {
  const attrs: string[] = [];

  if (ts.isVariableDeclarationList(node)) {
    attrs.push(`flags=${node.flags & ts.NodeFlags.BlockScoped}`);
  }
  if (ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node) || ts.isTypeOperatorNode(node)) {
    attrs.push(`op=${ts.tokenToString(node.operator) ?? node.operator}`);
  }
  if (ts.isHeritageClause(node)) {
    attrs.push(`token=${ts.tokenToString(node.token) ?? node.token}`);
  }
  if (ts.isMetaProperty(node)) {
    attrs.push(`keyword=${ts.tokenToString(node.keywordToken) ?? node.keywordToken}`);
  }
  if (
    ts.isImportClause(node) ||
    ts.isImportSpecifier(node) ||
    ts.isExportDeclaration(node) ||
    ts.isExportSpecifier(node) ||
    ts.isImportEqualsDeclaration(node)
  ) {
    if (node.isTypeOnly) attrs.push("type-only");
  }
  if (ts.isExportAssignment(node) && node.isExportEquals) {
    attrs.push("export-equals");
  }
  return attrs;
}

/**
 * Leaf value for nodes whose text carries meaning. Cooked values make quote style
 * irrelevant; a tag receives the raw text too, so tagged parts carry both.
 */
function leafValue(node: ts.Node, tagged: boolean): string | null {
  if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) return node.text;
  if (ts.isStringLiteral(node)) return JSON.stringify(node.text);
  if (
    ts.isNoSubstitutionTemplateLiteral(node) ||
    ts.isTemplateHead(node) ||
    ts.isTemplateMiddle(node) ||
    ts.isTemplateTail(node)
  ) {
    const cooked = JSON.stringify(node.text);
    return tagged ? `${cooked} raw=${JSON.stringify(node.rawText ?? node.text)}` : cooked;
  }
  if (ts.isNumericLiteral(node) || ts.isBigIntLiteral(node) || ts.isRegularExpressionLiteral(node)) {
    return node.text;
  }
  if (ts.isJsxText(node)) return JSON.stringify(node.text.replace(/\s*\n\s*/g, " ").trim());
  return null;
}

/** Whether `child` is a literal part of the template a tag receives. */
function isTaggedPart(parent: ts.Node, child: ts.Node, parentTagged: boolean): boolean {
  if (ts.isTaggedTemplateExpression(parent)) return child === parent.template;
  if (ts.isTemplateExpression(parent)) return parentTagged;
  if (ts.isTemplateSpan(parent)) return parentTagged && child === parent.literal;
  return false;
}

/**
 * Serialize the tree depth first, in source order. Comments and JSDoc are trivia
 * and are never visited by forEachChild.
 */
function serialize(root: ts.SourceFile): string {
  const lines: string[] = [];

  const visit = (node: ts.Node, depth: number, tagged: boolean): void => {
    if (ts.isJsxText(node) && node.containsOnlyTriviaWhiteSpaces) return;

    let line = " ".repeat(depth) + ts.SyntaxKind[node.kind];
    const attrs = scalarAttributes(node);
    if (attrs.length > 0) line += ` [${attrs.join(" ")}]`;
    const value = leafValue(node, tagged);
    if (value !== null) line += ` ${value}`;
    lines.push(line);

    ts.forEachChild(node, (child) => visit(child, depth + 1, isTaggedPart(node, child, tagged)));
  };

  visit(root, 0, false);
  return lines.join("\n");
}

function normalizeScript(content: string, filePath: string): string {
  const errors = syntaxErrors(content, filePath);
  if (errors.length > 0) {
    throw new ParseError(filePath, errors[0]);
  }
  const source = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, false, detectScriptKind(filePath));
  return serialize(source);
}

export const typescriptNormalizer: Normalizer = {
  kind: "typescript",
  version: VERSION,
  normalize: normalizeScript,
};

export const javascriptNormalizer: Normalizer = {
  kind: "javascript",
  version: VERSION,
  normalize: normalizeScript,
};
