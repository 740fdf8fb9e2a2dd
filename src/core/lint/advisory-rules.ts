import ts from "typescript";
import { displayPath, sourceLineAt, type SourceTree } from "./source-tree.js";
import type { LintFinding } from "./types.js";

export const MAX_COMPLEXITY = 10;
export const MAX_LINE_LENGTH = 127;

type FunctionWithBody =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

export interface FunctionComplexity {
  name: string;
  line: number;
  column: number;
  complexity: number;
}

function isFunctionWithBody(node: ts.Node): node is FunctionWithBody {
  return (
    (ts.isFunctionDeclaration(node) ||
      ts.isFunctionExpression(node) ||
      ts.isArrowFunction(node) ||
      ts.isMethodDeclaration(node) ||
      ts.isConstructorDeclaration(node) ||
      ts.isGetAccessorDeclaration(node) ||
      ts.isSetAccessorDeclaration(node)) &&
    node.body !== undefined
  );
}

function isDecisionPoint(node: ts.Node): boolean {
  if (ts.isBinaryExpression(node)) {
    const operator = node.operatorToken.kind;
    return (
      operator === ts.SyntaxKind.AmpersandAmpersandToken ||
      operator === ts.SyntaxKind.BarBarToken ||
      operator === ts.SyntaxKind.QuestionQuestionToken
    );
  }
  return (
    ts.isIfStatement(node) ||
    ts.isConditionalExpression(node) ||
    ts.isForStatement(node) ||
    ts.isForInStatement(node) ||
    ts.isForOfStatement(node) ||
    ts.isWhileStatement(node) ||
    ts.isDoStatement(node) ||
    ts.isCaseClause(node) ||
    ts.isCatchClause(node)
  );
}

export function cyclomaticComplexity(fn: FunctionWithBody): number {
  let complexity = 1;
  const visit = (node: ts.Node): void => {
    if (isFunctionWithBody(node)) {
      return;
    }
    if (isDecisionPoint(node)) {
      complexity += 1;
    }
    ts.forEachChild(node, visit);
  };
  if (fn.body) {
    visit(fn.body);
  }
  return complexity;
}

function functionName(fn: FunctionWithBody, parent: ts.Node | undefined): string {
  if (ts.isConstructorDeclaration(fn)) {
    return "constructor";
  }
  const name = ts.isArrowFunction(fn) ? undefined : fn.name;
  if (name && (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name))) {
    return name.text;
  }
  if (parent && (ts.isVariableDeclaration(parent) || ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent))) {
    if (ts.isIdentifier(parent.name)) {
      return parent.name.text;
    }
  }
  return "<anonymous>";
}

export function measureFunctionComplexities(sourceFile: ts.SourceFile): FunctionComplexity[] {
  const results: FunctionComplexity[] = [];
  const visit = (node: ts.Node, parent: ts.Node | undefined): void => {
    if (isFunctionWithBody(node)) {
      const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
      results.push({
        name: functionName(node, parent),
        line: line + 1,
        column: character + 1,
        complexity: cyclomaticComplexity(node)
      });
    }
    ts.forEachChild(node, (child) => visit(child, node));
  };
  visit(sourceFile, undefined);
  return results;
}

export function collectAdvisoryFindings(tree: SourceTree): LintFinding[] {
  const findings: LintFinding[] = [];
  for (const file of tree.files) {
    const sourceFile = tree.program.getSourceFile(file);
    if (!sourceFile) {
      continue;
    }
    const displayed = displayPath(tree.rootDir, sourceFile.fileName);

    for (const measured of measureFunctionComplexities(sourceFile)) {
      if (measured.complexity > MAX_COMPLEXITY) {
        findings.push({
          file: displayed,
          line: measured.line,
          column: measured.column,
          rule: "complexity",
          message: `'${measured.name}' is too complex (${measured.complexity})`,
          sourceLine: sourceLineAt(sourceFile, measured.line - 1)
        });
      }
    }

    sourceFile.text.split(/\r?\n/).forEach((text, index) => {
      if (text.length > MAX_LINE_LENGTH) {
        findings.push({
          file: displayed,
          line: index + 1,
          column: MAX_LINE_LENGTH + 1,
          rule: "line-length",
          message: `line too long (${text.length} > ${MAX_LINE_LENGTH} characters)`,
          sourceLine: text
        });
      }
    });
  }
  return findings;
}
