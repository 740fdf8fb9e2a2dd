import ts from "typescript";
import { displayPath, sourceLineAt, type SourceTree } from "./source-tree.js";
import type { LintFinding, StrictRule } from "./types.js";

// "Cannot find name" in its plain, spelling-suggestion, instance-member and shorthand-property forms.
export const UNDEFINED_NAME_CODES: ReadonlySet<number> = new Set([2304, 2552, 2662, 2663, 18004]);

// Captures the leading identifier of each `${...}` expression.
const PLACEHOLDER_PATTERN = /\$\{\s*([A-Za-z_$][\w$]*)[^}]*\}/g;

function toFinding(
  tree: SourceTree,
  sourceFile: ts.SourceFile,
  position: number,
  rule: StrictRule,
  message: string
): LintFinding {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(position);
  return {
    file: displayPath(tree.rootDir, sourceFile.fileName),
    line: line + 1,
    column: character + 1,
    rule,
    message,
    sourceLine: sourceLineAt(sourceFile, line)
  };
}

function diagnosticFinding(tree: SourceTree, sourceFile: ts.SourceFile, diagnostic: ts.Diagnostic, rule: StrictRule): LintFinding {
  const message = `${ts.flattenDiagnosticMessageText(diagnostic.messageText, " ")} (TS${diagnostic.code})`;
  return toFinding(tree, sourceFile, diagnostic.start ?? 0, rule, message);
}

function placeholderNames(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER_PATTERN)].flatMap((match) => (match[1] === undefined ? [] : [match[1]]));
}

/** Bindings the project declares or imports; globals from declaration files do not count. */
function projectBindingsInScope(checker: ts.TypeChecker, node: ts.Node): Set<string> {
  const names = new Set<string>();
  for (const symbol of checker.getSymbolsInScope(node, ts.SymbolFlags.Value | ts.SymbolFlags.Alias)) {
    const declarations = symbol.getDeclarations() ?? [];
    if (declarations.some((declaration) => !declaration.getSourceFile().isDeclarationFile)) {
      names.add(symbol.getName());
    }
  }
  return names;
}

/**
 * A quoted string whose `${...}` placeholder names a binding in scope is a template
 * literal written with the wrong delimiters. Placeholders for other engines
 * (`"${HOME}/transcripts"`) name nothing in scope and pass.
 */
export function findMalformedTemplates(tree: SourceTree, sourceFile: ts.SourceFile): LintFinding[] {
  const checker = tree.program.getTypeChecker();
  const findings: LintFinding[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isStringLiteral(node)) {
      const names = placeholderNames(node.text);
      if (names.length > 0) {
        const inScope = projectBindingsInScope(checker, node);
        const bound = names.find((name) => inScope.has(name));
        if (bound !== undefined) {
          findings.push(
            toFinding(
              tree,
              sourceFile,
              node.getStart(sourceFile),
              "malformed-template",
              `Template placeholder for '${bound}' in a quoted string; use a template literal`
            )
          );
        }
      }
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return findings;
}

export function collectStrictFindings(tree: SourceTree): LintFinding[] {
  const findings: LintFinding[] = [];
  for (const file of tree.files) {
    const sourceFile = tree.program.getSourceFile(file);
    if (!sourceFile) {
      continue;
    }

    const syntactic = tree.program.getSyntacticDiagnostics(sourceFile);
    for (const diagnostic of syntactic) {
      findings.push(diagnosticFinding(tree, sourceFile, diagnostic, "syntax-error"));
    }
    // Name resolution on a file that does not parse only repeats the syntax errors.
    if (syntactic.length === 0) {
      for (const diagnostic of tree.program.getSemanticDiagnostics(sourceFile)) {
        if (UNDEFINED_NAME_CODES.has(diagnostic.code)) {
          findings.push(diagnosticFinding(tree, sourceFile, diagnostic, "undefined-name"));
        }
      }
    }
    findings.push(...findMalformedTemplates(tree, sourceFile));
  }
  return findings;
}
