import { readdirSync } from "node:fs";
import { join, relative, sep } from "node:path";
import ts from "typescript";
import { describeError, PreflightError } from "../errors.js";

const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];
const SKIPPED_DIRECTORIES = new Set(["node_modules", "dist", "coverage"]);

// Without a tsconfig.json, installed @types packages load automatically and the DOM
// library supplies the web globals Node 20 also provides (URL, fetch, timers).
const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  lib: ["lib.es2022.d.ts", "lib.dom.d.ts"],
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  jsx: ts.JsxEmit.Preserve,
  allowImportingTsExtensions: true,
  skipLibCheck: true,
  noEmit: true
};

export function listSourceFiles(rootDir: string): string[] {
  const files: string[] = [];
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (entry.name.startsWith(".")) {
        continue;
      }
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          walk(fullPath);
        }
        continue;
      }
      if (entry.isFile() && SOURCE_EXTENSIONS.some((extension) => entry.name.endsWith(extension))) {
        files.push(fullPath);
      }
    }
  };
  walk(rootDir);
  return files.sort();
}

export function displayPath(rootDir: string, file: string): string {
  return relative(rootDir, file).split(sep).join("/");
}

export function loadCompilerOptions(rootDir: string): ts.CompilerOptions {
  const configPath = join(rootDir, "tsconfig.json");
  if (!ts.sys.fileExists(configPath)) {
    return { ...DEFAULT_COMPILER_OPTIONS };
  }
  const { config, error } = ts.readConfigFile(configPath, ts.sys.readFile);
  if (error) {
    throw new PreflightError(
      "strict_lint",
      `Unable to read ${configPath}: ${ts.flattenDiagnosticMessageText(error.messageText, "\n")}`
    );
  }
  // File selection belongs to the harness, so include/exclude errors are irrelevant here.
  const parsed = ts.parseJsonConfigFileContent(config, ts.sys, rootDir);
  return { ...parsed.options, noEmit: true };
}

export interface SourceTree {
  rootDir: string;
  files: string[];
  program: ts.Program;
}

export function loadSourceTree(rootDir: string): SourceTree {
  const files = listSourceFiles(rootDir);
  try {
    const program = ts.createProgram({ rootNames: files, options: loadCompilerOptions(rootDir) });
    return { rootDir, files, program };
  } catch (error) {
    if (error instanceof PreflightError) {
      throw error;
    }
    throw new PreflightError("strict_lint", `Unable to analyse ${rootDir}: ${describeError(error)}`, 1, { cause: error });
  }
}

export function sourceLineAt(sourceFile: ts.SourceFile, line: number): string {
  const starts = sourceFile.getLineStarts();
  const start = starts[line];
  if (start === undefined) {
    return "";
  }
  const end = starts[line + 1] ?? sourceFile.text.length;
  return sourceFile.text.slice(start, end).replace(/\r?\n$/, "");
}
