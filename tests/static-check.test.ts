import { afterEach, describe, expect, it } from "vitest";
import { StaticCheck } from "../src/core/checks/static-check.js";
import { PreflightError } from "../src/core/errors.js";
import { collectStrictFindings } from "../src/core/lint/strict-rules.js";
import { listSourceFiles, loadCompilerOptions, loadSourceTree } from "../src/core/lint/source-tree.js";
import {
  createFixtureProject,
  createMemoryReporter,
  healthyApplication,
  withFiles,
  type FixtureFiles,
  type FixtureProject
} from "./helpers/fixture-project.js";

const fixtures: FixtureProject[] = [];

afterEach(() => {
  for (const fixture of fixtures.splice(0, fixtures.length)) {
    fixture.cleanup();
  }
});

function makeProject(files: FixtureFiles): FixtureProject {
  const fixture = createFixtureProject(files);
  fixtures.push(fixture);
  return fixture;
}

async function runStaticCheck(files: FixtureFiles) {
  const { rootDir } = makeProject(files);
  const reporter = createMemoryReporter();
  const outcome = await new StaticCheck().run({ rootDir, reporter }).catch((error: unknown) => error);
  return { outcome, reporter, rootDir };
}

describe("StaticCheck", () => {
  it("passes a clean tree with nothing to report", async () => {
    const { outcome, reporter } = await runStaticCheck(healthyApplication);

    expect(outcome).toEqual({ summary: "4 source file(s) checked" });
    expect(reporter.stdout).toEqual(["[preflight] Strict pass: 0 violation(s)", "[preflight] Advisory pass: 0 finding(s)"]);
  });

  it("fails on an undefined name and shows where it is", async () => {
    const { outcome, reporter } = await runStaticCheck(
      withFiles({ "src/services/auth.ts": "export const authService = { secret: zqxWebhookSecret };\n" })
    );

    expect(outcome).toBeInstanceOf(PreflightError);
    expect(outcome).toMatchObject({ kind: "strict_lint", exitCode: 1, message: "Strict lint pass found 1 violation(s)." });
    expect(reporter.stdout).toEqual([
      "src/services/auth.ts:1:38: undefined-name Cannot find name 'zqxWebhookSecret'. (TS2304)",
      "export const authService = { secret: zqxWebhookSecret };",
      `${" ".repeat(37)}^`,
      "1     undefined-name",
      "[preflight] Strict pass: 1 violation(s)"
    ]);
  });

  it("fails on a syntax error", async () => {
    const { outcome, reporter } = await runStaticCheck(
      withFiles({ "src/storage/transcripts.ts": "export const transcriptStorage = ;\n" })
    );

    expect(outcome).toMatchObject({ kind: "strict_lint" });
    expect(reporter.stdout[0]).toBe("src/storage/transcripts.ts:1:34: syntax-error Expression expected. (TS1109)");
  });

  it("fails on a template placeholder for a binding in scope inside a quoted string", async () => {
    const { rootDir } = makeProject(
      withFiles({
        "src/services/transcription.ts": [
          'const name = "Ada";',
          `export const transcriptionService = { greeting: "Hello \${name}" };`,
          ""
        ].join("\n")
      })
    );

    const findings = collectStrictFindings(loadSourceTree(rootDir));
    expect(findings).toEqual([
      {
        file: "src/services/transcription.ts",
        line: 2,
        column: 49,
        rule: "malformed-template",
        message: "Template placeholder for 'name' in a quoted string; use a template literal",
        sourceLine: `export const transcriptionService = { greeting: "Hello \${name}" };`
      }
    ]);
  });

  it("accepts placeholders meant for other engines", async () => {
    const { outcome, reporter } = await runStaticCheck(
      withFiles({
        "src/storage/transcripts.ts": `export const transcriptStorage = { dir: "\${HOME}/transcripts" };\n`
      })
    );

    expect(outcome).toEqual({ summary: "4 source file(s) checked" });
    expect(reporter.stdout).toEqual(["[preflight] Strict pass: 0 violation(s)", "[preflight] Advisory pass: 0 finding(s)"]);
  });

  it("reports advisory findings without failing", async () => {
    const { outcome, reporter } = await runStaticCheck(
      withFiles({ "src/routes/banner.ts": `export const banner = "${"x".repeat(130)}";\n` })
    );

    expect(outcome).toEqual({ summary: "5 source file(s) checked" });
    expect(reporter.stdout).toEqual([
      "[preflight] Strict pass: 0 violation(s)",
      "src/routes/banner.ts:1:128: line-length line too long (155 > 127 characters)",
      "1     line-length",
      "[preflight] Advisory pass: 1 finding(s)"
    ]);
  });
});

describe("compiler options", () => {
  it("knows runtime globals when the project has no tsconfig.json", async () => {
    const { outcome, reporter } = await runStaticCheck({
      "package.json": healthyApplication["package.json"] ?? "{}\n",
      "src/main.ts": 'export const app = { name: "bot" };\n',
      "src/services/auth.ts": [
        "export const authService = {",
        '  endpoint: new URL("https://auth.example.test/token"),',
        "  encoder: new TextEncoder(),",
        "  request: fetch,",
        "  later: (task: () => void) => setTimeout(task, 10)",
        "};",
        ""
      ].join("\n")
    });

    expect(outcome).toEqual({ summary: "2 source file(s) checked" });
    expect(reporter.stdout).toEqual(["[preflight] Strict pass: 0 violation(s)", "[preflight] Advisory pass: 0 finding(s)"]);
  });

  it("reads the project's tsconfig.json and forces noEmit", () => {
    const { rootDir } = makeProject(
      withFiles({
        "tsconfig.json": JSON.stringify({ compilerOptions: { target: "ES2022", strict: true, types: ["node"], noEmit: false } })
      })
    );

    expect(loadCompilerOptions(rootDir)).toMatchObject({ strict: true, types: ["node"], noEmit: true });
  });

  it("resolves Node globals through the types a tsconfig.json names", async () => {
    const { outcome, reporter } = await runStaticCheck(
      withFiles({
        "tsconfig.json": JSON.stringify({ compilerOptions: { target: "ES2022", strict: true, types: ["node"] } }),
        "src/services/auth.ts": "export const authService = { secret: process.env.AUTH_SECRET ?? Buffer.from(\"test-secret\") };\n"
      })
    );

    expect(outcome).toEqual({ summary: "4 source file(s) checked" });
    expect(reporter.stdout[0]).toBe("[preflight] Strict pass: 0 violation(s)");
  });

  it("fails the strict pass when tsconfig.json cannot be parsed", async () => {
    const files = withFiles({ "tsconfig.json": '{ "compilerOptions": { "strict": true \n' });
    const { rootDir } = makeProject(files);

    expect(() => loadCompilerOptions(rootDir)).toThrowError(/^Unable to read .+tsconfig\.json: /);
    const { outcome, reporter } = await runStaticCheck(files);
    expect(outcome).toBeInstanceOf(PreflightError);
    expect(outcome).toMatchObject({ kind: "strict_lint", exitCode: 1 });
    expect(reporter.stdout).toEqual([]);
  });
});

describe("listSourceFiles", () => {
  it("skips dependencies, build output and hidden directories", () => {
    const { rootDir } = makeProject(
      withFiles({
        "node_modules/dep/index.ts": "export const dep = 1;\n",
        "dist/main.d.ts": "export declare const app: unknown;\n",
        ".cache/stale.ts": "export const stale = 1;\n",
        "README.md": "# fixture\n"
      })
    );

    expect(listSourceFiles(rootDir).map((file) => file.slice(rootDir.length + 1).replace(/\\/g, "/"))).toEqual([
      "src/main.ts",
      "src/services/auth.ts",
      "src/services/transcription.ts",
      "src/storage/transcripts.ts"
    ]);
  });
});
