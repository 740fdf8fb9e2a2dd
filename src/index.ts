import { loadPreflightConfig } from "./core/config.js";
import { describeError, PreflightError } from "./core/errors.js";
import { runPreflight } from "./core/services/preflight-runner.js";
import { createStreamReporter, tagged } from "./lib/reporter.js";

const reporter = createStreamReporter();

async function main(): Promise<number> {
  const config = loadPreflightConfig();
  const result = await runPreflight({ rootDir: config.rootDir, reporter });
  return result.exitCode;
}

// Loaded application modules may hold open handles, so exit explicitly.
main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    reporter.error(tagged(describeError(error)));
    process.exit(error instanceof PreflightError ? error.exitCode : 1);
  });
