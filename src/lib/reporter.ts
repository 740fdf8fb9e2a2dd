export const REPORT_TAG = "[preflight]";

/**
 * Line-oriented sink for everything the harness prints. Output is meant for
 * people, so there is no structure beyond one message per line.
 */
export interface Reporter {
  log(line: string): void;
  error(line: string): void;
}

interface LineStream {
  write(chunk: string): unknown;
}

export function createStreamReporter(stdout: LineStream = process.stdout, stderr: LineStream = process.stderr): Reporter {
  return {
    log(line) {
      stdout.write(`${line}\n`);
    },
    error(line) {
      stderr.write(`${line}\n`);
    }
  };
}

export function tagged(message: string): string {
  return `${REPORT_TAG} ${message}`;
}
