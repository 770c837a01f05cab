/**
 * CLI entry wrapper.
 *
 * The command modules read `runtimeConfig` when they load, so an invalid
 * environment fails at import time, before the logger exists. They are
 * loaded here so that failure still ends in an error line and exit code 1.
 */

import { errorMessage } from "../errors.js";

export async function main(argv: string[]): Promise<number> {
  let runCli: (argv: string[]) => Promise<number>;
  try {
    ({ runCli } = await import("./program.js"));
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
  return runCli(argv);
}
