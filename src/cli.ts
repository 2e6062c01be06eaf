import { HELP_TEXT, parseArgs } from "./args.js";
import { errorMessage } from "./errors.js";
import { run, type RunOptions } from "./main.js";

async function main(): Promise<void> {
  let opts: RunOptions | "help";
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    process.stderr.write(`${errorMessage(err)}\n\n${HELP_TEXT}`);
    process.exit(2);
  }
  if (opts === "help") {
    process.stdout.write(HELP_TEXT);
    process.exit(0);
  }

  try {
    process.exit(await run(opts));
  } catch (err) {
    process.stderr.write(`${errorMessage(err)}\n`);
    process.exit(3);
  }
}

void main();
