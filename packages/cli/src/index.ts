import { HttpParseError } from "@httptok/engine";
import { HELP_TEXT, UsageError } from "./args.js";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.log(HELP_TEXT);
  } else if (err instanceof HttpParseError) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
