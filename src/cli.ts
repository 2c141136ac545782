import "dotenv/config";
import { hideBin } from "yargs/helpers";
import { run } from "./run";

run(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("  ✗  Unexpected failure:", error);
    process.exitCode = 1;
  }
);
