import "dotenv/config";
import { errorMessage } from "@docsum/core";
import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
