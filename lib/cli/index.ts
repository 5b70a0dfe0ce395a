import "dotenv/config";
import { createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exitCode = 1;
  });
