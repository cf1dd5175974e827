#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "../core/errors.js";
import { createProgram } from "./program.js";

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  console.error(errorMessage(error));
  process.exitCode = 1;
}
