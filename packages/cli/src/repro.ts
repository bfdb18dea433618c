#!/usr/bin/env node
import "dotenv/config";
import { createReproProgram } from "./repro-command.js";
import { installProcessHandlers, runProgram } from "./main.js";

installProcessHandlers();

runProgram(createReproProgram()).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    console.error("[steadyplan] Fatal:", err);
    process.exit(1);
  },
);
