#!/usr/bin/env node
import "dotenv/config";
import { createPlanProgram } from "./plan-command.js";
import { installProcessHandlers, runProgram } from "./main.js";

installProcessHandlers();

runProgram(createPlanProgram()).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    console.error("[steadyplan] Fatal:", err);
    process.exit(1);
  },
);
