#!/usr/bin/env node
import { resolveProjectRoot } from "../config/loader.js";
import { selectInvoker } from "../execution/invoker.js";
import { main } from "../main.js";

process.exitCode = main({
  args: process.argv.slice(2),
  projectRoot: resolveProjectRoot(__dirname),
  platform: process.platform,
  invoker: selectInvoker(process),
  stderr: process.stderr,
});
