#!/usr/bin/env node
import { runPtrCli } from "./cli.js";

process.exitCode = await runPtrCli(process.argv.slice(2));
