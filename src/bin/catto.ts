#!/usr/bin/env node
import { ignoreBrokenPipe, runCli } from "../cli.js";

ignoreBrokenPipe(process.stdout);
process.exitCode = runCli(process.argv.slice(2));
