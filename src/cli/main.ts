#!/usr/bin/env node
import { createNodeIO, runCli } from "./index";

process.exitCode = await runCli(process.argv, createNodeIO());
