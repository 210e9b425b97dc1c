#!/usr/bin/env node
// SPDX-License-Identifier: MIT
// planar-compile entry point

import { runCli } from "./cli-runner.js";

runCli(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	},
);
