#!/usr/bin/env node

import path from "path";
import chalk from "chalk";

import { findBenchFiles, findRoot, runFile } from "./runner.js";

const root = await findRoot(".");

if (root === null) {
    console.log("ERROR: could not find a `benches` directory");
    process.exit(1);
}

let files: string[];
try {
    files = await findBenchFiles(root);
} catch (e: unknown) {
    console.log("ERROR: could not read " + path.join(root, "benches"));
    console.log(e);
    process.exit(1);
}

if (files.length === 0) {
    console.log("ERROR: no bench files found in " + path.join(root, "benches"));
    process.exit(1);
}

let failed = 0;
for (const file of files) {
    console.log(chalk.bold(`Running ${path.relative(".", file)}`));
    console.log();

    if (!(await runFile(file))) {
        ++failed;
    }

    console.log();
}

if (failed > 0) {
    process.exit(1);
}
