#!/usr/bin/env node

/**
 * GCL to Lambda Calculus Translator CLI (gclc)
 *
 * Usage:
 *   gclc <input.gcl>                 # print the translation
 *   gclc -o out.lambda <input.gcl>   # write it to a file
 *   gclc --run <input.gcl>           # evaluate it and print the output
 *   gclc --ast <input.gcl>           # print the decorated tree
 *   gclc --help
 */
import { runCli } from "../lib/cli/main.js";

process.exitCode = await runCli(process.argv.slice(2));
