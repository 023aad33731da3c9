/**
 * @fileoverview Discipline Classifier - Main Entry Point
 *
 * Classifies one paper given on the command line and prints the result
 * envelope as JSON:
 *
 *     discipline-classifier --file-id <id>
 *     discipline-classifier --content-id <id> [--trace-id <id>]
 *
 * @module discipline-classifier
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { runCli } from "./cli.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
    process.exitCode = await runCli(process.argv.slice(2), {
        env  : process.env,
        print: (line) => process.stdout.write(`${line}\n`),
    });
}

main().catch((error: unknown) => {
    console.error("[FATAL] Unexpected failure:", error);
    process.exitCode = 1;
});
