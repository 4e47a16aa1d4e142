#!/usr/bin/env node
/**
 * vault-transcriber entry point
 * Run: npm start -- -c config.yaml
 */

import { EXIT_SYSTEM_ERROR, buildProgram } from './program';

async function main() {
    await buildProgram().parseAsync(process.argv);
}

main().catch((error) => {
    console.error(error);
    process.exit(EXIT_SYSTEM_ERROR);
});
