#!/usr/bin/env node
import { runCli } from './cli';
import { logger } from './utils/logger';

runCli(process.argv.slice(2))
    .then(async (code) => {
        await logger.flush();
        process.exitCode = code;
    })
    .catch((err) => {
        console.error('起動エラー:', err);
        process.exit(1);
    });
