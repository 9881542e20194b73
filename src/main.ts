#!/usr/bin/env node
import { runCli } from './cli.js';
import { getLogger, initializeLogger, log } from './services/logger.js';
import { errorMessage } from './utils/error-fields.js';

async function main(): Promise<number> {
    const loggerResult = await initializeLogger();
    if (loggerResult.isErr()) {
        console.error(`Failed to initialize logger: ${loggerResult.error.message}`);
        return 1;
    }

    const session = loggerResult.value;
    log.info('pathwise session started', 'main', {
        sessionId: session.sessionId,
        logFile: session.filePath,
    });

    const code = await runCli(process.argv.slice(2));
    log.info('pathwise session finished', 'main', { exitCode: code });
    return code;
}

main()
    .catch((error: unknown) => {
        log.error('Unhandled failure', 'main', {
            message: errorMessage(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        console.error(`pathwise failed: ${errorMessage(error)}`);
        return 1;
    })
    .then(async (code) => {
        const session = getLogger();
        if (session) await session.flush();
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(`pathwise failed: ${errorMessage(error)}`);
        process.exitCode = 1;
    });
