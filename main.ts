#!/usr/bin/env node
import { createChatLoop } from './lib/cli';
import { createCommandExecutor } from './lib/command-router';
import { createSession } from './lib/commands';
import { loadConfig } from './lib/config';
import { ConsoleLogger } from './lib/interfaces';

async function main(): Promise<void> {
    const config = loadConfig();
    const session = createSession(
        config.baseUrl,
        config.authPath,
        { logger: new ConsoleLogger(config.logLevel), timeout: config.timeout },
        { clientId: config.clientId, clientSecret: config.clientSecret },
    );

    await createChatLoop(createCommandExecutor(session), {
        prompt: '> ',
        welcomeMessage: `REST client for ${config.baseUrl}\nType "help" for available commands or "exit" to quit.\n`,
        onExit: () => {
            console.log('Goodbye!');
        },
    });
}

main().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
