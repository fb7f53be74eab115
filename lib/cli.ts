import * as readline from 'readline';
import { ChatLoopOptions, ParsedCommand } from './models';

export type { ChatLoopOptions };

/**
 * Parses a command line string into command and arguments.
 * A quoted argument keeps any quote characters of the other kind, so
 * `post /items '{"name":"two"}'` yields the JSON text intact.
 */
export function parseCommand(input: string): ParsedCommand {
    const trimmed = input.trim();
    if (!trimmed) {
        return { command: '', args: [] };
    }

    const parts: string[] = [];
    let current = '';
    let quote: string | null = null;

    for (const char of trimmed) {
        if (quote) {
            if (char === quote) {
                quote = null;
            } else {
                current += char;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
        } else if (char === ' ' || char === '\t') {
            if (current) {
                parts.push(current);
                current = '';
            }
        } else {
            current += char;
        }
    }
    if (current) {
        parts.push(current);
    }

    const command = parts[0] || '';
    const args = parts.slice(1);
    return { command, args };
}

/**
 * Runs a chat loop until the executor returns false or input ends.
 * Lines run one at a time in the order they were entered; the returned
 * promise resolves once the interface is closed and queued commands are done.
 * @param commandExecutor Function that executes commands and returns whether to continue
 * @param options Configuration options for the chat loop
 */
export function createChatLoop(
    commandExecutor: (command: string, args: string[]) => Promise<boolean>,
    options: ChatLoopOptions = {},
): Promise<void> {
    const {
        prompt = '> ',
        welcomeMessage,
        onExit,
        input = process.stdin,
        output = process.stdout,
    } = options;

    const rl = readline.createInterface({ input, output, prompt });
    let queue: Promise<void> = Promise.resolve();
    let closed = false;
    let stopped = false;

    if (welcomeMessage) {
        console.log(welcomeMessage);
    }

    rl.prompt();

    const handleLine = async (line: string): Promise<void> => {
        // Lines entered after exit are dropped
        if (stopped) {
            return;
        }
        const { command, args } = parseCommand(line);
        try {
            const shouldContinue = await commandExecutor(command, args);

            if (!shouldContinue) {
                stopped = true;
                if (!closed) {
                    rl.close();
                }
                return;
            }
        } catch (error) {
            console.error('Error:', error);
        }

        console.log();
        if (!closed) {
            rl.prompt();
        }
    };

    rl.on('line', (line: string) => {
        queue = queue.then(() => handleLine(line));
    });

    return new Promise(resolve => {
        rl.on('close', () => {
            closed = true;
            queue = queue.then(() => {
                if (onExit) {
                    onExit();
                }
                resolve();
            });
        });
    });
}
