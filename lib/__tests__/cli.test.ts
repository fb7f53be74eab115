// Mock readline before importing the module under test
const mockCreateInterface = jest.fn();
jest.mock('readline', () => ({
    createInterface: mockCreateInterface,
}));

import { PassThrough } from 'stream';
import { parseCommand, createChatLoop } from '../cli';

describe('cli', () => {
    describe('parseCommand', () => {
        it('should parse a simple command without arguments', () => {
            const result = parseCommand('help');
            expect(result.command).toBe('help');
            expect(result.args).toEqual([]);
        });

        it('should parse a command with a single argument', () => {
            const result = parseCommand('get /items/1');
            expect(result.command).toBe('get');
            expect(result.args).toEqual(['/items/1']);
        });

        it('should parse a command with multiple arguments', () => {
            const result = parseCommand('post-form /auth/login client_id=a client_secret=b');
            expect(result.command).toBe('post-form');
            expect(result.args).toEqual(['/auth/login', 'client_id=a', 'client_secret=b']);
        });

        it('should handle quoted arguments with spaces', () => {
            const result = parseCommand('get /hello -H "X-Trace: abc123"');
            expect(result.command).toBe('get');
            expect(result.args).toEqual(['/hello', '-H', 'X-Trace: abc123']);
        });

        it('should keep double quotes inside single quotes', () => {
            const result = parseCommand(`post /items '{"name":"two"}'`);
            expect(result.command).toBe('post');
            expect(result.args).toEqual(['/items', '{"name":"two"}']);
        });

        it('should keep single quotes inside double quotes', () => {
            const result = parseCommand(`put-form /profile "name=O'Brien"`);
            expect(result.args).toEqual(['/profile', "name=O'Brien"]);
        });

        it('should join a quoted part with adjacent text', () => {
            const result = parseCommand('post-form /profile name="John Doe"');
            expect(result.args).toEqual(['/profile', 'name=John Doe']);
        });

        it('should handle empty input', () => {
            const result = parseCommand('');
            expect(result.command).toBe('');
            expect(result.args).toEqual([]);
        });

        it('should handle whitespace-only input', () => {
            const result = parseCommand('   ');
            expect(result.command).toBe('');
            expect(result.args).toEqual([]);
        });

        it('should handle tabs and repeated spaces between arguments', () => {
            const result = parseCommand('  login\tmy_id    my_secret  ');
            expect(result.command).toBe('login');
            expect(result.args).toEqual(['my_id', 'my_secret']);
        });

        it('should drop an empty quoted string', () => {
            const result = parseCommand('login ""');
            expect(result.command).toBe('login');
            expect(result.args).toEqual([]);
        });

        it('should handle unclosed quotes', () => {
            const result = parseCommand('get "unclosed');
            expect(result.command).toBe('get');
            expect(result.args).toEqual(['unclosed']);
        });
    });

    describe('createChatLoop', () => {
        let mockRl: { prompt: jest.Mock; close: jest.Mock; on: jest.Mock };
        let consoleLogSpy: jest.SpyInstance;
        let lineHandlers: Array<(input: string) => void>;
        let closeHandlers: Array<() => void>;

        const flush = () => new Promise(resolve => setImmediate(resolve));
        const enter = (line: string) => lineHandlers.forEach(handler => handler(line));

        beforeEach(() => {
            lineHandlers = [];
            closeHandlers = [];
            jest.clearAllMocks();

            mockRl = {
                prompt: jest.fn(),
                close: jest.fn(),
                on: jest.fn((event: string, handler: never) => {
                    if (event === 'line') {
                        lineHandlers.push(handler);
                    } else if (event === 'close') {
                        closeHandlers.push(handler);
                    }
                }),
            };

            mockCreateInterface.mockReturnValue(mockRl);
            consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
        });

        afterEach(() => {
            consoleLogSpy.mockRestore();
        });

        it('should create a readline interface on stdin/stdout with the default prompt', () => {
            void createChatLoop(jest.fn().mockResolvedValue(true));

            expect(mockCreateInterface).toHaveBeenCalledWith({
                input: process.stdin,
                output: process.stdout,
                prompt: '> ',
            });
            expect(mockRl.prompt).toHaveBeenCalled();
        });

        it('should use injected streams and a custom prompt', () => {
            const input = new PassThrough();
            const output = new PassThrough();
            void createChatLoop(jest.fn().mockResolvedValue(true), { prompt: 'api> ', input, output });

            expect(mockCreateInterface).toHaveBeenCalledWith({ input, output, prompt: 'api> ' });
        });

        it('should display welcome message if provided', () => {
            void createChatLoop(jest.fn().mockResolvedValue(true), { welcomeMessage: 'Welcome!' });

            expect(consoleLogSpy).toHaveBeenCalledWith('Welcome!');
        });

        it('should not display welcome message if not provided', () => {
            void createChatLoop(jest.fn().mockResolvedValue(true));

            expect(consoleLogSpy).not.toHaveBeenCalled();
        });

        it('should execute the parsed command when a line is entered', async () => {
            const commandExecutor = jest.fn().mockResolvedValue(true);
            void createChatLoop(commandExecutor);

            enter('get /items/1 -H "X-Trace: abc"');
            await flush();

            expect(commandExecutor).toHaveBeenCalledWith('get', ['/items/1', '-H', 'X-Trace: abc']);
            expect(consoleLogSpy).toHaveBeenCalledWith();
            expect(mockRl.prompt).toHaveBeenCalledTimes(2);
        });

        it('should continue loop when command executor returns true', async () => {
            const commandExecutor = jest.fn().mockResolvedValue(true);
            void createChatLoop(commandExecutor);

            enter('help');
            await flush();
            enter('token');
            await flush();

            expect(commandExecutor).toHaveBeenNthCalledWith(1, 'help', []);
            expect(commandExecutor).toHaveBeenNthCalledWith(2, 'token', []);
            expect(mockRl.close).not.toHaveBeenCalled();
        });

        it('should close the interface when command executor returns false', async () => {
            const commandExecutor = jest.fn().mockResolvedValue(false);
            void createChatLoop(commandExecutor);

            enter('exit');
            await flush();

            expect(commandExecutor).toHaveBeenCalledWith('exit', []);
            expect(mockRl.close).toHaveBeenCalled();
        });

        it('should call onExit and resolve when the interface closes', async () => {
            const onExit = jest.fn();
            const loop = createChatLoop(jest.fn().mockResolvedValue(false), { onExit });

            closeHandlers.forEach(handler => handler());

            await expect(loop).resolves.toBeUndefined();
            expect(onExit).toHaveBeenCalledTimes(1);
        });

        it('should resolve on close without onExit', async () => {
            const loop = createChatLoop(jest.fn().mockResolvedValue(false));

            closeHandlers.forEach(handler => handler());

            await expect(loop).resolves.toBeUndefined();
        });

        it('should report executor errors and keep prompting', async () => {
            const commandExecutor = jest.fn().mockRejectedValue(new Error('Test error'));
            const consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
            void createChatLoop(commandExecutor);

            enter('get /items');
            await flush();

            expect(consoleErrorSpy).toHaveBeenCalledWith('Error:', expect.any(Error));
            expect(mockRl.close).not.toHaveBeenCalled();
            expect(mockRl.prompt).toHaveBeenCalledTimes(2);

            consoleErrorSpy.mockRestore();
        });
    });

    describe('createChatLoop with real streams', () => {
        const actualReadline = jest.requireActual<typeof import('readline')>('readline');
        const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));
        let consoleLogSpy: jest.SpyInstance;
        let events: string[];

        const executor = async (command: string): Promise<boolean> => {
            events.push(`start ${command}`);
            await delay(command === 'login' ? 50 : 5);
            events.push(`end ${command}`);
            return command !== 'exit';
        };

        beforeEach(() => {
            events = [];
            mockCreateInterface.mockImplementation(actualReadline.createInterface);
            consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
        });

        afterEach(() => {
            consoleLogSpy.mockRestore();
        });

        it('should finish a slow command before starting the next one', async () => {
            const input = new PassThrough();
            const output = new PassThrough();
            const loop = createChatLoop(executor, {
                input,
                output,
                onExit: () => {
                    events.push('exit');
                },
            });

            input.end('login\nget /secure\n');
            await loop;

            expect(events).toEqual(['start login', 'end login', 'start get', 'end get', 'exit']);
        });

        it('should drop lines entered after exit and resolve once it finishes', async () => {
            const input = new PassThrough();
            const output = new PassThrough();
            const loop = createChatLoop(executor, {
                input,
                output,
                onExit: () => {
                    events.push('exit');
                },
            });

            input.end('exit\nget /late\n');
            await loop;

            expect(events).toEqual(['start exit', 'end exit', 'exit']);
        });
    });
});
