/**
 * Options for creating a REPL interface
 */
export type ChatLoopOptions = {
    prompt?: string;
    welcomeMessage?: string;
    onExit?: () => void;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

/**
 * A command line split into the command word and its arguments
 */
export type ParsedCommand = {
    command: string;
    args: string[];
}
