import {
    login,
    logout,
    showToken,
    sendRequest,
    parseHeader,
    parseFormFields,
    parseJsonBody,
    RequestInput,
} from './commands';
import { HeaderPair, HttpMethod, Session } from './models';

/**
 * Checks if help flag is present in arguments
 */
function hasHelpFlag(args: string[]): boolean {
    return args.includes('-h') || args.includes('--help');
}

/**
 * Splits `-H "Name: value"` pairs out of the argument list
 */
export function extractHeaders(args: string[]): { headers: HeaderPair[]; rest: string[] } {
    const headers: HeaderPair[] = [];
    const rest: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '-H' || arg === '--header') {
            const raw = args[i + 1];
            if (raw === undefined) {
                throw new Error(`${arg} requires a "Name: value" argument`);
            }
            headers.push(parseHeader(raw));
            i++;
        } else {
            rest.push(arg);
        }
    }
    return { headers, rest };
}

async function runRequest(session: Session, method: HttpMethod, args: string[], bodyKind: RequestInput['kind']): Promise<void> {
    const { headers, rest } = extractHeaders(args);
    const [path, ...payload] = rest;
    if (!path) {
        console.log(`A path is required. Type "help" for usage information.`);
        return;
    }

    let input: RequestInput;
    switch (bodyKind) {
        case 'json':
            input = { kind: 'json', body: parseJsonBody(payload[0]) };
            break;
        case 'form':
            input = { kind: 'form', fields: parseFormFields(payload) };
            break;
        case 'none':
            input = { kind: 'none' };
            break;
    }

    await sendRequest(session, method, path, input, headers);
}

/**
 * Builds the command executor bound to a shell session
 */
export function createCommandExecutor(session: Session): (command: string, args: string[]) => Promise<boolean> {
    return async (command: string, args: string[]): Promise<boolean> => {
        try {
            if (hasHelpFlag(args)) {
                printHelp();
                return true;
            }

            switch (command) {
                case 'login':
                case 'l':
                    await login(session, args[0], args[1]);
                    return true;

                case 'logout':
                    logout(session);
                    return true;

                case 'token':
                    showToken(session);
                    return true;

                case 'get':
                case 'g':
                    await runRequest(session, 'GET', args, 'none');
                    return true;

                case 'delete':
                case 'del':
                    await runRequest(session, 'DELETE', args, 'none');
                    return true;

                case 'post':
                    await runRequest(session, 'POST', args, 'json');
                    return true;

                case 'put':
                    await runRequest(session, 'PUT', args, 'json');
                    return true;

                case 'post-form':
                    await runRequest(session, 'POST', args, 'form');
                    return true;

                case 'put-form':
                    await runRequest(session, 'PUT', args, 'form');
                    return true;

                case 'help':
                case '--help':
                case '-h':
                    printHelp();
                    return true;

                case 'exit':
                case 'quit':
                case 'q':
                    return false;

                case 'clear':
                case 'cls':
                    console.clear();
                    return true;

                default:
                    if (command) {
                        console.error(`Unknown command: ${command}`);
                        console.log('Type "help" for usage information.');
                    } else {
                        printHelp();
                    }
                    return true;
            }
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            return true;
        }
    };
}

/**
 * Prints general help
 */
function printHelp(): void {
    console.log(`
Available commands:

  login, l [client-id] [client-secret]   Exchange client credentials for a token
                                         (defaults to API_CLIENT_ID / API_CLIENT_SECRET)
  logout                                 Forget the current token
  token                                  Show the current token summary

  get, g <path>                          GET and print the JSON response
  delete, del <path>                     DELETE and print the JSON response
  post <path> <json>                     POST a JSON body
  put <path> <json>                      PUT a JSON body
  post-form <path> [key=value...]        POST a form-encoded body
  put-form <path> [key=value...]         PUT a form-encoded body

  help, -h, --help                       Show this help message
  clear, cls                             Clear the screen
  exit, quit, q                          Exit the shell

Request options:
  -H, --header "Name: value"             Add a request header (repeatable)

Examples:
  login my-client my-secret
  get /items/1 -H "X-Trace: abc123"
  post /items '{"name":"two"}'
  put-form /profile name=John
`);
}
