import { parseArgs } from 'node:util';

export const COMMANDS = [
  'login',
  'logout',
  'status',
  'proxy',
  'keys',
  'request',
  'notify',
  'notify-completion',
  'help',
] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  /** --name: agent display name for this login */
  name?: string;
  /** --server: authorization server / relay base URL */
  server?: string;
  /** --force: log in again even with valid tokens */
  force: boolean;
  /** --forget-client: logout also drops the cached client registration */
  forgetClient: boolean;
  /** Positional relay URL for `proxy` */
  relayUrl?: string;
  /** --prompt, --choice (repeatable) and --placeholder-text for `request` */
  prompt?: string;
  choices: string[];
  placeholderText?: string;
  /** --message for `notify` */
  message?: string;
  /** --summary for `notify-completion` */
  summary?: string;
}

export const USAGE = `
hitl-agent: OAuth login and end-to-end encrypting MCP proxy

Usage:
  hitl-agent login [--name <agent>] [--server <url>] [--force]
                                  Authorize this agent in the browser (OAuth 2.1 + PKCE)
  hitl-agent logout [--forget-client]
                                  Delete stored tokens (and the client registration)
  hitl-agent status               Show credential, token expiry and key fingerprint
  hitl-agent proxy [relay-url]    Run the MCP stdio proxy
  hitl-agent keys                 Show (or create) the agent's public key and publish it
  hitl-agent request --prompt <text> [--choice <c>]... [--placeholder-text <text>]
                                  Ask the human and wait for the reply (end-to-end encrypted)
  hitl-agent notify --message <text>
                                  Send the human a notification
  hitl-agent notify-completion --summary <text>
                                  Report a finished task and wait for the human's reply

Options:
  --name <agent>    agent display name for this run (overrides HITL_AGENT_NAME)
  --server <url>    server base URL for this run (overrides HITL_SERVER_URL)

Environment:
  HITL_CONFIG_DIR   configuration directory (default ~/.hitl-agent)
  HITL_SERVER_URL   server base URL
  HITL_AGENT_NAME   agent display name
  HITL_API_KEY      use an API key instead of OAuth
  LOG_LEVEL         error | warn | info | debug
`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/** The trimmed value of a text flag a command cannot do without. */
function requiredText(value: string | undefined, flag: string, command: Command): string {
  const text = value?.trim();
  if (value === undefined) throw new Error(`${flag} is required for ${command}`);
  if (!text) throw new Error(`${flag} must not be empty`);
  return text;
}

function checkUrl(value: string, flag: string): string {
  try {
    return new URL(value).toString();
  } catch {
    throw new Error(`${flag} must be an absolute URL, got "${value}"`);
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      name: { type: 'string', short: 'n' },
      server: { type: 'string' },
      // dynamic registration is the only mode; the flag is kept for older scripts
      dynamic: { type: 'boolean' },
      force: { type: 'boolean' },
      'forget-client': { type: 'boolean' },
      prompt: { type: 'string' },
      choice: { type: 'string', multiple: true },
      'placeholder-text': { type: 'string' },
      message: { type: 'string' },
      summary: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [first = 'help', ...rest] = positionals;
  if (!isCommand(first)) throw new Error(`Unknown command "${first}". Run \`hitl-agent help\` for usage.`);
  const command: Command = values.help ? 'help' : first;

  const maxPositionals = command === 'proxy' ? 1 : 0;
  if (rest.length > maxPositionals) throw new Error(`Unexpected argument "${rest[maxPositionals]}" for ${command}`);

  const name = values.name?.trim();
  if (values.name !== undefined && !name) throw new Error('--name must not be empty');

  return {
    command,
    name,
    server: values.server === undefined ? undefined : checkUrl(values.server, '--server'),
    force: values.force ?? false,
    forgetClient: values['forget-client'] ?? false,
    relayUrl: rest[0] === undefined ? undefined : checkUrl(rest[0], 'relay-url'),
    prompt: command === 'request' ? requiredText(values.prompt, '--prompt', command) : undefined,
    choices: (values.choice ?? []).map((choice) => choice.trim()).filter(Boolean),
    placeholderText: values['placeholder-text']?.trim() || undefined,
    message: command === 'notify' ? requiredText(values.message, '--message', command) : undefined,
    summary: command === 'notify-completion' ? requiredText(values.summary, '--summary', command) : undefined,
  };
}
