#!/usr/bin/env node
/**
 * hitl-agent CLI.
 *
 * Usage:
 *   hitl-agent login [--name <agent>] [--server <url>] [--force]
 *   hitl-agent logout [--forget-client]
 *   hitl-agent status
 *   hitl-agent keys
 *   hitl-agent proxy [relay-url]
 *   hitl-agent request --prompt <text> [--choice <c>]... [--placeholder-text <text>]
 *   hitl-agent notify --message <text>
 *   hitl-agent notify-completion --summary <text>
 *
 * Every command but `proxy` prints to stdout.  `proxy` owns stdout for
 * JSON-RPC, so it only ever logs to stderr.
 */

import fs from 'node:fs';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import { openInBrowser } from '../auth/browser.js';
import { getEnvFilePath, type ConfigFile } from '../shared/config.js';
import { createContext } from '../shared/context.js';
import { errorMessage } from '../shared/errors.js';
import { parseCliArgs, USAGE, type CliArgs } from './args.js';
import { keys, login, logout, notify, notifyCompletion, proxy, request, status, type CommandEnv } from './commands.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  return PackageJsonSchema.parse(raw).version;
}

async function run(args: CliArgs): Promise<void> {
  if (args.command === 'help') {
    console.log(USAGE);
    return;
  }

  // flags apply to this run only
  const overrides: ConfigFile = {
    ...(args.server !== undefined && { serverUrl: args.server }),
    ...(args.name !== undefined && { agentName: args.name }),
  };
  const command: CommandEnv = { ctx: createContext({ overrides }), out: (line) => console.log(line) };

  switch (args.command) {
    case 'login': {
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        await login(command, { force: args.force, openBrowser: openInBrowser, signal: controller.signal });
      } finally {
        process.off('SIGINT', onSigint);
      }
      return;
    }
    case 'logout':
      await logout(command, { forgetClient: args.forgetClient });
      return;
    case 'status':
      await status(command);
      return;
    case 'keys':
      await keys(command);
      return;
    case 'proxy':
      await proxy({ ...command, out: (line) => console.error(line) }, { relayUrl: args.relayUrl, version: readVersion() });
      return;
    case 'request':
      await request(command, { prompt: args.prompt ?? '', choices: args.choices, placeholderText: args.placeholderText });
      return;
    case 'notify':
      await notify(command, args.message ?? '');
      return;
    case 'notify-completion':
      await notifyCompletion(command, args.summary ?? '');
      return;
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

loadEnv({ path: getEnvFilePath() });

let args: CliArgs;
try {
  args = parseCliArgs(process.argv.slice(2));
} catch (err) {
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(2);
}

run(args).catch((err: unknown) => {
  console.error(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
