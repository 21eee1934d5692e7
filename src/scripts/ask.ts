#!/usr/bin/env node
/**
 * NetQuery CLI
 *
 * One-shot:     netquery "show me all devices in rack A1"
 * Interactive:  netquery
 */

import 'reflect-metadata';
import * as readline from 'readline';
import { NetworkAgentError } from '../errors/network-agent.errors';
import { NetworkAgent } from '../network-agent';

export interface AskOptions {
  help?: boolean;
  config?: string;
  envFile?: string;
  check?: boolean;
  query?: string;
}

function printHelp(): void {
  console.log(`
NetQuery - ask questions about your network in plain language

Usage:
  netquery [options] [question]

Without a question, starts an interactive session.

Options:
  --config, -c <path>   main.yaml, or a directory containing it (default: environment only)
  --env-file <path>     dotenv file to load (default: .env when present)
  --check               Check connectivity to every enabled tool and exit
  --help, -h            Show this help

Prefix a question with @alias to ask one tool only:
  netquery "@nx show me all devices in rack A1"

Interactive commands: reset (forget earlier questions), tools, exit
`);
}

export function parseAskArgs(args: string[]): AskOptions {
  const options: AskOptions = {};
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--config' || arg === '-c') {
      options.config = args[++i];
    } else if (arg === '--env-file') {
      options.envFile = args[++i];
    } else if (arg === '--check') {
      options.check = true;
    } else {
      words.push(arg);
    }
  }

  if (words.length > 0) {
    options.query = words.join(' ');
  }
  return options;
}

function createAgent(options: AskOptions): NetworkAgent {
  return options.config
    ? NetworkAgent.fromConfigFile(options.config, { envFile: options.envFile })
    : NetworkAgent.fromEnv({ envFile: options.envFile });
}

async function answer(agent: NetworkAgent, query: string): Promise<boolean> {
  try {
    console.log(`\n${await agent.processQuery(query)}\n`);
    return true;
  } catch (error) {
    if (error instanceof NetworkAgentError) {
      console.error(`\n[${error.code}] ${error.message}\n`);
      return false;
    }
    throw error;
  }
}

async function interactive(agent: NetworkAgent): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const tools = agent.toolManager.getEnabledTools();
  console.log(`NetQuery ready. Tools: ${tools.map((t) => `${t.name} (@${t.aliases.join(', @')})`).join('; ')}`);

  rl.setPrompt('netquery> ');
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (input === 'exit' || input === 'quit') {
      break;
    } else if (input === 'reset') {
      agent.resetConversation();
      console.log('Conversation cleared.');
    } else if (input === 'tools') {
      for (const entry of agent.toolManager.getCatalog()) {
        console.log(`  ${entry.name} [${entry.aliases.join(', ')}]: ${entry.operations.join(', ')}`);
      }
    } else if (input) {
      await answer(agent, input);
    }
    rl.prompt();
  }
  rl.close();
}

export async function main(args: string[]): Promise<number> {
  const options = parseAskArgs(args);
  if (options.help) {
    printHelp();
    return 0;
  }

  let agent: NetworkAgent;
  try {
    agent = createAgent(options);
  } catch (error) {
    if (error instanceof NetworkAgentError) {
      console.error(`[${error.code}] ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (options.check) {
    const status = await agent.validateConnections();
    for (const [name, ok] of Object.entries(status)) {
      console.log(`${ok ? 'ok  ' : 'FAIL'} ${name}`);
    }
    return Object.values(status).every(Boolean) ? 0 : 1;
  }

  if (options.query) {
    return (await answer(agent, options.query)) ? 0 : 1;
  }

  await interactive(agent);
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.stack ?? error.message : String(error));
      process.exitCode = 1;
    });
}
