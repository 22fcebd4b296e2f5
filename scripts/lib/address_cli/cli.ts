import { AddressParser, loadDefaultParser } from '../address_parser.js';
import { interactivePromptAdapter, type PromptAdapter } from '../cli_prompts.js';
import { loadGazetteer } from '../gazetteer.js';
import { getRunOptions, resolveUserPath } from '../io.js';
import {
  runBatchCommand,
  runExploreCommand,
  runNormalizeCommand,
  runParseCommand
} from './handlers.js';

export const ADDRESS_COMMANDS = ['parse', 'batch', 'normalize', 'explore'] as const;

export type AddressCommand = (typeof ADDRESS_COMMANDS)[number];

const FLAG_ARGUMENTS = new Set(['--check']);

export function parseCliOptionMap(args: string[]): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

function isAddressCommand(value: string): value is AddressCommand {
  return ADDRESS_COMMANDS.some((command) => command === value);
}

async function loadParser(options: Map<string, string>): Promise<AddressParser> {
  const dataDir = options.get('data-dir');
  if (!dataDir) {
    return loadDefaultParser();
  }
  return AddressParser.fromRecords(await loadGazetteer(resolveUserPath(dataDir)));
}

export async function runAddressCli(
  argv: string[] = process.argv.slice(2),
  prompt: PromptAdapter = interactivePromptAdapter
): Promise<void> {
  const runOptions = getRunOptions(argv);
  const args = argv.filter((arg) => !FLAG_ARGUMENTS.has(arg));

  let command = args[0]?.trim().toLowerCase();
  const hasCommand = command !== undefined && !command.startsWith('--');
  const cliOptions = parseCliOptionMap(hasCommand ? args.slice(1) : args);

  if (!hasCommand) {
    command = await prompt.select<AddressCommand>({
      message: 'Command:',
      choices: ADDRESS_COMMANDS.map((value) => ({ name: value, value }))
    });
  }

  if (command === undefined || !isAddressCommand(command)) {
    throw new Error(`Unknown command '${command}'. Expected ${ADDRESS_COMMANDS.join('|')}`);
  }

  const parser = await loadParser(cliOptions);

  switch (command) {
    case 'parse':
      await runParseCommand(parser, prompt, cliOptions);
      return;
    case 'batch':
      await runBatchCommand(parser, cliOptions, runOptions);
      return;
    case 'normalize':
      runNormalizeCommand(parser, cliOptions);
      return;
    case 'explore':
      await runExploreCommand(parser, prompt);
      return;
  }
}
