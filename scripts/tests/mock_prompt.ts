import type { PromptAdapter, SelectChoice } from '../lib/cli_prompts.js';

export interface SelectCall {
  message: string;
  choiceNames: string[];
}

/**
 * Scripted prompt answers. Select steps name the choice to pick; input steps
 * are the raw text typed by the user.
 */
export class MockPromptAdapter implements PromptAdapter {
  private readonly selectQueue: string[];
  private readonly inputQueue: string[];

  readonly selectCalls: SelectCall[] = [];
  readonly inputCalls: Array<{ message: string; defaultValue?: string }> = [];

  constructor(options: { select?: string[]; input?: string[] } = {}) {
    this.selectQueue = [...(options.select ?? [])];
    this.inputQueue = [...(options.input ?? [])];
  }

  async select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T> {
    const choiceNames = options.choices.map((choice) => choice.name);
    this.selectCalls.push({ message: options.message, choiceNames });

    const name = this.selectQueue.shift();
    if (name === undefined) {
      throw new Error(`No mocked response left for select '${options.message}'`);
    }

    const choice = options.choices.find((entry) => entry.name === name);
    if (!choice) {
      throw new Error(`Choice '${name}' not offered by '${options.message}': ${choiceNames.join(', ')}`);
    }
    return choice.value;
  }

  async input(options: { message: string; defaultValue?: string }): Promise<string> {
    this.inputCalls.push(options);

    const value = this.inputQueue.shift();
    if (value === undefined) {
      throw new Error(`No mocked response left for input '${options.message}'`);
    }
    return value;
  }
}

export async function withSilentConsole<T>(run: () => Promise<T>): Promise<{ result: T; lines: string[] }> {
  const lines: string[] = [];
  const originalLog = console.log;
  console.log = (...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  };

  try {
    return { result: await run(), lines };
  } finally {
    console.log = originalLog;
  }
}
