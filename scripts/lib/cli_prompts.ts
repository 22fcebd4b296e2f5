import { input as inputPrompt, select as selectPrompt } from '@inquirer/prompts';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
  disabled?: boolean | string;
}

export interface PromptAdapter {
  select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T>;
  input(options: {
    message: string;
    defaultValue?: string;
  }): Promise<string>;
}

const CUSTOM_SENTINEL = '__address_custom__' as const;
const SKIP_SENTINEL = '__address_skip__' as const;

export const interactivePromptAdapter: PromptAdapter = {
  async select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T> {
    return selectPrompt({
      message: options.message,
      choices: options.choices,
      pageSize: options.pageSize,
      default: options.defaultValue
    });
  },

  async input(options): Promise<string> {
    return inputPrompt({
      message: options.message,
      default: options.defaultValue
    });
  }
};

function uniqueStrings(values: Iterable<string>): string[] {
  return Array.from(new Set(Array.from(values, (value) => value.trim()).filter(Boolean)));
}

export async function inputValidated(
  prompt: PromptAdapter,
  options: {
    message: string;
    defaultValue?: string;
    normalize?: (value: string) => string;
    validate?: (value: string) => string | undefined;
  }
): Promise<string> {
  while (true) {
    const raw = await prompt.input({
      message: options.message,
      defaultValue: options.defaultValue
    });

    const normalized = options.normalize ? options.normalize(raw.trim()) : raw.trim();
    const errorMessage = options.validate ? options.validate(normalized) : undefined;
    if (!errorMessage) {
      return normalized;
    }

    console.log(errorMessage);
  }
}

interface SelectOrCustomOptions {
  message: string;
  options: Iterable<string>;
  customInputMessage: string;
  customLabel?: string;
  validateCustom?: (value: string) => string | undefined;
  normalizeCustom?: (value: string) => string;
  pageSize?: number;
}

export async function selectOrCustom(
  prompt: PromptAdapter,
  options: SelectOrCustomOptions
): Promise<string> {
  const values = uniqueStrings(options.options);
  if (values.length === 0) {
    return inputValidated(prompt, {
      message: options.customInputMessage,
      normalize: options.normalizeCustom,
      validate: options.validateCustom
    });
  }

  const choices: Array<SelectChoice<string | typeof CUSTOM_SENTINEL>> = values.map((value) => ({
    name: value,
    value
  }));
  choices.push({
    name: options.customLabel ?? 'Custom...',
    value: CUSTOM_SENTINEL
  });

  const selected = await prompt.select({
    message: options.message,
    choices,
    pageSize: options.pageSize
  });

  if (selected !== CUSTOM_SENTINEL) {
    return selected;
  }

  return inputValidated(prompt, {
    message: options.customInputMessage,
    normalize: options.normalizeCustom,
    validate: options.validateCustom
  });
}

/**
 * Like `selectOrCustom`, with an extra Skip choice that resolves to
 * `undefined`. An empty custom answer also skips.
 */
export async function selectOptionalOrCustom(
  prompt: PromptAdapter,
  options: SelectOrCustomOptions & { skipLabel?: string }
): Promise<string | undefined> {
  const values = uniqueStrings(options.options);
  const choices: Array<
    SelectChoice<string | typeof CUSTOM_SENTINEL | typeof SKIP_SENTINEL>
  > = values.map((value) => ({
    name: value,
    value
  }));

  choices.push({
    name: options.skipLabel ?? 'Skip',
    value: SKIP_SENTINEL
  });
  choices.push({
    name: options.customLabel ?? 'Custom...',
    value: CUSTOM_SENTINEL
  });

  const selected = await prompt.select({
    message: options.message,
    choices,
    pageSize: options.pageSize
  });

  if (selected === SKIP_SENTINEL) {
    return undefined;
  }
  if (selected !== CUSTOM_SENTINEL) {
    return selected;
  }

  const validateCustom = options.validateCustom;
  const customValue = await inputValidated(prompt, {
    message: options.customInputMessage,
    normalize: options.normalizeCustom,
    validate: (value) =>
      value.length === 0 || !validateCustom ? undefined : validateCustom(value)
  });

  return customValue.length === 0 ? undefined : customValue;
}
