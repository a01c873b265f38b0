/**
 * Prompter backed by inquirer
 *
 * Only `resume` asks anything (the low-compatibility confirmation), so
 * this stays small. Outside a TTY, or with --non-interactive, every
 * question is answered from its default without touching stdin.
 */

import inquirer from 'inquirer';
import {
  Prompter,
  ConfirmOptions,
  SelectOptions,
  SelectChoice,
  PrompterError,
  createPrompterError,
} from '../types/prompter';
import { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';

type PromptKind = 'confirm' | 'select';

export interface InquirerPrompterConfig {
  interactive: boolean;
  /** Receives prompt_shown / prompt_answered events */
  logger?: Logger;
  /** Answers used when nothing can be asked and the question has no default */
  defaults?: {
    confirm?: boolean;
  };
  /** Overrides process.stdout.isTTY */
  isTTY?: boolean;
}

export class InquirerPrompter implements Prompter {
  private interactive: boolean;
  private readonly logger: Logger | undefined;
  private readonly defaults: NonNullable<InquirerPrompterConfig['defaults']>;
  private readonly isTTY: boolean;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.interactive = config.interactive ?? true;
    this.logger = config.logger;
    this.defaults = config.defaults ?? {};
    this.isTTY = config.isTTY ?? process.stdout.isTTY ?? false;
  }

  isInteractive(): boolean {
    return this.interactive && this.isTTY;
  }

  setNonInteractive(nonInteractive: boolean): void {
    this.interactive = !nonInteractive;
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    if (!this.isInteractive()) {
      const answer = options.default ?? this.defaults.confirm;
      return answer !== undefined
        ? ok(answer)
        : err(createPrompterError('NON_INTERACTIVE', 'Cannot prompt for confirmation in non-interactive mode'));
    }

    return this.ask('confirm', options.message, {}, async () => {
      const { value } = await inquirer.prompt<{ value: boolean }>([
        { type: 'confirm', name: 'value', message: options.message, default: options.default ?? true },
      ]);
      return value;
    });
  }

  async select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      const [first] = options.choices;
      return first !== undefined
        ? ok(first.value)
        : err(createPrompterError('NON_INTERACTIVE', 'Cannot prompt for selection in non-interactive mode'));
    }

    return this.ask('select', options.message, { choices: options.choices.length }, async () => {
      const { value } = await inquirer.prompt<{ value: T }>([
        {
          type: 'list',
          name: 'value',
          message: options.message,
          choices: options.choices.map((choice) => ({ name: choiceLabel(choice), value: choice.value })),
          default: options.default,
        },
      ]);
      return value;
    });
  }

  /** Shows one question and logs both ends of it */
  private async ask<T>(
    kind: PromptKind,
    message: string,
    details: Record<string, unknown>,
    show: () => Promise<T>
  ): Promise<Result<T, PrompterError>> {
    this.logger?.event('prompt_shown', message, { prompt: kind, ...details });
    try {
      const answer = await show();
      this.logger?.event('prompt_answered', message, { prompt: kind, answer: String(answer) });
      return ok(answer);
    } catch (error) {
      return err(toPrompterError(kind, error));
    }
  }
}

function choiceLabel<T>(choice: SelectChoice<T>): string {
  return choice.description ? `${choice.name} - ${choice.description}` : choice.name;
}

// Ctrl+C surfaces as a rejected prompt
function toPrompterError(kind: PromptKind, error: unknown): PrompterError {
  if (!(error instanceof Error)) {
    return createPrompterError('IO_ERROR', `${kind} failed: ${String(error)}`);
  }
  if (error.name === 'ExitPromptError' || /force closed|cancelled/.test(error.message)) {
    return createPrompterError('CANCELLED', 'User cancelled the prompt', error);
  }
  return createPrompterError('IO_ERROR', `${kind} failed: ${error.message}`, error);
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}

/** A prompter that never reads stdin */
export function createNonInteractivePrompter(defaults?: InquirerPrompterConfig['defaults']): Prompter {
  return new InquirerPrompter({ interactive: false, defaults });
}
