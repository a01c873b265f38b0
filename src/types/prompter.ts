/**
 * The questions the CLI may ask. Kept behind an interface so
 * non-interactive runs and tests never block on a TTY.
 */

import { Result } from './result';

export interface SelectChoice<T = string> {
  name: string;
  value: T;
  /** Shown after the name */
  description?: string;
}

export interface ConfirmOptions {
  message: string;
  /** Answer on enter, and the answer when nothing can be asked */
  default?: boolean;
}

export interface SelectOptions<T = string> {
  message: string;
  choices: SelectChoice<T>[];
  /** Answer when nothing can be asked; the first choice otherwise */
  default?: T;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

export type PromptResult<T> = Promise<Result<T, PrompterError>>;

export interface Prompter {
  confirm(options: ConfirmOptions): PromptResult<boolean>;
  select<T = string>(options: SelectOptions<T>): PromptResult<T>;
  /** False when stdin is not a TTY or --non-interactive was given */
  isInteractive(): boolean;
  setNonInteractive(nonInteractive: boolean): void;
}

export function createPrompterError(code: PrompterErrorCode, message: string, cause?: Error): PrompterError {
  return cause === undefined ? { code, message } : { code, message, cause };
}
