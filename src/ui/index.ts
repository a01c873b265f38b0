/**
 * UI module - user interface utilities
 * Provides spinners and prompts
 */

// Spinner service
export { SpinnerService, createSpinnerService } from './spinner-service';
export type { SpinnerServiceConfig, Spinner, SpinnerStream } from './spinner-service';

// Orchestrator progress
export { createSpinnerObserver } from './progress-observer';

// Inquirer-based prompter
export { InquirerPrompter, createInquirerPrompter, createNonInteractivePrompter } from './inquirer-prompter';
export type { InquirerPrompterConfig } from './inquirer-prompter';
