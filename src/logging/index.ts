export { BaseLogger } from './base-logger';
export { ConsoleLogger, createConsoleLogger, formatEventLine } from './console-logger';
export { BufferLogger } from './buffer-logger';
