export { buildProviders, openSession, runScoped, shutdownOnInterrupt, reportFailure } from './setup.js';
export type { Session } from './setup.js';
export { runInvoke, invokeCommand } from './commands/invoke.js';
export type { InvokeCommandOptions } from './commands/invoke.js';
export { runTyped, loadShape, typedCommand } from './commands/typed.js';
export type { TypedCommandOptions } from './commands/typed.js';
export { configCommand, redactConfig } from './commands/config.js';
export * from './output/formatter.js';
