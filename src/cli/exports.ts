/**
 * Barrel export for the CLI classes.
 */

export { ReasonCLI, VERSION } from './cli.js';
export { OutputFormatter } from './formatter.js';
