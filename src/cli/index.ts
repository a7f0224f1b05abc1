/**
 * CLI - Public Exports
 */
export { createProgram } from './program';
export { runGenerator, RunResult, RunDependencies } from './run';
