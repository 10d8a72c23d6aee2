export { shellCommandFor, SpawnShellExecutor } from './ShellExecutor'
export type { ShellExecutor } from './ShellExecutor'
